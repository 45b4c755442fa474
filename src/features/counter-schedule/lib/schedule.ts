/**
 * Counter schedule
 *
 * The counter owed on a given day is a pure function of the calendar date:
 * the start date carries `minCounter` and every following day adds one.
 */

const MS_PER_DAY = 86_400_000;

/**
 * Sentinel returned when no counter is due (before the start or after the end)
 */
export const NOT_SCHEDULED = 0;

/**
 * Parse a "YYYY-MM-DD" string into a local calendar date
 */
export function parseCalendarDate(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid calendar date "${value}" (expected YYYY-MM-DD)`);
  }

  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));

  // Date rolls 2025-02-30 over into March; reject instead
  if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    throw new Error(`Invalid calendar date "${value}"`);
  }

  return date;
}

/**
 * Whole calendar days from `from` to `to`, ignoring time of day
 */
export function daysBetween(from: Date, to: Date): number {
  const start = Date.UTC(from.getFullYear(), from.getMonth(), from.getDate());
  const end = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((end - start) / MS_PER_DAY);
}

/**
 * Counter value that should have been posted by `today`
 *
 * @returns the counter, or {@link NOT_SCHEDULED} outside `[minCounter, maxCounter]`
 */
export function expectedCounterFor(
  today: Date,
  startDate: Date,
  minCounter: number,
  maxCounter: number
): number {
  const count = daysBetween(startDate, today) + minCounter;

  if (count < minCounter || count > maxCounter) {
    return NOT_SCHEDULED;
  }

  return count;
}

/**
 * Check if running unattended in CI
 */
export function isCiEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.CI || env.GITHUB_ACTIONS);
}

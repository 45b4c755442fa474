/**
 * Operator commands
 *
 * Each command returns the process exit code; the entry point only wires
 * collaborators and exits.
 */

import * as Sentry from '@sentry/node';
import { INVALID_COUNTER, type StateManager } from '../entities/counter-state';
import { convertToPersianWord, isNumberSupported } from '../entities/numeral';
import type { PlatformClient } from '../features/bluesky-poster';
import { NOT_SCHEDULED, expectedCounterFor } from '../features/counter-schedule';
import {
  EXIT_FATAL,
  EXIT_OK,
  exitCodeFor,
  runDailyCounter,
  type CounterConfig,
  type RunResult,
} from '../features/daily-counter';
import { formatDuration } from '../shared';

export interface CommandContext {
  config: CounterConfig;
  stateManager: StateManager;
  now?: () => Date;
}

/**
 * Send a failed run to Sentry
 */
function reportRun(result: RunResult): void {
  const tags = { status: result.status, counter: String(result.finalCounter + 1) };

  if (exitCodeFor(result) !== EXIT_OK) {
    Sentry.captureMessage(`Daily counter run failed: ${result.status}`, {
      level: 'error',
      tags,
      extra: { error: result.error, storedCounter: result.storedCounter, expectedCounter: result.expectedCounter },
    });
  } else if (result.error) {
    Sentry.captureMessage(`Daily counter run stopped early: ${result.status}`, {
      level: 'warning',
      tags,
      extra: { error: result.error },
    });
  }
}

/**
 * One orchestrator pass
 */
export async function runCommand(
  context: CommandContext & { client: PlatformClient; signal?: AbortSignal; isCi?: boolean }
): Promise<number> {
  const result = await runDailyCounter(context);

  console.log(
    `\nSummary: ${result.status} | counter ${result.storedCounter} → ${result.finalCounter}` +
      ` | posted ${result.posted.length}, recovered ${result.recovered.length}`
  );
  console.log(result.changesMade ? 'State changed during this run' : 'No state changes');

  if (result.error) {
    reportRun(result);
  }

  return exitCodeFor(result);
}

/**
 * Print stored state against today's schedule
 */
export async function statusCommand(context: CommandContext): Promise<number> {
  const { config, stateManager } = context;
  const now = context.now ?? (() => new Date());

  const state = await stateManager.readState();
  const expected = expectedCounterFor(now(), config.startDate, config.minCounter, config.maxCounter);
  const cooldown = await stateManager.readCooldown();

  console.log(`🔢 Stored counter: ${state.counter === INVALID_COUNTER ? 'invalid' : state.counter}`);
  console.log(`🔗 Last post: ${state.lastPostUri ?? 'not recorded'}`);
  console.log(`📅 Expected counter: ${expected === NOT_SCHEDULED ? 'outside schedule' : expected}`);

  if (state.counter !== INVALID_COUNTER && expected !== NOT_SCHEDULED) {
    console.log(`⏳ Lag: ${Math.max(0, expected - state.counter)} day(s)`);
  }

  if (cooldown) {
    const remaining = cooldown.observedAt.getTime() + config.cooldownMs - now().getTime();
    console.log(
      remaining > 0
        ? `🚫 Rate limit cooldown active for ${formatDuration(remaining)}`
        : '✓ Rate limit cooldown expired'
    );
  } else {
    console.log('✓ No rate limit cooldown');
  }

  return EXIT_OK;
}

function parseInteger(value: string): number | null {
  return /^-?\d+$/.test(value.trim()) ? Number(value) : null;
}

/**
 * Print the Persian word for each argument
 */
export function convertCommand(args: string[]): number {
  if (args.length === 0) {
    console.error('✗ Usage: convert <number...>');
    return EXIT_FATAL;
  }

  let failed = false;
  for (const arg of args) {
    const value = parseInteger(arg);
    if (value === null || !isNumberSupported(value)) {
      failed = true;
    }
    console.log(`${arg}: ${value === null ? 'not an integer' : convertToPersianWord(value)}`);
  }

  return failed ? EXIT_FATAL : EXIT_OK;
}

export async function clearCooldownCommand(context: CommandContext): Promise<number> {
  await context.stateManager.clearCooldown();
  console.log('✓ Rate limit cooldown cleared');
  return EXIT_OK;
}

/**
 * Overwrite the stored counter after a manual fix
 */
export async function setCounterCommand(context: CommandContext, args: string[]): Promise<number> {
  const { config, stateManager } = context;
  const [value, lastPostUri] = args;
  const counter = value === undefined ? null : parseInteger(value);

  if (counter === null || counter < config.minCounter || counter > config.maxCounter) {
    console.error(`✗ Usage: set-counter <${config.minCounter}-${config.maxCounter}> [post-uri]`);
    return EXIT_FATAL;
  }

  if (lastPostUri !== undefined && !lastPostUri.startsWith('at://')) {
    console.error(`✗ Not a post URI: ${lastPostUri}`);
    return EXIT_FATAL;
  }

  await stateManager.writeState({ counter, lastPostUri });
  console.log(`✓ Stored counter set to ${counter}`);
  return EXIT_OK;
}

/**
 * Counter schedule feature - public API
 *
 * Works out which counter value is due on a given day
 */
export {
  expectedCounterFor,
  daysBetween,
  parseCalendarDate,
  isCiEnvironment,
  NOT_SCHEDULED,
} from './lib';

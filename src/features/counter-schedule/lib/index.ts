/**
 * Counter schedule exports
 */
export {
  expectedCounterFor,
  daysBetween,
  parseCalendarDate,
  isCiEnvironment,
  NOT_SCHEDULED,
} from './schedule';

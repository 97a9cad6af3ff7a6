export * from './errors';
export { CommonModule } from './common.module';
export { CLOCK, Clock, systemClock } from './providers/clock.provider';
export {
  RANDOM_SOURCE,
  RandomSource,
  mathRandomSource,
} from './providers/random.provider';
export {
  CompactDate,
  parseCompactDate,
  isLeapYear,
  daysInMonth,
  daysInYear,
  dayOfYear,
  fromDayOfYear,
} from './utils/calendar';

export {
  createLogger,
  generateCorrelationId,
  runCorrelationId,
  REDACTED_FIELDS,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  InvalidArgumentError,
  UnknownVariantError,
  RecordCorruptError,
  StorageUnavailableError,
  isOperationalError,
  toError,
  type SafeErrorDetails,
  type StorageOperation,
} from './errors.js';

export {
  isCalendarDate,
  parseCalendarDate,
  calendarDateOf,
  formatIsoDate,
  compareCalendarDates,
} from './calendar-date.js';

export {
  RecorderEnvSchema,
  loadRecorderConfig,
  type RecorderEnv,
  type RecorderConfig,
} from './env.js';

export { Ok, Err, isOk, isErr, type Result } from './types/result.js';

export type { Brand, CalendarDate } from './types/branded.js';

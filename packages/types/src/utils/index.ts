export {
  TOOLKIT_VERSION,
  UNKNOWN_BANK,
  DEFAULT_DETECTION_PAGE_BUDGET,
  FUZZY_SCORE_THRESHOLD,
} from './constants.js';
export { DATE_PATTERNS, normalizeDateString } from './date.js';
export { coerceAmount, roundToTwoDecimals } from './money.js';
export {
  createLogger,
  resolveLogLevel,
  isLogLevel,
  silentLogger,
  LOG_LEVEL_ENV,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogSink,
  type LoggerOptions,
} from './logger.js';

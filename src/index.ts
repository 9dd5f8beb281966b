export * from './lib/num/index.js';

export {
  ArithmeticError,
  MalformedLiteralError,
  DivisionByZeroError,
  NonFiniteNumberError,
  NotComparableError,
  InvalidOperandError,
  InvalidPlacesError,
  ConfigError
} from './utils/errors.js';

export type { ArithmeticErrorCode } from './utils/errors.js';

export { loadConfig, resetConfigCache, ROUNDING_NAMES } from './config/index.js';

export type { AppConfig, DecimalSettings, RoundingName, LogLevel } from './config/index.js';

export { createLogger } from './log.js';

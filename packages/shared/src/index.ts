/**
 * @lenslab/shared
 *
 * Logging, the error hierarchy and validation helpers used by every
 * other workspace package.
 *
 * @packageDocumentation
 */

export {
  ConfigError,
  type ErrorDescription,
  expectDefined,
  expectValid,
  JobFailedError,
  type JsonValue,
  LensLabError,
  LensLabErrorCode,
  NotFoundError,
  toLensLabError,
  TransportError,
  ValidationError,
} from './errors'
export {
  createLogger,
  getLogger,
  getLogLevel,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  resetLogLevel,
  setLogLevel,
} from './logger'

/**
 * @sourcer/core
 * Core utilities shared by every workspace
 */

// Config
export {
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  type BaseConfig,
  type BaseEnv,
} from "./config.js";

// Logger
export {
  logger,
  prettyHandler,
  jsonHandler,
  type LogLevel,
  type LogFormat,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  SourcerError,
  ConfigError,
  NetworkError,
  ValidationError,
  DatabaseError,
  ProviderError,
  ResolutionMissError,
  CacheUnavailableError,
  ExternalFetchError,
  ExternalFetchTimeoutError,
  SessionStateCorruptionError,
  SessionNotFoundError,
  InvalidStageTransitionError,
  InvalidPaginationRequestError,
  isSourcerError,
  isRetryableError,
  wrapError,
  type SourcerErrorOptions,
} from "./errors.js";

// Retry
export { withRetry, withTimeout, sleep, type RetryOptions } from "./retry.js";

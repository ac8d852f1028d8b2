/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

export {
  ValidationError,
  ResourceNotFoundError,
} from './ApplicationError.js';

export {
  OperationalError,
  FileSystemError,
  NetworkError,
  TimeoutError,
  ProviderError,
  RateLimitError,
  ProviderServerError,
  MalformedResponseError,
} from './ApplicationError.js';

export {
  ConfigurationError,
  BatchTimeoutError,
} from './ApplicationError.js';

export {
  RetryStrategy,
  DEFAULT_RETRY_POLICY,
  NETWORK_RETRY_POLICY,
  extractRetryAfter,
  defaultSleeper,
} from './RetryStrategy.js';

export type {
  RetryPolicy,
  RetryResult,
  Sleeper,
} from './RetryStrategy.js';

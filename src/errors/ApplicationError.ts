/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Retry hints consumed by RetryStrategy
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // Resource Errors
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  // File System Errors (local stores)
  FS_FILE_NOT_FOUND = 'FS_FILE_NOT_FOUND',
  FS_READ_FAILED = 'FS_READ_FAILED',
  FS_WRITE_FAILED = 'FS_WRITE_FAILED',
  FS_DELETE_FAILED = 'FS_DELETE_FAILED',

  // Network Errors (retryable)
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',

  // Provider Errors
  PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',
  PROVIDER_INVALID_RESPONSE = 'PROVIDER_INVALID_RESPONSE',

  // Configuration Errors (permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Batch processing
  BATCH_TIMEOUT = 'BATCH_TIMEOUT',

  UNKNOWN = 'UNKNOWN',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'search', 'writeCache') */
  operation?: string;

  /** Entity type being operated on (e.g., 'movie', 'tv') */
  entityType?: string;

  /** Entity ID or cache key if applicable */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Attempt number if retrying */
  attemptNumber?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;

  /**
   * HTTP status associated with the failure (0 for local errors)
   */
  public readonly statusCode: number;

  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: {
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION / RESOURCE ERRORS (not retryable)
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, 400, {
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ResourceNotFoundError extends ApplicationError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `${resourceType} not found: ${resourceId}`,
      ErrorCode.RESOURCE_NOT_FOUND,
      404,
      {
        retryable: false,
        context: { ...context, entityType: resourceType, entityId: resourceId },
      }
    );
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * Disk read/write failure on the cache, a metadata document or an asset.
 * Logged and skipped for the affected item only.
 */
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      0,
      false,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

export class NetworkError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      503,
      true,
      { ...context, metadata: { ...context?.metadata, url } },
      cause
    );
  }
}

export class TimeoutError extends NetworkError {
  constructor(
    public readonly timeoutMs: number,
    url?: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Operation timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      url,
      { ...context, durationMs: timeoutMs }
    );
  }
}

export class ProviderError extends OperationalError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      statusCode,
      retryable,
      { ...context, service: providerName },
      cause
    );
  }
}

export class RateLimitError extends ProviderError {
  constructor(
    providerName: string,
    /** Server-provided wait in seconds, when the response carried one */
    public readonly retryAfter?: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Rate limit exceeded for provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_RATE_LIMIT,
      429,
      true,
      { ...context, metadata: { ...context?.metadata, retryAfter } }
    );
  }
}

export class ProviderServerError extends ProviderError {
  constructor(
    providerName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Provider server error (${httpStatusCode}): ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_SERVER_ERROR,
      httpStatusCode,
      httpStatusCode >= 500, // 5xx are retryable, 4xx are not
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

/**
 * Empty or unparseable body on an otherwise successful response.
 * The catalog returns these transiently, so they are retried.
 */
export class MalformedResponseError extends ProviderError {
  constructor(
    providerName: string,
    public readonly endpoint: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Empty or malformed response from ${providerName}: ${endpoint}`,
      providerName,
      ErrorCode.PROVIDER_INVALID_RESPONSE,
      200,
      true,
      { ...context, metadata: { ...context?.metadata, endpoint } },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS
// ============================================

export class ConfigurationError extends ApplicationError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      0,
      {
        retryable: false,
        context: { ...context, metadata: { ...context?.metadata, configKey } },
      }
    );
  }
}

/**
 * An item was still in flight when its batch deadline passed.
 */
export class BatchTimeoutError extends ApplicationError {
  constructor(
    public readonly timeoutMs: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Batch timed out after ${timeoutMs}ms`,
      ErrorCode.BATCH_TIMEOUT,
      0,
      { retryable: false, context: { ...context, durationMs: timeoutMs } }
    );
  }
}

/**
 * Custom Error Types
 * Structured errors for the sourcing pipeline and its collaborators
 */

export interface SourcerErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
  retryable?: boolean;
}

/**
 * Base error class for all sourcer errors
 */
export class SourcerError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(message: string, code: string, options?: SourcerErrorOptions) {
    super(message);
    this.name = "SourcerError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends SourcerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends SourcerError {
  constructor(message: string, cause?: unknown) {
    super(message, "NETWORK_ERROR", { cause, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * Validation errors (schemas, inputs)
 */
export class ValidationError extends SourcerError {
  public readonly field?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

/**
 * Persistent store errors (Supabase or another backend)
 */
export class DatabaseError extends SourcerError {
  public readonly table: string;
  public readonly operation: string;

  constructor(message: string, table: string, operation: string, cause?: unknown) {
    super(message, "DATABASE_ERROR", {
      cause,
      context: { table, operation },
      retryable: true,
    });
    this.name = "DatabaseError";
    this.table = table;
    this.operation = operation;
  }
}

/**
 * Data provider HTTP errors
 */
export class ProviderError extends SourcerError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      endpoint?: string;
      context?: Record<string, unknown>;
    }
  ) {
    // Rate limits and upstream outages are retryable
    const status = options?.statusCode;
    const retryable = status === 429 || (status !== undefined && status >= 500);

    super(message, "PROVIDER_ERROR", { ...options, retryable });
    this.name = "ProviderError";
    this.statusCode = options?.statusCode;
    this.endpoint = options?.endpoint;
  }
}

// ============================================================
// PIPELINE TAXONOMY
// ============================================================

/**
 * No resolution tier produced a match. Non-fatal: the entity is kept unresolved.
 */
export class ResolutionMissError extends SourcerError {
  public readonly queryName: string;

  constructor(queryName: string, context?: Record<string, unknown>) {
    super(`No organization match for "${queryName}"`, "RESOLUTION_MISS", {
      context: { queryName, ...context },
      retryable: false,
    });
    this.name = "ResolutionMissError";
    this.queryName = queryName;
  }
}

/**
 * Cache backend could not be reached. Non-fatal: callers treat it as a miss.
 */
export class CacheUnavailableError extends SourcerError {
  public readonly namespace: string;

  constructor(namespace: string, operation: string, cause?: unknown) {
    super(`Cache backend unavailable during ${operation} (${namespace})`, "CACHE_UNAVAILABLE", {
      cause,
      context: { namespace, operation },
      retryable: true,
    });
    this.name = "CacheUnavailableError";
    this.namespace = namespace;
  }
}

/**
 * An external fetch failed for one item
 */
export class ExternalFetchError extends SourcerError {
  public readonly itemId?: string;

  constructor(
    message: string,
    options?: {
      itemId?: string;
      cause?: unknown;
      retryable?: boolean;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "EXTERNAL_FETCH_FAILURE", {
      cause: options?.cause,
      context: { itemId: options?.itemId, ...options?.context },
      retryable: options?.retryable ?? true,
    });
    this.name = "ExternalFetchError";
    this.itemId = options?.itemId;
  }
}

/**
 * An external call exceeded its time budget
 */
export class ExternalFetchTimeoutError extends SourcerError {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, "EXTERNAL_FETCH_TIMEOUT", {
      context: { label, timeoutMs },
      retryable: true,
    });
    this.name = "ExternalFetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Session state violates its invariants. Fatal.
 */
export class SessionStateCorruptionError extends SourcerError {
  public readonly sessionId: string;

  constructor(sessionId: string, message: string, context?: Record<string, unknown>) {
    super(`Session ${sessionId} corrupted: ${message}`, "SESSION_STATE_CORRUPTION", {
      context: { sessionId, ...context },
      retryable: false,
    });
    this.name = "SessionStateCorruptionError";
    this.sessionId = sessionId;
  }
}

export class SessionNotFoundError extends SourcerError {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND", {
      context: { sessionId },
      retryable: false,
    });
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class InvalidStageTransitionError extends SourcerError {
  constructor(sessionId: string, from: string, to: string) {
    super(`Session ${sessionId} cannot move from ${from} to ${to}`, "INVALID_STAGE_TRANSITION", {
      context: { sessionId, from, to },
      retryable: false,
    });
    this.name = "InvalidStageTransitionError";
  }
}

/**
 * Requested collection window lies beyond the known candidate ids.
 * User-visible; the session itself is unaffected.
 */
export class InvalidPaginationRequestError extends SourcerError {
  public readonly startIndex: number;
  public readonly count: number;
  public readonly available: number;

  constructor(startIndex: number, count: number, available: number) {
    super(
      `Cannot collect ${count} from index ${startIndex}: ${available} candidate ids known`,
      "INVALID_PAGINATION_REQUEST",
      { context: { startIndex, count, available }, retryable: false }
    );
    this.name = "InvalidPaginationRequestError";
    this.startIndex = startIndex;
    this.count = count;
    this.available = available;
  }
}

/**
 * Type guard to check if error is a sourcer error
 */
export function isSourcerError(error: unknown): error is SourcerError {
  return error instanceof SourcerError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isSourcerError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a sourcer error
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): SourcerError {
  if (isSourcerError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SourcerError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new SourcerError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}

/**
 * Error Types
 *
 * Coded error hierarchy shared by every tierstack package. Each error carries a
 * numeric code, a severity and free-form context so callers can log or branch
 * on it without string matching.
 *
 * Absent keys are never errors: reads of unknown keys return undefined and
 * deletes of unknown keys are no-ops. Entries dropped by a full tier stack are
 * reported through events, not exceptions.
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  NOT_FOUND = 1002,

  // Configuration errors (2000-2999)
  INVALID_CONFIG = 2000,
  MISSING_CAPACITY = 2001,

  // Locking errors (3000-3999)
  LOCK_TIMEOUT = 3000,
  LOCK_CANCELLED = 3001,

  // Inventory errors (4000-4999)
  SLOT_UNAVAILABLE = 4000
}

export enum ErrorSeverity {
  /** Expected outcome, no action needed */
  INFO = 'info',
  /** Recoverable; caller may retry */
  WARNING = 'warning',
  /** Operation failed */
  ERROR = 'error',
  /** Misconfiguration or broken invariant */
  CRITICAL = 'critical'
}

export type ErrorContext = Record<string, unknown>;

// =============================================================================
// Base Error
// =============================================================================

export class TierstackError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: ErrorContext;
  readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: {
      severity?: ErrorSeverity;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = 'TierstackError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack
    };
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Raised when cache, lock or inventory configuration is unusable, including
 * the lazy case where a new tier is needed but no capacity was configured
 * for its index.
 */
export class InvalidConfigurationError extends TierstackError {
  readonly issues: string[];

  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      issues?: string[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message, options.code ?? ErrorCode.INVALID_CONFIG, {
      severity: ErrorSeverity.CRITICAL,
      cause: options.cause,
      context: { ...options.context, issues: options.issues }
    });
    this.name = 'InvalidConfigurationError';
    this.issues = options.issues ?? [];
  }
}

export class ValidationError extends TierstackError {
  readonly field?: string;
  readonly receivedValue?: unknown;

  constructor(
    message: string,
    options: {
      field?: string;
      receivedValue?: unknown;
      context?: ErrorContext;
    } = {}
  ) {
    super(message, ErrorCode.INVALID_ARGUMENT, {
      severity: ErrorSeverity.WARNING,
      context: {
        ...options.context,
        field: options.field,
        receivedType: typeof options.receivedValue
      }
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.receivedValue = options.receivedValue;
  }
}

// =============================================================================
// Locking
// =============================================================================

/**
 * Lock could not be obtained within the caller's deadline. The protected
 * state was not touched; the caller may retry or report the resource as
 * contended.
 */
export class LockTimeoutError extends TierstackError {
  readonly key: string;
  readonly timeoutMs: number;
  readonly retryable = true;

  constructor(key: string, timeoutMs: number, context?: ErrorContext) {
    super(`Timeout: lock '${key}' not acquired within ${timeoutMs}ms`, ErrorCode.LOCK_TIMEOUT, {
      severity: ErrorSeverity.WARNING,
      context: { ...context, key, timeoutMs }
    });
    this.name = 'LockTimeoutError';
    this.key = key;
    this.timeoutMs = timeoutMs;
  }
}

/** A waiter was rejected because its lock table was disposed. */
export class LockCancelledError extends TierstackError {
  readonly key: string;

  constructor(key: string, reason = 'lock registry disposed') {
    super(`Lock '${key}' cancelled: ${reason}`, ErrorCode.LOCK_CANCELLED, {
      severity: ErrorSeverity.WARNING,
      context: { key, reason }
    });
    this.name = 'LockCancelledError';
    this.key = key;
  }
}

// =============================================================================
// Inventory
// =============================================================================

export class NotFoundError extends TierstackError {
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, ErrorCode.NOT_FOUND, {
      severity: ErrorSeverity.INFO,
      context: { resource, id }
    });
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

export type SlotUnavailableReason = 'unknown_slot' | 'sold_out';

export class SlotUnavailableError extends TierstackError {
  readonly slotKey: string;
  readonly reason: SlotUnavailableReason;

  constructor(slotKey: string, reason: SlotUnavailableReason, context?: ErrorContext) {
    const detail = reason === 'sold_out' ? 'no units available' : 'slot not configured';
    super(`Slot '${slotKey}' unavailable: ${detail}`, ErrorCode.SLOT_UNAVAILABLE, {
      severity: ErrorSeverity.INFO,
      context: { ...context, slotKey, reason }
    });
    this.name = 'SlotUnavailableError';
    this.slotKey = slotKey;
    this.reason = reason;
  }
}

// =============================================================================
// Utilities
// =============================================================================

export function isTierstackError(error: unknown): error is TierstackError {
  return error instanceof TierstackError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof LockTimeoutError) {
    return error.retryable;
  }
  return false;
}

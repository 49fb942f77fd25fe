/**
 * Base error class for hit-list errors
 */
export abstract class HitListError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;

  constructor(message: string, code: string, category: ErrorCategory, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Transient errors that may resolve on retry
   */
  TRANSIENT = 'transient',

  /**
   * Permanent errors that won't resolve on retry
   */
  PERMANENT = 'permanent',

  /**
   * Corrupted invariants; the list can no longer be trusted
   */
  FATAL = 'fatal'
}

/**
 * A record store or rank buffer could not be allocated.
 * The list it was meant for is left as it was before the call.
 */
export class AllocationError extends HitListError {
  public readonly operation: string;
  public readonly requestedCapacity: number;
  public readonly maxCapacity: number;
  public readonly originalError?: Error;

  constructor(operation: string, requestedCapacity: number, maxCapacity: number, originalError?: Error) {
    const message = `Failed to allocate ${requestedCapacity} slots for '${operation}'` +
      (originalError ? `: ${originalError.message}` : ` (limit ${maxCapacity})`);
    super(message, 'ALLOCATION_FAILED', ErrorCategory.TRANSIENT, true);
    this.operation = operation;
    this.requestedCapacity = requestedCapacity;
    this.maxCapacity = maxCapacity;
    this.originalError = originalError;
  }
}

/**
 * Operation attempted on a list in a state that does not allow it
 * (reading ranks of an unsorted list, touching a drained list, ...)
 */
export class ListStateError extends HitListError {
  public readonly operation: string;
  public readonly state: string;

  constructor(operation: string, state: string, reason?: string) {
    const message = `Cannot ${operation} ${state} hit list${reason ? `: ${reason}` : ''}`;
    super(message, 'LIST_STATE', ErrorCategory.PERMANENT, false);
    this.operation = operation;
    this.state = state;
  }
}

/**
 * Record bookkeeping is inconsistent (e.g. best domain out of range)
 */
export class InvariantError extends HitListError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION', ErrorCategory.FATAL, false);
  }
}

/**
 * Configuration validation error
 */
export class ConfigurationError extends HitListError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    const message = `Invalid configuration for '${field}': ${reason} (value: ${JSON.stringify(value)})`;
    super(message, 'CONFIG_ERROR', ErrorCategory.PERMANENT, false);
    this.field = field;
    this.value = value;
  }
}

/**
 * A hit-list file could not be read or does not match the expected shape
 */
export class HitListFormatError extends HitListError {
  public readonly file: string;
  public readonly issues: string[];

  constructor(file: string, issues: string[]) {
    const message = `Invalid hit list '${file}': ${issues.join('; ')}`;
    super(message, 'HIT_LIST_FORMAT', ErrorCategory.PERMANENT, false);
    this.file = file;
    this.issues = issues;
  }
}

/**
 * Determines if an error is retryable based on its type and properties
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HitListError) {
    return error.retryable;
  }

  // Runtime out-of-memory surfaces as a RangeError on buffer creation
  return error instanceof RangeError;
}

/**
 * Gets the error category for any error
 */
export function getErrorCategory(error: unknown): ErrorCategory {
  if (error instanceof HitListError) {
    return error.category;
  }

  if (isRetryableError(error)) {
    return ErrorCategory.TRANSIENT;
  }

  return ErrorCategory.PERMANENT;
}

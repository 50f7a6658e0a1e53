// @filename: error.ts
/**
 * Error taxonomy for subjects, bindings and the primitives built on them.
 *
 * Every error here is thrown synchronously at the call site. The core never
 * catches what an owner handler or a binding callback throws; those errors
 * propagate through the processing loop untouched.
 *
 * @module
 */

/**
 * Context accepted by every {@link SyncError}.
 */
export interface SyncErrorOptions {
  /** The operation that failed, e.g. `"perform"` or `"AutoList.insert"` */
  operation?: string;
  /** The value being processed when the error occurred */
  value?: unknown;
  /** The underlying error, if any */
  cause?: unknown;
  /** Helpful potential fixes for errors */
  tip?: unknown;
}

/**
 * Renders an error's value for {@link SyncError.toString}. Objects are shown
 * as truncated JSON; values JSON cannot encode (cycles, bigint fields) fall
 * back to `String`.
 */
function describeValue(value: unknown): string {
  if (typeof value !== "object" || value === null) return String(value);

  try {
    return JSON.stringify(value).slice(0, 100); // Truncate long objects
  } catch (error) {
    if (error instanceof TypeError) return String(value);
    throw error;
  }
}

/**
 * Base class for errors raised by this package.
 *
 * Carries the operation and value that were being processed so the message
 * printed by {@link SyncError.toString} points at the failing call.
 *
 * @example
 * ```ts
 * try {
 *   list.insert(10, "x");
 * } catch (err) {
 *   if (err instanceof SyncError) console.error(String(err));
 * }
 * ```
 */
export class SyncError extends Error {
  /** The operation where the error occurred */
  readonly operation?: string;

  /** The value being processed when the error occurred */
  readonly value?: unknown;

  /** Helpful potential fixes for errors */
  readonly tip?: unknown;

  constructor(message: string, options: SyncErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "SyncError";
    this.operation = options.operation;
    this.value = options.value;
    this.tip = options.tip;
  }

  /**
   * Returns a string representation of the error including the operation
   * and value context if available.
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.operation) {
      result += `\n  in operation: ${this.operation}`;
    }

    if (this.value !== undefined) {
      result += `\n  processing value: ${describeValue(this.value)}`;
    }

    if (this.cause !== undefined) {
      result += `\n  caused by: ${this.cause}`;
    }

    if (this.tip) {
      result += `\n  tip: ${this.tip}`;
    }

    return result;
  }
}

/**
 * Raised by any mutating call on a subject, binding or primitive that has
 * already been disposed. Never recovered internally: stop using the object.
 */
export class ObjectDisposedError extends SyncError {
  /** Name of the disposed object, e.g. `"SyncSubject"` */
  readonly objectName: string;

  constructor(objectName: string, message?: string, options: SyncErrorOptions = {}) {
    super(
      message ?? `Cannot perform operation because the ${objectName} has been disposed.`,
      options,
    );
    this.name = "ObjectDisposedError";
    this.objectName = objectName;
  }
}

/**
 * Raised when an argument is outside what an operation accepts: an index out
 * of range, or a payload with no runtime type.
 */
export class InvalidArgumentError extends SyncError {
  /** Name of the offending argument */
  readonly argument: string;

  constructor(argument: string, message: string, options: SyncErrorOptions = {}) {
    super(message, options);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

/**
 * Raised by APIs that cannot honour deferred execution, such as a removal
 * that would have to report whether it removed anything.
 */
export class UnsupportedOperationError extends SyncError {
  constructor(message: string, options: SyncErrorOptions = {}) {
    super(message, options);
    this.name = "UnsupportedOperationError";
  }
}

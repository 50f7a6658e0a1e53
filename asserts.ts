import { InvalidArgumentError, ObjectDisposedError } from "./error.ts";

/**
 * Throws an {@link ObjectDisposedError} when `disposed` is true.
 *
 * Mutating entry points on subjects, bindings and primitives start with it.
 *
 * @param disposed - The object's disposed flag
 * @param objectName - Name used in the error message, e.g. `"SyncSubject"`
 * @param operation - The entry point being called
 *
 * @throws {ObjectDisposedError} When the object has been disposed
 *
 * @example
 * ```ts
 * perform<TOp>(op: TOp): void {
 *   assertNotDisposed(this.#disposed, "SyncSubject", "perform");
 *   // ...
 * }
 * ```
 */
export function assertNotDisposed(disposed: boolean, objectName: string, operation: string): void {
  if (disposed) {
    throw new ObjectDisposedError(objectName, undefined, { operation });
  }
}

/**
 * Narrows away `null` and `undefined`, which have no runtime type and so
 * cannot be routed to a handler or a callback.
 *
 * @throws {InvalidArgumentError} When `value` is `null` or `undefined`
 */
export function assertPayload<T>(value: T, operation: string): asserts value is NonNullable<T> {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError("payload", `Payload cannot be ${value}.`, {
      operation,
      tip: "Wrap absent values in a payload class so they carry a runtime type.",
    });
  }
}

/**
 * Checks that `index` is an integer in `[0, length)`, or `[0, length]` when
 * `inclusiveEnd` is set (insertion may target the end of a list).
 *
 * @throws {InvalidArgumentError} When the index is out of range
 */
export function assertIndex(index: number, length: number, operation: string, inclusiveEnd = false): void {
  const upper = inclusiveEnd ? length : length - 1;
  if (!Number.isInteger(index) || index < 0 || index > upper) {
    throw new InvalidArgumentError(
      "index",
      `Index ${index} is out of range; expected 0..${upper}.`,
      { operation, value: index },
    );
  }
}

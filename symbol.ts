// @filename: symbol.ts
/**
 * Well-known symbols used by subjects, bindings and primitives.
 *
 * - `PERFORM`: the key of the method an owner implements to receive atomic
 *   operations from its {@link SyncSubject}.
 * - `Symbol.dispose`: polyfilled where the runtime lacks it, so every
 *   disposable object here works with `[Symbol.dispose]()` (and `using`
 *   blocks on runtimes that support them).
 *
 * @module
 */

/**
 * Key of the owner-side operation handler.
 *
 * Keeping the handler behind a symbol keeps it off the public, string-keyed
 * surface of the primitives: only code holding the symbol (the subject) is
 * expected to call it.
 *
 * @example
 * ```ts
 * class Counter implements SyncOwner {
 *   #subject = new SyncSubject(this);
 *   [PERFORM](op: unknown): void {
 *     // route `op` to the handler for its type
 *   }
 * }
 * ```
 */
export const PERFORM: unique symbol = Symbol("serialized-sync.perform");

/**
 * Adds Symbol.dispose if it doesn't exist natively.
 *
 *
 * This ensures Symbol.dispose is available for resource management,
 * even in environments that don't support it natively.
 */
if (typeof Symbol.dispose !== "symbol") {
  Reflect.defineProperty(Symbol, "dispose", {
    value: Symbol.for("Symbol.dispose"),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

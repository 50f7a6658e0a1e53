// @filename: binding.ts
import "./symbol.ts";

import type { Callback, Condition, ISyncBinding, ISyncSubject, PayloadType } from "./_types.ts";
import { assertNotDisposed } from "./asserts.ts";
import { ObjectDisposedError } from "./error.ts";
import { CallbackRegistry, type TypeKey, wrapCallback } from "./registry.ts";

/**
 * Listens to the broadcasts of one {@link SyncSubject}.
 *
 * A binding attaches itself to its subject when constructed and detaches when
 * disposed. Callbacks are keyed by the exact runtime type of the payload they
 * receive and run in the order they were added; an optional condition gates
 * each one.
 *
 * Primitives subclass it to offer typed registration methods (`onAdd`,
 * `onValue`, ...) that call {@link SyncBinding.addCallback} underneath.
 *
 * @example
 * ```ts
 * class Tick { constructor(readonly n: number) {} }
 *
 * const binding = new SyncBinding(subject);
 * binding.addCallback(Tick, (tick) => log.push(tick.n));
 * binding.addCallback(Tick, (tick) => log.push(tick.n * 10), (tick) => tick.n > 1);
 *
 * binding.invokeCallbacks(new Tick(2)); // log: [2, 20]
 * binding.dispose();
 * ```
 */
export class SyncBinding implements ISyncBinding {
  #subject: ISyncSubject | null;
  #callbacks = new CallbackRegistry();
  #disposed = false;

  /**
   * @throws {ObjectDisposedError} When `subject` is already disposed
   */
  constructor(subject: ISyncSubject) {
    if (subject.isDisposed) {
      throw new ObjectDisposedError(
        "SyncSubject",
        "Cannot create a binding to a disposed subject.",
        { operation: "SyncBinding.constructor" },
      );
    }

    this.#subject = subject;
    subject.addBinding(this);
  }

  get isDisposed(): boolean {
    return this.#disposed;
  }

  /**
   * The subject this binding is attached to, for subclasses that perform
   * operations on it (for example to replay current state).
   *
   * @throws {ObjectDisposedError} Once the binding is disposed
   */
  protected requireSubject(): ISyncSubject {
    if (this.#disposed || this.#subject === null) {
      throw new ObjectDisposedError(
        "SyncBinding",
        "This SyncBinding has been disposed and can no longer be used.",
      );
    }
    return this.#subject;
  }

  /**
   * Registers a callback for broadcasts whose runtime type is exactly `type`,
   * optionally gated by `condition`.
   *
   * @throws {ObjectDisposedError} Once the binding is disposed
   */
  addCallback(type: NumberConstructor, callback: Callback<number>, condition?: Condition<number>): void;
  addCallback(type: StringConstructor, callback: Callback<string>, condition?: Condition<string>): void;
  addCallback(type: BooleanConstructor, callback: Callback<boolean>, condition?: Condition<boolean>): void;
  addCallback(type: BigIntConstructor, callback: Callback<bigint>, condition?: Condition<bigint>): void;
  addCallback<T>(type: PayloadType<T>, callback: Callback<T>, condition?: Condition<T>): void;
  addCallback<T>(type: TypeKey, callback: Callback<T>, condition?: Condition<T>): void {
    this.register(type, callback, condition);
  }

  /**
   * Implementation of {@link SyncBinding.addCallback} for subclasses that
   * declare their own overloads tying `T` to `type`.
   *
   * @throws {ObjectDisposedError} Once the binding is disposed
   */
  protected register<T>(type: TypeKey, callback: Callback<T>, condition?: Condition<T>): void {
    assertNotDisposed(this.#disposed, "SyncBinding", "addCallback");
    this.#callbacks.addEntry(type, wrapCallback(type, callback, condition));
  }

  /**
   * Runs the callbacks registered for the broadcast's runtime type, in
   * registration order.
   *
   * @throws {ObjectDisposedError} Once the binding is disposed
   */
  invokeCallbacks<TBroadcast>(broadcast: TBroadcast): void {
    assertNotDisposed(this.#disposed, "SyncBinding", "invokeCallbacks");
    this.#callbacks.invoke(broadcast);
  }

  /**
   * Clears every callback and detaches from the subject. Safe to call from
   * inside a callback: the subject applies the removal once its current
   * broadcast finishes. Calling it again does nothing.
   */
  dispose(): void {
    if (this.#disposed) return;

    this.#callbacks.clear();

    const subject = this.#subject;
    this.#subject = null;
    this.#disposed = true;

    // a disposed subject has already dropped its bindings
    if (subject && !subject.isDisposed) {
      subject.removeBinding(this);
    }
  }

  [Symbol.dispose](): void {
    this.dispose();
  }
}

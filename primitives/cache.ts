// @filename: primitives/cache.ts
/**
 * A cache holding the latest value of each type, which also forwards every
 * pushed value to its bindings.
 *
 * Values are stored by type (last write wins), so `tryGetValue(Config)`
 * answers "what was the last `Config` pushed?". Derived types are stored
 * under their own type unless pushed with an explicit `asType`.
 *
 * @example
 * ```ts
 * class Resized { constructor(readonly width: number) {} }
 *
 * const cache = new AutoCache();
 * cache.bind().onValue(Resized, ({ width }) => console.log(width));
 *
 * cache.push(new Resized(640));  // 640
 * cache.tryGetValue(Resized);    // Resized { width: 640 }
 * cache.tryGetValue(String);     // undefined
 * ```
 *
 * @module
 */

import type { AutoObject, BoxlessValueHandler, Callback, Condition, PayloadType, SyncOwner } from "../_types.ts";
import { assertNotDisposed, assertPayload } from "../asserts.ts";
import { SyncBinding } from "../binding.ts";
import { BoxlessQueue } from "../boxless.ts";
import { CallbackRegistry, hasInstance, type PrimitiveType, runtimeTypeOf, type TypeKey } from "../registry.ts";
import { SyncSubject } from "../subject.ts";
import { PERFORM } from "../symbol.ts";

// Atomic operations
class PopOp {}
class ClearOp {}

// Broadcasts
class ValueBroadcast {
  constructor(readonly value: unknown) {}
}
class ClearBroadcast {}

const POP = new PopOp();
const CLEAR = new ClearOp();
const CLEARED = new ClearBroadcast();

/**
 * A binding to an {@link AutoCache}.
 */
export class AutoCacheBinding extends SyncBinding {
  /**
   * Called for every pushed value that is an instance of `type`, including
   * instances of its subclasses. Primitive values match their wrapper
   * constructor (`Number`, `String`, ...).
   */
  onValue(type: NumberConstructor, callback: Callback<number>, condition?: Condition<number>): this;
  onValue(type: StringConstructor, callback: Callback<string>, condition?: Condition<string>): this;
  onValue(type: BooleanConstructor, callback: Callback<boolean>, condition?: Condition<boolean>): this;
  onValue(type: BigIntConstructor, callback: Callback<bigint>, condition?: Condition<bigint>): this;
  onValue<T>(type: PayloadType<T>, callback: Callback<T>, condition?: Condition<T>): this;
  onValue<T>(type: TypeKey, callback: Callback<T>, condition?: Condition<T>): this {
    this.addCallback(ValueBroadcast, ({ value }) => {
      if (hasInstance<T>(value, type) && (!condition || condition(value))) callback(value);
    });
    return this;
  }

  /** Called when the cache is cleared. */
  onClear(callback: () => void): this {
    this.addCallback(ClearBroadcast, () => callback());
    return this;
  }
}

export class AutoCache implements AutoObject<AutoCacheBinding>, SyncOwner {
  #subject: SyncSubject;
  #handlers = new CallbackRegistry();
  #values = new Map<object, unknown>();
  #pending = new BoxlessQueue();

  #forward: BoxlessValueHandler = {
    handleValue: (value: unknown): void => this.#subject.broadcast(new ValueBroadcast(value)),
  };

  constructor() {
    this.#subject = new SyncSubject(this);

    this.#handlers.add(PopOp, () => this.#pending.dequeue(this.#forward));
    this.#handlers.add(ClearOp, () => this.#subject.broadcast(CLEARED));
  }

  /** Number of types with a stored value. */
  get count(): number {
    return this.#values.size;
  }

  /**
   * Stores `value` under `asType` (or its own runtime type), then forwards it
   * to the bindings. The store is visible immediately; the broadcast follows
   * the cache's other pending operations.
   *
   * @throws {InvalidArgumentError} When `value` is `null` or `undefined`
   * @throws {ObjectDisposedError} Once the cache is disposed
   */
  push<T>(value: T, asType?: PayloadType<T> | PrimitiveType): void {
    assertNotDisposed(this.#subject.isDisposed, "AutoCache", "push");
    assertPayload(value, "AutoCache.push");

    const key: object = asType ? asType.prototype : runtimeTypeOf(value, "AutoCache.push");
    this.#values.set(key, value);

    this.#pending.enqueue(value);
    this.#subject.perform(POP);
  }

  /**
   * The last value stored under exactly `type`, if any.
   */
  tryGetValue(type: NumberConstructor): number | undefined;
  tryGetValue(type: StringConstructor): string | undefined;
  tryGetValue(type: BooleanConstructor): boolean | undefined;
  tryGetValue(type: BigIntConstructor): bigint | undefined;
  tryGetValue<T>(type: PayloadType<T>): T | undefined;
  tryGetValue<T>(type: TypeKey): T | undefined {
    const value = this.#values.get(type.prototype);
    return hasInstance<T>(value, type) ? value : undefined;
  }

  /**
   * Drops every stored value and tells the bindings.
   *
   * @throws {ObjectDisposedError} Once the cache is disposed
   */
  clear(): void {
    assertNotDisposed(this.#subject.isDisposed, "AutoCache", "clear");

    this.#values.clear();
    this.#subject.perform(CLEAR);
  }

  bind(): AutoCacheBinding {
    return new AutoCacheBinding(this.#subject);
  }

  clearBindings(): void {
    this.#subject.clearBindings();
  }

  dispose(): void {
    this.#subject.dispose();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  [PERFORM](op: unknown): void {
    this.#handlers.invoke(op);
  }
}

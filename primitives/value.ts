// @filename: primitives/value.ts
/**
 * An observable single value that replays its current value to each new
 * callback.
 *
 * @example
 * ```ts
 * const health = new AutoValue(100);
 * using binding = health.bind();
 *
 * binding.onValue((hp) => console.log("hp", hp)); // hp 100
 * health.value = 90;                              // hp 90
 * health.value = 90;                              // (unchanged, no broadcast)
 * ```
 *
 * @module
 */

import type { AutoObject, Callback, Condition, EqualityComparer, PayloadType, SyncOwner } from "../_types.ts";
import { SyncBinding } from "../binding.ts";
import { CallbackRegistry, isInstanceOf } from "../registry.ts";
import { SyncSubject } from "../subject.ts";
import { PERFORM } from "../symbol.ts";

// Atomic operations
class UpdateOp<T> {
  constructor(readonly value: T) {}
}

/** Replays the current value to one callback, right after it registers. */
class SyncOp<T> {
  constructor(readonly callback: Callback<T>, readonly condition: Condition<T>) {}
}

// Broadcasts
class UpdateBroadcast<T> {
  constructor(readonly value: T) {}
}

export interface AutoValueOptions<T> {
  /**
   * Decides whether an assignment changes the value.
   * @default Object.is
   */
  comparer?: EqualityComparer<T>;
}

/**
 * A binding to an {@link AutoValue}.
 */
export class AutoValueBinding<T> extends SyncBinding {
  /**
   * Calls `callback` with the current value (once the value's pending
   * operations have run), then with every new value. Both are skipped when
   * `condition` rejects the value.
   */
  onValue(callback: Callback<T>, condition?: Condition<T>): this {
    const accepts: Condition<T> = condition ?? (() => true);

    this.addCallback<UpdateBroadcast<T>>(
      UpdateBroadcast,
      (broadcast) => callback(broadcast.value),
      (broadcast) => accepts(broadcast.value),
    );

    this.requireSubject().perform(new SyncOp(callback, accepts));
    return this;
  }

  /**
   * Like {@link AutoValueBinding.onValue}, but only for values that are
   * instances of `type`.
   */
  onValueOf<D extends T>(type: PayloadType<D>, callback: Callback<D>, condition?: Condition<D>): this {
    const accepts = (value: T): boolean => isInstanceOf(value, type) && (!condition || condition(value));
    const deliver = (value: T): void => {
      if (isInstanceOf(value, type)) callback(value);
    };

    this.addCallback<UpdateBroadcast<T>>(
      UpdateBroadcast,
      (broadcast) => deliver(broadcast.value),
      (broadcast) => accepts(broadcast.value),
    );

    this.requireSubject().perform(new SyncOp(deliver, accepts));
    return this;
  }
}

/**
 * An observable value. Assignments are atomic operations: they are applied
 * in order, and never while bindings are still being told about a previous
 * change.
 *
 * Reading `value` right after assigning it from inside a callback returns
 * the old value; the assignment runs once the current broadcast completes.
 */
export class AutoValue<T> implements AutoObject<AutoValueBinding<T>>, SyncOwner {
  #value: T;
  #subject: SyncSubject;
  #handlers = new CallbackRegistry();

  /** Equality used to skip assignments that change nothing. */
  readonly comparer: EqualityComparer<T>;

  constructor(value: T, { comparer = Object.is }: AutoValueOptions<T> = {}) {
    this.#value = value;
    this.comparer = comparer;
    this.#subject = new SyncSubject(this);

    this.#handlers.add<UpdateOp<T>>(UpdateOp, (op) => this.#update(op));
    this.#handlers.add<SyncOp<T>>(SyncOp, (op) => this.#sync(op));
  }

  get value(): T {
    return this.#value;
  }

  set value(value: T) {
    this.#subject.perform(new UpdateOp(value));
  }

  bind(): AutoValueBinding<T> {
    return new AutoValueBinding<T>(this.#subject);
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

  #update(op: UpdateOp<T>): void {
    if (this.comparer(this.#value, op.value)) return;

    this.#value = op.value;
    this.#subject.broadcast(new UpdateBroadcast(op.value));
  }

  #sync(op: SyncOp<T>): void {
    if (op.condition(this.#value)) op.callback(this.#value);
  }
}

// @filename: primitives/set.ts
import type { AutoObject, Callback, EqualityComparer, PayloadType, SyncOwner } from "../_types.ts";
import { SyncBinding } from "../binding.ts";
import { UnsupportedOperationError } from "../error.ts";
import { CallbackRegistry, isInstanceOf } from "../registry.ts";
import { SyncSubject } from "../subject.ts";
import { PERFORM } from "../symbol.ts";

// Atomic operations
class AddOp<T> {
  constructor(readonly item: T) {}
}

class RemoveOp<T> {
  constructor(readonly item: T) {}
}

class ClearOp {}

// Broadcasts
class AddBroadcast<T> {
  constructor(readonly item: T) {}
}

class RemoveBroadcast<T> {
  constructor(readonly item: T) {}
}

class ClearBroadcast {}

/** Follows every Add, Remove and Clear broadcast. */
class ModifyBroadcast {}

const CLEAR = new ClearOp();
const CLEARED = new ClearBroadcast();
const MODIFIED = new ModifyBroadcast();

export interface AutoSetOptions<T> {
  /** Initial contents. No broadcasts are sent for them. */
  items?: Iterable<T>;
  /**
   * Item equality. Without one, membership is SameValueZero and lookups go
   * through the native `Set`; with one, lookups scan the items.
   */
  comparer?: EqualityComparer<T>;
}

/**
 * A binding to an {@link AutoSet}.
 */
export class AutoSetBinding<T> extends SyncBinding {
  onAdd(callback: Callback<T>): this {
    this.addCallback<AddBroadcast<T>>(AddBroadcast, ({ item }) => callback(item));
    return this;
  }

  onAddOf<D extends T>(type: PayloadType<D>, callback: Callback<D>): this {
    this.addCallback<AddBroadcast<T>>(AddBroadcast, ({ item }) => {
      if (isInstanceOf(item, type)) callback(item);
    });
    return this;
  }

  onRemove(callback: Callback<T>): this {
    this.addCallback<RemoveBroadcast<T>>(RemoveBroadcast, ({ item }) => callback(item));
    return this;
  }

  onRemoveOf<D extends T>(type: PayloadType<D>, callback: Callback<D>): this {
    this.addCallback<RemoveBroadcast<T>>(RemoveBroadcast, ({ item }) => {
      if (isInstanceOf(item, type)) callback(item);
    });
    return this;
  }

  onClear(callback: () => void): this {
    this.addCallback(ClearBroadcast, () => callback());
    return this;
  }

  /**
   * Called after any change to the set's contents, once the more specific
   * callbacks for that change have run.
   */
  onModify(callback: () => void): this {
    this.addCallback(ModifyBroadcast, () => callback());
    return this;
  }
}

/**
 * An observable set. Membership is SameValueZero, like `Set`, unless a
 * `comparer` is given.
 *
 * `add`, `remove` and `clear` broadcast only when they change the set.
 *
 * @example
 * ```ts
 * const tags = new AutoSet<string>();
 * tags.bind()
 *   .onAdd((tag) => console.log("+", tag))
 *   .onModify(() => console.log("now", tags.size));
 *
 * tags.add("red"); // + red, now 1
 * tags.add("red"); // (already present)
 * ```
 */
export class AutoSet<T> implements AutoObject<AutoSetBinding<T>>, SyncOwner, Iterable<T> {
  #items: Set<T>;
  #subject: SyncSubject;
  #handlers = new CallbackRegistry();

  readonly comparer?: EqualityComparer<T>;

  constructor({ items = [], comparer }: AutoSetOptions<T> = {}) {
    this.comparer = comparer;
    this.#items = new Set();
    for (const item of items) {
      if (!this.#find(item)) this.#items.add(item);
    }
    this.#subject = new SyncSubject(this);

    this.#handlers.add<AddOp<T>>(AddOp, (op) => this.#add(op));
    this.#handlers.add<RemoveOp<T>>(RemoveOp, (op) => this.#remove(op));
    this.#handlers.add(ClearOp, () => this.#clear());
  }

  get size(): number {
    return this.#items.size;
  }

  has(item: T): boolean {
    return this.#find(item) !== undefined;
  }

  toArray(): T[] {
    return Array.from(this.#items);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.#items.values();
  }

  add(item: T): void {
    this.#subject.perform(new AddOp(item));
  }

  /** Removes `item` if present. Absent items are ignored. */
  remove(item: T): void {
    this.#subject.perform(new RemoveOp(item));
  }

  /**
   * Not supported: removal may be deferred, so whether it happened cannot be
   * reported. Use {@link AutoSet.remove}.
   *
   * @throws {UnsupportedOperationError} Always
   */
  delete(item: T): boolean {
    throw new UnsupportedOperationError(
      "AutoSet cannot report whether an item was removed because removal may be deferred.",
      { operation: "AutoSet.delete", value: item, tip: "Use remove() instead." },
    );
  }

  clear(): void {
    this.#subject.perform(CLEAR);
  }

  bind(): AutoSetBinding<T> {
    return new AutoSetBinding<T>(this.#subject);
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

  /** The stored item equal to `item`, boxed so `undefined` items are found too. */
  #find(item: T): [T] | undefined {
    const comparer = this.comparer;
    if (!comparer) return this.#items.has(item) ? [item] : undefined;

    for (const candidate of this.#items) {
      if (comparer(candidate, item)) return [candidate];
    }
    return undefined;
  }

  #add({ item }: AddOp<T>): void {
    if (this.#find(item)) return;

    this.#items.add(item);
    this.#subject.broadcast(new AddBroadcast(item));
    this.#subject.broadcast(MODIFIED);
  }

  #remove({ item }: RemoveOp<T>): void {
    const found = this.#find(item);
    if (!found) return;

    const [stored] = found;
    this.#items.delete(stored);
    this.#subject.broadcast(new RemoveBroadcast(stored));
    this.#subject.broadcast(MODIFIED);
  }

  #clear(): void {
    if (this.#items.size === 0) return;

    this.#items.clear();
    this.#subject.broadcast(CLEARED);
    this.#subject.broadcast(MODIFIED);
  }
}

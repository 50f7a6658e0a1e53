// @filename: primitives/list.ts
import type { AutoObject, EqualityComparer, PayloadType, SyncOwner } from "../_types.ts";
import { assertIndex } from "../asserts.ts";
import { SyncBinding } from "../binding.ts";
import { CallbackRegistry, isInstanceOf } from "../registry.ts";
import { SyncSubject } from "../subject.ts";
import { PERFORM } from "../symbol.ts";

//////////////////////////
// Atomic operations    //
//////////////////////////

class AddOp<T> {
  constructor(readonly item: T) {}
}

class InsertOp<T> {
  constructor(readonly index: number, readonly item: T) {}
}

class UpdateOp<T> {
  constructor(readonly index: number, readonly item: T) {}
}

class RemoveAtOp {
  constructor(readonly index: number) {}
}

class RemoveOp<T> {
  constructor(readonly item: T) {}
}

class ClearOp {}

//////////////////////////
// Broadcasts           //
//////////////////////////

class AddBroadcast<T> {
  constructor(readonly item: T, readonly index: number) {}
}

class UpdateBroadcast<T> {
  constructor(readonly previous: T, readonly item: T, readonly index: number) {}
}

class RemoveBroadcast<T> {
  constructor(readonly item: T, readonly index: number) {}
}

class ClearBroadcast {}

const CLEAR = new ClearOp();
const CLEARED = new ClearBroadcast();

/** Receives an item and the index it was added at or removed from. */
export type ItemCallback<T> = (item: T, index: number) => void;

/** Receives the replaced item, its replacement and their index. */
export type UpdateCallback<P, T> = (previous: P, item: T, index: number) => void;

export interface AutoListOptions<T> {
  /** Initial contents. No broadcasts are sent for them. */
  items?: Iterable<T>;
  /**
   * Item equality, used by `set`, `remove`, `indexOf` and `contains`.
   * @default Object.is
   */
  comparer?: EqualityComparer<T>;
}

/**
 * A binding to an {@link AutoList}. Every registration method returns the
 * binding so calls can be chained.
 */
export class AutoListBinding<T> extends SyncBinding {
  /** Called when an item is added or inserted. */
  onAdd(callback: ItemCallback<T>): this {
    this.addCallback<AddBroadcast<T>>(AddBroadcast, ({ item, index }) => callback(item, index));
    return this;
  }

  /** Called when an item that is an instance of `type` is added or inserted. */
  onAddOf<D extends T>(type: PayloadType<D>, callback: ItemCallback<D>): this {
    this.addCallback<AddBroadcast<T>>(AddBroadcast, ({ item, index }) => {
      if (isInstanceOf(item, type)) callback(item, index);
    });
    return this;
  }

  /** Called when `set` replaces an item with one that is not equal to it. */
  onUpdate(callback: UpdateCallback<T, T>): this {
    this.addCallback<UpdateBroadcast<T>>(
      UpdateBroadcast,
      ({ previous, item, index }) => callback(previous, item, index),
    );
    return this;
  }

  /**
   * Called for updates where the replaced item is an instance of `previousType`
   * and its replacement an instance of `itemType`.
   */
  onUpdateOf<P extends T, D extends T>(
    previousType: PayloadType<P>,
    itemType: PayloadType<D>,
    callback: UpdateCallback<P, D>,
  ): this {
    this.addCallback<UpdateBroadcast<T>>(UpdateBroadcast, ({ previous, item, index }) => {
      if (isInstanceOf(previous, previousType) && isInstanceOf(item, itemType)) {
        callback(previous, item, index);
      }
    });
    return this;
  }

  /** Called when an item is removed, with the index it was removed from. */
  onRemove(callback: ItemCallback<T>): this {
    this.addCallback<RemoveBroadcast<T>>(RemoveBroadcast, ({ item, index }) => callback(item, index));
    return this;
  }

  /** Called when an item that is an instance of `type` is removed. */
  onRemoveOf<D extends T>(type: PayloadType<D>, callback: ItemCallback<D>): this {
    this.addCallback<RemoveBroadcast<T>>(RemoveBroadcast, ({ item, index }) => {
      if (isInstanceOf(item, type)) callback(item, index);
    });
    return this;
  }

  /** Called when a non-empty list is cleared. Removed items are not reported. */
  onClear(callback: () => void): this {
    this.addCallback(ClearBroadcast, () => callback());
    return this;
  }
}

/**
 * An observable list. Mutations are atomic operations; reads see only the
 * operations that have already run.
 *
 * Index arguments are checked when the operation runs, so an out-of-range
 * index passed while the list is busy throws from the call that drains it.
 *
 * @example
 * ```ts
 * const list = new AutoList<string>();
 * list.bind()
 *   .onAdd((item, index) => console.log("add", item, index))
 *   .onRemove((item, index) => console.log("remove", item, index));
 *
 * list.add("a");    // add a 0
 * list.insert(0, "b"); // add b 0
 * list.remove("a"); // remove a 1
 * ```
 */
export class AutoList<T> implements AutoObject<AutoListBinding<T>>, SyncOwner, Iterable<T> {
  #items: T[];
  #subject: SyncSubject;
  #handlers = new CallbackRegistry();

  readonly comparer: EqualityComparer<T>;

  constructor({ items = [], comparer = Object.is }: AutoListOptions<T> = {}) {
    this.#items = Array.from(items);
    this.comparer = comparer;
    this.#subject = new SyncSubject(this);

    this.#handlers.add<AddOp<T>>(AddOp, (op) => this.#add(op));
    this.#handlers.add<InsertOp<T>>(InsertOp, (op) => this.#insert(op));
    this.#handlers.add<UpdateOp<T>>(UpdateOp, (op) => this.#update(op));
    this.#handlers.add(RemoveAtOp, (op) => this.#removeAt(op));
    this.#handlers.add<RemoveOp<T>>(RemoveOp, (op) => this.#remove(op));
    this.#handlers.add(ClearOp, () => this.#clear());
  }

  get length(): number {
    return this.#items.length;
  }

  /**
   * @throws {InvalidArgumentError} When `index` is out of range
   */
  get(index: number): T {
    assertIndex(index, this.#items.length, "AutoList.get");
    return this.#items[index];
  }

  indexOf(item: T): number {
    return this.#items.findIndex((candidate) => this.comparer(candidate, item));
  }

  contains(item: T): boolean {
    return this.indexOf(item) >= 0;
  }

  /** A copy of the current items. */
  toArray(): T[] {
    return this.#items.slice();
  }

  [Symbol.iterator](): Iterator<T> {
    return this.#items[Symbol.iterator]();
  }

  add(item: T): void {
    this.#subject.perform(new AddOp(item));
  }

  /** Inserts at `0..length`; `length` appends. */
  insert(index: number, item: T): void {
    this.#subject.perform(new InsertOp(index, item));
  }

  /** Replaces the item at `index`. Equal replacements change nothing. */
  set(index: number, item: T): void {
    this.#subject.perform(new UpdateOp(index, item));
  }

  removeAt(index: number): void {
    this.#subject.perform(new RemoveAtOp(index));
  }

  /** Removes the first item equal to `item`, if there is one. */
  remove(item: T): void {
    this.#subject.perform(new RemoveOp(item));
  }

  clear(): void {
    this.#subject.perform(CLEAR);
  }

  bind(): AutoListBinding<T> {
    return new AutoListBinding<T>(this.#subject);
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

  ///////////////////////////
  // Operation handlers    //
  ///////////////////////////

  #add({ item }: AddOp<T>): void {
    this.#items.push(item);
    this.#subject.broadcast(new AddBroadcast(item, this.#items.length - 1));
  }

  #insert({ index, item }: InsertOp<T>): void {
    assertIndex(index, this.#items.length, "AutoList.insert", true);

    this.#items.splice(index, 0, item);
    this.#subject.broadcast(new AddBroadcast(item, index));
  }

  #update({ index, item }: UpdateOp<T>): void {
    assertIndex(index, this.#items.length, "AutoList.set");

    const previous = this.#items[index];
    if (this.comparer(previous, item)) return;

    this.#items[index] = item;
    this.#subject.broadcast(new UpdateBroadcast(previous, item, index));
  }

  #removeAt({ index }: RemoveAtOp): void {
    assertIndex(index, this.#items.length, "AutoList.removeAt");

    const [item] = this.#items.splice(index, 1);
    this.#subject.broadcast(new RemoveBroadcast(item, index));
  }

  #remove({ item }: RemoveOp<T>): void {
    const index = this.indexOf(item);
    if (index < 0) return;

    const [removed] = this.#items.splice(index, 1);
    this.#subject.broadcast(new RemoveBroadcast(removed, index));
  }

  #clear(): void {
    if (this.#items.length === 0) return;

    this.#items.length = 0;
    this.#subject.broadcast(CLEARED);
  }
}

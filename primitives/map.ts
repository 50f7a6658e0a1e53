// @filename: primitives/map.ts
import type { AutoObject, EqualityComparer, SyncOwner } from "../_types.ts";
import { SyncBinding } from "../binding.ts";
import { UnsupportedOperationError } from "../error.ts";
import { CallbackRegistry } from "../registry.ts";
import { SyncSubject } from "../subject.ts";
import { PERFORM } from "../symbol.ts";

//////////////////////////
// Atomic operations    //
//////////////////////////

class SetOp<K, V> {
  constructor(readonly key: K, readonly value: V) {}
}

class RemoveOp<K> {
  constructor(readonly key: K) {}
}

class RemoveEntryOp<K, V> {
  constructor(readonly key: K, readonly value: V) {}
}

class ClearOp {}

//////////////////////////
// Broadcasts           //
//////////////////////////

class AddBroadcast<K, V> {
  constructor(readonly key: K, readonly value: V) {}
}

class UpdateBroadcast<K, V> {
  constructor(readonly key: K, readonly previous: V, readonly value: V) {}
}

class RemoveBroadcast<K, V> {
  constructor(readonly key: K, readonly value: V) {}
}

class ClearBroadcast {}

const CLEAR = new ClearOp();
const CLEARED = new ClearBroadcast();

export interface AutoMapOptions<K, V> {
  /** Initial entries. No broadcasts are sent for them. */
  items?: Iterable<readonly [K, V]>;
  /**
   * Key equality. Without one, keys are SameValueZero and lookups go through
   * the native `Map`; with one, lookups scan the keys and an equal key keeps
   * the spelling it was first stored with.
   */
  keyComparer?: EqualityComparer<K>;
  /**
   * Value equality used by {@link AutoMap.removeEntry}.
   * @default Object.is
   */
  valueComparer?: EqualityComparer<V>;
}

/**
 * A binding to an {@link AutoMap}.
 */
export class AutoMapBinding<K, V> extends SyncBinding {
  /** Called when a new key is set. */
  onAdd(callback: (key: K, value: V) => void): this {
    this.addCallback<AddBroadcast<K, V>>(AddBroadcast, ({ key, value }) => callback(key, value));
    return this;
  }

  /** Called when an existing key is set, with the value it replaced. */
  onUpdate(callback: (key: K, previous: V, value: V) => void): this {
    this.addCallback<UpdateBroadcast<K, V>>(
      UpdateBroadcast,
      ({ key, previous, value }) => callback(key, previous, value),
    );
    return this;
  }

  onRemove(callback: (key: K, value: V) => void): this {
    this.addCallback<RemoveBroadcast<K, V>>(RemoveBroadcast, ({ key, value }) => callback(key, value));
    return this;
  }

  onClear(callback: () => void): this {
    this.addCallback(ClearBroadcast, () => callback());
    return this;
  }
}

/**
 * An observable map. Keys are SameValueZero, like `Map`, unless a
 * `keyComparer` is given.
 *
 * @example
 * ```ts
 * const scores = new AutoMap<string, number>();
 * scores.bind()
 *   .onAdd((name, score) => console.log("joined", name, score))
 *   .onUpdate((name, before, after) => console.log(name, before, "->", after));
 *
 * scores.set("ada", 1); // joined ada 1
 * scores.set("ada", 3); // ada 1 -> 3
 * ```
 */
export class AutoMap<K, V> implements AutoObject<AutoMapBinding<K, V>>, SyncOwner, Iterable<[K, V]> {
  #entries: Map<K, V>;
  #subject: SyncSubject;
  #handlers = new CallbackRegistry();

  readonly keyComparer?: EqualityComparer<K>;
  readonly valueComparer: EqualityComparer<V>;

  constructor({ items = [], keyComparer, valueComparer = Object.is }: AutoMapOptions<K, V> = {}) {
    this.keyComparer = keyComparer;
    this.valueComparer = valueComparer;
    this.#entries = new Map();
    for (const [key, value] of items) {
      const found = this.#findKey(key);
      this.#entries.set(found ? found[0] : key, value);
    }
    this.#subject = new SyncSubject(this);

    this.#handlers.add<SetOp<K, V>>(SetOp, (op) => this.#set(op));
    this.#handlers.add<RemoveOp<K>>(RemoveOp, (op) => this.#remove(op));
    this.#handlers.add<RemoveEntryOp<K, V>>(RemoveEntryOp, (op) => this.#removeEntry(op));
    this.#handlers.add(ClearOp, () => this.#clear());
  }

  get size(): number {
    return this.#entries.size;
  }

  get(key: K): V | undefined {
    const found = this.#findKey(key);
    return found ? this.#entries.get(found[0]) : undefined;
  }

  has(key: K): boolean {
    return this.#findKey(key) !== undefined;
  }

  keys(): IterableIterator<K> {
    return this.#entries.keys();
  }

  values(): IterableIterator<V> {
    return this.#entries.values();
  }

  entries(): IterableIterator<[K, V]> {
    return this.#entries.entries();
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this.#entries.entries();
  }

  /** Adds `key` or replaces its value. */
  set(key: K, value: V): void {
    this.#subject.perform(new SetOp(key, value));
  }

  /** Alias of {@link AutoMap.set}. */
  add(key: K, value: V): void {
    this.set(key, value);
  }

  /** Removes `key` if present. Absent keys are ignored. */
  remove(key: K): void {
    this.#subject.perform(new RemoveOp(key));
  }

  /** Removes `key` only while it maps to a value equal to `value`. */
  removeEntry(key: K, value: V): void {
    this.#subject.perform(new RemoveEntryOp(key, value));
  }

  /**
   * Not supported: removal may be deferred, so whether it happened cannot be
   * reported. Use {@link AutoMap.remove}.
   *
   * @throws {UnsupportedOperationError} Always
   */
  delete(key: K): boolean {
    throw new UnsupportedOperationError(
      "AutoMap cannot report whether a key was removed because removal may be deferred.",
      { operation: "AutoMap.delete", value: key, tip: "Use remove() instead." },
    );
  }

  clear(): void {
    this.#subject.perform(CLEAR);
  }

  bind(): AutoMapBinding<K, V> {
    return new AutoMapBinding<K, V>(this.#subject);
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

  /** The stored key equal to `key`, boxed so an `undefined` key is found too. */
  #findKey(key: K): [K] | undefined {
    const comparer = this.keyComparer;
    if (!comparer) return this.#entries.has(key) ? [key] : undefined;

    for (const candidate of this.#entries.keys()) {
      if (comparer(candidate, key)) return [candidate];
    }
    return undefined;
  }

  #set({ key, value }: SetOp<K, V>): void {
    const found = this.#findKey(key);
    if (!found) {
      this.#entries.set(key, value);
      this.#subject.broadcast(new AddBroadcast(key, value));
      return;
    }

    const [stored] = found;
    const previous = this.#entries.get(stored);
    this.#entries.set(stored, value);
    this.#subject.broadcast(new UpdateBroadcast(stored, previous, value));
  }

  #remove({ key }: RemoveOp<K>): void {
    const found = this.#findKey(key);
    if (!found) return;

    const [stored] = found;
    const value = this.#entries.get(stored);
    this.#entries.delete(stored);
    this.#subject.broadcast(new RemoveBroadcast(stored, value));
  }

  #removeEntry({ key, value }: RemoveEntryOp<K, V>): void {
    const found = this.#findKey(key);
    if (!found) return;

    // `undefined` is only stored when V allows it
    const [stored] = found;
    const existing = this.#entries.get(stored);
    const matches = existing === undefined ? value === undefined : this.valueComparer(existing, value);
    if (!matches) return;

    this.#entries.delete(stored);
    this.#subject.broadcast(new RemoveBroadcast(stored, existing));
  }

  #clear(): void {
    if (this.#entries.size === 0) return;

    this.#entries.clear();
    this.#subject.broadcast(CLEARED);
  }
}

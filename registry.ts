// @filename: registry.ts
/**
 * Type-keyed, ordered callback storage shared by bindings (for broadcasts)
 * and owners (for atomic-operation handlers).
 *
 * A payload's runtime type is its prototype. Entries are keyed by the
 * prototype of the constructor they were registered with, so lookup is a
 * single `Map` access and matching is exact: a `Poodle` payload never reaches
 * callbacks registered for `Dog`.
 *
 * @example
 * ```ts
 * class Moved { constructor(readonly x: number, readonly y: number) {} }
 *
 * const registry = new CallbackRegistry();
 * registry.add(Moved, ({ x, y }) => console.log(x, y));
 * registry.add(Number, (n) => console.log(n + 1), (n) => n > 0);
 *
 * registry.invoke(new Moved(1, 2)); // 1 2
 * registry.invoke(4);               // 5
 * registry.invoke(-4);              // nothing: the condition rejects it
 * ```
 *
 * @module
 */

import type { Callback, Condition, PayloadType } from "./_types.ts";
import { assertPayload } from "./asserts.ts";
import { InvalidArgumentError } from "./error.ts";

/**
 * Constructors that stand in for primitive payload types.
 */
export type PrimitiveType =
  | NumberConstructor
  | StringConstructor
  | BooleanConstructor
  | BigIntConstructor;

/**
 * Anything that can key a registry: a payload class or a primitive's
 * constructor.
 */
export type TypeKey = PayloadType<unknown> | PrimitiveType;

/**
 * A callback already wrapped with its type check and condition.
 */
export type Entry = (payload: unknown) => void;

/**
 * Resolves the runtime type of a payload.
 *
 * @throws {InvalidArgumentError} For `null`, `undefined` and objects with no
 * prototype
 */
export function runtimeTypeOf(payload: unknown, operation = "runtimeTypeOf"): object {
  assertPayload(payload, operation);

  const proto: unknown = Object.getPrototypeOf(payload);
  if (typeof proto !== "object" || proto === null) {
    throw new InvalidArgumentError("payload", "Payload has no runtime type.", {
      operation,
      tip: "Create payloads with a class (or use a primitive) instead of Object.create(null).",
    });
  }

  return proto;
}

function hasType<T>(value: unknown, type: TypeKey): value is T {
  return value !== null && value !== undefined && Object.getPrototypeOf(value) === type.prototype;
}

/**
 * Type guard: true when `value`'s runtime type is exactly `type`.
 *
 * @example
 * ```ts
 * isPayloadOf(new Dog("Rex"), Dog);    // true
 * isPayloadOf(new Poodle("Fifi"), Dog); // false, use instanceof for subtypes
 * isPayloadOf(3, Number);              // true
 * ```
 */
export function isPayloadOf(value: unknown, type: NumberConstructor): value is number;
export function isPayloadOf(value: unknown, type: StringConstructor): value is string;
export function isPayloadOf(value: unknown, type: BooleanConstructor): value is boolean;
export function isPayloadOf(value: unknown, type: BigIntConstructor): value is bigint;
export function isPayloadOf<T>(value: unknown, type: PayloadType<T>): value is T;
export function isPayloadOf(value: unknown, type: TypeKey): boolean {
  return hasType(value, type);
}

/**
 * Like {@link isPayloadOf}, but subclass instances match too. Primitives
 * match their wrapper constructor (`3` is an instance of `Number` here).
 *
 * Used for derived-type filters, e.g. listening only for the `Dog`s added to
 * a list of `Animal`s.
 */
export function isInstanceOf(value: unknown, type: NumberConstructor): value is number;
export function isInstanceOf(value: unknown, type: StringConstructor): value is string;
export function isInstanceOf(value: unknown, type: BooleanConstructor): value is boolean;
export function isInstanceOf(value: unknown, type: BigIntConstructor): value is bigint;
export function isInstanceOf<T>(value: unknown, type: PayloadType<T>): value is T;
export function isInstanceOf(value: unknown, type: TypeKey): boolean {
  return hasInstance(value, type);
}

/**
 * Untyped core of {@link isInstanceOf} for wrappers whose own overloads tie
 * `T` to `type`.
 */
export function hasInstance<T>(value: unknown, type: TypeKey): value is T {
  return value instanceof type || hasType<T>(value, type);
}

/**
 * Wraps `callback` so it only runs for payloads whose runtime type is exactly
 * `type` and which `condition` (when given) accepts.
 */
export function wrapCallback<T>(type: TypeKey, callback: Callback<T>, condition?: Condition<T>): Entry {
  return condition
    ? (payload) => {
      if (hasType<T>(payload, type) && condition(payload)) callback(payload);
    }
    : (payload) => {
      if (hasType<T>(payload, type)) callback(payload);
    };
}

export class CallbackRegistry {
  #entries = new Map<object, Entry[]>();

  /** Number of payload types with at least one entry. */
  get size(): number {
    return this.#entries.size;
  }

  /**
   * Appends a callback for payloads whose runtime type is exactly `type`.
   * When `condition` is given the callback only runs for payloads it accepts.
   */
  add(type: NumberConstructor, callback: Callback<number>, condition?: Condition<number>): void;
  add(type: StringConstructor, callback: Callback<string>, condition?: Condition<string>): void;
  add(type: BooleanConstructor, callback: Callback<boolean>, condition?: Condition<boolean>): void;
  add(type: BigIntConstructor, callback: Callback<bigint>, condition?: Condition<bigint>): void;
  add<T>(type: PayloadType<T>, callback: Callback<T>, condition?: Condition<T>): void;
  add<T>(type: TypeKey, callback: Callback<T>, condition?: Condition<T>): void {
    this.addEntry(type, wrapCallback(type, callback, condition));
  }

  /**
   * Appends a pre-wrapped entry under `type`. Typed registration goes
   * through {@link CallbackRegistry.add}; this is the seam for wrappers
   * that expose their own overloads.
   */
  addEntry(type: TypeKey, entry: Entry): void {
    const key: object = type.prototype;
    const entries = this.#entries.get(key);
    if (entries) entries.push(entry);
    else this.#entries.set(key, [entry]);
  }

  /**
   * Runs every entry registered for the payload's runtime type, in
   * registration order. Entries added while this runs wait for the next
   * payload; entries cleared while this runs are skipped.
   *
   * @throws {InvalidArgumentError} When the payload has no runtime type
   */
  invoke(payload: unknown): void {
    const entries = this.#entries.get(runtimeTypeOf(payload, "invoke"));
    if (!entries) return;

    const count = entries.length;
    for (let i = 0; i < count && i < entries.length; i++) {
      entries[i](payload);
    }
  }

  /** True when at least one entry exists for `type`. */
  has(type: TypeKey): boolean {
    return this.#entries.has(type.prototype);
  }

  /** Number of entries registered for `type`. */
  count(type: TypeKey): number {
    return this.#entries.get(type.prototype)?.length ?? 0;
  }

  /** Removes every entry. */
  clear(): void {
    for (const entries of this.#entries.values()) {
      entries.length = 0;
    }
    this.#entries.clear();
  }
}

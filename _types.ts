// @filename: _types.ts
import type { PERFORM } from "./symbol.ts";

/**
 * Runtime identity of a payload type: its constructor.
 *
 * Payload classes are their own keys, and `Number`, `String`, `Boolean` and
 * `BigInt` stand in for primitive payloads. A payload matches a type only
 * when its prototype is exactly `type.prototype`; subclass instances do
 * not match their base class.
 *
 * @typeParam T - The instances this constructor describes.
 *
 * @example
 * ```ts
 * class AddOp<T> { constructor(readonly item: T) {} }
 *
 * const key: PayloadType<AddOp<string>> = AddOp;
 * ```
 */
// deno-lint-ignore no-explicit-any
export type PayloadType<T> = abstract new (...args: any[]) => T;

/**
 * Receives a payload delivered to a binding or an owner handler.
 */
export type Callback<T> = (payload: T) => void;

/**
 * Decides whether a callback runs for a given payload.
 */
export type Condition<T> = (payload: T) => boolean;

/**
 * Equality used by primitives to decide whether a change happened.
 * Defaults to `Object.is` wherever one is accepted.
 */
export type EqualityComparer<T> = (a: T, b: T) => boolean;

/**
 * Visitor handed to {@link BoxlessQueue.dequeue}. The queue calls
 * `handleValue` with exactly one pending value.
 */
export interface BoxlessValueHandler {
  handleValue<T extends {}>(value: T): void;
}

/**
 * An object that owns a {@link SyncSubject} and reacts to its atomic
 * operations.
 *
 * The subject calls `[PERFORM]` once per operation, on the stack that
 * processes it, before any binding can observe the resulting broadcast.
 * The owner routes the operation to its handler for the operation's type
 * (ignoring types it has no handler for), mutates its state, and calls
 * {@link SyncSubject.broadcast} to announce the change.
 */
export interface SyncOwner {
  [PERFORM](op: unknown): void;
}

/**
 * A serialized, synchronous subject: the contract bindings depend on.
 */
export interface ISyncSubject extends Disposable {
  /** True once disposed; every mutating call then fails. */
  readonly isDisposed: boolean;

  /**
   * Attaches a binding. Deferred until the current processing loop drains
   * when the subject is busy.
   */
  addBinding(binding: ISyncBinding): void;

  /**
   * Detaches a binding. Deferred until the current processing loop drains
   * when the subject is busy.
   */
  removeBinding(binding: ISyncBinding): void;

  /** Detaches every binding, with the same deferral rule. */
  clearBindings(): void;

  /**
   * Requests an atomic operation. Runs immediately when idle, otherwise after
   * everything already scheduled.
   */
  perform<TOp>(op: TOp): void;

  /** Drops atomic operations that were queued but have not run yet. */
  clear(): void;

  /** Disposes the subject, deferred while busy. Idempotent. */
  dispose(): void;
}

/**
 * A per-subscriber registry of typed callbacks attached to one subject.
 */
export interface ISyncBinding extends Disposable {
  /**
   * True once disposed. A subject skips disposed bindings that are still
   * waiting for their deferred removal.
   */
  readonly isDisposed: boolean;

  /**
   * Invokes every callback registered for the payload's runtime type whose
   * condition accepts it, in registration order. Performs no reentrancy
   * protection of its own; the subject provides that.
   */
  invokeCallbacks<TBroadcast>(broadcast: TBroadcast): void;

  /** Clears callbacks and detaches from the subject. Idempotent. */
  dispose(): void;
}

/**
 * Shared surface of the observable primitives.
 *
 * @typeParam TBinding - The primitive's binding type.
 */
export interface AutoObject<TBinding> extends Disposable {
  /**
   * Creates a new binding attached to this object.
   */
  bind(): TBinding;

  /**
   * Removes all bindings from this object. Deferred while the object is
   * processing other operations.
   */
  clearBindings(): void;

  /** Releases every binding reference; further mutations fail. */
  dispose(): void;
}

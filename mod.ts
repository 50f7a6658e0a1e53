/**
 * A serialized, fully synchronous event-dispatch core, plus the observable
 * primitives built on it.
 *
 * An object that wants to be observable owns a {@link SyncSubject}. Callers
 * ask for changes by performing **atomic operations** on the subject; the
 * owner applies each one and **broadcasts** what changed to every
 * {@link SyncBinding} attached to the subject.
 *
 * Three guarantees hold, however the calls nest:
 *
 * 1. The owner finishes reacting to an operation before any binding hears
 *    about it, so bindings never see half-applied state.
 * 2. An operation requested from inside a callback never runs right away. It
 *    waits until the current broadcast has reached every binding.
 * 3. Deferred work runs in the order it was requested.
 *
 * Everything happens on the caller's stack: no promises, no timers, no
 * microtasks. Deferred work is drained by whichever call is already running
 * when it is requested.
 *
 * ## Reentrancy
 *
 * ```ts
 * import { AutoValue } from "./mod.ts";
 *
 * const score = new AutoValue(0);
 * const log: string[] = [];
 *
 * score.bind().onValue((value) => {
 *   log.push(`saw ${value}`);
 *   if (value === 1) score.value = 2; // deferred, not recursive
 *   log.push(`done ${value}`);
 * });
 *
 * score.value = 1;
 * // log: ["saw 0", "done 0", "saw 1", "done 1", "saw 2", "done 2"]
 * ```
 *
 * ## Observable primitives
 *
 * | Primitive        | Holds                      | Broadcasts                        |
 * | ---------------- | -------------------------- | --------------------------------- |
 * | `AutoValue<T>`   | one value                  | new value (replayed to new callbacks) |
 * | `AutoList<T>`    | ordered items              | add, update, remove, clear        |
 * | `AutoSet<T>`     | unique items               | add, remove, clear, modify        |
 * | `AutoMap<K, V>`  | keyed values               | add, update, remove, clear        |
 * | `AutoCache`      | latest value of each type  | every pushed value, clear         |
 * | `AutoChannel`    | nothing                    | every message sent                |
 *
 * ## Writing your own
 *
 * Implement {@link SyncOwner} by giving the object a `[PERFORM]` method,
 * route operations through a {@link CallbackRegistry}, and subclass
 * {@link SyncBinding} for typed registration methods:
 *
 * ```ts
 * import { CallbackRegistry, PERFORM, SyncBinding, SyncSubject } from "./mod.ts";
 *
 * class Deposit { constructor(readonly amount: number) {} }
 * class BalanceChanged { constructor(readonly balance: number) {} }
 *
 * class AccountBinding extends SyncBinding {
 *   onBalance(callback: (balance: number) => void): this {
 *     this.addCallback(BalanceChanged, ({ balance }) => callback(balance));
 *     return this;
 *   }
 * }
 *
 * class Account {
 *   #balance = 0;
 *   #subject = new SyncSubject(this);
 *   #handlers = new CallbackRegistry();
 *
 *   constructor() {
 *     this.#handlers.add(Deposit, ({ amount }) => {
 *       this.#balance += amount;
 *       this.#subject.broadcast(new BalanceChanged(this.#balance));
 *     });
 *   }
 *
 *   deposit(amount: number) { this.#subject.perform(new Deposit(amount)); }
 *   bind() { return new AccountBinding(this.#subject); }
 *   [PERFORM](op: unknown) { this.#handlers.invoke(op); }
 * }
 * ```
 *
 * @module
 */
export * from "./binding.ts";
export * from "./boxless.ts";
export * from "./error.ts";
export { CallbackRegistry, isInstanceOf, isPayloadOf, runtimeTypeOf } from "./registry.ts";
export type { PrimitiveType, TypeKey } from "./registry.ts";
export * from "./subject.ts";
export * from "./symbol.ts";
export * from "./primitives/mod.ts";

export type * from "./_types.ts";

// @filename: primitives/channel.ts
import type { AutoObject, Callback, Condition, PayloadType, SyncOwner } from "../_types.ts";
import { SyncBinding } from "../binding.ts";
import type { TypeKey } from "../registry.ts";
import { SyncSubject } from "../subject.ts";
import { PERFORM } from "../symbol.ts";

/**
 * A binding to an {@link AutoChannel}.
 */
export class AutoChannelBinding extends SyncBinding {
  /**
   * Called for every message whose runtime type is exactly `type` and which
   * `condition` (when given) accepts.
   */
  on(type: NumberConstructor, callback: Callback<number>, condition?: Condition<number>): this;
  on(type: StringConstructor, callback: Callback<string>, condition?: Condition<string>): this;
  on(type: BooleanConstructor, callback: Callback<boolean>, condition?: Condition<boolean>): this;
  on(type: BigIntConstructor, callback: Callback<bigint>, condition?: Condition<bigint>): this;
  on<T>(type: PayloadType<T>, callback: Callback<T>, condition?: Condition<T>): this;
  on<T>(type: TypeKey, callback: Callback<T>, condition?: Condition<T>): this {
    this.register(type, callback, condition);
    return this;
  }
}

/**
 * A fire-and-forget message channel with no state.
 *
 * Every message sent is broadcast unchanged, in send order. A message sent
 * from inside a callback is delivered after the current message has reached
 * every binding.
 *
 * @example
 * ```ts
 * class Jumped { constructor(readonly height: number) {} }
 *
 * const events = new AutoChannel();
 * events.bind().on(Jumped, ({ height }) => console.log("jumped", height));
 *
 * events.send(new Jumped(2)); // jumped 2
 * events.send("ignored");     // no binding listens for strings
 * ```
 */
export class AutoChannel implements AutoObject<AutoChannelBinding>, SyncOwner {
  #subject: SyncSubject;

  constructor() {
    this.#subject = new SyncSubject(this);
  }

  /**
   * @throws {InvalidArgumentError} When `message` is `null` or `undefined`
   * @throws {ObjectDisposedError} Once the channel is disposed
   */
  send<T>(message: T): void {
    this.#subject.perform(message);
  }

  bind(): AutoChannelBinding {
    return new AutoChannelBinding(this.#subject);
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

  [PERFORM](message: unknown): void {
    this.#subject.broadcast(message);
  }
}

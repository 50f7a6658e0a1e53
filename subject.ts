// @filename: subject.ts
/**
 * The serialized dispatch core.
 *
 * A {@link SyncSubject} belongs to an owner (usually an observable primitive)
 * and orders everything that happens to it: atomic operations requested by
 * callers, broadcasts the owner sends in response, and changes to the set of
 * attached bindings.
 *
 * Only one processing pass runs at a time. Anything requested while a pass is
 * running (from an owner handler or a binding callback) is queued and runs,
 * in request order, once the current operation has been fully delivered.
 *
 * @example
 * ```ts
 * import { PERFORM, SyncBinding, SyncSubject } from "./mod.ts";
 *
 * class Increment { constructor(readonly by: number) {} }
 * class Changed { constructor(readonly count: number) {} }
 *
 * class Counter {
 *   count = 0;
 *   readonly subject = new SyncSubject(this);
 *
 *   [PERFORM](op: unknown): void {
 *     if (op instanceof Increment) {
 *       this.count += op.by;
 *       this.subject.broadcast(new Changed(this.count));
 *     }
 *   }
 * }
 *
 * const counter = new Counter();
 * const binding = new SyncBinding(counter.subject);
 * binding.addCallback(Changed, ({ count }) => console.log(count));
 *
 * counter.subject.perform(new Increment(2)); // 2
 * ```
 *
 * @module
 */

import "./symbol.ts";

import type { BoxlessValueHandler, ISyncBinding, ISyncSubject, SyncOwner } from "./_types.ts";
import { assertNotDisposed } from "./asserts.ts";
import { BoxlessQueue } from "./boxless.ts";
import { clear, createQueue, dequeue, enqueue, getSize, type Queue } from "./queue.ts";
import { runtimeTypeOf } from "./registry.ts";
import { PERFORM } from "./symbol.ts";

/**
 * Options for {@link SyncSubject}.
 */
export interface SyncSubjectOptions {
  /**
   * Initial capacity of the pending-operation queues. Both grow past it.
   * @default 16
   */
  capacity?: number;
}

/**
 * Work the processing loop applies in order.
 */
type InternalOp =
  | { readonly kind: "add-binding"; readonly binding: ISyncBinding }
  | { readonly kind: "remove-binding"; readonly binding: ISyncBinding }
  | { readonly kind: "clear-bindings" }
  | { readonly kind: "perform" }
  | { readonly kind: "dispose" };

// Payload-free markers are shared.
const CLEAR_BINDINGS: InternalOp = Object.freeze({ kind: "clear-bindings" });
const PERFORM_NEXT: InternalOp = Object.freeze({ kind: "perform" });
const DISPOSE: InternalOp = Object.freeze({ kind: "dispose" });

const NAME = "SyncSubject";

/**
 * A hot, serialized, fully synchronous subject.
 *
 * Bindings are notified in the order they were added. Errors thrown by the
 * owner or by binding callbacks are never caught; they halt the current pass
 * and propagate to whoever triggered it, and the subject stays usable.
 */
export class SyncSubject implements ISyncSubject {
  #owner: SyncOwner | null;
  #bindings = new Set<ISyncBinding>();
  #ops: Queue<InternalOp>;
  #pending: BoxlessQueue;
  #busy = false;
  #disposed = false;

  #handler: BoxlessValueHandler = {
    handleValue: (value: unknown): void => this.#handle(value),
  };

  /**
   * @param owner - Receives every atomic operation before any binding sees
   * the broadcasts it produces
   */
  constructor(owner: SyncOwner, { capacity = 16 }: SyncSubjectOptions = {}) {
    this.#owner = owner;
    this.#ops = createQueue<InternalOp>(capacity);
    this.#pending = new BoxlessQueue(capacity);
  }

  get isDisposed(): boolean {
    return this.#disposed;
  }

  /**
   * True while a processing pass is running. Work requested meanwhile is
   * deferred until the pass finishes.
   */
  get isBusy(): boolean {
    return this.#busy;
  }

  /** Number of attached bindings, not counting deferred additions. */
  get bindingCount(): number {
    return this.#bindings.size;
  }

  /** Whether `binding` is currently in the live binding set. */
  hasBinding(binding: ISyncBinding): boolean {
    return this.#bindings.has(binding);
  }

  /**
   * @throws {ObjectDisposedError} Once disposed
   */
  addBinding(binding: ISyncBinding): void {
    assertNotDisposed(this.#disposed, NAME, "addBinding");
    enqueue(this.#ops, { kind: "add-binding", binding });
    this.#process();
  }

  /**
   * @throws {ObjectDisposedError} Once disposed
   */
  removeBinding(binding: ISyncBinding): void {
    assertNotDisposed(this.#disposed, NAME, "removeBinding");
    enqueue(this.#ops, { kind: "remove-binding", binding });
    this.#process();
  }

  /**
   * @throws {ObjectDisposedError} Once disposed
   */
  clearBindings(): void {
    assertNotDisposed(this.#disposed, NAME, "clearBindings");
    enqueue(this.#ops, CLEAR_BINDINGS);
    this.#process();
  }

  /**
   * Requests an atomic operation.
   *
   * When idle, the owner handles `op` right away on this call stack and any
   * work it schedules is drained before returning. When busy, `op` waits
   * behind everything already scheduled.
   *
   * @throws {ObjectDisposedError} Once disposed
   * @throws {InvalidArgumentError} When `op` has no runtime type
   */
  perform<TOp>(op: TOp): void {
    assertNotDisposed(this.#disposed, NAME, "perform");
    runtimeTypeOf(op, "perform");

    if (this.#busy) {
      this.#pending.enqueue(op);
      enqueue(this.#ops, PERFORM_NEXT);
      return;
    }

    // first operation stays off the queues
    this.#busy = true;
    try {
      this.#handle(op);
    } finally {
      this.#busy = false;
    }

    this.#process();
  }

  /**
   * Delivers `broadcast` to every live binding, in insertion order. Meant to
   * be called by the owner from its operation handler.
   *
   * Bindings added or removed by a callback are applied after the broadcast
   * has reached every binding that was live when it started.
   *
   * @throws {ObjectDisposedError} Once disposed
   * @throws {InvalidArgumentError} When `broadcast` has no runtime type
   */
  broadcast<TBroadcast>(broadcast: TBroadcast): void {
    assertNotDisposed(this.#disposed, NAME, "broadcast");
    runtimeTypeOf(broadcast, "broadcast");

    const wasBusy = this.#busy;
    this.#busy = true;

    try {
      for (const binding of this.#bindings) {
        if (!binding.isDisposed) binding.invokeCallbacks(broadcast);
      }
    } finally {
      this.#busy = wasBusy;
    }

    this.#process();
  }

  /**
   * Drops atomic operations that were requested but have not run. Bindings
   * and the operation currently running are unaffected, and binding changes
   * or a dispose queued alongside the dropped operations still apply, in
   * order.
   *
   * @throws {ObjectDisposedError} Once disposed
   */
  clear(): void {
    assertNotDisposed(this.#disposed, NAME, "clear");
    this.#pending.clear();

    // a stale marker would run a later operation ahead of its turn
    for (let i = getSize(this.#ops); i > 0; i--) {
      const op = dequeue(this.#ops);
      if (op !== undefined && op.kind !== "perform") enqueue(this.#ops, op);
    }
  }

  /**
   * Releases the bindings and the owner. While busy, teardown waits until the
   * current pass has drained everything queued before it. Calling it again
   * does nothing.
   */
  dispose(): void {
    if (this.#disposed) return;

    if (this.#busy) {
      enqueue(this.#ops, DISPOSE);
      return;
    }

    this.#teardown();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  #handle(op: unknown): void {
    this.#owner?.[PERFORM](op);
  }

  #process(): void {
    if (this.#busy) return;

    this.#busy = true;
    let disposing = false;

    try {
      drain: while (true) {
        const op = dequeue(this.#ops);
        if (op === undefined) break;

        switch (op.kind) {
          case "add-binding":
            this.#bindings.add(op.binding);
            break;
          case "remove-binding":
            this.#bindings.delete(op.binding);
            break;
          case "clear-bindings":
            this.#bindings.clear();
            break;
          case "perform":
            this.#pending.dequeue(this.#handler);
            break;
          case "dispose":
            disposing = true;
            break drain;
        }
      }
    } finally {
      this.#busy = false;
    }

    if (disposing) this.#teardown();
  }

  #teardown(): void {
    this.#bindings.clear();
    this.#pending.clear();
    clear(this.#ops);
    this.#owner = null;
    this.#disposed = true;
  }
}

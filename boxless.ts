// @filename: boxless.ts
/**
 * A FIFO of pending values of mixed types.
 *
 * Values are stored as they are, with no per-value wrapper recording their
 * type; the runtime type travels with the value itself. Dequeuing hands the
 * value to a {@link BoxlessValueHandler}, which dispatches on that type.
 *
 * @module
 */

import type { BoxlessValueHandler } from "./_types.ts";
import { assertPayload } from "./asserts.ts";
import { clear, createQueue, dequeue, enqueue, getSize, isEmpty, type Queue } from "./queue.ts";

export class BoxlessQueue {
  #queue: Queue<{}>;

  /**
   * @param capacity - Initial capacity; the queue grows past it as needed
   */
  constructor(capacity = 16) {
    this.#queue = createQueue<{}>(capacity);
  }

  /** Number of pending values. */
  get size(): number {
    return getSize(this.#queue);
  }

  get isEmpty(): boolean {
    return isEmpty(this.#queue);
  }

  /**
   * Appends a value to the back of the queue.
   *
   * @throws {InvalidArgumentError} When `value` is `null` or `undefined`
   */
  enqueue<T>(value: T): void {
    assertPayload(value, "BoxlessQueue.enqueue");
    enqueue(this.#queue, value);
  }

  /**
   * Removes the front value and passes it to `handler.handleValue`.
   *
   * @returns `false` without calling the handler when the queue is empty
   */
  dequeue(handler: BoxlessValueHandler): boolean {
    const value = dequeue(this.#queue);
    if (value === undefined) return false;

    handler.handleValue(value);
    return true;
  }

  /** Drops every pending value. */
  clear(): void {
    clear(this.#queue);
  }
}

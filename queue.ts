/**
 * A lightweight FIFO queue backed by a circular buffer, so `enqueue` and
 * `dequeue` stay O(1) without the cost of `Array.shift()`.
 *
 * Subjects use it for their internal-operation markers and, through
 * {@link BoxlessQueue}, for pending atomic operations. When full, the queue
 * doubles its backing array instead of overflowing.
 *
 * @example
 * ```ts
 * import { createQueue, enqueue, dequeue, clear } from './queue.ts';
 *
 * const pending = createQueue<string>(4);
 * enqueue(pending, 'add-binding');
 * enqueue(pending, 'perform');
 *
 * dequeue(pending);  // 'add-binding' (removes and returns)
 *
 * clear(pending);    // empty the queue
 * ```
 *
 * @module
 */

///////////////////////
// Core Data Types   //
///////////////////////

/**
 * Represents a circular buffer-based queue for efficient FIFO operations.
 *
 * `undefined` marks a free slot, so it cannot be stored as an element.
 *
 * @template T - The type of elements stored in the queue
 */
export interface Queue<T extends {} | null> {
  /** The backing array that holds queue elements */
  items: (T | undefined)[];
  /** Index pointing to the front element (next to dequeue) */
  head: number;
  /** Index pointing to where the next element will be added */
  tail: number;
  /** Current number of elements in the queue */
  size: number;
  /** Current capacity of the backing array */
  capacity: number;
}

////////////////////////////
// Factory & Core Setup   //
////////////////////////////

/**
 * Creates a new empty queue with the specified initial capacity.
 *
 * @param capacity - Initial number of slots (default: 16)
 * @returns A new empty queue ready for use
 */
export function createQueue<T extends {} | null>(capacity: number = 16): Queue<T> {
  const slots = Math.max(1, Math.floor(capacity));
  return {
    items: new Array<T | undefined>(slots),
    head: 0,
    tail: 0,
    size: 0,
    capacity: slots,
  };
}

/////////////////////////
// Core Queue Operations //
/////////////////////////

/**
 * Adds an element to the back of the queue. Runs in O(1) amortized time.
 */
export function enqueue<T extends {} | null>(queue: Queue<T>, item: T): void {
  if (queue.size >= queue.capacity) grow(queue);

  queue.items[queue.tail] = item;
  queue.tail = (queue.tail + 1) % queue.capacity; // wrap around using modulo
  queue.size++;
}

/**
 * Removes and returns the front element from the queue.
 *
 * @returns The front element, or undefined if queue is empty
 *
 * @example
 * ```
 * let op;
 * while ((op = dequeue(ops)) !== undefined) {
 *   run(op);
 * }
 * ```
 */
export function dequeue<T extends {} | null>(queue: Queue<T>): T | undefined {
  if (isEmpty(queue)) {
    return undefined;
  }

  const item = queue.items[queue.head];
  queue.items[queue.head] = undefined; // help garbage collector
  queue.head = (queue.head + 1) % queue.capacity;
  queue.size--;

  return item;
}

////////////////////////////////
// Utility & Status Functions //
////////////////////////////////

/** Checks if the queue contains no elements. */
export function isEmpty<T extends {} | null>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

/** Returns the current number of elements in the queue. */
export function getSize<T extends {} | null>(queue: Queue<T>): number {
  return queue.size;
}

/**
 * Empties the queue, releasing every reference it held. The capacity the
 * queue has grown to is kept.
 */
export function clear<T extends {} | null>(queue: Queue<T>): void {
  queue.items.length = 0;
  queue.items.length = queue.capacity;

  queue.head = 0;
  queue.tail = 0;
  queue.size = 0;
}

/**
 * Doubles the backing array, unrolling the ring so the front element lands
 * at index 0.
 */
function grow<T extends {} | null>(queue: Queue<T>): void {
  const capacity = queue.capacity * 2;
  const items = new Array<T | undefined>(capacity);

  for (let i = 0; i < queue.size; i++) {
    items[i] = queue.items[(queue.head + i) % queue.capacity];
  }

  queue.items = items;
  queue.head = 0;
  queue.tail = queue.size;
  queue.capacity = capacity;
}

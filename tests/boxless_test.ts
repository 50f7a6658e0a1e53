import { test, expect, vi } from "vitest";

import type { BoxlessValueHandler } from "../_types.ts";
import { BoxlessQueue } from "../boxless.ts";
import { InvalidArgumentError } from "../error.ts";
import { Dog, Value } from "./_utils/fixtures.ts";

function collector(into: unknown[]): BoxlessValueHandler {
  return {
    handleValue(value) {
      into.push(value);
    },
  };
}

test("boxless queue keeps FIFO order across mixed types", () => {
  const queue = new BoxlessQueue(2);
  const dog = new Dog("Rex");
  const value = new Value(3);

  queue.enqueue(1);
  queue.enqueue("two");
  queue.enqueue(dog);
  queue.enqueue(value);
  queue.enqueue(false);

  const out: unknown[] = [];
  const handler = collector(out);
  while (queue.dequeue(handler));

  expect(out).toEqual([1, "two", dog, value, false]);
  expect(out[2]).toBe(dog);
});

test("dequeue hands exactly one value to the handler", () => {
  const queue = new BoxlessQueue();
  queue.enqueue("a");
  queue.enqueue("b");

  const handleValue = vi.fn();
  expect(queue.dequeue({ handleValue })).toBe(true);

  expect(handleValue).toHaveBeenCalledTimes(1);
  expect(handleValue).toHaveBeenCalledWith("a");
  expect(queue.size).toBe(1);
});

test("dequeue on an empty queue returns false without calling the handler", () => {
  const queue = new BoxlessQueue();
  const handleValue = vi.fn();

  expect(queue.dequeue({ handleValue })).toBe(false);
  expect(handleValue).not.toHaveBeenCalled();
  expect(queue.isEmpty).toBe(true);
});

test("clear drops pending values", () => {
  const queue = new BoxlessQueue();
  queue.enqueue(1);
  queue.enqueue(2);

  queue.clear();

  const handleValue = vi.fn();
  expect(queue.size).toBe(0);
  expect(queue.dequeue({ handleValue })).toBe(false);
});

test("null and undefined cannot be enqueued", () => {
  const queue = new BoxlessQueue();

  expect(() => queue.enqueue(null)).toThrow(InvalidArgumentError);
  expect(() => queue.enqueue(undefined)).toThrow("Payload cannot be undefined.");
  expect(queue.isEmpty).toBe(true);
});

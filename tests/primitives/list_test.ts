import { test, expect, vi } from "vitest";

import { InvalidArgumentError, ObjectDisposedError } from "../../error.ts";
import { AutoList } from "../../primitives/list.ts";
import { Animal, Cat, Dog, Poodle } from "../_utils/fixtures.ts";

/** Binds to every broadcast and records it as a line of text. */
function record<T>(list: AutoList<T>): string[] {
  const log: string[] = [];
  list.bind()
    .onAdd((item, index) => log.push(`add ${item}@${index}`))
    .onUpdate((previous, item, index) => log.push(`update ${previous}->${item}@${index}`))
    .onRemove((item, index) => log.push(`remove ${item}@${index}`))
    .onClear(() => log.push("clear"));
  return log;
}

// -----------------------------------------------------------------------------
// Mutations
// -----------------------------------------------------------------------------

test("every mutation is broadcast with its index", () => {
  const list = new AutoList<string>();
  const log = record(list);

  list.add("a");
  list.add("b");
  list.insert(1, "c");
  list.set(0, "d");
  list.removeAt(2);
  list.remove("c");
  list.clear();

  expect(log).toEqual([
    "add a@0",
    "add b@1",
    "add c@1",
    "update a->d@0",
    "remove b@2",
    "remove c@1",
    "clear",
  ]);
  expect(list.toArray()).toEqual([]);
});

test("insert at the length appends", () => {
  const list = new AutoList({ items: [1, 2] });
  const log = record(list);

  list.insert(2, 3);

  expect(log).toEqual(["add 3@2"]);
  expect(list.toArray()).toEqual([1, 2, 3]);
});

test("mutations that change nothing are not broadcast", () => {
  const list = new AutoList({ items: [1, 2] });
  const log = record(list);

  list.set(0, 1);
  list.remove(5);
  list.clear();
  list.clear();

  expect(log).toEqual(["clear"]);
});

test("the comparer drives set, remove and lookups", () => {
  const list = new AutoList({
    items: ["Apple", "Pear"],
    comparer: (a: string, b: string) => a.toLowerCase() === b.toLowerCase(),
  });
  const log = record(list);

  expect(list.indexOf("PEAR")).toBe(1);
  expect(list.contains("apple")).toBe(true);

  list.set(0, "APPLE");
  list.remove("apple");

  expect(log).toEqual(["remove Apple@0"]);
  expect(list.toArray()).toEqual(["Pear"]);
});

// -----------------------------------------------------------------------------
// Reads
// -----------------------------------------------------------------------------

test("initial items are readable without broadcasts", () => {
  const list = new AutoList({ items: new Set(["x", "y"]) });
  const log = record(list);

  expect(list.length).toBe(2);
  expect(list.get(1)).toBe("y");
  expect(list.indexOf("y")).toBe(1);
  expect(list.contains("z")).toBe(false);
  expect([...list]).toEqual(["x", "y"]);
  expect(log).toEqual([]);
});

test("toArray returns a copy", () => {
  const list = new AutoList({ items: [1] });

  list.toArray().push(2);

  expect(list.length).toBe(1);
});

test("out-of-range indexes throw InvalidArgumentError", () => {
  const list = new AutoList({ items: ["a", "b"] });

  expect(() => list.get(2)).toThrow(InvalidArgumentError);
  expect(() => list.set(5, "c")).toThrow(InvalidArgumentError);
  expect(() => list.removeAt(-1)).toThrow(InvalidArgumentError);
  expect(() => list.insert(3, "c")).toThrow("Index 3 is out of range; expected 0..2.");
  expect(list.toArray()).toEqual(["a", "b"]);
});

// -----------------------------------------------------------------------------
// Serialization
// -----------------------------------------------------------------------------

test("mutations requested from a callback run after the broadcast", () => {
  const list = new AutoList<number>();
  const log: string[] = [];

  list.bind().onAdd((item) => {
    if (item === 1) {
      list.add(2);
      log.push(`length ${list.length}`);
    }
    log.push(`add ${item}`);
  });

  list.add(1);

  expect(log).toEqual(["length 1", "add 1", "add 2"]);
  expect(list.toArray()).toEqual([1, 2]);
});

test("a deferred bad index throws from the call that drains it", () => {
  const list = new AutoList<string>();

  list.bind().onAdd((item) => {
    if (item === "a") list.insert(10, "x");
  });

  expect(() => list.add("a")).toThrow(InvalidArgumentError);
  expect(list.toArray()).toEqual(["a"]);

  list.add("b");
  expect(list.toArray()).toEqual(["a", "b"]);
});

// -----------------------------------------------------------------------------
// Derived types
// -----------------------------------------------------------------------------

test("the …Of callbacks only report instances of the given types", () => {
  const list = new AutoList<Animal>();
  const log: string[] = [];

  list.bind()
    .onAddOf(Dog, (dog, index) => log.push(`dog added ${dog.name}@${index}`))
    .onUpdateOf(Dog, Cat, (dog, cat, index) => log.push(`dog ${dog.name} -> cat ${cat.name}@${index}`))
    .onRemoveOf(Dog, (dog, index) => log.push(`dog removed ${dog.name}@${index}`));

  list.add(new Cat("Tom"));
  list.add(new Poodle("Fifi"));
  list.set(1, new Cat("Kit"));
  list.set(0, new Dog("Rex"));
  list.removeAt(0);
  list.removeAt(0);

  expect(log).toEqual([
    "dog added Fifi@1",
    "dog Fifi -> cat Kit@1",
    "dog removed Rex@0",
  ]);
});

// -----------------------------------------------------------------------------
// Lifecycle
// -----------------------------------------------------------------------------

test("a disposed binding stops receiving broadcasts", () => {
  const list = new AutoList<number>();
  const callback = vi.fn();
  const binding = list.bind().onAdd(callback);

  list.add(1);
  binding.dispose();
  list.add(2);

  expect(callback).toHaveBeenCalledTimes(1);
  expect(callback).toHaveBeenCalledWith(1, 0);
});

test("a disposed list rejects mutations but stays readable", () => {
  const list = new AutoList({ items: [1] });
  list.dispose();

  expect(() => list.add(2)).toThrow(ObjectDisposedError);
  expect(() => list.clear()).toThrow(ObjectDisposedError);
  expect(() => list.bind()).toThrow(ObjectDisposedError);
  expect(list.toArray()).toEqual([1]);
});

import { test, expect } from "vitest";

import { ObjectDisposedError, UnsupportedOperationError } from "../../error.ts";
import { AutoMap } from "../../primitives/map.ts";

/** Binds to every broadcast and records it as a line of text. */
function record<K, V>(map: AutoMap<K, V>): string[] {
  const log: string[] = [];
  map.bind()
    .onAdd((key, value) => log.push(`add ${key}=${value}`))
    .onUpdate((key, previous, value) => log.push(`update ${key} ${previous}->${value}`))
    .onRemove((key, value) => log.push(`remove ${key}=${value}`))
    .onClear(() => log.push("clear"));
  return log;
}

// -----------------------------------------------------------------------------
// Mutations
// -----------------------------------------------------------------------------

test("set broadcasts an add for new keys and an update for existing ones", () => {
  const map = new AutoMap<string, number>();
  const log = record(map);

  map.set("a", 1);
  map.set("a", 2);
  map.add("b", 3);
  map.set("a", 2);

  expect(log).toEqual(["add a=1", "update a 1->2", "add b=3", "update a 2->2"]);
  expect(map.get("a")).toBe(2);
});

test("remove and clear only broadcast when something changes", () => {
  const map = new AutoMap<string, number>({ items: [["a", 1], ["b", 2]] });
  const log = record(map);

  map.remove("a");
  map.remove("missing");
  map.clear();
  map.clear();

  expect(log).toEqual(["remove a=1", "clear"]);
  expect(map.size).toBe(0);
});

test("removeEntry needs the key to map to an equal value", () => {
  const map = new AutoMap<string, number>({ items: [["a", 1], ["b", 2]] });
  const log = record(map);

  map.removeEntry("a", 5);
  map.removeEntry("missing", 1);
  map.removeEntry("a", 1);

  expect(log).toEqual(["remove a=1"]);
  expect([...map.keys()]).toEqual(["b"]);
});

test("removeEntry compares values with the value comparer", () => {
  const map = new AutoMap<string, string>({
    items: [["greeting", "Hello"]],
    valueComparer: (a, b) => a.toLowerCase() === b.toLowerCase(),
  });
  const log = record(map);

  map.removeEntry("greeting", "HELLO");

  expect(log).toEqual(["remove greeting=Hello"]);
});

test("removeEntry matches an undefined value", () => {
  const map = new AutoMap<string, number | undefined>();
  const log = record(map);

  map.set("u", undefined);
  map.removeEntry("u", 0);
  map.removeEntry("u", undefined);

  expect(log).toEqual(["add u=undefined", "remove u=undefined"]);
  expect(map.has("u")).toBe(false);
});

test("a key comparer matches keys and keeps the first stored spelling", () => {
  const map = new AutoMap<string, number>({
    items: [["Ada", 1], ["ADA", 2]],
    keyComparer: (a, b) => a.toLowerCase() === b.toLowerCase(),
  });
  const log = record(map);

  expect([...map]).toEqual([["Ada", 2]]);
  expect(map.get("ada")).toBe(2);
  expect(map.has("aDa")).toBe(true);

  map.set("ADA", 3);
  map.removeEntry("ada", 3);
  map.set("bob", 4);
  map.remove("BOB");

  expect(log).toEqual(["update Ada 2->3", "remove Ada=3", "add bob=4", "remove bob=4"]);
  expect(map.size).toBe(0);
});

// -----------------------------------------------------------------------------
// Reads
// -----------------------------------------------------------------------------

test("reads reflect the current entries", () => {
  const map = new AutoMap<string, number>({ items: [["x", 1], ["y", 2]] });

  expect(map.size).toBe(2);
  expect(map.get("y")).toBe(2);
  expect(map.get("z")).toBeUndefined();
  expect(map.has("x")).toBe(true);
  expect([...map.values()]).toEqual([1, 2]);
  expect([...map.entries()]).toEqual([["x", 1], ["y", 2]]);
  expect([...map]).toEqual([["x", 1], ["y", 2]]);
});

test("delete is not supported", () => {
  const map = new AutoMap<string, number>({ items: [["a", 1]] });

  expect(() => map.delete("a")).toThrow(UnsupportedOperationError);
  expect(map.has("a")).toBe(true);
});

// -----------------------------------------------------------------------------
// Serialization
// -----------------------------------------------------------------------------

test("a set requested from onAdd runs after the add is broadcast", () => {
  const map = new AutoMap<string, number>();
  const seen: Array<number | undefined> = [];
  const updates: string[] = [];

  map.bind()
    .onAdd((key, value) => {
      map.set(key, value * 10);
      seen.push(map.get(key));
    })
    .onUpdate((key, previous, value) => updates.push(`${key} ${previous}->${value}`));

  map.set("a", 1);

  expect(seen).toEqual([1]);
  expect(updates).toEqual(["a 1->10"]);
  expect(map.get("a")).toBe(10);
});

// -----------------------------------------------------------------------------
// Lifecycle
// -----------------------------------------------------------------------------

test("a disposed map rejects mutations but stays readable", () => {
  const map = new AutoMap<string, number>({ items: [["a", 1]] });
  map.dispose();

  expect(() => map.set("b", 2)).toThrow(ObjectDisposedError);
  expect(() => map.removeEntry("a", 1)).toThrow(ObjectDisposedError);
  expect(map.get("a")).toBe(1);
});

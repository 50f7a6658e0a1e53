import { test, expect, vi } from "vitest";

import { ObjectDisposedError } from "../../error.ts";
import { AutoValue } from "../../primitives/value.ts";
import { Animal, Cat, Dog, Poodle } from "../_utils/fixtures.ts";

// -----------------------------------------------------------------------------
// Value and replay
// -----------------------------------------------------------------------------

test("onValue replays the current value, then reports changes", () => {
  const value = new AutoValue(1);
  const seen: number[] = [];

  value.bind().onValue((current) => seen.push(current));
  value.value = 2;
  value.value = 3;

  expect(seen).toEqual([1, 2, 3]);
  expect(value.value).toBe(3);
});

test("assigning an equal value broadcasts nothing", () => {
  const value = new AutoValue("a");
  const callback = vi.fn();
  value.bind().onValue(callback);

  value.value = "a";

  expect(callback).toHaveBeenCalledTimes(1);
});

test("a custom comparer decides what counts as a change", () => {
  const value = new AutoValue("Hello", {
    comparer: (a, b) => a.toLowerCase() === b.toLowerCase(),
  });
  const seen: string[] = [];
  value.bind().onValue((current) => seen.push(current));

  value.value = "HELLO";
  value.value = "bye";

  expect(seen).toEqual(["Hello", "bye"]);
  expect(value.value).toBe("bye");
});

test("onValue conditions filter both the replay and later values", () => {
  const value = new AutoValue(1);
  const seen: number[] = [];

  value.bind().onValue((current) => seen.push(current), (current) => current % 2 === 0);
  value.value = 2;
  value.value = 3;
  value.value = 4;

  expect(seen).toEqual([2, 4]);
});

test("onValueOf only reports instances of the given type", () => {
  const pet = new AutoValue<Animal>(new Cat("Boots"));
  const log: string[] = [];

  pet.bind()
    .onValue((animal) => log.push(`animal ${animal.name}`))
    .onValueOf(Dog, (dog) => log.push(`dog ${dog.name}`));

  pet.value = new Dog("Rex");
  pet.value = new Poodle("Fifi");
  pet.value = new Cat("Tom");

  expect(log).toEqual([
    "animal Boots",
    "animal Rex",
    "dog Rex",
    "animal Fifi",
    "dog Fifi",
    "animal Tom",
  ]);
});

test("onValueOf replays the current value when it matches", () => {
  const pet = new AutoValue<Animal>(new Dog("Boots"));
  const log: string[] = [];

  pet.bind()
    .onValue((animal) => log.push(`animal ${animal.name}`))
    .onValueOf(Dog, (dog) => log.push(`dog ${dog.name}`));

  expect(log).toEqual(["animal Boots", "dog Boots"]);
});

// -----------------------------------------------------------------------------
// Serialization
// -----------------------------------------------------------------------------

test("assignments made in a callback are applied after the broadcast", () => {
  const score = new AutoValue(0);
  const log: string[] = [];

  score.bind().onValue((value) => {
    log.push(`saw ${value}`);
    if (value === 1) score.value = 2;
    log.push(`done ${value} (value is ${score.value})`);
  });

  score.value = 1;

  expect(log).toEqual([
    "saw 0",
    "done 0 (value is 0)",
    "saw 1",
    "done 1 (value is 1)",
    "saw 2",
    "done 2 (value is 2)",
  ]);
});

test("a callback registered during a broadcast gets its replay afterwards", () => {
  const value = new AutoValue(1);
  const binding = value.bind();
  const log: string[] = [];

  binding.onValue((current) => {
    log.push(`outer ${current}`);
    if (current === 2) binding.onValue((inner) => log.push(`inner ${inner}`));
  });

  value.value = 2;

  expect(log).toEqual(["outer 1", "outer 2", "inner 2"]);
});

// -----------------------------------------------------------------------------
// Lifecycle
// -----------------------------------------------------------------------------

test("clearBindings stops every binding", () => {
  const value = new AutoValue(0);
  const callback = vi.fn();
  value.bind().onValue(callback);

  value.clearBindings();
  value.value = 1;

  expect(callback).toHaveBeenCalledTimes(1);
});

test("a disposed value rejects assignments and new bindings", () => {
  const value = new AutoValue(0);
  value[Symbol.dispose]();

  expect(() => {
    value.value = 1;
  }).toThrow(ObjectDisposedError);
  expect(() => value.bind()).toThrow(ObjectDisposedError);
  expect(value.value).toBe(0);
});

test("a disposed binding cannot register callbacks", () => {
  const value = new AutoValue(0);
  const binding = value.bind();
  binding.dispose();

  expect(() => binding.onValue(() => {})).toThrow(ObjectDisposedError);
});

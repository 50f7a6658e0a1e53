import { CallbackRegistry } from "../../registry.ts";
import { SyncSubject } from "../../subject.ts";
import { PERFORM } from "../../symbol.ts";

// Class hierarchy for derived-type filters
export class Animal {
  constructor(readonly name: string) {}
}
export class Dog extends Animal {}
export class Poodle extends Dog {}
export class Cat extends Animal {}

// Payloads
export class Value {
  constructor(readonly value: number) {}
}
export class Label {
  constructor(readonly text: string) {}
}

/**
 * Minimal owner: records every operation it receives and rebroadcasts the
 * ones it has a handler for.
 */
export class TestOwner {
  readonly subject: SyncSubject;
  readonly handlers = new CallbackRegistry();
  readonly received: unknown[] = [];

  constructor() {
    this.subject = new SyncSubject(this);
  }

  [PERFORM](op: unknown): void {
    this.received.push(op);
    this.handlers.invoke(op);
  }
}

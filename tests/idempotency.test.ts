import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { LRUSet } from "../lib/idempotency";

describe("LRUSet", () => {
  it("remembers a key once", () => {
    const seen = new LRUSet<number>(10);
    assert.equal(seen.remember(1), true);
    assert.equal(seen.remember(1), false);
    assert.equal(seen.size, 1);
  });

  it("evicts the least recently added key", () => {
    const seen = new LRUSet<number>(2);
    seen.add(1);
    seen.add(2);
    seen.add(1); // refresh
    seen.add(3);
    assert.equal(seen.has(1), true);
    assert.equal(seen.has(2), false);
    assert.equal(seen.has(3), true);
  });

  it("rejects a non-positive capacity", () => {
    assert.throws(() => new LRUSet(0), /positive finite/);
  });
});

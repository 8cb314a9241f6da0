import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { setTimeout as sleep } from "node:timers/promises";

import { KeyedQueue } from "../lib/queue";

describe("KeyedQueue", () => {
  it("runs tasks for one key in order, one at a time", async () => {
    const queue = new KeyedQueue(() => undefined);
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await sleep(ms);
      events.push(`${name}:end`);
    };

    void queue.push("chat", task("a", 20));
    void queue.push("chat", task("b", 0));
    await queue.drain();

    assert.deepEqual(events, ["a:start", "a:end", "b:start", "b:end"]);
    assert.equal(queue.pending, 0);
  });

  it("lets different keys overlap", async () => {
    const queue = new KeyedQueue(() => undefined);
    const events: string[] = [];

    void queue.push("one", async () => {
      events.push("one:start");
      await sleep(20);
      events.push("one:end");
    });
    void queue.push("two", async () => {
      events.push("two:start");
    });
    await queue.drain();

    assert.deepEqual(events, ["one:start", "two:start", "one:end"]);
  });

  it("reports a failing task and carries on", async () => {
    const failures: string[] = [];
    const queue = new KeyedQueue((err, key) => {
      failures.push(`${key}: ${err instanceof Error ? err.message : String(err)}`);
    });
    let ran = false;

    void queue.push("chat", async () => {
      throw new Error("boom");
    });
    await queue.push("chat", async () => {
      ran = true;
    });

    assert.deepEqual(failures, ["chat: boom"]);
    assert.equal(ran, true);
  });
});

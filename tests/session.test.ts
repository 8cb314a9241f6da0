import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { IDLE } from "../lib/conversation";
import { MemorySessionStore } from "../lib/session";

describe("MemorySessionStore", () => {
  it("reads unknown chats as idle", () => {
    assert.deepEqual(new MemorySessionStore().get("1"), IDLE);
  });

  it("forgets a chat when it goes back to idle", () => {
    const sessions = new MemorySessionStore();
    sessions.set("1", { step: "INPUT_ACTUAL", row: 2 });
    sessions.set("2", { step: "INPUT_ACTUAL", row: 3 });
    assert.equal(sessions.size, 2);

    sessions.set("1", IDLE);
    assert.equal(sessions.size, 1);
    assert.deepEqual(sessions.get("2"), { step: "INPUT_ACTUAL", row: 3 });

    sessions.clear("2");
    assert.equal(sessions.size, 0);
  });
});

/**
 * Per-chat conversation sessions.
 *
 * A chat with no entry is IDLE. Storing IDLE removes the entry, so finished,
 * cancelled and failed conversations leave nothing behind.
 */

import { IDLE, type ConversationState } from "./conversation";

export interface SessionStore {
  get(chatKey: string): ConversationState;
  set(chatKey: string, state: ConversationState): void;
  clear(chatKey: string): void;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ConversationState>();

  get(chatKey: string): ConversationState {
    return this.sessions.get(chatKey) ?? IDLE;
  }

  set(chatKey: string, state: ConversationState): void {
    if (state.step === "IDLE") {
      this.sessions.delete(chatKey);
      return;
    }
    this.sessions.set(chatKey, state);
  }

  clear(chatKey: string): void {
    this.sessions.delete(chatKey);
  }

  get size(): number {
    return this.sessions.size;
  }
}

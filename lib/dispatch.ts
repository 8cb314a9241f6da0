/**
 * Routes one Telegram update to the menu, the status listing or the update
 * conversation, and delivers the reply.
 *
 * Commands and their menu buttons share a handler. A reply to a button press
 * edits the pressed message; a reply to a command, and any error, is sent as
 * a new message.
 */

import {
  advance,
  type ConversationEvent,
  type Reply,
} from "./conversation";
import { CollaboratorError, describeError } from "./errors";
import type { Logger } from "./log";
import {
  buildStartMenu,
  HELP_TEXT,
  menuCommandFor,
  parseProjectIndex,
  PONG_TEXT,
  START_TEXT,
} from "./menu";
import type { SessionStore } from "./session";
import type { RowStore } from "./sheets";
import { formatStatusReport, splitMessage } from "./status";
import type {
  ChatTransport,
  TgCallbackQuery,
  TgMessage,
  TgUpdate,
} from "./telegram";

export type DispatcherDeps = {
  transport: ChatTransport;
  store: RowStore;
  sessions: SessionStore;
  log: Logger;
  /** Called with collaborator failures; wired to the admin chat. */
  notifyError?: (text: string) => Promise<void>;
  /** From getMe; commands suffixed with another bot's name are ignored. */
  botUsername?: string;
};

/**
 * Where a reply goes: a new message, or an edit of the message whose button
 * was pressed.
 */
type Origin = {
  chatId: number;
  editMessageId?: number;
};

/** A reply already cut into the messages that carry it. */
type Outgoing = Omit<Reply, "text"> & { chunks: string[] };

function outgoing(reply: Reply): Outgoing {
  const { text, ...rest } = reply;
  return { ...rest, chunks: splitMessage(text) };
}

type Command = "start" | "update" | "list" | "help" | "cancel" | "ping";

const COMMANDS: readonly Command[] = [
  "start",
  "update",
  "list",
  "help",
  "cancel",
  "ping",
];

/**
 * "/update@SomeBot now" -> "update". Unknown commands, and commands addressed
 * to a bot other than `botUsername`, come back undefined; text that is not a
 * command comes back null.
 */
export function parseCommand(
  text: string,
  botUsername?: string,
): Command | undefined | null {
  const m = /^\/([A-Za-z0-9_]+)(?:@(\w+))?(?:\s|$)/.exec(text.trim());
  if (!m) return null;
  const addressee = m[2];
  if (
    addressee !== undefined &&
    botUsername !== undefined &&
    addressee.toLowerCase() !== botUsername.toLowerCase()
  ) {
    return undefined;
  }
  const name = m[1].toLowerCase();
  return COMMANDS.find((c) => c === name);
}

export function chatKey(chatId: number): string {
  return String(chatId);
}

/**
 * The chat an update belongs to, used to serialise per-chat processing.
 */
export function chatIdOf(update: TgUpdate): number | undefined {
  return update.message?.chat.id ?? update.callback_query?.message?.chat.id;
}

export function createDispatcher(deps: DispatcherDeps) {
  const { transport, store, sessions, log } = deps;

  async function reportCollaboratorError(err: CollaboratorError): Promise<void> {
    log.error(`${err.operation} failed: ${err.message}`);
    if (!deps.notifyError) return;
    try {
      await deps.notifyError(`⚠ ${err.operation} failed: ${err.message}`);
    } catch (notifyErr) {
      log.warn(`admin notification failed: ${describeError(notifyErr)}`);
    }
  }

  async function deliver(origin: Origin, reply: Outgoing): Promise<void> {
    const { chunks } = reply;
    const options = {
      parseMode: reply.html ? ("HTML" as const) : undefined,
      disableWebPagePreview: reply.html ? true : undefined,
    };
    for (const [i, chunk] of chunks.entries()) {
      const last = i === chunks.length - 1;
      const replyMarkup = last ? reply.keyboard : undefined;
      if (i === 0 && origin.editMessageId !== undefined && !reply.isError) {
        await transport.editMessageText(origin.chatId, origin.editMessageId, chunk, {
          ...options,
          replyMarkup,
        });
      } else {
        await transport.sendMessage(origin.chatId, chunk, {
          ...options,
          replyMarkup,
        });
      }
    }
  }

  /**
   * Send a reply; a failed send ends the chat's conversation.
   */
  async function safeDeliver(origin: Origin, reply: Outgoing): Promise<void> {
    try {
      await deliver(origin, reply);
    } catch (err) {
      log.error(`Telegram API error: ${describeError(err)}`);
      sessions.clear(chatKey(origin.chatId));
    }
  }

  async function runConversation(
    origin: Origin,
    event: ConversationEvent,
  ): Promise<void> {
    const key = chatKey(origin.chatId);
    const before = sessions.get(key);
    const result = await advance(before, event, store);
    sessions.set(key, result.state);
    if (before.step !== result.state.step) {
      log.info(`chat ${key}: ${before.step} -> ${result.state.step}`);
    }
    if (result.error) await reportCollaboratorError(result.error);
    if (result.reply) await safeDeliver(origin, outgoing(result.reply));
  }

  async function listProjects(origin: Origin): Promise<void> {
    let chunks: string[];
    try {
      chunks = formatStatusReport(await store.getAllRecords());
    } catch (err) {
      await reportCollaboratorError(
        err instanceof CollaboratorError
          ? err
          : new CollaboratorError("sheets.getAllRecords", err),
      );
      await safeDeliver(
        origin,
        outgoing({
          text: `❌ Error fetching data: ${describeError(err)}`,
          isError: true,
        }),
      );
      return;
    }
    await safeDeliver(origin, { chunks, html: true });
  }

  async function runCommand(origin: Origin, command: Command): Promise<void> {
    switch (command) {
      case "start":
        return safeDeliver(
          origin,
          outgoing({ text: START_TEXT, keyboard: buildStartMenu() }),
        );
      case "help":
        return safeDeliver(origin, outgoing({ text: HELP_TEXT }));
      case "ping":
        return safeDeliver(origin, outgoing({ text: PONG_TEXT }));
      case "list":
        return listProjects(origin);
      case "update":
        return runConversation(origin, { type: "START" });
      case "cancel":
        return runConversation(origin, { type: "CANCEL" });
    }
  }

  async function handleMessage(msg: TgMessage): Promise<void> {
    const text = msg.text;
    if (text === undefined) return;
    const origin: Origin = { chatId: msg.chat.id };

    const command = parseCommand(text, deps.botUsername);
    if (command === null) {
      await runConversation(origin, { type: "TEXT", text });
      return;
    }
    if (command === undefined) {
      log.debug(`chat ${msg.chat.id}: ignoring command ${text}`);
      return;
    }
    await runCommand(origin, command);
  }

  async function handleCallback(cb: TgCallbackQuery): Promise<void> {
    try {
      await transport.answerCallbackQuery(cb.id);
    } catch (err) {
      log.warn(`answerCallbackQuery failed: ${describeError(err)}`);
    }

    const msg = cb.message;
    if (!msg) return;
    const origin: Origin = { chatId: msg.chat.id, editMessageId: msg.message_id };
    const data = cb.data ?? "";

    const menuCommand = menuCommandFor(data);
    if (menuCommand) {
      await runCommand(origin, menuCommand);
      return;
    }

    const index = parseProjectIndex(data);
    if (index !== undefined) {
      await runConversation(origin, { type: "SELECT", index });
      return;
    }

    log.debug(`chat ${msg.chat.id}: ignoring callback data "${data}"`);
  }

  return async function dispatch(update: TgUpdate): Promise<void> {
    log.debug(`update ${update.update_id}`);
    if (update.message) {
      await handleMessage(update.message);
    } else if (update.callback_query) {
      await handleCallback(update.callback_query);
    }
  };
}

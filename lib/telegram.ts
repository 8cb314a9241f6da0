/**
 * Telegram Bot API client with time-bounded calls.
 *
 * - Uses raw HTTPS via global fetch (Node 20).
 * - Implements the ChatTransport the dispatcher talks to, plus the webhook,
 *   polling and command-list calls used by the process wiring.
 */

import { CollaboratorError } from "./errors";

/**
 * Default timeout for Telegram API calls (in ms).
 * Can be overridden per-call.
 */
export const TELEGRAM_TIMEOUT_MS = 6500;

const TELEGRAM_API_ROOT = "https://api.telegram.org";

/* =============================
   Telegram payload types (minimal)
============================= */

export type TgUser = {
  id: number;
  is_bot?: boolean;
  first_name?: string;
  last_name?: string;
  username?: string;
};

export type TgChat = {
  id: number;
  type: string;
  title?: string;
  username?: string;
};

export type TgMessage = {
  message_id: number;
  date: number;
  chat: TgChat;
  from?: TgUser;
  text?: string;
};

export type TgCallbackQuery = {
  id: string;
  from: TgUser;
  message?: TgMessage;
  data?: string;
};

export type TgUpdate = {
  update_id: number;
  message?: TgMessage;
  callback_query?: TgCallbackQuery;
};

export type TgInlineKeyboardButton = {
  text: string;
  callback_data?: string;
  url?: string;
};

export type TgInlineKeyboardMarkup = {
  inline_keyboard: TgInlineKeyboardButton[][];
};

export type TgBotCommand = {
  command: string;
  description: string;
};

type TgApiEnvelope<T> = {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
};

export type MessageOptions = {
  replyMarkup?: TgInlineKeyboardMarkup;
  parseMode?: "HTML";
  disableWebPagePreview?: boolean;
};

/**
 * What the bot core needs from the chat platform.
 */
export interface ChatTransport {
  sendMessage(chatId: number, text: string, options?: MessageOptions): Promise<void>;
  editMessageText(
    chatId: number,
    messageId: number,
    text: string,
    options?: MessageOptions,
  ): Promise<void>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function hasChatId(message: unknown): boolean {
  if (!isObject(message)) return false;
  const chat = Reflect.get(message, "chat");
  return isObject(chat) && typeof Reflect.get(chat, "id") === "number";
}

/**
 * Structural check for a JSON body claiming to be an update: a numeric
 * update_id, and a chat id on every message it carries.
 */
export function isTgUpdate(value: unknown): value is TgUpdate {
  if (!isObject(value) || typeof Reflect.get(value, "update_id") !== "number") {
    return false;
  }
  const message = Reflect.get(value, "message");
  if (message !== undefined && !hasChatId(message)) return false;

  const query = Reflect.get(value, "callback_query");
  if (query === undefined) return true;
  if (!isObject(query) || typeof Reflect.get(query, "id") !== "string") {
    return false;
  }
  const queryMessage = Reflect.get(query, "message");
  return queryMessage === undefined || hasChatId(queryMessage);
}

export class TelegramApi implements ChatTransport {
  private readonly base: string;

  constructor(
    botToken: string,
    private readonly timeoutMs: number = TELEGRAM_TIMEOUT_MS,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    if (!botToken) throw new Error("BOT_TOKEN is not set");
    this.base = `${TELEGRAM_API_ROOT}/bot${botToken}`;
  }

  async call<T>(
    method: string,
    payload: Record<string, unknown>,
    options: { timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<T> {
    const url = `${this.base}/${method}`;

    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      options.timeoutMs ?? this.timeoutMs,
    );
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const doFetch = this.fetchImpl;
    try {
      const res = await doFetch(url, {
        method: "POST",
        signal: controller.signal,
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
      });

      let data: TgApiEnvelope<T>;
      try {
        data = (await res.json()) as TgApiEnvelope<T>;
      } catch {
        throw new Error(
          `Telegram ${method} failed: non-JSON response (${res.status} ${res.statusText})`,
        );
      }

      if (!res.ok || !data.ok || data.result === undefined) {
        const desc = data.description ? ` - ${data.description}` : "";
        throw new Error(
          `Telegram ${method} failed: ${res.status} ${res.statusText}${desc}`,
        );
      }

      return data.result;
    } catch (err) {
      throw new CollaboratorError(`telegram.${method}`, err);
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  async sendMessage(
    chatId: number,
    text: string,
    options: MessageOptions = {},
  ): Promise<void> {
    await this.call("sendMessage", {
      chat_id: chatId,
      text,
      parse_mode: options.parseMode,
      reply_markup: options.replyMarkup,
      disable_web_page_preview: options.disableWebPagePreview,
    });
  }

  /**
   * Edit the text (and inline keyboard) of an existing message in the same chat.
   */
  async editMessageText(
    chatId: number,
    messageId: number,
    text: string,
    options: MessageOptions = {},
  ): Promise<void> {
    await this.call("editMessageText", {
      chat_id: chatId,
      message_id: messageId,
      text,
      parse_mode: options.parseMode,
      reply_markup: options.replyMarkup,
      disable_web_page_preview: options.disableWebPagePreview,
    });
  }

  /**
   * Answer a callback query. Use empty text to silently acknowledge.
   */
  async answerCallbackQuery(
    callbackQueryId: string,
    text?: string,
  ): Promise<void> {
    await this.call("answerCallbackQuery", {
      callback_query_id: callbackQueryId,
      text,
      show_alert: false,
      cache_time: 0,
    });
  }

  getMe(): Promise<TgUser> {
    return this.call<TgUser>("getMe", {});
  }

  /**
   * See: https://core.telegram.org/bots/api#setmycommands
   */
  async setMyCommands(commands: TgBotCommand[]): Promise<void> {
    await this.call("setMyCommands", { commands });
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call("setWebhook", {
      url,
      secret_token: secretToken,
      allowed_updates: ["message", "callback_query"],
    });
  }

  async deleteWebhook(): Promise<void> {
    await this.call("deleteWebhook", { drop_pending_updates: false });
  }

  /**
   * Long-poll for updates. The HTTP timeout is stretched past the
   * server-side wait so an idle poll is not cut short.
   */
  getUpdates(
    offset: number,
    waitSeconds: number,
    signal?: AbortSignal,
  ): Promise<TgUpdate[]> {
    return this.call<TgUpdate[]>(
      "getUpdates",
      {
        offset,
        timeout: waitSeconds,
        allowed_updates: ["message", "callback_query"],
      },
      { timeoutMs: waitSeconds * 1000 + this.timeoutMs, signal },
    );
  }
}

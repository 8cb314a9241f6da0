/**
 * Environment configuration, read once at start-up.
 *
 * Env:
 * - BOT_TOKEN (required)
 * - SPREADSHEET_ID or SHEET_ID (required)
 * - SHEET_NAME (default "Project Summary")
 * - GOOGLE_CREDS_JSON, or GOOGLE_SERVICE_ACCOUNT_EMAIL with either
 *   GOOGLE_PRIVATE_KEY (with \n) or GOOGLE_PRIVATE_KEY_BASE64
 * - WEBHOOK_URL (optional; webhook mode when set, long polling otherwise)
 * - WEBHOOK_SECRET (optional)
 * - PORT (default 5000)
 * - ADMIN_CHAT_ID (optional)
 * - LOG_LEVEL (default info)
 */

import { ConfigError, describeError } from "./errors";
import { isLogLevel, type LogLevel } from "./log";

export const DEFAULT_SHEET_NAME = "Project Summary";
export const DEFAULT_PORT = 5000;

export type ServiceAccount = {
  email: string;
  privateKey: string;
};

export type BotConfig = {
  botToken: string;
  spreadsheetId: string;
  sheetName: string;
  serviceAccount: ServiceAccount;
  webhookUrl?: string;
  webhookSecret?: string;
  /** Path the webhook is served on; the token itself, as Telegram is told. */
  webhookPath: string;
  port: number;
  adminChatId?: number;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

/**
 * Handle surrounding quotes and escaped newlines in a pasted private key.
 */
export function normalizePrivateKeyText(key: string): string {
  let k = key.trim();
  if (
    (k.startsWith('"') && k.endsWith('"')) ||
    (k.startsWith("'") && k.endsWith("'"))
  ) {
    k = k.slice(1, -1);
  }
  return k.replace(/\\n/g, "\n");
}

function serviceAccountFromJson(raw: string): ServiceAccount {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `GOOGLE_CREDS_JSON is not valid JSON: ${describeError(err)}`,
    );
  }
  if (typeof parsed !== "object" || parsed === null) {
    throw new ConfigError("GOOGLE_CREDS_JSON must be a JSON object");
  }
  const email: unknown = Reflect.get(parsed, "client_email");
  const key: unknown = Reflect.get(parsed, "private_key");
  if (typeof email !== "string" || !email) {
    throw new ConfigError("GOOGLE_CREDS_JSON has no client_email");
  }
  if (typeof key !== "string" || !key) {
    throw new ConfigError("GOOGLE_CREDS_JSON has no private_key");
  }
  return { email, privateKey: normalizePrivateKeyText(key) };
}

/**
 * Prefer GOOGLE_CREDS_JSON, then GOOGLE_PRIVATE_KEY_BASE64, then GOOGLE_PRIVATE_KEY.
 */
function readServiceAccount(env: Env): ServiceAccount {
  const json = read(env, "GOOGLE_CREDS_JSON");
  if (json) return serviceAccountFromJson(json);

  const email = read(env, "GOOGLE_SERVICE_ACCOUNT_EMAIL");
  if (!email) {
    throw new ConfigError(
      "GOOGLE_CREDS_JSON or GOOGLE_SERVICE_ACCOUNT_EMAIL is not set",
    );
  }
  const b64 = read(env, "GOOGLE_PRIVATE_KEY_BASE64");
  const privateKey = b64
    ? Buffer.from(b64, "base64").toString("utf8")
    : normalizePrivateKeyText(env.GOOGLE_PRIVATE_KEY ?? "");
  if (!privateKey) {
    throw new ConfigError(
      "GOOGLE_PRIVATE_KEY or GOOGLE_PRIVATE_KEY_BASE64 is not set",
    );
  }
  return { email, privateKey };
}

function readPort(env: Env): number {
  const raw = read(env, "PORT");
  if (!raw) return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

function readAdminChatId(env: Env): number | undefined {
  const raw = read(env, "ADMIN_CHAT_ID");
  if (!raw) return undefined;
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw new ConfigError(`ADMIN_CHAT_ID must be a numeric chat id, got "${raw}"`);
  }
  return id;
}

function readLogLevel(env: Env): LogLevel {
  const raw = read(env, "LOG_LEVEL")?.toLowerCase();
  if (!raw) return "info";
  if (!isLogLevel(raw)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error`);
  }
  return raw;
}

export function loadConfig(env: Env = process.env): BotConfig {
  const botToken = read(env, "BOT_TOKEN");
  if (!botToken) throw new ConfigError("BOT_TOKEN is not set");

  const spreadsheetId = read(env, "SPREADSHEET_ID") ?? read(env, "SHEET_ID");
  if (!spreadsheetId) throw new ConfigError("SPREADSHEET_ID is not set");

  return {
    botToken,
    spreadsheetId,
    sheetName: read(env, "SHEET_NAME") ?? DEFAULT_SHEET_NAME,
    serviceAccount: readServiceAccount(env),
    webhookUrl: read(env, "WEBHOOK_URL"),
    webhookSecret: read(env, "WEBHOOK_SECRET"),
    webhookPath: `/${botToken}`,
    port: readPort(env),
    adminChatId: readAdminChatId(env),
    logLevel: readLogLevel(env),
  };
}

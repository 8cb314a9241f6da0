/**
 * Project progress tracker bot: process entry.
 *
 * - Webhook mode when WEBHOOK_URL is set, long polling otherwise.
 * - The HTTP server runs in both modes for the health routes.
 * - SIGINT / SIGTERM stop intake, drain queued updates, then exit.
 *
 * See lib/config.ts for the environment variables.
 */

import type { Server } from "node:http";
import { createWebhookHandler } from "./api/bot";
import { createHttpServer } from "./api/server";
import { loadConfig, type BotConfig } from "./lib/config";
import { chatIdOf, createDispatcher } from "./lib/dispatch";
import { describeError } from "./lib/errors";
import { LRUSet } from "./lib/idempotency";
import { createLogger, type Logger } from "./lib/log";
import { BOT_COMMANDS } from "./lib/menu";
import { runPolling } from "./lib/polling";
import { KeyedQueue } from "./lib/queue";
import { MemorySessionStore } from "./lib/session";
import {
  createSheetsClient,
  googleSheetsValues,
  SheetsRowStore,
} from "./lib/sheets";
import { TelegramApi, type TgUpdate } from "./lib/telegram";

function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, "0.0.0.0", () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function run(config: BotConfig, log: Logger): Promise<void> {
  const api = new TelegramApi(config.botToken);
  const store = new SheetsRowStore(
    googleSheetsValues(
      createSheetsClient(config.serviceAccount),
      config.spreadsheetId,
    ),
    config.sheetName,
  );

  let botUsername: string | undefined;
  try {
    botUsername = (await api.getMe()).username;
  } catch (err) {
    log.warn(`getMe failed: ${describeError(err)}`);
  }

  const adminChatId = config.adminChatId;
  const dispatch = createDispatcher({
    transport: api,
    store,
    sessions: new MemorySessionStore(),
    log: log.child("dispatch"),
    notifyError:
      adminChatId === undefined
        ? undefined
        : (text) => api.sendMessage(adminChatId, text),
    botUsername,
  });

  const queue = new KeyedQueue((err, key) =>
    log.error(`update for chat ${key} failed: ${describeError(err)}`),
  );
  const enqueue = (update: TgUpdate) => {
    const chatId = chatIdOf(update);
    const key = chatId === undefined ? `update:${update.update_id}` : String(chatId);
    void queue.push(key, () => dispatch(update));
  };

  try {
    await api.setMyCommands(BOT_COMMANDS);
  } catch (err) {
    log.warn(`setMyCommands failed: ${describeError(err)}`);
  }

  const webhookMode = config.webhookUrl !== undefined;
  const server = createHttpServer(
    webhookMode
      ? {
          webhookPath: config.webhookPath,
          webhook: createWebhookHandler({
            enqueue,
            log: log.child("webhook"),
            secretToken: config.webhookSecret,
          }),
        }
      : {},
    log.child("http"),
  );
  await listen(server, config.port);
  log.info(`http server listening on port ${config.port}`);

  let requestStop: (reason: string) => void = () => undefined;
  const stopRequested = new Promise<void>((resolve) => {
    requestStop = (reason) => {
      log.info(`${reason}, shutting down`);
      resolve();
    };
  });
  process.once("SIGINT", () => requestStop("received SIGINT"));
  process.once("SIGTERM", () => requestStop("received SIGTERM"));

  const polling = new AbortController();
  let pollingDone: Promise<void> = Promise.resolve();
  if (config.webhookUrl !== undefined) {
    const base = config.webhookUrl.replace(/\/+$/, "");
    await api.setWebhook(`${base}${config.webhookPath}`, config.webhookSecret);
    log.info("webhook registered");
  } else {
    const seen = new LRUSet<number>(1000);
    pollingDone = runPolling(
      api,
      (update) => {
        if (seen.remember(update.update_id)) enqueue(update);
      },
      polling.signal,
      log.child("polling"),
    ).catch((err: unknown) => {
      log.error(`polling failed: ${describeError(err)}`);
      process.exitCode = 1;
      requestStop("polling failed");
    });
  }

  await stopRequested;

  polling.abort();
  await Promise.all([pollingDone, close(server)]);
  await queue.drain();
  log.info("shutdown complete");
}

async function main(): Promise<void> {
  const bootLog = createLogger("progress-bot");
  let config: BotConfig;
  try {
    config = loadConfig();
  } catch (err) {
    bootLog.error(describeError(err));
    process.exitCode = 1;
    return;
  }

  const log = createLogger("progress-bot", { level: config.logLevel });
  log.info(
    `starting in ${config.webhookUrl ? "webhook" : "polling"} mode for sheet "${config.sheetName}"`,
  );
  await run(config, log);
}

main().catch((err: unknown) => {
  console.error(`fatal: ${describeError(err)}`);
  process.exit(1);
});

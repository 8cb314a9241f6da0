/**
 * Long-polling delivery: getUpdates in a loop until the signal aborts.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { describeError } from "./errors";
import type { Logger } from "./log";
import type { TgUpdate } from "./telegram";

export const POLL_WAIT_SECONDS = 30;
export const POLL_RETRY_MS = 3000;

export interface UpdateSource {
  deleteWebhook(): Promise<void>;
  getUpdates(
    offset: number,
    waitSeconds: number,
    signal?: AbortSignal,
  ): Promise<TgUpdate[]>;
}

export type PollingOptions = {
  waitSeconds?: number;
  retryMs?: number;
};

/**
 * Resolves once `signal` aborts. Failed calls, including clearing the
 * webhook at start, are logged and retried after `retryMs`.
 */
export async function runPolling(
  source: UpdateSource,
  onUpdate: (update: TgUpdate) => void,
  signal: AbortSignal,
  log: Logger,
  options: PollingOptions = {},
): Promise<void> {
  const waitSeconds = options.waitSeconds ?? POLL_WAIT_SECONDS;
  const retryMs = options.retryMs ?? POLL_RETRY_MS;

  let webhookCleared = false;
  let offset = 0;
  while (!signal.aborted) {
    let updates: TgUpdate[];
    try {
      if (!webhookCleared) {
        // getUpdates is refused while a webhook is registered
        await source.deleteWebhook();
        webhookCleared = true;
        log.info("polling for updates");
      }
      updates = await source.getUpdates(offset, waitSeconds, signal);
    } catch (err) {
      if (signal.aborted) break;
      const call = webhookCleared ? "getUpdates" : "deleteWebhook";
      log.warn(`${call} failed: ${describeError(err)}; retrying in ${retryMs}ms`);
      try {
        await sleep(retryMs, undefined, { signal });
      } catch {
        break;
      }
      continue;
    }
    for (const update of updates) {
      offset = Math.max(offset, update.update_id + 1);
      onUpdate(update);
    }
  }
  log.info("polling stopped");
}

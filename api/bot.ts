/**
 * Telegram webhook handler.
 * - Webhook: POST <webhook path>
 * - Accepts one JSON update, hands it to the delivery queue and answers
 *   straight away; processing happens after the response.
 * - Idempotent by update_id
 *
 * Status codes: 200 accepted (or duplicate), 400 malformed body,
 * 403 wrong secret token, 405 not POST, 500 unexpected failure.
 */

import { describeError } from "../lib/errors";
import { LRUSet } from "../lib/idempotency";
import type { Logger } from "../lib/log";
import { isTgUpdate, type TgUpdate } from "../lib/telegram";

export const SECRET_HEADER = "x-telegram-bot-api-secret-token";

/**
 * Minimal subset of Node's IncomingMessage the handler relies on.
 */
export type WebhookRequest = AsyncIterable<Buffer | string> & {
  method?: string;
  url?: string;
  headers: Record<string, string | string[] | undefined>;
};

/**
 * Minimal subset of Node's ServerResponse the handler relies on.
 */
export interface WebhookResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(data?: string): unknown;
}

export type WebhookOptions = {
  enqueue: (update: TgUpdate) => void;
  log: Logger;
  secretToken?: string;
  seen?: LRUSet<number>;
};

export async function readBody(req: AsyncIterable<Buffer | string>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of req) {
    chunks.push(typeof c === "string" ? Buffer.from(c, "utf8") : c);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function finish(res: WebhookResponse, status: number): void {
  res.statusCode = status;
  res.end();
}

export function createWebhookHandler(options: WebhookOptions) {
  const seen = options.seen ?? new LRUSet<number>(1000);
  const { log } = options;

  return async function handler(
    req: WebhookRequest,
    res: WebhookResponse,
  ): Promise<void> {
    try {
      if (req.method !== "POST") {
        res.setHeader("Allow", "POST");
        finish(res, 405);
        return;
      }

      if (options.secretToken && req.headers[SECRET_HEADER] !== options.secretToken) {
        log.warn("webhook request with a wrong secret token");
        finish(res, 403);
        return;
      }

      let body: unknown;
      try {
        body = JSON.parse(await readBody(req));
      } catch (err) {
        log.warn(`webhook body is not JSON: ${describeError(err)}`);
        finish(res, 400);
        return;
      }
      if (!isTgUpdate(body)) {
        log.warn("webhook body is not a Telegram update");
        finish(res, 400);
        return;
      }

      // Idempotency by update_id
      if (seen.remember(body.update_id)) {
        options.enqueue(body);
      } else {
        log.debug(`duplicate update ${body.update_id}`);
      }
      finish(res, 200);
    } catch (err) {
      log.error(`webhook error: ${describeError(err)}`);
      finish(res, 500);
    }
  };
}

export type WebhookHandler = ReturnType<typeof createWebhookHandler>;

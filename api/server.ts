/**
 * HTTP surface: the webhook endpoint plus fixed-text liveness routes.
 *
 * - GET /, GET /health -> 200 "OK"
 * - GET /wakeup        -> 200 "Bot is awake" (hit by the uptime monitor)
 * - <webhook path>     -> webhook handler (only when one is given)
 * - anything else      -> 404
 */

import { createServer, type Server } from "node:http";
import { describeError } from "../lib/errors";
import type { Logger } from "../lib/log";
import type { WebhookHandler, WebhookRequest, WebhookResponse } from "./bot";

export const HEALTH_TEXT = "OK";
export const WAKEUP_TEXT = "Bot is awake";

export type RouterOptions = {
  webhookPath?: string;
  webhook?: WebhookHandler;
};

function text(res: WebhookResponse, status: number, body: string): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "text/plain; charset=utf-8");
  res.end(body);
}

export function createRouter(options: RouterOptions) {
  return async function route(
    req: WebhookRequest,
    res: WebhookResponse,
  ): Promise<void> {
    const path = (req.url ?? "/").split("?")[0];

    if (options.webhook && options.webhookPath && path === options.webhookPath) {
      await options.webhook(req, res);
      return;
    }

    if (req.method === "GET" || req.method === "HEAD") {
      if (path === "/" || path === "/health") return text(res, 200, HEALTH_TEXT);
      if (path === "/wakeup") return text(res, 200, WAKEUP_TEXT);
    }
    text(res, 404, "Not Found");
  };
}

export function createHttpServer(options: RouterOptions, log: Logger): Server {
  const route = createRouter(options);
  return createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      res.statusCode = 500;
      res.end();
      log.error(`http error: ${describeError(err)}`);
    });
  });
}

// backend/services/shared/middleware/httpLogger.ts

/**
 * Why:
 * - Consistent, structured request logs so ops can aggregate by `service`
 *   and correlate by `reqId`.
 * - Telemetry only: never blocks a request.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.id` is populated.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes, favicon and static assets are not logged.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger as rootLogger } from "../utils/logger";

const QUIET_PATHS = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/healthz",
  "/readyz",
  "/favicon.ico",
]);

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    // Reuse the id minted by requestIdMiddleware; mint only if it never ran.
    genReqId: (req, res) => {
      if (req.id) return req.id;
      const id = randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = (req.url ?? "").split("?")[0];
        return (
          QUIET_PATHS.has(url) ||
          url.startsWith("/static/") ||
          url.startsWith("/media/")
        );
      },
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}

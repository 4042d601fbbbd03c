// backend/services/shared/middleware/requestId.ts

/**
 * Why:
 * - Every inbound request carries a stable correlation key so request logs,
 *   error events and problem+json bodies (`instance`) can be tied together.
 *
 * Notes:
 * - Order matters. This must run **before** the http logger so every log line
 *   carries the id.
 * - Idempotent: never overwrite a caller-supplied ID. We only mint a UUID if
 *   the incoming request lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const hdr =
      req.headers["x-request-id"] ||
      req.headers["x-correlation-id"] ||
      req.headers["x-amzn-trace-id"];

    const id = (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();

    req.id = String(id);
    res.setHeader("x-request-id", String(id));
    next();
  };
}

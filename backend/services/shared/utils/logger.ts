// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * ❗️Each service MUST call `initLogger(SERVICE_NAME, level)` at bootstrap
 *    BEFORE creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger("museum", config.logLevel);
 */

const validLevels: ReadonlySet<string> = new Set([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export function isLogLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function initialLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
  if (!isLogLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

// NOTE: no "service" in base until initLogger() runs.
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: initialLevel(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "password",
      "passwordHash",
    ],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string, level?: LevelWithSilent): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: level ?? pinoOptions.level,
    base: { service: SERVICE_NAME },
  });
}

// ───────────────────────────── Request context helper ─────────────────────────
export function extractLogContext(req: Request): Record<string, unknown> {
  return {
    requestId: req.id ?? null,
    path: req.originalUrl,
    method: req.method,
    admin: req.admin?.username ?? null,
    entityId: req.params?.id,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}

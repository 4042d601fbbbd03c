// backend/services/museum/src/config.ts

/**
 * Why:
 * - One validated, frozen config object built once at startup and handed to
 *   the app factory, the image pipeline and the CLI. Nothing below reads
 *   process.env directly.
 *
 * Notes:
 * - No dotenv loading here (bootstrap.ts loads env first).
 * - Empty strings count as unset so `FOO=` in a .env falls back to the default.
 * - Failures name the offending variable.
 */

import path from "node:path";
import { z } from "zod";
import type { LevelWithSilent } from "pino";

const FLAG_TRUE = new Set(["true", "1", "yes", "on"]);

const zFlag = z
  .string()
  .default("false")
  .transform((v) => FLAG_TRUE.has(v.toLowerCase()));

const zInt = (def: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(def);

const zEnv = z.object({
  SECRET_KEY: z.string({ required_error: "Required" }).min(1),
  DEBUG: zFlag,
  ALLOWED_HOSTS: z.string().default(""),
  PORT: zInt(8000, 0, 65535),

  MONGO_URI: z.string().startsWith("mongodb").optional(),
  DB_HOST: z.string().default("db"),
  DB_PORT: zInt(27017, 1, 65535),
  DB_NAME: z.string().default("museum_db"),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_WAIT_INTERVAL_MS: zInt(2000, 1),

  SUPERUSER_USERNAME: z.string().optional(),
  SUPERUSER_EMAIL: z.string().email().optional(),
  SUPERUSER_PASSWORD: z.string().min(8, "Must be at least 8 characters").optional(),

  MAX_IMAGE_WIDTH: zInt(1920, 1),
  MAX_IMAGE_HEIGHT: zInt(1920, 1),
  IMAGE_QUALITY: zInt(85, 1, 100),
  UPLOAD_MAX_MB: z.coerce.number().positive().default(50),

  MEDIA_ROOT: z.string().default("./media"),
  STATIC_ROOT: z.string().default("./staticfiles"),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),

  ADMIN_TOKEN_TTL_SEC: zInt(28800, 1),

  SITE_TITLE: z.string().default("Museum"),
  PANORAMA_IMAGE: z.string().default("/static/images/panorama.jpg"),
  PANORAMA_AUTOROTATE_SPEED: z.coerce.number().default(0.3),
  PANORAMA_RESUME_DELAY_MS: zInt(5000, 0),
});

export type ImageBounds = {
  readonly maxWidth: number;
  readonly maxHeight: number;
  readonly quality: number;
};

export type SuperuserCredentials = {
  readonly username: string;
  readonly email: string;
  readonly password: string;
};

export type PanoramaSettings = {
  readonly image: string;
  readonly autoRotateSpeed: number;
  readonly resumeDelayMs: number;
};

export type MuseumConfig = {
  readonly secretKey: string;
  readonly debug: boolean;
  readonly allowedHosts: readonly string[];
  readonly port: number;
  readonly mongoUri: string;
  readonly dbWaitIntervalMs: number;
  /** Null unless all three SUPERUSER_* variables are set. */
  readonly superuser: SuperuserCredentials | null;
  readonly image: ImageBounds;
  readonly uploadMaxBytes: number;
  readonly mediaRoot: string;
  readonly staticRoot: string;
  readonly logLevel: LevelWithSilent;
  readonly adminTokenTtlSec: number;
  readonly siteTitle: string;
  readonly panorama: PanoramaSettings;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Trimmed, non-empty values only. */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v === undefined) continue;
    const s = v.trim();
    if (s !== "") out[k] = s;
  }
  return out;
}

export function buildMongoUri(parts: {
  host: string;
  port: number;
  name: string;
  user?: string;
  password?: string;
}): string {
  const auth = parts.user
    ? `${encodeURIComponent(parts.user)}:${encodeURIComponent(parts.password ?? "")}@`
    : "";
  const query = parts.user ? "?authSource=admin" : "";
  return `mongodb://${auth}${parts.host}:${parts.port}/${parts.name}${query}`;
}

export function parseHostList(raw: string): string[] {
  return raw
    .split(",")
    .map((h) => h.trim())
    .filter(Boolean);
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): MuseumConfig {
  const parsed = zEnv.safeParse(presentValues(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const e = parsed.data;

  const superuser =
    e.SUPERUSER_USERNAME && e.SUPERUSER_EMAIL && e.SUPERUSER_PASSWORD
      ? Object.freeze({
          username: e.SUPERUSER_USERNAME,
          email: e.SUPERUSER_EMAIL,
          password: e.SUPERUSER_PASSWORD,
        })
      : null;

  return Object.freeze({
    secretKey: e.SECRET_KEY,
    debug: e.DEBUG,
    allowedHosts: Object.freeze(parseHostList(e.ALLOWED_HOSTS)),
    port: e.PORT,
    mongoUri:
      e.MONGO_URI ??
      buildMongoUri({
        host: e.DB_HOST,
        port: e.DB_PORT,
        name: e.DB_NAME,
        user: e.DB_USER,
        password: e.DB_PASSWORD,
      }),
    dbWaitIntervalMs: e.DB_WAIT_INTERVAL_MS,
    superuser,
    image: Object.freeze({
      maxWidth: e.MAX_IMAGE_WIDTH,
      maxHeight: e.MAX_IMAGE_HEIGHT,
      quality: e.IMAGE_QUALITY,
    }),
    uploadMaxBytes: Math.floor(e.UPLOAD_MAX_MB * 1024 * 1024),
    mediaRoot: path.resolve(cwd, e.MEDIA_ROOT),
    staticRoot: path.resolve(cwd, e.STATIC_ROOT),
    logLevel: e.LOG_LEVEL ?? (e.DEBUG ? "debug" : "info"),
    adminTokenTtlSec: e.ADMIN_TOKEN_TTL_SEC,
    siteTitle: e.SITE_TITLE,
    panorama: Object.freeze({
      image: e.PANORAMA_IMAGE,
      autoRotateSpeed: e.PANORAMA_AUTOROTATE_SPEED,
      resumeDelayMs: e.PANORAMA_RESUME_DELAY_MS,
    }),
  });
}

// backend/services/museum/src/bootstrap.ts
/**
 * Why:
 * - Keep start-up boring: load env via the shared cascade (repo root → service),
 *   validate config once, then stamp the shared logger with this service's name.
 * - Both the HTTP entry (index.ts) and the CLI call this before anything else.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadEnvCascadeForService } from "@shared/env";
import { initLogger } from "@shared/utils/logger";
import { loadConfig, type MuseumConfig } from "./config";

export const SERVICE_NAME = "museum" as const;

export const SERVICE_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  ".."
);

export function bootstrapService(): MuseumConfig {
  loadEnvCascadeForService(SERVICE_DIR);
  const config = loadConfig(process.env);
  initLogger(SERVICE_NAME, config.logLevel);
  return config;
}

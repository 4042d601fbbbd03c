// backend/services/museum/src/cli/entrypoint.ts

/**
 * Container start sequence:
 *   wait for DB → connect → media folders → migrate → collectstatic →
 *   initial admin (when SUPERUSER_* are all set) → start HTTP.
 *
 * Every step is injectable so the sequence can run against fakes.
 */

import { logger } from "@shared/utils/logger";
import type { MuseumConfig, SuperuserCredentials } from "../config";
import type { MigrationReport } from "../migrations";
import type { SuperuserOutcome } from "../services/authService";
import type { CollectReport } from "./collectStatic";
import { waitForDatabase } from "./waitForDatabase";

export type EntrypointSteps = {
  ping: () => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  connect: () => Promise<void>;
  ensureMediaFolders: () => Promise<void>;
  migrate: () => Promise<MigrationReport>;
  collectStatic: () => Promise<CollectReport>;
  ensureSuperuser: (creds: SuperuserCredentials) => Promise<SuperuserOutcome>;
  start: () => Promise<unknown>;
};

export type EntrypointReport = {
  dbAttempts: number;
  migrations: MigrationReport;
  staticFiles: CollectReport;
  superuser: SuperuserOutcome | "skipped";
};

export async function runEntrypoint(
  config: MuseumConfig,
  steps: EntrypointSteps
): Promise<EntrypointReport> {
  const dbAttempts = await waitForDatabase({
    ping: steps.ping,
    intervalMs: config.dbWaitIntervalMs,
    sleep: steps.sleep,
  });
  await steps.connect();

  logger.info("setting up media directories");
  await steps.ensureMediaFolders();

  logger.info("running database migrations");
  const migrations = await steps.migrate();

  logger.info("collecting static files");
  const staticFiles = await steps.collectStatic();

  let superuser: EntrypointReport["superuser"] = "skipped";
  if (config.superuser) {
    superuser = await steps.ensureSuperuser(config.superuser);
  } else {
    logger.info("SUPERUSER_* not fully set, skipping initial admin");
  }

  logger.info("starting application");
  await steps.start();

  return { dbAttempts, migrations, staticFiles, superuser };
}

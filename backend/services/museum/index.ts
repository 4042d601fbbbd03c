// backend/services/museum/index.ts
/**
 * Why:
 * - Keep start-up boring and reliable: load env + config (bootstrap), then
 *   connect the DB and start HTTP (server.ts).
 * - The container entrypoint (`museum entrypoint`) waits for the DB and runs
 *   migrations before it gets here.
 */

import { bootstrapService, SERVICE_NAME } from "./src/bootstrap";
import { logger } from "@shared/utils/logger";
import { startMuseumServer } from "./src/server";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

startMuseumServer(bootstrapService()).catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});

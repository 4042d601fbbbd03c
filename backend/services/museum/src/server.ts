// backend/services/museum/src/server.ts
import {
  startHttpService,
  type StartedService,
} from "@shared/bootstrap/startHttpService";
import { logger } from "@shared/utils/logger";
import { createMuseumApp } from "./app";
import { SERVICE_NAME } from "./bootstrap";
import type { MuseumConfig } from "./config";
import { connectDb, disconnectDb, mongoReadiness } from "./db";
import { createMongoRepos } from "./repo";
import { createServices } from "./services";

/** Connect, assemble, listen. Used by index.ts and `museum start`. */
export async function startMuseumServer(config: MuseumConfig): Promise<StartedService> {
  await connectDb(config.mongoUri);
  const services = createServices(config, createMongoRepos());
  const app = createMuseumApp({ config, services, readiness: mongoReadiness });
  return startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: disconnectDb,
  });
}

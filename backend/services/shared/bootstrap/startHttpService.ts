// backend/services/shared/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // 0 in tests for an ephemeral port
  serviceName: string;
  logger: Logger;
  /** Extra cleanup after the server closes (e.g. DB disconnect). */
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

/** Listen, log the bound port, and close cleanly on SIGTERM/SIGINT. */
export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, serviceName, logger, onShutdown } = opts;

  return new Promise((resolve, reject) => {
    const server = app.listen(port);

    const stop = () =>
      new Promise<void>((res, rej) => {
        server.close((err) => (err ? rej(err) : res()));
      });

    const shutdown = (signal: string) => {
      logger.info({ signal, service: serviceName }, "shutting down service");
      stop()
        .then(() => onShutdown?.())
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err, service: serviceName }, "shutdown failed");
          process.exit(1);
        });
    };

    server.once("error", (err) => {
      logger.error({ err, service: serviceName }, "http server error");
      reject(err);
    });

    server.once("listening", () => {
      const addr = server.address();
      const boundPort = addr !== null && typeof addr === "object" ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");

      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));

      resolve({ server, boundPort, stop });
    });
  });
}

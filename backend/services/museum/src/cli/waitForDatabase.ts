// backend/services/museum/src/cli/waitForDatabase.ts
import { logger } from "@shared/utils/logger";

export type WaitForDatabaseOptions = {
  /** One reachability probe; rejects while the database is down. */
  ping: () => Promise<void>;
  intervalMs: number;
  sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Polls until `ping` resolves. Fixed interval, no backoff, no attempt cap:
 * the container stays up until the database does.
 * Resolves with the number of attempts it took.
 */
export async function waitForDatabase(opts: WaitForDatabaseOptions): Promise<number> {
  const pause = opts.sleep ?? sleep;
  logger.info("waiting for database");
  for (let attempt = 1; ; attempt++) {
    try {
      await opts.ping();
      logger.info({ attempt }, "database is up");
      return attempt;
    } catch (err) {
      logger.warn(
        { attempt, err: err instanceof Error ? err.message : String(err) },
        "database is unavailable - sleeping"
      );
      await pause(opts.intervalMs);
    }
  }
}

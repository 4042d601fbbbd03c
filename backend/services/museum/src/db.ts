// backend/services/museum/src/db.ts
import mongoose from "mongoose";
import { logger } from "@shared/utils/logger";

export function redactUri(uri: string): string {
  return uri.replace(/:\/\/[^@/]*@/, "://***:***@");
}

/** No-op when this process is already connected. */
export async function connectDb(uri: string): Promise<void> {
  if (mongoose.connection.readyState === mongoose.ConnectionStates.connected) return;
  // Indexes come from migrations, not from model compilation.
  await mongoose.connect(uri, { autoIndex: false });
  logger.info({ component: "mongodb", uri: redactUri(uri) }, "[MongoDB] connected");
}

export async function disconnectDb(): Promise<void> {
  await mongoose.disconnect();
  logger.info({ component: "mongodb" }, "[MongoDB] disconnected");
}

/**
 * One reachability probe: open a throwaway connection, ping, close.
 * Rejects when the server is not reachable within `timeoutMs`.
 */
export async function pingDb(uri: string, timeoutMs = 2000): Promise<void> {
  const conn = mongoose.createConnection(uri, {
    serverSelectionTimeoutMS: timeoutMs,
    connectTimeoutMS: timeoutMs,
    autoIndex: false,
  });
  try {
    await conn.asPromise();
    const db = conn.db;
    if (!db) throw new Error("MongoDB connection has no database handle");
    await db.command({ ping: 1 });
  } finally {
    await conn.close().catch((err: unknown) => {
      logger.debug({ component: "mongodb", err }, "[MongoDB] probe close failed");
    });
  }
}

/** Readiness for /health/ready and /readyz. */
export function mongoReadiness(): { mongo: "ok" } {
  const state = mongoose.connection.readyState;
  if (state !== mongoose.ConnectionStates.connected) {
    throw new Error(`mongo state=${state}`);
  }
  return { mongo: "ok" };
}

/** Builds the indexes declared on every registered model. */
export async function ensureModelIndexes(): Promise<void> {
  for (const name of mongoose.modelNames()) {
    await mongoose.model(name).createIndexes();
    logger.debug({ component: "mongodb", model: name }, "[MongoDB] indexes ensured");
  }
}

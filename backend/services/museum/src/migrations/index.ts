// backend/services/museum/src/migrations/index.ts
import type { Migration } from "./runner";
import { createIndexes } from "./scripts/0001_createIndexes";
import { recountExhibits } from "./scripts/0002_recountExhibits";

export const MIGRATIONS: readonly Migration[] = [createIndexes, recountExhibits];

export { runMigrations, MongoMigrationLedger } from "./runner";
export type { Migration, MigrationContext, MigrationLedger, MigrationReport } from "./runner";

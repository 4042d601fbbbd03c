// backend/services/museum/src/migrations/runner.ts

/**
 * Versioned schema migrations.
 *
 * Each migration runs at most once; the ledger (schema_migrations) records
 * the versions that completed. Pending ones run in ascending version order
 * and the first failure stops the run without recording that version.
 */

import { logger } from "@shared/utils/logger";
import { SchemaMigrationModel, type SchemaMigrationDoc } from "../models/SchemaMigration";
import type { Repos } from "../repo/types";

export type MigrationContext = {
  repos: Repos;
  /** Builds every index declared on the models. */
  ensureIndexes: () => Promise<void>;
};

export type Migration = {
  version: number;
  name: string;
  up(ctx: MigrationContext): Promise<void>;
};

export interface MigrationLedger {
  appliedVersions(): Promise<Set<number>>;
  record(version: number, name: string): Promise<void>;
}

export class MongoMigrationLedger implements MigrationLedger {
  async appliedVersions(): Promise<Set<number>> {
    const docs = await SchemaMigrationModel.find()
      .select("version")
      .lean<Pick<SchemaMigrationDoc, "version">[]>()
      .exec();
    return new Set(docs.map((d) => d.version));
  }

  async record(version: number, name: string): Promise<void> {
    await SchemaMigrationModel.create({ version, name, appliedAt: new Date() });
  }
}

export type MigrationReport = { applied: number[]; skipped: number[] };

export async function runMigrations(
  migrations: readonly Migration[],
  ledger: MigrationLedger,
  ctx: MigrationContext
): Promise<MigrationReport> {
  const sorted = [...migrations].sort((a, b) => a.version - b.version);
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].version === sorted[i - 1].version) {
      throw new Error(`Duplicate migration version ${sorted[i].version}`);
    }
  }

  const done = await ledger.appliedVersions();
  const report: MigrationReport = { applied: [], skipped: [] };

  for (const m of sorted) {
    if (done.has(m.version)) {
      report.skipped.push(m.version);
      continue;
    }
    logger.info({ version: m.version, name: m.name }, "applying migration");
    await m.up(ctx);
    await ledger.record(m.version, m.name);
    report.applied.push(m.version);
  }

  logger.info(
    { applied: report.applied.length, skipped: report.skipped.length },
    report.applied.length ? "migrations applied" : "no migrations to apply"
  );
  return report;
}

// backend/services/museum/test/migrations.spec.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  MIGRATIONS,
  runMigrations,
  type Migration,
  type MigrationContext,
  type MigrationLedger,
} from "../src/migrations";
import { buildTestApp, seedCategory, seedExhibit, type TestContext } from "./helpers/app";

class MemoryLedger implements MigrationLedger {
  readonly done = new Map<number, string>();

  async appliedVersions() {
    return new Set(this.done.keys());
  }

  async record(version: number, name: string) {
    this.done.set(version, name);
  }
}

let ctx: TestContext;
let migrationCtx: MigrationContext;

beforeEach(async () => {
  ctx = await buildTestApp();
  migrationCtx = { repos: ctx.repos, ensureIndexes: vi.fn(async () => {}) };
});

afterEach(async () => {
  await ctx.cleanup();
});

function migration(version: number, log: number[], fail = false): Migration {
  return {
    version,
    name: `m${version}`,
    async up() {
      if (fail) throw new Error(`m${version} failed`);
      log.push(version);
    },
  };
}

describe("runMigrations", () => {
  it("applies pending migrations in version order, once", async () => {
    const ledger = new MemoryLedger();
    const log: number[] = [];
    const list = [migration(3, log), migration(1, log), migration(2, log)];

    expect(await runMigrations(list, ledger, migrationCtx)).toEqual({
      applied: [1, 2, 3],
      skipped: [],
    });
    expect(await runMigrations(list, ledger, migrationCtx)).toEqual({
      applied: [],
      skipped: [1, 2, 3],
    });
    expect(log).toEqual([1, 2, 3]);
  });

  it("stops at the first failure without recording it", async () => {
    const ledger = new MemoryLedger();
    const log: number[] = [];
    await expect(
      runMigrations([migration(1, log), migration(2, log, true), migration(3, log)], ledger, migrationCtx)
    ).rejects.toThrow("m2 failed");
    expect([...ledger.done.keys()]).toEqual([1]);
    expect(log).toEqual([1]);
  });

  it("refuses duplicate versions", async () => {
    await expect(
      runMigrations([migration(1, []), migration(1, [])], new MemoryLedger(), migrationCtx)
    ).rejects.toThrow("Duplicate migration version 1");
  });
});

describe("built-in migrations", () => {
  it("builds indexes and recounts exhibitCount from the exhibits", async () => {
    const art = await seedCategory(ctx, "Art");
    const empty = await seedCategory(ctx, "Empty");
    await seedExhibit(ctx, art.id, "Vase");
    await seedExhibit(ctx, art.id, "Mask");
    await ctx.repos.categories.setExhibitCount(art.id, 7);
    await ctx.repos.categories.setExhibitCount(empty.id, 3);

    const report = await runMigrations(MIGRATIONS, new MemoryLedger(), migrationCtx);

    expect(report.applied).toEqual([1, 2]);
    expect(migrationCtx.ensureIndexes).toHaveBeenCalledTimes(1);
    expect((await ctx.repos.categories.findById(art.id))?.exhibitCount).toBe(2);
    expect((await ctx.repos.categories.findById(empty.id))?.exhibitCount).toBe(0);
  });
});

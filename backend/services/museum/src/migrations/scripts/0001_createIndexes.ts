// backend/services/museum/src/migrations/scripts/0001_createIndexes.ts
import type { Migration } from "../runner";

export const createIndexes: Migration = {
  version: 1,
  name: "create_indexes",
  async up(ctx) {
    await ctx.ensureIndexes();
  },
};

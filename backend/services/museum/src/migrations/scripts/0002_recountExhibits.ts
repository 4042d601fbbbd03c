// backend/services/museum/src/migrations/scripts/0002_recountExhibits.ts
import { logger } from "@shared/utils/logger";
import type { Migration } from "../runner";

/** exhibitCount from scratch, for every category. */
export const recountExhibits: Migration = {
  version: 2,
  name: "recount_category_exhibits",
  async up({ repos }) {
    const counts = await repos.exhibits.countByCategory();
    const categories = await repos.categories.listOrdered();
    for (const c of categories) {
      const n = counts.get(c.id) ?? 0;
      if (n !== c.exhibitCount) {
        logger.info(
          { categoryId: c.id, from: c.exhibitCount, to: n },
          "exhibitCount corrected"
        );
      }
      await repos.categories.setExhibitCount(c.id, n);
    }
  },
};

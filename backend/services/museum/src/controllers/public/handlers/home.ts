// backend/services/museum/src/controllers/public/handlers/home.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger } from "@shared/utils/logger";
import type { Exhibit } from "../../../contracts/museum.contract";
import type { MuseumServices } from "../../../services";
import type { ViewContext } from "../../../views/layout";
import { renderHome } from "../../../views/pages/home";

/** Categories in display order, each with its exhibits newest first. */
export const home = (services: MuseumServices, ctx: ViewContext): RequestHandler =>
  asyncHandler(async (_req, res) => {
    const [categories, exhibits, featured, events] = await Promise.all([
      services.categories.listOrdered(),
      services.exhibits.listAll(),
      services.exhibits.listFeatured(),
      services.events.listActive(),
    ]);

    const byCategory = new Map<string, Exhibit[]>();
    for (const x of exhibits) {
      const bucket = byCategory.get(x.categoryId);
      if (bucket) bucket.push(x);
      else byCategory.set(x.categoryId, [x]);
    }

    logger.debug(
      { categories: categories.length, events: events.length },
      "home page loaded"
    );

    res.type("html").send(
      renderHome(ctx, {
        categories: categories.map((category) => ({
          category,
          exhibits: byCategory.get(category.id) ?? [],
        })),
        featured,
        events,
      })
    );
  });

// backend/services/museum/src/controllers/public/handlers/categories.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger } from "@shared/utils/logger";
import type { MuseumServices } from "../../../services";
import type { ViewContext } from "../../../views/layout";
import { renderCategory, renderCategoryList } from "../../../views/pages/categories";

export const categoryList = (
  services: MuseumServices,
  ctx: ViewContext
): RequestHandler =>
  asyncHandler(async (_req, res) => {
    const categories = await services.categories.listOrdered();
    res.type("html").send(renderCategoryList(ctx, categories));
  });

export const categoryPage = (
  services: MuseumServices,
  ctx: ViewContext
): RequestHandler =>
  asyncHandler(async (req, res) => {
    const category = await services.categories.getBySlug(req.params.slug);
    const [exhibits, withAudio] = await Promise.all([
      services.exhibits.listByCategory(category.id),
      services.exhibits.countWithAudio(category.id),
    ]);
    logger.debug(
      { slug: category.slug, exhibits: exhibits.length },
      "category page loaded"
    );
    res.type("html").send(renderCategory(ctx, { category, exhibits, withAudio }));
  });

// backend/services/museum/src/controllers/public/handlers/exhibit.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import type { MuseumServices } from "../../../services";
import type { ViewContext } from "../../../views/layout";
import { renderExhibit } from "../../../views/pages/exhibit";

/** Counts the view first, then renders the counted record. */
export const exhibitPage = (
  services: MuseumServices,
  ctx: ViewContext
): RequestHandler =>
  asyncHandler(async (req, res) => {
    const exhibit = await services.exhibits.recordView(req.params.id);
    const category = await services.categories.findById(exhibit.categoryId);
    res.type("html").send(renderExhibit(ctx, { exhibit, category }));
  });

// backend/services/museum/src/routes/publicRoutes.ts
import { Router } from "express";
import type { MuseumServices } from "../services";
import type { ViewContext } from "../views/layout";
import { home } from "../controllers/public/handlers/home";
import { categoryList, categoryPage } from "../controllers/public/handlers/categories";
import { exhibitPage } from "../controllers/public/handlers/exhibit";
import { audioGuides, eventList } from "../controllers/public/handlers/events";

export function publicRoutes(services: MuseumServices, ctx: ViewContext): Router {
  const router = Router();
  router.get("/", home(services, ctx));
  router.get("/categories", categoryList(services, ctx));
  router.get("/categories/:slug", categoryPage(services, ctx));
  router.get("/exhibits/:id", exhibitPage(services, ctx));
  router.get("/events", eventList(services, ctx));
  router.get("/audio-guides", audioGuides(services, ctx));
  return router;
}

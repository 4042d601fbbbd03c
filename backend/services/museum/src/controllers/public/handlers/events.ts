// backend/services/museum/src/controllers/public/handlers/events.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import type { MuseumServices } from "../../../services";
import type { ViewContext } from "../../../views/layout";
import { renderEvents } from "../../../views/pages/events";
import { renderAudioGuides } from "../../../views/pages/audioGuides";

export const eventList = (services: MuseumServices, ctx: ViewContext): RequestHandler =>
  asyncHandler(async (_req, res) => {
    res.type("html").send(renderEvents(ctx, await services.events.listActive()));
  });

export const audioGuides = (
  services: MuseumServices,
  ctx: ViewContext
): RequestHandler =>
  asyncHandler(async (_req, res) => {
    res.type("html").send(renderAudioGuides(ctx, await services.exhibits.listWithAudio()));
  });

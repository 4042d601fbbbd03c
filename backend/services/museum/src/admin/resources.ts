// backend/services/museum/src/admin/resources.ts
import { z } from "zod";
import { zFormBoolean, zObjectId } from "@shared/contracts/common";
import type { MuseumServices } from "../services";
import {
  categoryCreateDto,
  categoryUpdateDto,
  eventCreateDto,
  eventUpdateDto,
  exhibitCreateDto,
  exhibitUpdateDto,
} from "../validators/museum.dto";
import { AdminSite, defineResource } from "./AdminSite";
import { presentCategory, presentEvent, presentExhibit } from "./present";

export function buildAdminSite(services: MuseumServices): AdminSite {
  const { events, categories, exhibits } = services;

  const eventResource = defineResource({
    meta: {
      name: "events",
      label: "Events",
      listDisplay: ["title", "isActive", "createdAt", "image"],
      searchFields: ["title", "description"],
      filters: ["isActive"],
      listPerPage: 20,
      ordering: ["-createdAt"],
      fileFields: ["image"],
      readonlyFields: ["createdAt", "updatedAt"],
    },
    createSchema: eventCreateDto,
    updateSchema: eventUpdateDto,
    filterSchema: z.object({ isActive: zFormBoolean.optional() }),
    present: presentEvent,
    ops: {
      list: (q) => events.list(q),
      get: (id) => events.get(id),
      create: (input, files) => events.create(input, files),
      update: (id, input, files) => events.update(id, input, files),
      remove: (id) => events.remove(id),
    },
  });

  const categoryResource = defineResource({
    meta: {
      name: "categories",
      label: "Categories",
      listDisplay: ["title", "slug", "order", "exhibitCount", "createdAt", "image"],
      searchFields: ["title", "description"],
      filters: [],
      listPerPage: 20,
      ordering: ["order", "title"],
      fileFields: ["image"],
      readonlyFields: ["exhibitCount", "createdAt", "updatedAt"],
    },
    createSchema: categoryCreateDto,
    updateSchema: categoryUpdateDto,
    filterSchema: z.object({}),
    present: presentCategory,
    ops: {
      list: (q) => categories.list(q),
      get: (id) => categories.get(id),
      create: (input, files) => categories.create(input, files),
      update: (id, input, files) => categories.update(id, input, files),
      remove: (id) => categories.remove(id),
    },
  });

  const exhibitResource = defineResource({
    meta: {
      name: "exhibits",
      label: "Exhibits",
      listDisplay: [
        "title",
        "categoryId",
        "isFeatured",
        "viewCount",
        "hasAudio",
        "createdAt",
        "image",
      ],
      searchFields: ["title", "description"],
      filters: ["categoryId", "isFeatured"],
      listPerPage: 20,
      ordering: ["-createdAt"],
      fileFields: ["image", "audio"],
      readonlyFields: ["viewCount", "createdAt", "updatedAt"],
    },
    createSchema: exhibitCreateDto,
    updateSchema: exhibitUpdateDto,
    filterSchema: z.object({
      categoryId: zObjectId.optional(),
      isFeatured: zFormBoolean.optional(),
    }),
    present: presentExhibit,
    ops: {
      list: (q) => exhibits.list(q),
      get: (id) => exhibits.get(id),
      create: (input, files) => exhibits.create(input, files),
      update: (id, input, files) => exhibits.update(id, input, files),
      remove: (id) => exhibits.remove(id),
    },
  });

  return new AdminSite()
    .register(eventResource)
    .register(categoryResource)
    .register(exhibitResource);
}

// backend/services/museum/src/contracts/museum.contract.ts

/**
 * Domain contracts (zod) for the content store.
 * Mappers parse every document through these on the way out of Mongo, so
 * services and views never see a malformed record.
 */

import { z } from "zod";
import { zObjectId } from "@shared/contracts/common";

export const eventContract = z.object({
  id: zObjectId,
  title: z.string().min(1).max(200),
  description: z.string(),
  image: z.string().min(1),
  isActive: z.boolean(),
  createdAt: z.date(),
  updatedAt: z.date(),
});
export type MuseumEvent = z.infer<typeof eventContract>;

export const categoryContract = z.object({
  id: zObjectId,
  title: z.string().min(1).max(100),
  slug: z.string().min(1).max(100),
  description: z.string(),
  image: z.string().min(1),
  order: z.number().int().min(0),
  exhibitCount: z.number().int().min(0),
  createdAt: z.date(),
  updatedAt: z.date(),
});
export type Category = z.infer<typeof categoryContract>;

export const exhibitContract = z.object({
  id: zObjectId,
  title: z.string().min(1).max(100),
  description: z.string().min(1),
  image: z.string().min(1),
  audio: z.string().min(1).nullable(),
  viewCount: z.number().int().min(0),
  isFeatured: z.boolean(),
  categoryId: zObjectId,
  createdAt: z.date(),
  updatedAt: z.date(),
});
export type Exhibit = z.infer<typeof exhibitContract>;

export const adminUserContract = z.object({
  id: zObjectId,
  username: z.string().min(1),
  email: z.string().email(),
  isSuperuser: z.boolean(),
  createdAt: z.date(),
});
export type AdminUser = z.infer<typeof adminUserContract>;

/** Only the login path ever sees the hash. */
export type AdminUserWithHash = AdminUser & { passwordHash: string };

// backend/services/museum/src/mappers/museum.mapper.ts
import type { z } from "zod";
import {
  adminUserContract,
  categoryContract,
  eventContract,
  exhibitContract,
  type AdminUser,
  type Category,
  type Exhibit,
  type MuseumEvent,
} from "../contracts/museum.contract";
import type { EventDoc } from "../models/Event";
import type { CategoryDoc } from "../models/Category";
import type { ExhibitDoc } from "../models/Exhibit";
import type { AdminUserDoc } from "../models/AdminUser";

/** A stored row that breaks its contract is a server fault, never a 400. */
function fromDb<S extends z.ZodTypeAny>(contract: S, what: string, raw: unknown): z.output<S> {
  const parsed = contract.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new Error(`Stored ${what} failed its contract (${fields})`);
  }
  return parsed.data;
}

export function eventFromDb(doc: EventDoc): MuseumEvent {
  return fromDb(eventContract, "event", {
    id: doc._id.toHexString(),
    title: doc.title,
    description: doc.description ?? "",
    image: doc.image,
    isActive: doc.isActive,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  });
}

export function categoryFromDb(doc: CategoryDoc): Category {
  return fromDb(categoryContract, "category", {
    id: doc._id.toHexString(),
    title: doc.title,
    slug: doc.slug,
    description: doc.description ?? "",
    image: doc.image,
    order: doc.order,
    exhibitCount: doc.exhibitCount ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  });
}

export function exhibitFromDb(doc: ExhibitDoc): Exhibit {
  return fromDb(exhibitContract, "exhibit", {
    id: doc._id.toHexString(),
    title: doc.title,
    description: doc.description,
    image: doc.image,
    audio: doc.audio || null,
    viewCount: doc.viewCount,
    isFeatured: doc.isFeatured,
    categoryId: doc.categoryId.toHexString(),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  });
}

export function adminUserFromDb(doc: AdminUserDoc): AdminUser {
  return fromDb(adminUserContract, "admin user", {
    id: doc._id.toHexString(),
    username: doc.username,
    email: doc.email,
    isSuperuser: doc.isSuperuser,
    createdAt: doc.createdAt,
  });
}

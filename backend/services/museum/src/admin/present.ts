// backend/services/museum/src/admin/present.ts
import type { Category, Exhibit, MuseumEvent } from "../contracts/museum.contract";
import { mediaUrl } from "../media/mediaStore";

export function presentEvent(e: MuseumEvent) {
  return {
    id: e.id,
    title: e.title,
    description: e.description,
    image: mediaUrl(e.image),
    isActive: e.isActive,
    createdAt: e.createdAt.toISOString(),
    updatedAt: e.updatedAt.toISOString(),
  };
}

export function presentCategory(c: Category) {
  return {
    id: c.id,
    title: c.title,
    slug: c.slug,
    description: c.description,
    image: mediaUrl(c.image),
    order: c.order,
    exhibitCount: c.exhibitCount,
    createdAt: c.createdAt.toISOString(),
    updatedAt: c.updatedAt.toISOString(),
  };
}

export function presentExhibit(x: Exhibit) {
  return {
    id: x.id,
    title: x.title,
    description: x.description,
    image: mediaUrl(x.image),
    audio: mediaUrl(x.audio),
    hasAudio: x.audio !== null,
    viewCount: x.viewCount,
    isFeatured: x.isFeatured,
    categoryId: x.categoryId,
    createdAt: x.createdAt.toISOString(),
    updatedAt: x.updatedAt.toISOString(),
  };
}

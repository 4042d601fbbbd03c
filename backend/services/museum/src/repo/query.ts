// backend/services/museum/src/repo/query.ts
import { isValidObjectId } from "mongoose";
import type { ListQuery } from "./types";

export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Mongo filter for a ListQuery: exact filters AND (field1 ~ q OR field2 ~ q …). */
export function mongoListFilter(q: ListQuery): Record<string, unknown> {
  const filter: Record<string, unknown> = { ...(q.filters ?? {}) };
  const term = q.search?.term.trim();
  if (q.search && term) {
    const rx = { $regex: escapeRegex(term), $options: "i" };
    filter.$or = q.search.fields.map((f) => ({ [f]: rx }));
  }
  return filter;
}

/** Malformed ids can never match; skip the round trip. */
export function isId(id: string): boolean {
  return isValidObjectId(id) && /^[a-f0-9]{24}$/i.test(id);
}

// backend/services/museum/src/validators/museum.dto.ts
import { z } from "zod";
import { zFormBoolean, zObjectId } from "@shared/contracts/common";

/**
 * Admin API input shapes. Bodies arrive as JSON or as multipart text fields
 * (all strings), so numbers coerce and booleans accept form spellings.
 * File fields (image, audio) travel separately via multer.
 */

/** Blank form fields count as "not sent". */
const blankAsUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

export const SLUG_RE = /^[\p{L}\p{N}_]+(?:-[\p{L}\p{N}_]+)*$/u;

const zSlug = z
  .string()
  .trim()
  .toLowerCase()
  .max(100)
  .regex(SLUG_RE, "Use letters, numbers, underscores or hyphens");

// ── Events ────────────────────────────────────────────────────────────────────
export const eventCreateDto = z
  .object({
    title: z.string().trim().min(1).max(200),
    description: z.string().default(""),
    isActive: zFormBoolean.default(true),
  })
  .strict();

export const eventUpdateDto = eventCreateDto.partial().strict();

export type EventCreateInput = z.infer<typeof eventCreateDto>;
export type EventUpdateInput = z.infer<typeof eventUpdateDto>;

// ── Categories ────────────────────────────────────────────────────────────────
export const categoryCreateDto = z
  .object({
    title: z.string().trim().min(1).max(100),
    slug: z.preprocess(blankAsUndefined, zSlug.optional()),
    description: z.string().default(""),
    order: z.preprocess(
      blankAsUndefined,
      z.coerce.number().int().min(0).default(0)
    ),
  })
  .strict();

export const categoryUpdateDto = z
  .object({
    title: z.string().trim().min(1).max(100).optional(),
    slug: z.preprocess(blankAsUndefined, zSlug.optional()),
    description: z.string().optional(),
    order: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).optional()),
  })
  .strict();

export type CategoryCreateInput = z.infer<typeof categoryCreateDto>;
export type CategoryUpdateInput = z.infer<typeof categoryUpdateDto>;

// ── Exhibits ──────────────────────────────────────────────────────────────────
export const exhibitCreateDto = z
  .object({
    title: z.string().trim().min(1).max(100),
    description: z.string().trim().min(1),
    categoryId: zObjectId,
    isFeatured: zFormBoolean.default(false),
  })
  .strict();

export const exhibitUpdateDto = z
  .object({
    title: z.string().trim().min(1).max(100).optional(),
    description: z.string().trim().min(1).optional(),
    categoryId: zObjectId.optional(),
    isFeatured: zFormBoolean.optional(),
    /** Drop the audio guide (ignored when a new audio file is uploaded). */
    clearAudio: zFormBoolean.optional(),
  })
  .strict();

export type ExhibitCreateInput = z.infer<typeof exhibitCreateDto>;
export type ExhibitUpdateInput = z.infer<typeof exhibitUpdateDto>;

// ── Auth ──────────────────────────────────────────────────────────────────────
export const loginDto = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export type LoginInput = z.infer<typeof loginDto>;

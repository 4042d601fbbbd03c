// backend/services/museum/src/media/imageNormalizer.ts
import sharp from "sharp";
import { logger } from "@shared/utils/logger";
import type { ImageBounds } from "../config";

/** Formats we decode and re-encode; anything else is stored as uploaded. */
export const NORMALIZABLE_FORMATS: ReadonlySet<string> = new Set([
  "jpeg",
  "png",
  "webp",
  "gif",
  "tiff",
]);

export type NormalizeResult =
  | {
      normalized: true;
      bytes: Buffer;
      width: number;
      height: number;
      sourceFormat: string;
    }
  | { normalized: false; bytes: Buffer; reason: string };

/**
 * Fit inside `maxWidth` x `maxHeight` (never enlarge), flatten transparency
 * onto white, re-encode as JPEG at `quality`.
 *
 * Never rejects: an undecodable or unsupported input comes back unchanged
 * with `normalized: false`.
 */
export async function normalizeImage(
  input: Buffer,
  bounds: ImageBounds
): Promise<NormalizeResult> {
  let format: string | undefined;
  try {
    ({ format } = await sharp(input).metadata());
  } catch (err) {
    logger.debug({ err, component: "imageNormalizer" }, "not a decodable image");
    return { normalized: false, bytes: input, reason: "undecodable" };
  }

  if (!format || !NORMALIZABLE_FORMATS.has(format)) {
    logger.debug(
      { format, component: "imageNormalizer" },
      "unsupported image format, storing original"
    );
    return { normalized: false, bytes: input, reason: `unsupported:${format ?? "unknown"}` };
  }

  try {
    const { data, info } = await sharp(input)
      .flatten({ background: "#ffffff" })
      .resize({
        width: bounds.maxWidth,
        height: bounds.maxHeight,
        fit: "inside",
        withoutEnlargement: true,
      })
      .jpeg({ quality: bounds.quality })
      .toBuffer({ resolveWithObject: true });

    return {
      normalized: true,
      bytes: data,
      width: info.width,
      height: info.height,
      sourceFormat: format,
    };
  } catch (err) {
    logger.debug({ err, format, component: "imageNormalizer" }, "re-encode failed");
    return { normalized: false, bytes: input, reason: "encode-failed" };
  }
}

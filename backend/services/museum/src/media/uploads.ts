// backend/services/museum/src/media/uploads.ts
import path from "node:path";
import { logger } from "@shared/utils/logger";
import type { ImageBounds } from "../config";
import { normalizeImage } from "./imageNormalizer";
import { storedFileName, type MediaFolder, type MediaStore } from "./mediaStore";

/** The part of a multer file the pipeline needs. */
export type UploadedFile = {
  originalname: string;
  buffer: Buffer;
  mimetype?: string;
};

export type UploadedFiles = {
  image?: UploadedFile;
  audio?: UploadedFile;
};

/**
 * Image field ingestion: normalize, then store. A normalized file takes a
 * `.jpg` extension; an untouched one keeps its own.
 */
export class MediaIngest {
  constructor(
    private readonly store: MediaStore,
    private readonly bounds: ImageBounds
  ) {}

  async storeImage(folder: MediaFolder, file: UploadedFile): Promise<string> {
    const result = await normalizeImage(file.buffer, this.bounds);
    const name = storedFileName(
      file.originalname,
      result.normalized ? ".jpg" : undefined
    );
    const rel = await this.store.save(folder, name, result.bytes);
    logger.debug(
      {
        component: "mediaIngest",
        folder,
        stored: rel,
        normalized: result.normalized,
        ...(result.normalized
          ? { width: result.width, height: result.height }
          : { reason: result.reason }),
      },
      "image stored"
    );
    return rel;
  }

  async storeFile(folder: MediaFolder, file: UploadedFile): Promise<string> {
    const ext = path.extname(file.originalname);
    return this.store.save(folder, storedFileName(file.originalname, ext), file.buffer);
  }

  /** Best-effort cleanup; failures are logged, not thrown. */
  async release(...relPaths: Array<string | null | undefined>): Promise<void> {
    for (const rel of relPaths) {
      try {
        await this.store.remove(rel);
      } catch (err) {
        logger.warn({ err, relPath: rel, component: "mediaIngest" }, "media cleanup failed");
      }
    }
  }
}

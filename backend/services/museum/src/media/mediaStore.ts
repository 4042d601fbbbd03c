// backend/services/museum/src/media/mediaStore.ts
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { slugify } from "@shared/utils/slugify";
import { logger } from "@shared/utils/logger";

/** Upload folders under MEDIA_ROOT, one per file field. */
export const MEDIA_FOLDERS = {
  event: "event",
  category: "category",
  exhibitImage: "exhibit_images",
  exhibitAudio: "exhibit_audio",
} as const;

export type MediaFolder = (typeof MEDIA_FOLDERS)[keyof typeof MEDIA_FOLDERS];

export interface MediaStore {
  /** Writes `bytes` and returns the media-relative path ("event/x-1a2b3c4d.jpg"). */
  save(folder: MediaFolder, fileName: string, bytes: Buffer): Promise<string>;
  /** Missing files are not an error. */
  remove(relPath: string | null | undefined): Promise<void>;
  ensureFolders(): Promise<void>;
}

export const MEDIA_URL_PREFIX = "/media";

export function mediaUrl(relPath: string): string;
export function mediaUrl(relPath: string | null): string | null;
export function mediaUrl(relPath: string | null): string | null {
  if (!relPath) return null;
  return `${MEDIA_URL_PREFIX}/${relPath.split("/").map(encodeURIComponent).join("/")}`;
}

/** `Photo of Vase.PNG` + ".jpg" → `photo-of-vase-<8 hex>.jpg` */
export function storedFileName(originalName: string, ext?: string): string {
  const parsed = path.parse(originalName);
  const extension = (ext ?? parsed.ext).toLowerCase().replace(/[^.a-z0-9]/g, "");
  const stem = slugify(parsed.name, 60) || "file";
  return `${stem}-${randomBytes(4).toString("hex")}${extension}`;
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export class FsMediaStore implements MediaStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolve(relPath: string): string {
    const abs = path.resolve(this.root, relPath);
    if (abs !== this.root && !abs.startsWith(this.root + path.sep)) {
      throw new Error(`Media path escapes MEDIA_ROOT: ${relPath}`);
    }
    return abs;
  }

  async save(folder: MediaFolder, fileName: string, bytes: Buffer): Promise<string> {
    const rel = path.posix.join(folder, fileName);
    const abs = this.resolve(rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, bytes, { flag: "wx" });
    return rel;
  }

  async remove(relPath: string | null | undefined): Promise<void> {
    if (!relPath) return;
    try {
      await fs.unlink(this.resolve(relPath));
    } catch (err) {
      if (!isErrno(err, "ENOENT")) throw err;
      logger.debug({ relPath, component: "mediaStore" }, "media file already gone");
    }
  }

  async ensureFolders(): Promise<void> {
    for (const folder of Object.values(MEDIA_FOLDERS)) {
      await fs.mkdir(path.join(this.root, folder), { recursive: true });
    }
  }
}

// backend/services/museum/src/services/exhibitService.ts
import { HttpError, notFoundError } from "@shared/http/errors";
import { logger } from "@shared/utils/logger";
import type { Exhibit } from "../contracts/museum.contract";
import { MEDIA_FOLDERS } from "../media/mediaStore";
import type { MediaIngest, UploadedFiles } from "../media/uploads";
import type {
  CategoryRepo,
  ExhibitPatch,
  ExhibitRepo,
  ListQuery,
  ListResult,
  Revision,
} from "../repo/types";
import type { ExhibitCreateInput, ExhibitUpdateInput } from "../validators/museum.dto";

export class ExhibitService {
  constructor(
    private readonly repo: ExhibitRepo,
    private readonly categories: CategoryRepo,
    private readonly media: MediaIngest
  ) {}

  listAll(): Promise<Exhibit[]> {
    return this.repo.listAll();
  }

  listByCategory(categoryId: string): Promise<Exhibit[]> {
    return this.repo.listByCategory(categoryId);
  }

  listFeatured(): Promise<Exhibit[]> {
    return this.repo.listFeatured();
  }

  listWithAudio(): Promise<Exhibit[]> {
    return this.repo.listWithAudio();
  }

  countWithAudio(categoryId: string): Promise<number> {
    return this.repo.countWithAudio(categoryId);
  }

  list(q: ListQuery): Promise<ListResult<Exhibit>> {
    return this.repo.list(q);
  }

  async get(id: string): Promise<Exhibit> {
    const exhibit = await this.repo.findById(id);
    if (!exhibit) throw notFoundError("Exhibit");
    return exhibit;
  }

  /** One page view: a single atomic increment, then the fresh record. */
  async recordView(id: string): Promise<Exhibit> {
    const exhibit = await this.repo.incrementViews(id);
    if (!exhibit) throw notFoundError("Exhibit");
    return exhibit;
  }

  private async assertCategory(categoryId: string): Promise<void> {
    const category = await this.categories.findById(categoryId);
    if (!category) {
      throw new HttpError(400, `Unknown category: ${categoryId}`, "UNKNOWN_CATEGORY");
    }
  }

  async create(input: ExhibitCreateInput, files: UploadedFiles): Promise<Exhibit> {
    await this.assertCategory(input.categoryId);
    if (!files.image) {
      throw new HttpError(400, "An image file is required", "IMAGE_REQUIRED");
    }

    const image = await this.media.storeImage(MEDIA_FOLDERS.exhibitImage, files.image);
    const audio = files.audio
      ? await this.media.storeFile(MEDIA_FOLDERS.exhibitAudio, files.audio)
      : null;

    let created: Exhibit;
    try {
      created = await this.repo.create({ ...input, image, audio });
    } catch (err) {
      await this.media.release(image, audio);
      throw err;
    }
    await this.categories.adjustExhibitCount(created.categoryId, 1);
    logger.info(
      { exhibitId: created.id, categoryId: created.categoryId },
      "exhibit created"
    );
    return created;
  }

  async update(
    id: string,
    input: ExhibitUpdateInput,
    files: UploadedFiles
  ): Promise<Exhibit> {
    const current = await this.get(id);
    const { clearAudio, ...fields } = input;
    const moving =
      fields.categoryId !== undefined && fields.categoryId !== current.categoryId;
    if (moving && fields.categoryId) await this.assertCategory(fields.categoryId);

    const image = files.image
      ? await this.media.storeImage(MEDIA_FOLDERS.exhibitImage, files.image)
      : undefined;
    const audio = files.audio
      ? await this.media.storeFile(MEDIA_FOLDERS.exhibitAudio, files.audio)
      : undefined;

    const patch: ExhibitPatch = {
      ...fields,
      image,
      audio: audio ?? (clearAudio ? null : undefined),
    };

    let revision: Revision<Exhibit> | null;
    try {
      revision = await this.repo.update(id, patch);
    } catch (err) {
      await this.media.release(image, audio);
      throw err;
    }
    if (!revision) {
      await this.media.release(image, audio);
      throw notFoundError("Exhibit");
    }

    // Counts follow the pre-image of the write, not the earlier read.
    const { previous, updated } = revision;
    const target = fields.categoryId ?? previous.categoryId;
    if (target !== previous.categoryId) {
      await this.categories.adjustExhibitCount(previous.categoryId, -1);
      await this.categories.adjustExhibitCount(target, 1);
    }

    const replaced: Array<string | null> = [];
    if (image) replaced.push(previous.image);
    if (patch.audio !== undefined && previous.audio !== patch.audio) {
      replaced.push(previous.audio);
    }
    await this.media.release(...replaced);
    if (!updated) throw notFoundError("Exhibit");
    return updated;
  }

  async remove(id: string): Promise<void> {
    const removed = await this.repo.remove(id);
    if (!removed) throw notFoundError("Exhibit");
    await this.categories.adjustExhibitCount(removed.categoryId, -1);
    await this.media.release(removed.image, removed.audio);
    logger.info({ exhibitId: id }, "exhibit deleted");
  }
}

// backend/services/museum/src/services/eventService.ts
import { HttpError, notFoundError } from "@shared/http/errors";
import { logger } from "@shared/utils/logger";
import type { MuseumEvent } from "../contracts/museum.contract";
import { MEDIA_FOLDERS } from "../media/mediaStore";
import type { MediaIngest, UploadedFiles } from "../media/uploads";
import type { EventRepo, ListQuery, ListResult } from "../repo/types";
import type { EventCreateInput, EventUpdateInput } from "../validators/museum.dto";

export class EventService {
  constructor(
    private readonly repo: EventRepo,
    private readonly media: MediaIngest
  ) {}

  listActive(): Promise<MuseumEvent[]> {
    return this.repo.listActive();
  }

  list(q: ListQuery): Promise<ListResult<MuseumEvent>> {
    return this.repo.list(q);
  }

  async get(id: string): Promise<MuseumEvent> {
    const event = await this.repo.findById(id);
    if (!event) throw notFoundError("Event");
    return event;
  }

  async create(input: EventCreateInput, files: UploadedFiles): Promise<MuseumEvent> {
    if (!files.image) {
      throw new HttpError(400, "An image file is required", "IMAGE_REQUIRED");
    }
    const image = await this.media.storeImage(MEDIA_FOLDERS.event, files.image);
    try {
      const created = await this.repo.create({ ...input, image });
      logger.info({ eventId: created.id }, "event created");
      return created;
    } catch (err) {
      await this.media.release(image);
      throw err;
    }
  }

  async update(
    id: string,
    patch: EventUpdateInput,
    files: UploadedFiles
  ): Promise<MuseumEvent> {
    const current = await this.get(id);
    const image = files.image
      ? await this.media.storeImage(MEDIA_FOLDERS.event, files.image)
      : undefined;

    let updated: MuseumEvent | null;
    try {
      updated = await this.repo.update(id, { ...patch, image });
    } catch (err) {
      await this.media.release(image);
      throw err;
    }
    if (!updated) {
      await this.media.release(image);
      throw notFoundError("Event");
    }
    if (image) await this.media.release(current.image);
    return updated;
  }

  async remove(id: string): Promise<void> {
    const removed = await this.repo.remove(id);
    if (!removed) throw notFoundError("Event");
    await this.media.release(removed.image);
    logger.info({ eventId: id }, "event deleted");
  }
}

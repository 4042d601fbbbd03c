// backend/services/museum/src/repo/eventRepo.ts
import { clean } from "@shared/contracts/common";
import { EventModel, type EventDoc } from "../models/Event";
import { eventFromDb } from "../mappers/museum.mapper";
import type { MuseumEvent } from "../contracts/museum.contract";
import { isId, mongoListFilter } from "./query";
import type {
  EventCreate,
  EventPatch,
  EventRepo,
  ListQuery,
  ListResult,
} from "./types";

const NEWEST_FIRST = { createdAt: -1, _id: -1 } as const;

export class MongoEventRepo implements EventRepo {
  async create(input: EventCreate): Promise<MuseumEvent> {
    const doc = await EventModel.create(input);
    return eventFromDb(doc.toObject());
  }

  async findById(id: string): Promise<MuseumEvent | null> {
    if (!isId(id)) return null;
    const doc = await EventModel.findById(id).lean<EventDoc>().exec();
    return doc ? eventFromDb(doc) : null;
  }

  async update(id: string, patch: EventPatch): Promise<MuseumEvent | null> {
    if (!isId(id)) return null;
    const doc = await EventModel.findByIdAndUpdate(
      id,
      { $set: clean(patch) },
      { new: true, runValidators: true }
    )
      .lean<EventDoc>()
      .exec();
    return doc ? eventFromDb(doc) : null;
  }

  async remove(id: string): Promise<MuseumEvent | null> {
    if (!isId(id)) return null;
    const doc = await EventModel.findByIdAndDelete(id).lean<EventDoc>().exec();
    return doc ? eventFromDb(doc) : null;
  }

  async list(q: ListQuery): Promise<ListResult<MuseumEvent>> {
    const filter = mongoListFilter(q);
    const [docs, total] = await Promise.all([
      EventModel.find(filter)
        .sort(NEWEST_FIRST)
        .skip(q.offset)
        .limit(q.limit)
        .lean<EventDoc[]>()
        .exec(),
      EventModel.countDocuments(filter).exec(),
    ]);
    return { items: docs.map(eventFromDb), total };
  }

  async listActive(): Promise<MuseumEvent[]> {
    const docs = await EventModel.find({ isActive: true })
      .sort(NEWEST_FIRST)
      .lean<EventDoc[]>()
      .exec();
    return docs.map(eventFromDb);
  }
}

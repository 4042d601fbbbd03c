// backend/services/museum/src/repo/exhibitRepo.ts
import { clean } from "@shared/contracts/common";
import { ExhibitModel, type ExhibitDoc } from "../models/Exhibit";
import { exhibitFromDb } from "../mappers/museum.mapper";
import type { Exhibit } from "../contracts/museum.contract";
import { isId, mongoListFilter } from "./query";
import type {
  ExhibitCreate,
  ExhibitPatch,
  ExhibitRepo,
  ListQuery,
  ListResult,
  Revision,
} from "./types";

const NEWEST_FIRST = { createdAt: -1, _id: -1 } as const;
const HAS_AUDIO = { audio: { $nin: [null, ""] } };

export class MongoExhibitRepo implements ExhibitRepo {
  async create(input: ExhibitCreate): Promise<Exhibit> {
    const doc = await ExhibitModel.create({ ...input, viewCount: 0 });
    return exhibitFromDb(doc.toObject());
  }

  async findById(id: string): Promise<Exhibit | null> {
    if (!isId(id)) return null;
    const doc = await ExhibitModel.findById(id).lean<ExhibitDoc>().exec();
    return doc ? exhibitFromDb(doc) : null;
  }

  async update(id: string, patch: ExhibitPatch): Promise<Revision<Exhibit> | null> {
    if (!isId(id)) return null;
    const before = await ExhibitModel.findByIdAndUpdate(
      id,
      { $set: clean(patch) },
      { new: false, runValidators: true }
    )
      .lean<ExhibitDoc>()
      .exec();
    if (!before) return null;
    return { previous: exhibitFromDb(before), updated: await this.findById(id) };
  }

  async remove(id: string): Promise<Exhibit | null> {
    if (!isId(id)) return null;
    const doc = await ExhibitModel.findByIdAndDelete(id).lean<ExhibitDoc>().exec();
    return doc ? exhibitFromDb(doc) : null;
  }

  async list(q: ListQuery): Promise<ListResult<Exhibit>> {
    const filter = mongoListFilter(q);
    const [docs, total] = await Promise.all([
      ExhibitModel.find(filter)
        .sort(NEWEST_FIRST)
        .skip(q.offset)
        .limit(q.limit)
        .lean<ExhibitDoc[]>()
        .exec(),
      ExhibitModel.countDocuments(filter).exec(),
    ]);
    return { items: docs.map(exhibitFromDb), total };
  }

  async listAll(): Promise<Exhibit[]> {
    const docs = await ExhibitModel.find().sort(NEWEST_FIRST).lean<ExhibitDoc[]>().exec();
    return docs.map(exhibitFromDb);
  }

  async listByCategory(categoryId: string): Promise<Exhibit[]> {
    if (!isId(categoryId)) return [];
    const docs = await ExhibitModel.find({ categoryId })
      .sort(NEWEST_FIRST)
      .lean<ExhibitDoc[]>()
      .exec();
    return docs.map(exhibitFromDb);
  }

  async listFeatured(): Promise<Exhibit[]> {
    const docs = await ExhibitModel.find({ isFeatured: true })
      .sort(NEWEST_FIRST)
      .lean<ExhibitDoc[]>()
      .exec();
    return docs.map(exhibitFromDb);
  }

  async listWithAudio(): Promise<Exhibit[]> {
    const docs = await ExhibitModel.find(HAS_AUDIO)
      .sort(NEWEST_FIRST)
      .lean<ExhibitDoc[]>()
      .exec();
    return docs.map(exhibitFromDb);
  }

  async countWithAudio(categoryId: string): Promise<number> {
    if (!isId(categoryId)) return 0;
    return ExhibitModel.countDocuments({ categoryId, ...HAS_AUDIO }).exec();
  }

  async incrementViews(id: string): Promise<Exhibit | null> {
    if (!isId(id)) return null;
    const doc = await ExhibitModel.findByIdAndUpdate(
      id,
      { $inc: { viewCount: 1 } },
      { new: true }
    )
      .lean<ExhibitDoc>()
      .exec();
    return doc ? exhibitFromDb(doc) : null;
  }

  async removeByCategory(categoryId: string): Promise<Exhibit[]> {
    if (!isId(categoryId)) return [];
    const docs = await ExhibitModel.find({ categoryId }).lean<ExhibitDoc[]>().exec();
    if (docs.length === 0) return [];
    await ExhibitModel.deleteMany({ _id: { $in: docs.map((d) => d._id) } }).exec();
    return docs.map(exhibitFromDb);
  }

  async countByCategory(): Promise<Map<string, number>> {
    const rows = await ExhibitModel.aggregate<{ _id: unknown; n: number }>([
      { $group: { _id: "$categoryId", n: { $sum: 1 } } },
    ]).exec();
    const out = new Map<string, number>();
    for (const r of rows) out.set(String(r._id), r.n);
    return out;
  }
}

// backend/services/museum/src/repo/categoryRepo.ts
import { clean } from "@shared/contracts/common";
import { CategoryModel, type CategoryDoc } from "../models/Category";
import { categoryFromDb } from "../mappers/museum.mapper";
import type { Category } from "../contracts/museum.contract";
import { isId, mongoListFilter } from "./query";
import type {
  CategoryCreate,
  CategoryPatch,
  CategoryRepo,
  ListQuery,
  ListResult,
} from "./types";

const DISPLAY_ORDER = { order: 1, title: 1 } as const;

export class MongoCategoryRepo implements CategoryRepo {
  async create(input: CategoryCreate): Promise<Category> {
    const doc = await CategoryModel.create({ ...input, exhibitCount: 0 });
    return categoryFromDb(doc.toObject());
  }

  async findById(id: string): Promise<Category | null> {
    if (!isId(id)) return null;
    const doc = await CategoryModel.findById(id).lean<CategoryDoc>().exec();
    return doc ? categoryFromDb(doc) : null;
  }

  async update(id: string, patch: CategoryPatch): Promise<Category | null> {
    if (!isId(id)) return null;
    const doc = await CategoryModel.findByIdAndUpdate(
      id,
      { $set: clean(patch) },
      { new: true, runValidators: true }
    )
      .lean<CategoryDoc>()
      .exec();
    return doc ? categoryFromDb(doc) : null;
  }

  async remove(id: string): Promise<Category | null> {
    if (!isId(id)) return null;
    const doc = await CategoryModel.findByIdAndDelete(id).lean<CategoryDoc>().exec();
    return doc ? categoryFromDb(doc) : null;
  }

  async list(q: ListQuery): Promise<ListResult<Category>> {
    const filter = mongoListFilter(q);
    const [docs, total] = await Promise.all([
      CategoryModel.find(filter)
        .sort(DISPLAY_ORDER)
        .skip(q.offset)
        .limit(q.limit)
        .lean<CategoryDoc[]>()
        .exec(),
      CategoryModel.countDocuments(filter).exec(),
    ]);
    return { items: docs.map(categoryFromDb), total };
  }

  async listOrdered(): Promise<Category[]> {
    const docs = await CategoryModel.find()
      .sort(DISPLAY_ORDER)
      .lean<CategoryDoc[]>()
      .exec();
    return docs.map(categoryFromDb);
  }

  async findBySlug(slug: string): Promise<Category | null> {
    const doc = await CategoryModel.findOne({ slug }).lean<CategoryDoc>().exec();
    return doc ? categoryFromDb(doc) : null;
  }

  async findByTitle(title: string): Promise<Category | null> {
    const doc = await CategoryModel.findOne({ title }).lean<CategoryDoc>().exec();
    return doc ? categoryFromDb(doc) : null;
  }

  async adjustExhibitCount(id: string, delta: number): Promise<void> {
    if (!isId(id) || delta === 0) return;
    await CategoryModel.updateOne({ _id: id }, { $inc: { exhibitCount: delta } }).exec();
  }

  async setExhibitCount(id: string, count: number): Promise<void> {
    if (!isId(id)) return;
    await CategoryModel.updateOne({ _id: id }, { $set: { exhibitCount: count } }).exec();
  }
}

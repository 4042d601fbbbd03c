// backend/services/museum/src/models/Category.ts
import { Schema, model, type Types } from "mongoose";

export interface CategoryDoc {
  _id: Types.ObjectId;
  title: string;
  slug: string;
  description: string;
  image: string;
  order: number;
  /** Denormalized; kept in step by the exhibit service with $inc. */
  exhibitCount: number;
  createdAt: Date;
  updatedAt: Date;
}

const CategorySchema = new Schema<CategoryDoc>(
  {
    title: { type: String, required: true, trim: true, maxlength: 100 },
    slug: { type: String, required: true, trim: true, maxlength: 100 },
    description: { type: String, default: "" },
    image: { type: String, required: true },
    order: { type: Number, default: 0, min: 0 },
    exhibitCount: { type: Number, default: 0, min: 0 },
  },
  {
    collection: "categories",
    strict: true,
    versionKey: false,
    timestamps: true,
  }
);

CategorySchema.index({ title: 1 }, { unique: true, name: "uniq_categories_title" });
CategorySchema.index({ slug: 1 }, { unique: true, name: "uniq_categories_slug" });
CategorySchema.index({ order: 1, title: 1 }, { name: "categories_order_title" });

export const CategoryModel = model<CategoryDoc>("Category", CategorySchema);

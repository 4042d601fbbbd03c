// backend/services/museum/src/models/Exhibit.ts
import { Schema, model, type Types } from "mongoose";

export interface ExhibitDoc {
  _id: Types.ObjectId;
  title: string;
  description: string;
  image: string;
  /** Audio guide, media-relative path; null when there is none. */
  audio: string | null;
  viewCount: number;
  isFeatured: boolean;
  categoryId: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const ExhibitSchema = new Schema<ExhibitDoc>(
  {
    title: { type: String, required: true, trim: true, maxlength: 100 },
    description: { type: String, required: true },
    image: { type: String, required: true },
    audio: { type: String, default: null },
    viewCount: { type: Number, default: 0, min: 0 },
    isFeatured: { type: Boolean, default: false },
    categoryId: {
      type: Schema.Types.ObjectId,
      ref: "Category",
      required: true,
    },
  },
  {
    collection: "exhibits",
    strict: true,
    versionKey: false,
    timestamps: true,
  }
);

ExhibitSchema.index(
  { categoryId: 1, createdAt: -1 },
  { name: "exhibits_category_createdAt" }
);
ExhibitSchema.index({ isFeatured: 1 }, { name: "exhibits_isFeatured" });
ExhibitSchema.index({ viewCount: -1 }, { name: "exhibits_viewCount_desc" });

export const ExhibitModel = model<ExhibitDoc>("Exhibit", ExhibitSchema);

// backend/services/museum/src/models/Event.ts
import { Schema, model, type Types } from "mongoose";

export interface EventDoc {
  _id: Types.ObjectId;
  title: string;
  description: string;
  /** Media-relative path, e.g. "event/opening-3fa2c1d0.jpg". */
  image: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const EventSchema = new Schema<EventDoc>(
  {
    title: { type: String, required: true, trim: true, maxlength: 200 },
    description: { type: String, default: "" },
    image: { type: String, required: true },
    isActive: { type: Boolean, default: true },
  },
  {
    collection: "events",
    strict: true,
    versionKey: false,
    timestamps: true,
  }
);

EventSchema.index({ createdAt: -1 }, { name: "events_createdAt_desc" });
EventSchema.index({ isActive: 1 }, { name: "events_isActive" });

export const EventModel = model<EventDoc>("Event", EventSchema);

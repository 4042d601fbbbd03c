// backend/services/museum/src/models/AdminUser.ts
import { Schema, model, type Types } from "mongoose";

export interface AdminUserDoc {
  _id: Types.ObjectId;
  username: string;
  email: string;
  passwordHash: string;
  isSuperuser: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const AdminUserSchema = new Schema<AdminUserDoc>(
  {
    username: { type: String, required: true, trim: true },
    email: { type: String, required: true, trim: true, lowercase: true },
    passwordHash: { type: String, required: true, select: false },
    isSuperuser: { type: Boolean, default: false },
  },
  {
    collection: "admin_users",
    strict: true,
    versionKey: false,
    timestamps: true,
  }
);

AdminUserSchema.index(
  { username: 1 },
  { unique: true, name: "uniq_admin_users_username" }
);

export const AdminUserModel = model<AdminUserDoc>("AdminUser", AdminUserSchema);

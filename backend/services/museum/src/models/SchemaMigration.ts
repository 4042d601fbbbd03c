// backend/services/museum/src/models/SchemaMigration.ts
import { Schema, model, type Types } from "mongoose";

export interface SchemaMigrationDoc {
  _id: Types.ObjectId;
  version: number;
  name: string;
  appliedAt: Date;
}

const SchemaMigrationSchema = new Schema<SchemaMigrationDoc>(
  {
    version: { type: Number, required: true },
    name: { type: String, required: true },
    appliedAt: { type: Date, required: true, default: () => new Date() },
  },
  { collection: "schema_migrations", strict: true, versionKey: false }
);

SchemaMigrationSchema.index(
  { version: 1 },
  { unique: true, name: "uniq_schema_migrations_version" }
);

export const SchemaMigrationModel = model<SchemaMigrationDoc>(
  "SchemaMigration",
  SchemaMigrationSchema
);

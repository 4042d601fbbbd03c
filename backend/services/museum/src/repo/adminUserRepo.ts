// backend/services/museum/src/repo/adminUserRepo.ts
import { AdminUserModel, type AdminUserDoc } from "../models/AdminUser";
import { adminUserFromDb } from "../mappers/museum.mapper";
import type { AdminUser, AdminUserWithHash } from "../contracts/museum.contract";
import type { AdminUserCreate, AdminUserRepo } from "./types";

export class MongoAdminUserRepo implements AdminUserRepo {
  async findByUsername(username: string): Promise<AdminUserWithHash | null> {
    const doc = await AdminUserModel.findOne({ username })
      .select("+passwordHash")
      .lean<AdminUserDoc>()
      .exec();
    return doc ? { ...adminUserFromDb(doc), passwordHash: doc.passwordHash } : null;
  }

  async create(input: AdminUserCreate): Promise<AdminUser> {
    const doc = await AdminUserModel.create(input);
    return adminUserFromDb(doc.toObject());
  }
}

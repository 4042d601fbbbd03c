// backend/services/museum/src/repo/index.ts
import { MongoAdminUserRepo } from "./adminUserRepo";
import { MongoCategoryRepo } from "./categoryRepo";
import { MongoEventRepo } from "./eventRepo";
import { MongoExhibitRepo } from "./exhibitRepo";
import type { Repos } from "./types";

export function createMongoRepos(): Repos {
  return {
    events: new MongoEventRepo(),
    categories: new MongoCategoryRepo(),
    exhibits: new MongoExhibitRepo(),
    adminUsers: new MongoAdminUserRepo(),
  };
}

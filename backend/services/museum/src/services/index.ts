// backend/services/museum/src/services/index.ts
import type { MuseumConfig } from "../config";
import { FsMediaStore, type MediaStore } from "../media/mediaStore";
import { MediaIngest } from "../media/uploads";
import type { Repos } from "../repo/types";
import { AuthService } from "./authService";
import { CategoryService } from "./categoryService";
import { EventService } from "./eventService";
import { ExhibitService } from "./exhibitService";

export type MuseumServices = {
  events: EventService;
  categories: CategoryService;
  exhibits: ExhibitService;
  auth: AuthService;
  media: MediaStore;
};

export function createServices(
  config: MuseumConfig,
  repos: Repos,
  opts: { media?: MediaStore; bcryptRounds?: number } = {}
): MuseumServices {
  const media = opts.media ?? new FsMediaStore(config.mediaRoot);
  const ingest = new MediaIngest(media, config.image);
  return {
    events: new EventService(repos.events, ingest),
    categories: new CategoryService(repos.categories, repos.exhibits, ingest),
    exhibits: new ExhibitService(repos.exhibits, repos.categories, ingest),
    auth: new AuthService(repos.adminUsers, {
      secretKey: config.secretKey,
      tokenTtlSec: config.adminTokenTtlSec,
      bcryptRounds: opts.bcryptRounds,
    }),
    media,
  };
}

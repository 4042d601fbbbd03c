// backend/services/museum/src/repo/types.ts

/**
 * Storage seams. The app uses the Mongoose implementations in this folder;
 * tests swap in the in-memory ones from test/helpers/memoryRepos.ts.
 *
 * Cross-entity rules (category existence, exhibitCount, cascades) live in the
 * services, not here. Repos only promise single-document atomicity.
 */

import type {
  AdminUser,
  AdminUserWithHash,
  Category,
  Exhibit,
  MuseumEvent,
} from "../contracts/museum.contract";

export type FilterValue = string | boolean;

export type ListQuery = {
  /** Case-insensitive substring match over any of `fields`. */
  search?: { term: string; fields: readonly string[] };
  /** Exact-match filters, already validated against the resource. */
  filters?: Readonly<Record<string, FilterValue>>;
  limit: number;
  offset: number;
};

export type ListResult<T> = { items: T[]; total: number };

export interface CrudRepo<T, TCreate, TPatch> {
  create(input: TCreate): Promise<T>;
  findById(id: string): Promise<T | null>;
  update(id: string, patch: TPatch): Promise<T | null>;
  /** Returns the removed record so callers can release its media. */
  remove(id: string): Promise<T | null>;
  /** Paged list in the resource's default ordering. */
  list(q: ListQuery): Promise<ListResult<T>>;
}

// ── Event ─────────────────────────────────────────────────────────────────────
export type EventCreate = {
  title: string;
  description: string;
  image: string;
  isActive: boolean;
};
export type EventPatch = Partial<EventCreate>;

export interface EventRepo extends CrudRepo<MuseumEvent, EventCreate, EventPatch> {
  /** Active events, newest first. */
  listActive(): Promise<MuseumEvent[]>;
}

// ── Category ──────────────────────────────────────────────────────────────────
export type CategoryCreate = {
  title: string;
  slug: string;
  description: string;
  image: string;
  order: number;
};
export type CategoryPatch = Partial<CategoryCreate>;

export interface CategoryRepo
  extends CrudRepo<Category, CategoryCreate, CategoryPatch> {
  /** All categories by `order`, then `title`. */
  listOrdered(): Promise<Category[]>;
  findBySlug(slug: string): Promise<Category | null>;
  findByTitle(title: string): Promise<Category | null>;
  /** Atomic `$inc` on exhibitCount. */
  adjustExhibitCount(id: string, delta: number): Promise<void>;
  setExhibitCount(id: string, count: number): Promise<void>;
}

// ── Exhibit ───────────────────────────────────────────────────────────────────
export type ExhibitCreate = {
  title: string;
  description: string;
  image: string;
  audio: string | null;
  isFeatured: boolean;
  categoryId: string;
};
export type ExhibitPatch = Partial<ExhibitCreate>;

/** Both sides of one write; `updated` is null if the record vanished right after. */
export type Revision<T> = { previous: T; updated: T | null };

export interface ExhibitRepo
  extends Omit<CrudRepo<Exhibit, ExhibitCreate, ExhibitPatch>, "update"> {
  /**
   * `previous` is the pre-image of this very write, so racing edits each see
   * the category they actually moved the exhibit out of.
   */
  update(id: string, patch: ExhibitPatch): Promise<Revision<Exhibit> | null>;
  /** Every exhibit, newest first. */
  listAll(): Promise<Exhibit[]>;
  listByCategory(categoryId: string): Promise<Exhibit[]>;
  listFeatured(): Promise<Exhibit[]>;
  listWithAudio(): Promise<Exhibit[]>;
  countWithAudio(categoryId: string): Promise<number>;
  /** Atomic `$inc` on viewCount; returns the updated exhibit. */
  incrementViews(id: string): Promise<Exhibit | null>;
  /** Deletes and returns every exhibit of the category. */
  removeByCategory(categoryId: string): Promise<Exhibit[]>;
  /** categoryId → number of exhibits. */
  countByCategory(): Promise<Map<string, number>>;
}

// ── Admin users ───────────────────────────────────────────────────────────────
export type AdminUserCreate = {
  username: string;
  email: string;
  passwordHash: string;
  isSuperuser: boolean;
};

export interface AdminUserRepo {
  findByUsername(username: string): Promise<AdminUserWithHash | null>;
  create(input: AdminUserCreate): Promise<AdminUser>;
}

export type Repos = {
  events: EventRepo;
  categories: CategoryRepo;
  exhibits: ExhibitRepo;
  adminUsers: AdminUserRepo;
};

// backend/services/museum/src/services/categoryService.ts
import { HttpError, notFoundError } from "@shared/http/errors";
import { slugify, uniqueSlug } from "@shared/utils/slugify";
import { logger } from "@shared/utils/logger";
import type { Category } from "../contracts/museum.contract";
import { MEDIA_FOLDERS } from "../media/mediaStore";
import type { MediaIngest, UploadedFiles } from "../media/uploads";
import type { CategoryRepo, ExhibitRepo, ListQuery, ListResult } from "../repo/types";
import type {
  CategoryCreateInput,
  CategoryUpdateInput,
} from "../validators/museum.dto";

const SLUG_MAX = 100;

export class CategoryService {
  constructor(
    private readonly repo: CategoryRepo,
    private readonly exhibits: ExhibitRepo,
    private readonly media: MediaIngest
  ) {}

  listOrdered(): Promise<Category[]> {
    return this.repo.listOrdered();
  }

  list(q: ListQuery): Promise<ListResult<Category>> {
    return this.repo.list(q);
  }

  findById(id: string): Promise<Category | null> {
    return this.repo.findById(id);
  }

  async get(id: string): Promise<Category> {
    const category = await this.repo.findById(id);
    if (!category) throw notFoundError("Category");
    return category;
  }

  async getBySlug(slug: string): Promise<Category> {
    const category = await this.repo.findBySlug(slug);
    if (!category) throw notFoundError("Category");
    return category;
  }

  /** Derived slug for `title`, suffixed `-2`, `-3`, … past existing ones. */
  async deriveSlug(title: string): Promise<string> {
    const base = slugify(title, SLUG_MAX) || "category";
    return uniqueSlug(
      base,
      async (candidate) => (await this.repo.findBySlug(candidate)) !== null,
      SLUG_MAX
    );
  }

  private async assertTitleFree(title: string, exceptId?: string): Promise<void> {
    const other = await this.repo.findByTitle(title);
    if (other && other.id !== exceptId) {
      throw new HttpError(409, `A category titled "${title}" already exists`, "DUPLICATE_TITLE");
    }
  }

  private async assertSlugFree(slug: string, exceptId?: string): Promise<void> {
    const other = await this.repo.findBySlug(slug);
    if (other && other.id !== exceptId) {
      throw new HttpError(409, `Slug "${slug}" is already in use`, "DUPLICATE_SLUG");
    }
  }

  async create(input: CategoryCreateInput, files: UploadedFiles): Promise<Category> {
    await this.assertTitleFree(input.title);
    let slug: string;
    if (input.slug) {
      await this.assertSlugFree(input.slug);
      slug = input.slug;
    } else {
      slug = await this.deriveSlug(input.title);
    }

    if (!files.image) {
      throw new HttpError(400, "An image file is required", "IMAGE_REQUIRED");
    }
    const image = await this.media.storeImage(MEDIA_FOLDERS.category, files.image);
    try {
      const created = await this.repo.create({
        title: input.title,
        slug,
        description: input.description,
        order: input.order,
        image,
      });
      logger.info({ categoryId: created.id, slug }, "category created");
      return created;
    } catch (err) {
      await this.media.release(image);
      throw err;
    }
  }

  async update(
    id: string,
    patch: CategoryUpdateInput,
    files: UploadedFiles
  ): Promise<Category> {
    const current = await this.get(id);
    if (patch.title !== undefined && patch.title !== current.title) {
      await this.assertTitleFree(patch.title, id);
    }
    if (patch.slug !== undefined && patch.slug !== current.slug) {
      await this.assertSlugFree(patch.slug, id);
    }

    const image = files.image
      ? await this.media.storeImage(MEDIA_FOLDERS.category, files.image)
      : undefined;

    let updated: Category | null;
    try {
      updated = await this.repo.update(id, { ...patch, image });
    } catch (err) {
      await this.media.release(image);
      throw err;
    }
    if (!updated) {
      await this.media.release(image);
      throw notFoundError("Category");
    }
    if (image) await this.media.release(current.image);
    return updated;
  }

  /** Deletes the category together with its exhibits and all their files. */
  async remove(id: string): Promise<{ exhibitsRemoved: number }> {
    const category = await this.get(id);
    const exhibits = await this.exhibits.removeByCategory(id);
    const removed = await this.repo.remove(id);
    if (!removed) throw notFoundError("Category");

    await this.media.release(
      category.image,
      ...exhibits.flatMap((e) => [e.image, e.audio])
    );
    logger.info(
      { categoryId: id, exhibitsRemoved: exhibits.length },
      "category deleted"
    );
    return { exhibitsRemoved: exhibits.length };
  }
}

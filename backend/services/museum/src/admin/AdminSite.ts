// backend/services/museum/src/admin/AdminSite.ts

/**
 * Generic admin CRUD built from per-model resource definitions.
 *
 * A definition names what the list shows (listDisplay), what `q` searches,
 * which query keys filter, the page size, and which multipart fields carry
 * files. The site turns raw HTTP input into validated service calls and
 * presents records as JSON-ready objects.
 */

import { z } from "zod";
import { parseRequest } from "@shared/contracts/common";
import { HttpError } from "@shared/http/errors";
import { makeList, type ListPage } from "@shared/http/pagination";
import type { UploadedFiles } from "../media/uploads";
import type { FilterValue, ListQuery, ListResult } from "../repo/types";

export type FileField = "image" | "audio";

export type ResourceMeta = {
  name: string;
  label: string;
  listDisplay: readonly string[];
  searchFields: readonly string[];
  filters: readonly string[];
  listPerPage: number;
  ordering: readonly string[];
  fileFields: readonly FileField[];
  readonlyFields: readonly string[];
};

export type Presented = Record<string, unknown>;

export interface AdminResource {
  readonly meta: ResourceMeta;
  list(query: unknown): Promise<ListPage<Presented>>;
  get(id: string): Promise<Presented>;
  create(body: unknown, files: UploadedFiles): Promise<Presented>;
  update(id: string, body: unknown, files: UploadedFiles): Promise<Presented>;
  remove(id: string): Promise<void>;
}

export type ResourceOps<T, C, U> = {
  list(q: ListQuery): Promise<ListResult<T>>;
  get(id: string): Promise<T>;
  create(input: C, files: UploadedFiles): Promise<T>;
  update(id: string, input: U, files: UploadedFiles): Promise<T>;
  remove(id: string): Promise<unknown>;
};

export type ResourceDefinition<T, C, U> = {
  meta: ResourceMeta;
  createSchema: z.ZodType<C, z.ZodTypeDef, unknown>;
  updateSchema: z.ZodType<U, z.ZodTypeDef, unknown>;
  filterSchema: z.ZodType<Record<string, FilterValue | undefined>, z.ZodTypeDef, unknown>;
  present(item: T): Presented;
  ops: ResourceOps<T, C, U>;
};

const MAX_PAGE = 100;

/** The admin's multipart/JSON body; multer leaves it undefined for bodiless requests. */
function bodyOrEmpty(body: unknown): unknown {
  return body === undefined || body === null ? {} : body;
}

export function defineResource<T, C, U>(def: ResourceDefinition<T, C, U>): AdminResource {
  const { meta } = def;

  const zListQuery = z.object({
    q: z.string().trim().optional(),
    limit: z.coerce.number().int().min(1).max(MAX_PAGE).default(meta.listPerPage),
    offset: z.coerce.number().int().min(0).default(0),
  });

  const pick = (item: T): Presented => {
    const full = def.present(item);
    const out: Presented = { id: full.id };
    for (const key of meta.listDisplay) out[key] = full[key];
    return out;
  };

  const checkFiles = (files: UploadedFiles) => {
    for (const field of Object.keys(files)) {
      if (!meta.fileFields.some((f) => f === field)) {
        throw new HttpError(
          400,
          `Field "${field}" does not accept files on ${meta.name}`,
          "UNEXPECTED_FILE"
        );
      }
    }
  };

  return {
    meta,

    async list(query) {
      const page = parseRequest(zListQuery, query);
      const rawFilters = parseRequest(def.filterSchema, query);
      const filters: Record<string, FilterValue> = {};
      for (const key of meta.filters) {
        const v = rawFilters[key];
        if (v !== undefined) filters[key] = v;
      }
      const result = await def.ops.list({
        search: page.q ? { term: page.q, fields: meta.searchFields } : undefined,
        filters,
        limit: page.limit,
        offset: page.offset,
      });
      return makeList(result.items.map(pick), page.limit, page.offset, result.total);
    },

    async get(id) {
      return def.present(await def.ops.get(id));
    },

    async create(body, files) {
      checkFiles(files);
      const input = parseRequest(def.createSchema, bodyOrEmpty(body));
      return def.present(await def.ops.create(input, files));
    },

    async update(id, body, files) {
      checkFiles(files);
      const input = parseRequest(def.updateSchema, bodyOrEmpty(body));
      return def.present(await def.ops.update(id, input, files));
    },

    async remove(id) {
      await def.ops.remove(id);
    },
  };
}

export class AdminSite {
  private readonly resources = new Map<string, AdminResource>();

  register(resource: AdminResource): this {
    if (this.resources.has(resource.meta.name)) {
      throw new Error(`Admin resource already registered: ${resource.meta.name}`);
    }
    this.resources.set(resource.meta.name, resource);
    return this;
  }

  /** 404 for names nobody registered. */
  require(name: string): AdminResource {
    const resource = this.resources.get(name);
    if (!resource) {
      throw new HttpError(404, `Unknown admin resource: ${name}`, "NOT_FOUND");
    }
    return resource;
  }

  describe(): ResourceMeta[] {
    return [...this.resources.values()].map((r) => r.meta);
  }
}

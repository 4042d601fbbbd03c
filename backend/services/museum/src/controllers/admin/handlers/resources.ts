// backend/services/museum/src/controllers/admin/handlers/resources.ts
import type { Request, RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import type { AdminSite } from "../../../admin/AdminSite";
import type { UploadedFiles } from "../../../media/uploads";

/** Files multer collected for the `image`/`audio` fields. */
export function uploadedFiles(req: Request): UploadedFiles {
  const files = req.files;
  if (!files || Array.isArray(files)) return {};
  const out: UploadedFiles = {};
  const image = files.image?.[0];
  const audio = files.audio?.[0];
  if (image) out.image = image;
  if (audio) out.audio = audio;
  return out;
}

export const index = (site: AdminSite): RequestHandler => (_req, res) => {
  res.json({ resources: site.describe() });
};

export const list = (site: AdminSite): RequestHandler =>
  asyncHandler(async (req, res) => {
    const resource = site.require(req.params.resource);
    res.json(await resource.list(req.query));
  });

export const getOne = (site: AdminSite): RequestHandler =>
  asyncHandler(async (req, res) => {
    const resource = site.require(req.params.resource);
    res.json(await resource.get(req.params.id));
  });

export const create = (site: AdminSite): RequestHandler =>
  asyncHandler(async (req, res) => {
    const resource = site.require(req.params.resource);
    const created = await resource.create(req.body, uploadedFiles(req));
    res.status(201).json(created);
  });

export const update = (site: AdminSite): RequestHandler =>
  asyncHandler(async (req, res) => {
    const resource = site.require(req.params.resource);
    res.json(await resource.update(req.params.id, req.body, uploadedFiles(req)));
  });

export const remove = (site: AdminSite): RequestHandler =>
  asyncHandler(async (req, res) => {
    const resource = site.require(req.params.resource);
    await resource.remove(req.params.id);
    res.status(204).send();
  });

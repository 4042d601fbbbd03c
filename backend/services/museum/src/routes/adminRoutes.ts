// backend/services/museum/src/routes/adminRoutes.ts
import { Router } from "express";
import multer from "multer";
import { authenticate } from "@shared/middleware/authenticate";
import type { AdminSite } from "../admin/AdminSite";
import type { AuthService } from "../services/authService";
import { login } from "../controllers/admin/handlers/login";
import {
  create,
  getOne,
  index,
  list,
  remove,
  update,
} from "../controllers/admin/handlers/resources";

export type AdminRoutesDeps = {
  site: AdminSite;
  auth: AuthService;
  secretKey: string;
  uploadMaxBytes: number;
};

export function adminRoutes(deps: AdminRoutesDeps): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.uploadMaxBytes, files: 2 },
  }).fields([
    { name: "image", maxCount: 1 },
    { name: "audio", maxCount: 1 },
  ]);

  // Open
  router.post("/login", login(deps.auth));

  // Everything below requires a bearer token
  router.use(authenticate(deps.secretKey));

  router.get("/", index(deps.site));
  router.get("/:resource", list(deps.site));
  router.get("/:resource/:id", getOne(deps.site));
  router.post("/:resource", upload, create(deps.site));
  router.patch("/:resource/:id", upload, update(deps.site));
  router.delete("/:resource/:id", remove(deps.site));

  return router;
}

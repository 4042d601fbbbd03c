// backend/services/museum/src/controllers/admin/handlers/login.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { zodBadRequest } from "@shared/contracts/common";
import type { AuthService } from "../../../services/authService";
import { loginDto } from "../../../validators/museum.dto";

export const login = (auth: AuthService): RequestHandler =>
  asyncHandler(async (req, res) => {
    const parsed = loginDto.safeParse(req.body);
    if (!parsed.success) return zodBadRequest(res, parsed.error);

    const result = await auth.login(parsed.data.username, parsed.data.password);
    res.json(result);
  });

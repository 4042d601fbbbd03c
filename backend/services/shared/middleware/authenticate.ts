// backend/services/shared/middleware/authenticate.ts
import type { RequestHandler } from "express";
import jwt from "jsonwebtoken";
import { HttpError } from "../http/errors";

/**
 * Bearer-token guard for admin routes.
 * Tokens are HS256 JWTs minted by the admin login handler with the service's
 * secret key; the verified claims land on `req.admin`.
 */

export type AdminTokenClaims = Express.AdminClaims;

export function signAdminToken(
  claims: AdminTokenClaims,
  secret: string,
  expiresInSec: number
): string {
  return jwt.sign(
    { username: claims.username, isSuperuser: claims.isSuperuser },
    secret,
    { subject: claims.sub, expiresIn: expiresInSec, algorithm: "HS256" }
  );
}

export function verifyAdminToken(token: string, secret: string): AdminTokenClaims {
  const decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });

  // Only object payloads, never strings
  if (typeof decoded !== "object" || decoded === null) {
    throw new HttpError(401, "Invalid token payload", "UNAUTHORIZED");
  }
  const { sub, username, isSuperuser } = decoded;
  if (typeof sub !== "string" || typeof username !== "string") {
    throw new HttpError(401, "Invalid token: missing subject", "UNAUTHORIZED");
  }
  return { sub, username, isSuperuser: isSuperuser === true };
}

export function authenticate(secret: string): RequestHandler {
  return (req, _res, next) => {
    const auth = req.headers.authorization;

    if (!auth || !auth.startsWith("Bearer ")) {
      return next(
        new HttpError(401, "Missing or malformed Authorization header", "UNAUTHORIZED")
      );
    }

    try {
      req.admin = verifyAdminToken(auth.slice(7).trim(), secret);
      return next();
    } catch (err) {
      if (err instanceof HttpError) return next(err);
      return next(new HttpError(401, "Invalid or expired token", "UNAUTHORIZED"));
    }
  };
}

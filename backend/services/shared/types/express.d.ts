// backend/services/shared/types/express.d.ts

/**
 * Global Express request augmentation used by all services.
 * - id: correlation id set by requestIdMiddleware (echoed as x-request-id)
 * - admin: claims from a verified admin bearer token (see authenticate.ts)
 */
declare global {
  namespace Express {
    interface AdminClaims {
      sub: string;
      username: string;
      isSuperuser: boolean;
    }

    interface Request {
      admin?: AdminClaims;
    }
  }
}

export {};

// backend/services/shared/middleware/problemJson.ts

/**
 * Why:
 * - Error responses under API prefixes are RFC 7807 Problem+JSON so clients
 *   and tests can rely on one shape.
 * - Page routes (server-rendered HTML) get the same status with an HTML body
 *   produced by the service's `renderPage` hook.
 *
 * Notes:
 * - Transport-level formatting only, no business logic.
 * - Request validation arrives as HttpError(400) via parseRequest(); any other
 *   error, a stray ZodError included, is a 500.
 * - 5xx detail is never echoed to the client; the error is logged with the
 *   request id instead.
 */

import type { ErrorRequestHandler, Request, Response } from "express";
import { MulterError } from "multer";
import { HttpError } from "../http/errors";
import { extractLogContext, logger } from "../utils/logger";

export type ErrorPageRenderer = (p: {
  status: number;
  title: string;
  detail: string;
}) => string;

export type ProblemJsonOptions = {
  /** Paths that always answer with Problem+JSON. */
  apiPrefixes: string[];
  /** HTML body for everything else. Omit to send Problem+JSON everywhere. */
  renderPage?: ErrorPageRenderer;
};

type NormalizedError = {
  status: number;
  title: string;
  detail: string;
  code?: string;
  errors?: unknown[];
};

const TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  409: "Conflict",
  413: "Payload Too Large",
  500: "Internal Server Error",
};

function titleFor(status: number): string {
  return TITLES[status] ?? (status >= 500 ? "Internal Server Error" : "Request Error");
}

function isDuplicateKey(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  const code = "code" in err ? err.code : undefined;
  const message = "message" in err ? err.message : undefined;
  return (
    code === 11000 ||
    (typeof message === "string" && /E11000 duplicate key/i.test(message))
  );
}

function normalize(err: unknown): NormalizedError {
  if (err instanceof HttpError) {
    return {
      status: err.status,
      title: titleFor(err.status),
      detail: err.message,
      code: err.code,
      errors: err.errors,
    };
  }
  if (err instanceof MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    return {
      status,
      title: titleFor(status),
      detail: err.message,
      code: err.code,
    };
  }
  if (isDuplicateKey(err)) {
    return {
      status: 409,
      title: titleFor(409),
      detail: "A record with the same unique value already exists",
      code: "DUPLICATE",
    };
  }
  return {
    status: 500,
    title: titleFor(500),
    detail: "Unexpected error",
    code: "INTERNAL_ERROR",
  };
}

function wantsProblem(req: Request, opts: ProblemJsonOptions): boolean {
  if (!opts.renderPage) return true;
  return opts.apiPrefixes.some((p) => req.path.startsWith(p));
}

function send(
  req: Request,
  res: Response,
  opts: ProblemJsonOptions,
  e: NormalizedError
) {
  if (!wantsProblem(req, opts) && opts.renderPage) {
    res
      .status(e.status)
      .type("html")
      .send(
        opts.renderPage({ status: e.status, title: e.title, detail: e.detail })
      );
    return;
  }
  res
    .status(e.status)
    .type("application/problem+json")
    .json({
      type: "about:blank",
      title: e.title,
      status: e.status,
      detail: e.detail,
      code: e.code,
      errors: e.errors,
      instance: req.id ? String(req.id) : undefined,
    });
}

/** 404 for anything no router claimed. */
export function notFoundProblemJson(opts: ProblemJsonOptions) {
  return (req: Request, res: Response) => {
    send(req, res, opts, {
      status: 404,
      title: titleFor(404),
      detail: "Route not found",
      code: "NOT_FOUND",
    });
  };
}

/** Converts any thrown/next(err) into Problem+JSON (or an HTML page). */
export function errorProblemJson(opts: ProblemJsonOptions): ErrorRequestHandler {
  return (err, req, res, _next) => {
    const e = normalize(err);

    if (e.status >= 500) {
      logger.error({ err, ...extractLogContext(req) }, "request error");
    } else {
      logger.debug(
        { status: e.status, code: e.code, ...extractLogContext(req) },
        "request rejected"
      );
    }

    send(req, res, opts, e);
  };
}

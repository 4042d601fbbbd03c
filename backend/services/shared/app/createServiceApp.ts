// backend/services/shared/app/createServiceApp.ts

/**
 * Why:
 * - One builder assembles the HTTP stack so every service gets the same
 *   ordering: requestId → http logger → health → host check → static mounts →
 *   json/urlencoded parsers → routes → 404 → error handler.
 *
 * Notes:
 * - Health stays ahead of the host check; container probes call it by IP.
 * - Static mounts come before the parsers and routes so asset requests never
 *   touch them.
 * - Paths under `apiPrefixes` answer errors with Problem+JSON; everything else
 *   uses `renderErrorPage` when one is given.
 */

import express, { type Express } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { allowedHostsMiddleware } from "../middleware/allowedHosts";
import {
  notFoundProblemJson,
  errorProblemJson,
  type ErrorPageRenderer,
} from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type StaticMount = {
  /** URL prefix, e.g. "/static". */
  prefix: string;
  /** Absolute directory served under the prefix. */
  dir: string;
};

export type CreateServiceAppOptions = {
  /** Service slug, used in logs and health bodies. */
  serviceName: string;
  /** Mounts the service's routers on the root router. */
  mountRoutes: (router: express.Router) => void;
  /** Prefixes whose errors are always Problem+JSON (health is added). */
  apiPrefixes: string[];
  renderErrorPage?: ErrorPageRenderer;
  readiness?: ReadinessFn;
  allowedHosts: readonly string[];
  debug: boolean;
  staticMounts?: StaticMount[];
  /** Limit for JSON/urlencoded bodies (multipart limits live with multer). */
  bodyLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  // ── Transport & telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(opts.serviceName));

  // ── Health (open) ──────────────────────────────────────────────────────────
  app.use(
    createHealthRouter({ service: opts.serviceName, readiness: opts.readiness })
  );

  app.use(
    allowedHostsMiddleware({
      allowedHosts: opts.allowedHosts,
      debug: opts.debug,
    })
  );

  for (const m of opts.staticMounts ?? []) {
    app.use(m.prefix, express.static(m.dir, { fallthrough: true, index: false }));
  }

  // ── Body parsers ───────────────────────────────────────────────────────────
  app.use(express.json({ limit: opts.bodyLimit ?? "1mb" }));
  app.use(express.urlencoded({ extended: false, limit: opts.bodyLimit ?? "1mb" }));

  // ── Routes ─────────────────────────────────────────────────────────────────
  const root = express.Router();
  opts.mountRoutes(root);
  app.use(root);

  // ── Tails: 404 + error formatter ───────────────────────────────────────────
  const problemOpts = {
    apiPrefixes: [...opts.apiPrefixes, "/health", "/healthz", "/readyz"],
    renderPage: opts.renderErrorPage,
  };
  app.use(notFoundProblemJson(problemOpts));
  app.use(errorProblemJson(problemOpts));

  return app;
}

// backend/services/museum/src/app.ts
/**
 * Why:
 * - Assemble the museum site on the shared builder: requestId → httpLogger →
 *   health → host check → (debug) static+media → parsers → routes → 404 → error.
 * - Dependencies come in explicitly so tests build the same app over
 *   in-memory repos and a temp media root.
 *
 * Notes:
 * - `/admin/api` answers errors as Problem+JSON; public pages get an HTML
 *   error page with the same status.
 * - Static and media files are served here only in debug; production puts a
 *   reverse proxy in front for both.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { ReadinessFn } from "@shared/health";
import { buildAdminSite } from "./admin/resources";
import { SERVICE_NAME } from "./bootstrap";
import type { MuseumConfig } from "./config";
import { MEDIA_URL_PREFIX } from "./media/mediaStore";
import { adminRoutes } from "./routes/adminRoutes";
import { publicRoutes } from "./routes/publicRoutes";
import type { MuseumServices } from "./services";
import type { ViewContext } from "./views/layout";
import { errorPageRenderer } from "./views/pages/error";

export const ADMIN_API_PREFIX = "/admin/api";

export type MuseumAppDeps = {
  config: MuseumConfig;
  services: MuseumServices;
  readiness?: ReadinessFn;
};

export function createMuseumApp(deps: MuseumAppDeps): Express {
  const { config, services } = deps;
  const view: ViewContext = {
    siteTitle: config.siteTitle,
    panorama: config.panorama,
  };
  const site = buildAdminSite(services);

  return createServiceApp({
    serviceName: SERVICE_NAME,
    apiPrefixes: [ADMIN_API_PREFIX],
    renderErrorPage: errorPageRenderer(view),
    readiness: deps.readiness,
    allowedHosts: config.allowedHosts,
    debug: config.debug,
    staticMounts: config.debug
      ? [
          { prefix: "/static", dir: config.staticRoot },
          { prefix: MEDIA_URL_PREFIX, dir: config.mediaRoot },
        ]
      : [],
    mountRoutes: (root) => {
      root.use(
        ADMIN_API_PREFIX,
        adminRoutes({
          site,
          auth: services.auth,
          secretKey: config.secretKey,
          uploadMaxBytes: config.uploadMaxBytes,
        })
      );
      root.use(publicRoutes(services, view));
    },
  });
}

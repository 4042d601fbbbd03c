// backend/services/shared/middleware/allowedHosts.ts

/**
 * Host header validation.
 *
 * Patterns:
 * - "*"             any host
 * - ".example.org"  example.org and every subdomain
 * - "example.org"   exact match (case-insensitive, port ignored)
 *
 * An empty list in debug mode allows the loopback names only; an empty list
 * outside debug rejects everything.
 */

import type { RequestHandler } from "express";
import { HttpError } from "../http/errors";

const DEBUG_DEFAULT_HOSTS = [".localhost", "127.0.0.1", "[::1]"];

/** Strip the port; keep IPv6 brackets. */
export function hostWithoutPort(host: string): string {
  const h = host.trim().toLowerCase();
  if (h.startsWith("[")) {
    const end = h.indexOf("]");
    return end === -1 ? h : h.slice(0, end + 1);
  }
  const colon = h.lastIndexOf(":");
  return colon === -1 ? h : h.slice(0, colon);
}

export function isHostAllowed(host: string, patterns: readonly string[]): boolean {
  const h = hostWithoutPort(host).replace(/\.$/, "");
  if (!h) return false;
  return patterns.some((raw) => {
    const p = raw.trim().toLowerCase();
    if (p === "*") return true;
    if (p.startsWith(".")) return h === p.slice(1) || h.endsWith(p);
    return h === p;
  });
}

export function effectiveAllowedHosts(
  allowedHosts: readonly string[],
  debug: boolean
): readonly string[] {
  if (allowedHosts.length === 0 && debug) return DEBUG_DEFAULT_HOSTS;
  return allowedHosts;
}

export function allowedHostsMiddleware(opts: {
  allowedHosts: readonly string[];
  debug: boolean;
}): RequestHandler {
  const patterns = effectiveAllowedHosts(opts.allowedHosts, opts.debug);
  return (req, _res, next) => {
    const host = req.headers.host ?? "";
    if (isHostAllowed(host, patterns)) return next();
    next(new HttpError(400, `Invalid HTTP_HOST header: "${host}"`, "DISALLOWED_HOST"));
  };
}

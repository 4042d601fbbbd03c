// backend/services/shared/env.ts

/**
 * Why:
 * - Envs live either at the repo root (.env shared by every service and the
 *   docker-compose file) or beside a service. Load them **by layer**:
 *     1) repo root   → project-wide values
 *     2) service dir → service-specific overrides
 *   Later files override earlier ones; values already present in the real
 *   process environment always win (container-injected env beats files).
 *
 * Notes:
 * - Files are optional: in containers everything is injected.
 * - dotenv-expand resolves `${VAR}` references across layers.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

/** Find the first directory upward from `start` that contains any of the markers. */
export function findRootWithMarkers(
  start: string,
  markers: string[]
): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Load a single env file if it exists; expand vars; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath, override: true });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath} — ${String(parsed.error)}`
    );
  }
  dotenvExpand.expand(parsed);
  return true;
}

/**
 * Load `<repoRoot>/.env` then `<serviceDir>/.env`.
 * Returns the list of files that were actually loaded.
 */
export function loadEnvCascadeForService(serviceDir: string): string[] {
  const snapshot = { ...process.env };
  const injected = new Set(
    Object.keys(snapshot).filter((k) => snapshot[k] !== undefined)
  );

  const root = findRootWithMarkers(serviceDir, ["package.json", ".git"]);
  const files = [
    root ? path.join(root, ".env") : null,
    path.join(serviceDir, ".env"),
  ].filter((f): f is string => f !== null);

  const loaded: string[] = [];
  for (const f of files) {
    if (loadIfExists(f)) loaded.push(f);
  }

  // override:true lets the service layer beat the root layer; put back
  // whatever the real environment injected before we started.
  for (const key of injected) {
    process.env[key] = snapshot[key];
  }
  return loaded;
}

// backend/services/museum/src/cli/collectStatic.ts
import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "@shared/utils/logger";

export type StaticSource = {
  /** Absolute file or directory. */
  from: string;
  /** Destination relative to STATIC_ROOT ("." for the root). */
  to: string;
  /** Skip silently when missing (build output, vendored packages). */
  optional?: boolean;
};

export type CollectReport = { copied: number; missing: string[] };

export type CollectOptions = {
  clear?: boolean;
  /** STATIC_ROOT may live inside the repo but must not be it or hold it. */
  repoRoot?: string;
  /** STATIC_ROOT must not overlap MEDIA_ROOT in either direction. */
  mediaRoot?: string;
};

/** Sources under the repo root: page assets, the client bundle, the panorama library. */
export function defaultStaticSources(repoRoot: string): StaticSource[] {
  const front = path.join(repoRoot, "frontend", "museum");
  const modules = path.join(repoRoot, "node_modules");
  return [
    { from: path.join(front, "public"), to: "." },
    { from: path.join(front, "dist", "js"), to: "js", optional: true },
    {
      from: path.join(modules, "three", "build", "three.min.js"),
      to: "vendor/three/three.min.js",
      optional: true,
    },
    {
      from: path.join(modules, "panolens", "build", "panolens.min.js"),
      to: "vendor/panolens/panolens.min.js",
      optional: true,
    },
  ];
}

async function countFiles(p: string): Promise<number> {
  const stat = await fs.stat(p);
  if (!stat.isDirectory()) return 1;
  let n = 0;
  for (const entry of await fs.readdir(p)) n += await countFiles(path.join(p, entry));
  return n;
}

/** `inner` is `outer` or somewhere below it. */
function isWithin(inner: string, outer: string): boolean {
  const rel = path.relative(outer, inner);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

function assertSafeRoot(root: string, opts: CollectOptions): void {
  const repo = opts.repoRoot ? path.resolve(opts.repoRoot) : undefined;
  const media = opts.mediaRoot ? path.resolve(opts.mediaRoot) : undefined;
  if (
    root === path.parse(root).root ||
    (repo !== undefined && isWithin(repo, root)) ||
    (media !== undefined && (isWithin(media, root) || isWithin(root, media)))
  ) {
    throw new Error(`Refusing to collect static files into ${root}`);
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/** Copy every source into `staticRoot`, clearing it first unless told not to. */
export async function collectStatic(
  staticRoot: string,
  sources: readonly StaticSource[],
  opts: CollectOptions = {}
): Promise<CollectReport> {
  const root = path.resolve(staticRoot);
  assertSafeRoot(root, opts);

  if (opts.clear ?? true) {
    await fs.rm(root, { recursive: true, force: true });
  }
  await fs.mkdir(root, { recursive: true });

  const report: CollectReport = { copied: 0, missing: [] };
  for (const src of sources) {
    if (!(await exists(src.from))) {
      if (!src.optional) throw new Error(`Static source not found: ${src.from}`);
      logger.warn({ source: src.from }, "optional static source missing");
      report.missing.push(src.from);
      continue;
    }
    const dest = path.resolve(root, src.to);
    await fs.mkdir(path.dirname(dest), { recursive: true });
    await fs.cp(src.from, dest, { recursive: true, force: true });
    report.copied += await countFiles(src.from);
  }

  logger.info({ staticRoot: root, copied: report.copied }, "static files collected");
  return report;
}

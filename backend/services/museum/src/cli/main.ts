// backend/services/museum/src/cli/main.ts

/**
 * Museum management commands.
 *
 * Usage:
 *   tsx backend/services/museum/src/cli/main.ts <command>
 *
 * Commands:
 *   start            connect and serve HTTP
 *   entrypoint       wait for DB, migrate, collect static, ensure admin, serve
 *   migrate          apply pending migrations
 *   collectstatic    rebuild STATIC_ROOT (--no-clear keeps existing files)
 *   createsuperuser  create the SUPERUSER_* admin unless it exists
 *   populate         add demo categories, events and exhibits
 */

import { findRootWithMarkers } from "@shared/env";
import { logger } from "@shared/utils/logger";
import { bootstrapService, SERVICE_DIR, SERVICE_NAME } from "../bootstrap";
import type { MuseumConfig } from "../config";
import { connectDb, disconnectDb, ensureModelIndexes, pingDb } from "../db";
import { FsMediaStore } from "../media/mediaStore";
import { MIGRATIONS, MongoMigrationLedger, runMigrations } from "../migrations";
import { createMongoRepos } from "../repo";
import { startMuseumServer } from "../server";
import { createServices } from "../services";
import { collectStatic, defaultStaticSources } from "./collectStatic";
import { runEntrypoint } from "./entrypoint";
import { populateDemoData } from "./populate";

type Command = (config: MuseumConfig, args: string[]) => Promise<void>;

function repoRoot(): string {
  const root = findRootWithMarkers(SERVICE_DIR, ["package.json"]);
  if (!root) throw new Error(`No package.json above ${SERVICE_DIR}`);
  return root;
}

const migrate = () =>
  runMigrations(MIGRATIONS, new MongoMigrationLedger(), {
    repos: createMongoRepos(),
    ensureIndexes: ensureModelIndexes,
  });

const collect = (config: MuseumConfig, clear = true) => {
  const root = repoRoot();
  return collectStatic(config.staticRoot, defaultStaticSources(root), {
    clear,
    repoRoot: root,
    mediaRoot: config.mediaRoot,
  });
};

/** Run `fn` with a DB connection, always disconnecting afterwards. */
async function withDb(config: MuseumConfig, fn: () => Promise<unknown>): Promise<void> {
  await connectDb(config.mongoUri);
  try {
    await fn();
  } finally {
    await disconnectDb();
  }
}

const COMMANDS: Record<string, Command> = {
  async start(config) {
    await startMuseumServer(config);
  },

  async entrypoint(config) {
    const services = createServices(config, createMongoRepos());
    await runEntrypoint(config, {
      ping: () => pingDb(config.mongoUri),
      connect: () => connectDb(config.mongoUri),
      ensureMediaFolders: () => new FsMediaStore(config.mediaRoot).ensureFolders(),
      migrate: () => migrate(),
      collectStatic: () => collect(config),
      ensureSuperuser: (creds) => services.auth.ensureSuperuser(creds),
      start: () => startMuseumServer(config),
    });
  },

  async migrate(config) {
    await withDb(config, () => migrate());
  },

  async collectstatic(config, args) {
    await collect(config, !args.includes("--no-clear"));
  },

  async createsuperuser(config) {
    const creds = config.superuser;
    if (!creds) {
      throw new Error(
        "SUPERUSER_USERNAME, SUPERUSER_EMAIL and SUPERUSER_PASSWORD must all be set"
      );
    }
    await withDb(config, async () => {
      const services = createServices(config, createMongoRepos());
      const outcome = await services.auth.ensureSuperuser(creds);
      logger.info(
        { outcome },
        outcome === "created" ? "Superuser created successfully" : "Superuser already exists"
      );
    });
  },

  async populate(config) {
    await withDb(config, async () => {
      const services = createServices(config, createMongoRepos());
      await new FsMediaStore(config.mediaRoot).ensureFolders();
      await populateDemoData(services);
    });
  },
};

async function main(argv: string[]): Promise<void> {
  const [name, ...args] = argv;
  const command = name ? COMMANDS[name] : undefined;
  if (!command) {
    const known = Object.keys(COMMANDS).join(", ");
    throw new Error(`Unknown command "${name ?? ""}". Expected one of: ${known}`);
  }
  const config = bootstrapService();
  logger.debug({ command: name, service: SERVICE_NAME }, "cli command");
  await command(config, args);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  logger.error({ err }, "command failed");
  process.exit(1);
});

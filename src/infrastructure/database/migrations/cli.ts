import { loadConfig } from "../../config/config.js";
import { createLogger } from "../../logging/logger.js";
import { createPgPool, pgMigrateDown, pgMigrateUp } from "../postgres/index.js";
import { openSqliteDatabase } from "../sqlite.js";
import { migrateDown, migrateUp } from "./runner.js";

/**
 * `npm run migrate` / `npm run migrate:down` against the configured store.
 */
const run = async (direction: string | undefined): Promise<void> => {
  if (direction !== "up" && direction !== "down") {
    process.stderr.write("usage: cli.ts <up|down>\n");
    process.exitCode = 2;
    return;
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.log.level, format: config.log.format }).child({
    service: "migrations",
  });

  if (config.database.url) {
    const pool = createPgPool(config.database.url);
    try {
      if (direction === "up") {
        await pgMigrateUp(pool, logger);
      } else {
        const version = await pgMigrateDown(pool, logger);
        logger.info(version ? `Rolled back ${version}` : "Nothing to roll back");
      }
    } finally {
      await pool.end();
    }
    return;
  }

  const db = openSqliteDatabase(config.database.path);
  try {
    if (direction === "up") {
      await migrateUp(db, logger);
    } else {
      const version = await migrateDown(db, logger);
      if (version) logger.info(`Rolled back ${version}`);
    }
  } finally {
    db.close();
  }
};

run(process.argv[2]).catch((e: unknown) => {
  process.stderr.write(`Migration failed: ${e instanceof Error ? e.message : String(e)}\n`);
  process.exitCode = 1;
});

import type { Command } from "commander";
import { logger } from "../../core/logger";
import { closeDb, getDb } from "../../db/client";
import { runMigrations } from "../../db/migrate";

export const commands = (program: Command) => {
  program
    .command("db:migrate")
    .description("Run database migrations")
    .action(() => {
      try {
        const applied = runMigrations(getDb().sqlite);
        logger.info({ applied }, "Database is up to date");
      } catch (error) {
        logger.error({ err: error }, "Migration failed");
        process.exitCode = 1;
      } finally {
        closeDb();
      }
    });
};

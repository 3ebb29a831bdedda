import type Database from "better-sqlite3";
import { readFileSync, readdirSync, existsSync } from "fs";
import { join } from "path";
import { logger } from "../core/logger";

// Resolves to src/db/migrations from both src/db and dist/db.
export const MIGRATIONS_DIR = join(__dirname, "..", "..", "src", "db", "migrations");

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function runMigrations(db: Database.Database, migrationsDir = MIGRATIONS_DIR): string[] {
  logger.info("Running database migrations...");

  if (!existsSync(migrationsDir)) {
    logger.info({ migrationsDir }, "No migrations directory found");
    return [];
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS __drizzle_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL
    )
  `);

  const appliedMigrations = new Set<string>();
  const appliedRows = db.prepare<[], { hash: string }>("SELECT hash FROM __drizzle_migrations").all();
  for (const row of appliedRows) {
    appliedMigrations.add(row.hash);
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
  const applied: string[] = [];

  for (const file of files) {
    if (appliedMigrations.has(file)) {
      logger.debug({ file }, "Migration already applied, skipping");
      continue;
    }

    const content = readFileSync(join(migrationsDir, file), "utf-8");
    logger.info({ file }, "Applying migration...");

    const statements = content
      .split("--> statement-breakpoint")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const apply = db.transaction(() => {
      for (const statement of statements) {
        try {
          logger.debug({ statement: statement.substring(0, 200) }, "Executing statement");
          db.exec(statement);
        } catch (error) {
          const message = errorMessage(error);
          if (message.includes("already exists") || message.includes("duplicate column")) {
            logger.debug({ statement: statement.substring(0, 100) }, "Object already exists, continuing");
          } else {
            logger.error({ error, statement: statement.substring(0, 200) }, "Statement failed");
            throw error;
          }
        }
      }
      db.prepare("INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)").run(file, Date.now());
    });

    apply();
    applied.push(file);
    logger.info({ file }, "Migration applied successfully");
  }

  logger.info({ applied: applied.length }, "All migrations completed");
  return applied;
}

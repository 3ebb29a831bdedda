import { logger } from "./core/logger";
import { env } from "./core/config";
import { closeDb, getDb } from "./db/client";
import { runMigrations } from "./db/migrate";
import { PlatformSessionsRepository } from "./db/repositories/platform-sessions.repo";
import { AdapterRegistry, type AdapterTuning } from "./platforms/registry";
import { ChromiumLauncher, type BrowserLauncher } from "./services/browser-session";
import { SessionRegistry } from "./services/session-manager";
import { SqliteSessionStore, type SessionStore } from "./services/session-store";

export interface RuntimeOptions {
  store?: SessionStore;
  launcher?: BrowserLauncher;
  headless?: boolean;
  tuning?: AdapterTuning;
}

export interface Runtime {
  store: SessionStore;
  sessions: SessionRegistry;
  adapters: AdapterRegistry;
  shutdown(): Promise<void>;
}

/**
 * Wires the default stack: SQLite-backed store, persistent Chromium profiles
 * and one adapter per session key.
 */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
  let ownsDb = false;
  let store = options.store;
  if (!store) {
    const { db, sqlite } = getDb();
    runMigrations(sqlite);
    store = new SqliteSessionStore(new PlatformSessionsRepository(db));
    ownsDb = true;
  }

  const launcher = options.launcher ?? new ChromiumLauncher({ headless: options.headless ?? env.PLAYWRIGHT_HEADLESS });
  const sessions = new SessionRegistry({ store, launcher });
  const adapters = new AdapterRegistry(sessions, store, options.tuning);

  return {
    store,
    sessions,
    adapters,
    async shutdown() {
      await sessions.shutdown();
      if (ownsDb) closeDb();
      logger.debug("Runtime shut down");
    },
  };
}

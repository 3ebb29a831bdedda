import { ZodError } from "zod";
import { logger } from "../core/logger";
import { StorageUnavailableError } from "../core/errors";
import { computeSnapshotHash } from "../core/hash";
import { sessionKeyToString, type SessionKey, type SessionState } from "../domain/models";
import type { PlatformSessionsRepository } from "../db/repositories/platform-sessions.repo";
import { parseStorageState, serializeStorageState } from "./playwright-session-state";

export interface StoredSessionSummary {
  platform: string;
  identity: string;
  stateHash: string;
  lastValidatedAt: number | null;
  updatedAt: number;
}

/**
 * Durable home of SessionState, one record per platform identity. Everything
 * handed out is a fresh copy; callers never share a reference with the store.
 */
export interface SessionStore {
  load(key: SessionKey): Promise<SessionState | null>;
  save(key: SessionKey, state: SessionState): Promise<void>;
  clear(key: SessionKey): Promise<boolean>;
  list(): Promise<StoredSessionSummary[]>;
  touchValidated(key: SessionKey, at: number): Promise<void>;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SqliteSessionStore implements SessionStore {
  constructor(private readonly repo: PlatformSessionsRepository) {}

  async load(key: SessionKey): Promise<SessionState | null> {
    const row = await this.guard(key, "load", () => this.repo.findByKey(key.platform, key.identity));
    if (!row) return null;

    try {
      return {
        platform: key.platform,
        identity: key.identity,
        storage: parseStorageState(row.stateJson),
        lastValidatedAt: row.lastValidatedAt,
      };
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof ZodError) {
        logger.warn({ session: sessionKeyToString(key), error: describe(error) }, "Stored session is corrupt, treating as missing");
        return null;
      }
      throw error;
    }
  }

  async save(key: SessionKey, state: SessionState): Promise<void> {
    const stateJson = serializeStorageState(state.storage);
    const stateHash = computeSnapshotHash(stateJson);
    await this.guard(key, "save", () =>
      this.repo.upsert({
        platform: key.platform,
        identity: key.identity,
        stateJson,
        stateHash,
        lastValidatedAt: state.lastValidatedAt,
      })
    );
    logger.info(
      { session: sessionKeyToString(key), cookieCount: state.storage.cookies.length, stateHash },
      "Session state saved"
    );
  }

  async clear(key: SessionKey): Promise<boolean> {
    const removed = await this.guard(key, "clear", () => this.repo.delete(key.platform, key.identity));
    logger.info({ session: sessionKeyToString(key), removed }, "Session state cleared");
    return removed;
  }

  async list(): Promise<StoredSessionSummary[]> {
    const rows = await this.guard(null, "list", () => this.repo.list());
    return rows.map((row) => ({
      platform: row.platform,
      identity: row.identity,
      stateHash: row.stateHash,
      lastValidatedAt: row.lastValidatedAt,
      updatedAt: row.updatedAt,
    }));
  }

  async touchValidated(key: SessionKey, at: number): Promise<void> {
    await this.guard(key, "touchValidated", () => this.repo.touchValidated(key.platform, key.identity, at));
  }

  private async guard<T>(key: SessionKey | null, action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.warn({ session: key ? sessionKeyToString(key) : null, action, error: describe(error) }, "Session store failure");
      throw new StorageUnavailableError(`Session store ${action} failed: ${describe(error)}`, "STORAGE_IO");
    }
  }
}

interface MemoryRecord {
  key: SessionKey;
  stateJson: string;
  stateHash: string;
  lastValidatedAt: number | null;
  updatedAt: number;
}

/**
 * Process-local store with the same copy semantics as the SQLite one.
 */
export class MemorySessionStore implements SessionStore {
  private records = new Map<string, MemoryRecord>();

  async load(key: SessionKey): Promise<SessionState | null> {
    const record = this.records.get(sessionKeyToString(key));
    if (!record) return null;
    return {
      platform: key.platform,
      identity: key.identity,
      storage: parseStorageState(record.stateJson),
      lastValidatedAt: record.lastValidatedAt,
    };
  }

  async save(key: SessionKey, state: SessionState): Promise<void> {
    const stateJson = serializeStorageState(state.storage);
    this.records.set(sessionKeyToString(key), {
      key: { platform: key.platform, identity: key.identity },
      stateJson,
      stateHash: computeSnapshotHash(stateJson),
      lastValidatedAt: state.lastValidatedAt,
      updatedAt: Math.floor(Date.now() / 1000),
    });
  }

  async clear(key: SessionKey): Promise<boolean> {
    return this.records.delete(sessionKeyToString(key));
  }

  async list(): Promise<StoredSessionSummary[]> {
    return [...this.records.values()].map((record) => ({
      platform: record.key.platform,
      identity: record.key.identity,
      stateHash: record.stateHash,
      lastValidatedAt: record.lastValidatedAt,
      updatedAt: record.updatedAt,
    }));
  }

  async touchValidated(key: SessionKey, at: number): Promise<void> {
    const record = this.records.get(sessionKeyToString(key));
    if (record) {
      record.lastValidatedAt = at;
    }
  }
}

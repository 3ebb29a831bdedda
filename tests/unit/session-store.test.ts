import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openDatabase, type DatabaseHandle } from "../../src/db/client";
import { runMigrations } from "../../src/db/migrate";
import { PlatformSessionsRepository } from "../../src/db/repositories/platform-sessions.repo";
import { MemorySessionStore, SqliteSessionStore, type SessionStore } from "../../src/services/session-store";
import { StorageUnavailableError } from "../../src/core/errors";
import { computeSnapshotHash } from "../../src/core/hash";
import type { SessionKey } from "../../src/domain/models";
import { sessionState, storageWithCookie } from "../support/factories";

const key: SessionKey = { platform: "xiaohongshu", identity: "default" };

function storeContract(name: string, create: () => SessionStore) {
  describe(`${name} contract`, () => {
    let store: SessionStore;

    beforeEach(() => {
      store = create();
    });

    it("should return null for an unknown key", async () => {
      expect(await store.load(key)).toBeNull();
    });

    it("should load what was saved", async () => {
      await store.save(key, sessionState());
      expect(await store.load(key)).toEqual(sessionState());
    });

    it("should keep the last writer", async () => {
      await store.save(key, sessionState("default", "first"));
      await store.save(key, sessionState("default", "second"));
      const loaded = await store.load(key);
      expect(loaded?.storage.cookies[0]?.value).toBe("second");
      expect(await store.list()).toHaveLength(1);
    });

    it("should hand out copies", async () => {
      await store.save(key, sessionState());
      const first = await store.load(key);
      first?.storage.cookies.splice(0);
      const second = await store.load(key);
      expect(second?.storage.cookies).toHaveLength(1);
    });

    it("should keep identities apart", async () => {
      await store.save(key, sessionState("default", "a"));
      await store.save({ platform: "xiaohongshu", identity: "work:2" }, sessionState("work:2", "b"));

      const listed = await store.list();
      expect(listed.map((s) => s.identity).sort()).toEqual(["default", "work:2"]);
      expect((await store.load({ platform: "xiaohongshu", identity: "work:2" }))?.storage.cookies[0]?.value).toBe("b");
    });

    it("should clear a record", async () => {
      await store.save(key, sessionState());
      expect(await store.clear(key)).toBe(true);
      expect(await store.clear(key)).toBe(false);
      expect(await store.load(key)).toBeNull();
    });

    it("should record validation without touching credentials", async () => {
      await store.save(key, sessionState());
      await store.touchValidated(key, 1_700_000_000);
      expect(await store.load(key)).toEqual({ ...sessionState(), lastValidatedAt: 1_700_000_000 });
    });

    it("should hash the serialized storage", async () => {
      await store.save(key, sessionState());
      const [summary] = await store.list();
      expect(summary?.stateHash).toBe(computeSnapshotHash(JSON.stringify(storageWithCookie())));
    });
  });
}

storeContract("MemorySessionStore", () => new MemorySessionStore());

describe("SqliteSessionStore", () => {
  let handle: DatabaseHandle;
  let repo: PlatformSessionsRepository;

  beforeEach(() => {
    handle = openDatabase(":memory:");
    runMigrations(handle.sqlite);
    repo = new PlatformSessionsRepository(handle.db);
  });

  afterEach(() => {
    if (handle.sqlite.open) handle.sqlite.close();
  });

  storeContract("SqliteSessionStore", () => new SqliteSessionStore(repo));

  it("should treat a corrupt record as missing", async () => {
    await repo.upsert({ platform: "xiaohongshu", identity: "default", stateJson: "{broken", stateHash: "x", lastValidatedAt: null });
    const store = new SqliteSessionStore(repo);
    expect(await store.load(key)).toBeNull();
  });

  it("should treat a record with the wrong shape as missing", async () => {
    await repo.upsert({
      platform: "xiaohongshu",
      identity: "default",
      stateJson: JSON.stringify({ cookies: "nope" }),
      stateHash: "x",
      lastValidatedAt: null,
    });
    expect(await new SqliteSessionStore(repo).load(key)).toBeNull();
  });

  it("should surface driver failures as StorageUnavailable", async () => {
    const store = new SqliteSessionStore(repo);
    handle.sqlite.close();
    await expect(store.load(key)).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(store.save(key, sessionState())).rejects.toMatchObject({ code: "STORAGE_IO" });
  });

  it("should apply migrations once", () => {
    expect(runMigrations(handle.sqlite)).toEqual([]);
  });
});

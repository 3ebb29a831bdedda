import { describe, it, expect } from "vitest";
import { BrowserSessionManager, SessionRegistry } from "../../src/services/session-manager";
import { MemorySessionStore } from "../../src/services/session-store";
import { OperationCancelledError, SessionUnavailableError } from "../../src/core/errors";
import type { SessionKey } from "../../src/domain/models";
import type { PageDriver } from "../../src/services/page-driver";
import { FakeLauncher, FakePageDriver } from "../support/fake-page-driver";
import { sessionState, storageWithCookie } from "../support/factories";

const key: SessionKey = { platform: "xiaohongshu", identity: "default" };

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function slowPages(tickMs: number): () => FakePageDriver {
  return () => {
    const page = new FakePageDriver();
    page.tickMs = tickMs;
    return page;
  };
}

function manager(launcher: FakeLauncher, store = new MemorySessionStore()): BrowserSessionManager {
  return new BrowserSessionManager({ key, store, launcher, launchRetryDelayMs: 1 });
}

describe("BrowserSessionManager", () => {
  it("should apply the stored session before the first navigation", async () => {
    const store = new MemorySessionStore();
    await store.save(key, sessionState());
    const launcher = new FakeLauncher();

    await manager(launcher, store).withSession("getFeeds", async ({ page }) => {
      await page.goto("https://www.xiaohongshu.com/explore", 1000);
    });

    const page = launcher.last;
    expect(page?.calls).toEqual(["applyState", "goto https://www.xiaohongshu.com/explore"]);
    expect(page?.storage).toEqual(storageWithCookie());
  });

  it("should start a fresh session when nothing is stored", async () => {
    const launcher = new FakeLauncher();
    const sessions = manager(launcher);

    await sessions.start();

    expect(sessions.isStarted()).toBe(true);
    expect(launcher.last?.calls).toEqual([]);
  });

  it("should retry a failed launch once", async () => {
    const launcher = new FakeLauncher(undefined, 1);
    const sessions = manager(launcher);

    await sessions.start();

    expect(launcher.keys).toHaveLength(2);
    expect(launcher.launched).toHaveLength(1);
  });

  it("should give up after the second failed launch", async () => {
    const sessions = manager(new FakeLauncher(undefined, 2));

    const error = await sessions.start().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SessionUnavailableError);
    expect(error).toMatchObject({ code: "SESSION_LAUNCH_FAILED" });
    expect(sessions.isStarted()).toBe(false);
  });

  it("should run operations one at a time in arrival order", async () => {
    const launcher = new FakeLauncher(slowPages(2));
    const sessions = manager(launcher);

    const operation = (name: string) =>
      sessions.withSession(name, async ({ page }) => {
        await page.count(".a");
        await page.count(".b");
        await page.count(".c");
        return name;
      });

    const results = await Promise.all([operation("first"), operation("second"), operation("third")]);

    expect(results).toEqual(["first", "second", "third"]);
    const trace = sessions.getStepTrace();
    expect(trace.map((r) => r.step)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(trace.map((r) => r.operation)).toEqual([
      "first", "first", "first",
      "second", "second", "second",
      "third", "third", "third",
    ]);
    expect(new Set(trace.map((r) => r.operationId)).size).toBe(3);
    expect(sessions.getStepCount()).toBe(9);
  });

  it("should drop a queued operation that is cancelled before it starts", async () => {
    const sessions = manager(new FakeLauncher());
    const gate = deferred();
    const controller = new AbortController();
    let ran = false;

    const holder = sessions.withSession("publish", () => gate.promise);
    const queued = sessions.withSession(
      "search",
      async () => {
        ran = true;
      },
      { signal: controller.signal }
    );
    expect(sessions.getQueueLength()).toBe(1);

    controller.abort();
    const error = await queued.catch((e: unknown) => e);
    gate.resolve();
    await holder;

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error).toMatchObject({ code: "CANCELLED_QUEUED" });
    expect(ran).toBe(false);
    expect(sessions.getQueueLength()).toBe(0);
  });

  it("should release the session when an operation throws", async () => {
    const sessions = manager(new FakeLauncher());

    await expect(
      sessions.withSession("comment", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(await sessions.withSession("getFeeds", async () => "next")).toBe("next");
  });

  it("should refuse a page handle kept past its operation", async () => {
    const sessions = manager(new FakeLauncher());
    const leaked: { page?: PageDriver } = {};

    await sessions.withSession("getFeeds", async ({ page }) => {
      leaked.page = page;
    });

    const { page } = leaked;
    if (!page) throw new Error("page handle was not captured");
    expect(() => page.url()).toThrow(SessionUnavailableError);
  });

  it("should not let an operation close the shared browser", async () => {
    const launcher = new FakeLauncher();

    await manager(launcher).withSession("getFeeds", async ({ page }) => {
      expect(() => page.close()).toThrow("Operations cannot close the shared session");
    });

    expect(launcher.last?.closed).toBe(false);
  });

  it("should restart a session whose browser died", async () => {
    const launcher = new FakeLauncher();
    const sessions = manager(launcher);

    await sessions.withSession("getFeeds", async () => undefined);
    const first = launcher.last;
    if (first) first.alive = false;

    await sessions.withSession("search", async () => undefined);

    expect(launcher.launched).toHaveLength(2);
    expect(first?.closed).toBe(true);
  });

  it("should report the live storage as the current state", async () => {
    const launcher = new FakeLauncher(() => {
      const page = new FakePageDriver();
      page.storage = storageWithCookie("fresh-cookie");
      return page;
    });

    const state = await manager(launcher).withSession("login", (ctx) => ctx.currentState());

    expect(state).toEqual({ ...sessionState("default", "fresh-cookie") });
  });

  it("should queue a direct state change behind the running operation", async () => {
    const launcher = new FakeLauncher();
    const sessions = manager(launcher);
    const gate = deferred();

    const holder = sessions.withSession("publish", () => gate.promise);
    const applied = sessions.applyState(sessionState("default", "late-cookie"));
    expect(sessions.getQueueLength()).toBe(1);

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(launcher.last?.calls).toEqual([]);

    gate.resolve();
    await holder;
    await applied;

    expect(launcher.last?.calls).toEqual(["applyState"]);
    expect(launcher.last?.storage).toEqual(storageWithCookie("late-cookie"));
  });

  it("should read the current state only between operations", async () => {
    const launcher = new FakeLauncher();
    const sessions = manager(launcher);
    const gate = deferred();
    const order: string[] = [];

    const holder = sessions.withSession("login", async () => {
      await gate.promise;
      order.push("login finished");
    });
    const state = sessions.currentState().then((current) => {
      order.push("state read");
      return current;
    });

    gate.resolve();
    await holder;

    expect(await state).toMatchObject({ platform: "xiaohongshu", identity: "default", lastValidatedAt: null });
    expect(order).toEqual(["login finished", "state read"]);
  });

  it("should refuse to change the state of a session that never started", async () => {
    const sessions = manager(new FakeLauncher());

    await expect(sessions.applyState(sessionState())).rejects.toMatchObject({ code: "SESSION_NOT_STARTED" });
    expect(sessions.getQueueLength()).toBe(0);
  });

  it("should close the browser on stop", async () => {
    const launcher = new FakeLauncher();
    const sessions = manager(launcher);
    await sessions.start();

    await sessions.stop();

    expect(launcher.last?.closed).toBe(true);
    expect(sessions.isStarted()).toBe(false);
    expect(await sessions.isAlive()).toBe(false);
  });
});

describe("SessionRegistry", () => {
  it("should hand out one manager per identity", () => {
    const registry = new SessionRegistry({ store: new MemorySessionStore(), launcher: new FakeLauncher() });

    expect(registry.get(key)).toBe(registry.get({ ...key }));
    expect(registry.get({ platform: "xiaohongshu", identity: "other" })).not.toBe(registry.get(key));
    expect(registry.list()).toHaveLength(2);
  });

  it("should run different identities concurrently", async () => {
    const registry = new SessionRegistry({ store: new MemorySessionStore(), launcher: new FakeLauncher() });
    const gate = deferred();

    const blocked = registry.get(key).withSession("publish", () => gate.promise);
    const other = await registry
      .get({ platform: "xiaohongshu", identity: "other" })
      .withSession("getFeeds", async ({ key: current }) => current.identity);

    expect(other).toBe("other");
    gate.resolve();
    await blocked;
  });

  it("should stop every browser on shutdown", async () => {
    const launcher = new FakeLauncher();
    const registry = new SessionRegistry({ store: new MemorySessionStore(), launcher });
    await registry.get(key).start();
    await registry.get({ platform: "xiaohongshu", identity: "other" }).start();

    await registry.shutdown();

    expect(launcher.launched.every((page) => page.closed)).toBe(true);
    expect(registry.list()).toEqual([]);
  });
});

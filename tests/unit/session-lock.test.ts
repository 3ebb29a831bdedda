import { describe, it, expect } from "vitest";
import { SessionLock } from "../../src/core/session-lock";
import { OperationCancelledError } from "../../src/core/errors";

describe("SessionLock", () => {
  it("should grant immediately when free", async () => {
    const lock = new SessionLock("xiaohongshu:default");
    const release = await lock.acquire("op-1", "getFeeds");
    expect(lock.isLocked()).toBe(true);
    expect(lock.getHolder()?.operationId).toBe("op-1");
    release();
    expect(lock.isLocked()).toBe(false);
  });

  it("should serve waiters in arrival order", async () => {
    const lock = new SessionLock("xiaohongshu:default");
    const order: string[] = [];
    const releaseFirst = await lock.acquire("op-1", "first");

    const waiters = ["op-2", "op-3", "op-4"].map((id) =>
      lock.acquire(id, id).then((release) => {
        order.push(id);
        release();
      })
    );
    expect(lock.getQueueLength()).toBe(3);

    releaseFirst();
    await Promise.all(waiters);

    expect(order).toEqual(["op-2", "op-3", "op-4"]);
    expect(lock.isLocked()).toBe(false);
  });

  it("should drop a queued waiter whose signal aborts", async () => {
    const lock = new SessionLock("xiaohongshu:default");
    const releaseFirst = await lock.acquire("op-1", "first");
    const controller = new AbortController();

    const cancelled = lock.acquire("op-2", "search", controller.signal);
    const next = lock.acquire("op-3", "comment");
    expect(lock.getQueueLength()).toBe(2);

    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(OperationCancelledError);
    expect(lock.getQueueLength()).toBe(1);

    releaseFirst();
    const releaseNext = await next;
    expect(lock.getHolder()?.operationId).toBe("op-3");
    releaseNext();
  });

  it("should reject an already aborted signal without queueing", async () => {
    const lock = new SessionLock("xiaohongshu:default");
    const controller = new AbortController();
    controller.abort();

    await expect(lock.acquire("op-1", "getFeeds", controller.signal)).rejects.toMatchObject({ code: "CANCELLED_QUEUED" });
    expect(lock.isLocked()).toBe(false);
  });

  it("should ignore a second release", async () => {
    const lock = new SessionLock("xiaohongshu:default");
    const release = await lock.acquire("op-1", "first");
    const second = lock.acquire("op-2", "second");

    release();
    const releaseSecond = await second;
    release();

    expect(lock.getHolder()?.operationId).toBe("op-2");
    releaseSecond();
  });
});

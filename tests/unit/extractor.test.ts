import { describe, it, expect } from "vitest";
import { z } from "zod";
import { Extractor, type ReadPlan } from "../../src/services/extractor";
import type { DomScript } from "../../src/services/page-driver";
import {
  AuthenticationRequiredError,
  ExtractionFailedError,
  ExtractionTimeoutError,
  NotFoundError,
  OperationCancelledError,
} from "../../src/core/errors";
import { FakePageDriver } from "../support/fake-page-driver";

const URL_FEED = "https://site.test/feed?tab=home";
const readCards: DomScript = { name: "readCards", fn: () => [] };
const checkBlocked: DomScript = { name: "checkBlocked", fn: () => null };

const Names = z.array(z.string());
const names = (raw: unknown): string[] | null => {
  const result = Names.safeParse(raw);
  return result.success ? result.data : null;
};

function plan(overrides: Partial<ReadPlan<string[]>> = {}): ReadPlan<string[]> {
  return {
    name: "test.feed",
    url: URL_FEED,
    readyMarker: ".card",
    statePath: "feed.items",
    fromState: names,
    domScript: readCards,
    fromDom: names,
    ...overrides,
  };
}

function extractor(): Extractor {
  return new Extractor({ timeoutMs: 60, pollMs: 5, navigationTimeoutMs: 100, blockedUrlPatterns: [/\/website-login\/captcha/] });
}

describe("Extractor", () => {
  it("should navigate and prefer embedded state", async () => {
    const page = new FakePageDriver().route(/\/feed/, (p) => {
      p.set(".card", { count: 2 }).setState("feed.items", ["a", "b"]);
    });
    page.script("readCards", () => ["from-dom"]);

    expect(await extractor().extract(page, plan())).toEqual(["a", "b"]);
    expect(page.calls.filter((c) => c.startsWith("goto"))).toEqual([`goto ${URL_FEED}`]);
    expect(page.calls).not.toContain("run readCards");
  });

  it("should not navigate when the page is already there", async () => {
    const page = new FakePageDriver().setState("feed.items", ["a"]);
    page.currentUrl = "https://site.test/feed/?tab=home&extra=1";

    expect(await extractor().extract(page, plan())).toEqual(["a"]);
    expect(page.calls.some((c) => c.startsWith("goto"))).toBe(false);
  });

  it("should fall back to the DOM when state is malformed", async () => {
    const page = new FakePageDriver().route(/\/feed/, (p) => {
      p.set(".card").setState("feed.items", { unexpected: true });
    });
    page.script("readCards", () => ["x", "y"]);

    expect(await extractor().extract(page, plan())).toEqual(["x", "y"]);
  });

  it("should fail when neither source is usable", async () => {
    const page = new FakePageDriver().route(/\/feed/, (p) => {
      p.set(".card");
    });
    page.script("readCards", () => [1, 2]);

    await expect(extractor().extract(page, plan())).rejects.toBeInstanceOf(ExtractionFailedError);
  });

  it("should report a missing entity as not found when the plan says so", async () => {
    const page = new FakePageDriver().route(/\/feed/, (p) => {
      p.set(".card");
    });

    await expect(extractor().extract(page, plan({ missingIsNotFound: true }))).rejects.toMatchObject({
      kind: "NotFound",
      code: "RESOURCE_MISSING",
    });
  });

  it("should time out when the page never becomes ready", async () => {
    const page = new FakePageDriver();

    await expect(extractor().extract(page, plan())).rejects.toBeInstanceOf(ExtractionTimeoutError);
  });

  it("should raise not found for an inaccessible page without waiting for content", async () => {
    const page = new FakePageDriver();
    page.script("checkBlocked", () => ({ blocked: true, reason: "该笔记已被删除" }));
    const inaccessible = {
      script: checkBlocked,
      parse: (raw: unknown) => {
        const result = z.object({ blocked: z.boolean(), reason: z.string() }).safeParse(raw);
        return result.success && result.data.blocked ? result.data.reason : null;
      },
    };

    const error = await extractor()
      .extract(page, plan({ inaccessible }))
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ message: "test.feed: 该笔记已被删除", code: "RESOURCE_INACCESSIBLE" });
  });

  it("should raise authentication required on a challenge page", async () => {
    const page = new FakePageDriver().route(/\/feed/, (p) => {
      p.currentUrl = "https://site.test/website-login/captcha?redirect=feed";
    });

    await expect(extractor().extract(page, plan())).rejects.toBeInstanceOf(AuthenticationRequiredError);
    expect(page.calls.some((c) => c.startsWith("readState"))).toBe(false);
  });

  it("should return a copy that shares nothing with the parser's value", async () => {
    const shared = ["a"];
    const page = new FakePageDriver().setState("feed.items", ["ignored"]);
    page.currentUrl = URL_FEED;

    const result = await extractor().extract(page, plan({ fromState: () => shared }));
    result.push("mutated");

    expect(shared).toEqual(["a"]);
  });

  it("should scroll until the target count is loaded", async () => {
    const page = new FakePageDriver().route(/\/feed/, (p) => {
      p.set(".card").set(".comment", { count: 1 }).setState("feed.items", []);
    });
    page.on("scroll", (p) => {
      const current = p.elements.get(".comment")?.count ?? 0;
      p.set(".comment", { count: current + 1 });
    });

    const result = await extractor().extract(
      page,
      plan({ scroll: { itemSelector: ".comment", endMarker: ".end", targetCount: 3, stepPx: 500, maxAttempts: 10 } })
    );

    expect(result).toEqual([]);
    expect(page.calls.filter((c) => c === "scrollBy")).toHaveLength(2);
    expect(page.calls.some((c) => c.startsWith("click"))).toBe(false);
  });

  it("should stop scrolling at the end marker", async () => {
    const page = new FakePageDriver().route(/\/feed/, (p) => {
      p.set(".card").set(".end").setState("feed.items", []);
    });

    await extractor().extract(page, plan({ scroll: { itemSelector: ".comment", endMarker: ".end", targetCount: 50, stepPx: 500, maxAttempts: 10 } }));
    expect(page.calls.filter((c) => c === "scrollBy")).toHaveLength(0);
  });

  it("should not start when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const page = new FakePageDriver();

    await expect(extractor().extract(page, plan(), controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
    expect(page.calls).toEqual([]);
  });
});

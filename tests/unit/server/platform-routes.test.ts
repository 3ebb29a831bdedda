import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { AddressInfo } from "net";
import type { Server } from "http";
import { Router } from "express";
import { z } from "zod";
import { createApp } from "../../../src/server";
import { createPlatformRoutes } from "../../../src/server/routes/platform.routes";
import { errorBody, statusForError } from "../../../src/server/errors";
import {
  AuthenticationRequiredError,
  ExtractionFailedError,
  NotFoundError,
  OperationCancelledError,
  SessionUnavailableError,
  WorkflowFailedError,
} from "../../../src/core/errors";
import type { PlatformAdapter } from "../../../src/platforms/adapter";
import type {
  AuthState,
  CommentInput,
  FeedItem,
  PostDetail,
  PublishContent,
  PublishResult,
  ReplyInput,
  SessionKey,
  UserProfile,
  WriteResult,
} from "../../../src/domain/models";
import { MemorySessionStore } from "../../../src/services/session-store";
import { createSessionBlob } from "../../../src/services/session-blob";
import { storageWithCookie } from "../../support/factories";

function extractRouteInfo(router: Router): Array<{ method: string; path: string }> {
  const routes: Array<{ method: string; path: string }> = [];
  const stack = (router as unknown as { stack: Array<{ route?: { methods: Record<string, boolean>; path: string } }> }).stack;

  for (const layer of stack) {
    if (layer.route) {
      for (const method of Object.keys(layer.route.methods)) {
        routes.push({ method: method.toUpperCase(), path: layer.route.path });
      }
    }
  }
  return routes;
}

function feedItem(id: string): FeedItem {
  return {
    id,
    title: `Post ${id}`,
    authorRef: { id: "u1", name: "Ann" },
    excerpt: "",
    mediaRefs: [],
    publishedAt: null,
    xsecToken: "",
    likes: 0,
  };
}

class StubAdapter implements PlatformAdapter {
  readonly platform = "xiaohongshu" as const;
  readonly calls: Array<{ method: string; args: unknown[] }> = [];
  failWith: Error | null = null;

  constructor(readonly key: SessionKey) {}

  private record(method: string, ...args: unknown[]): void {
    this.calls.push({ method, args });
    if (this.failWith) throw this.failWith;
  }

  async login() {
    this.record("login");
    return { alreadyLoggedIn: true, qrCode: null, cookieCount: 1, savedAt: 1 };
  }

  async checkLogin(): Promise<AuthState> {
    this.record("checkLogin");
    return { isValid: true, error: null, checkedAt: 1 };
  }

  async getFeeds(limit: number): Promise<FeedItem[]> {
    this.record("getFeeds", limit);
    return [feedItem("a"), feedItem("b")].slice(0, limit);
  }

  async search(keyword: string, limit: number): Promise<FeedItem[]> {
    this.record("search", keyword, limit);
    return [feedItem("s1")];
  }

  async getPostDetail(id: string, token: string, options?: { loadAllComments?: boolean; maxComments?: number }): Promise<PostDetail> {
    this.record("getPostDetail", id, token, { loadAllComments: options?.loadAllComments, maxComments: options?.maxComments });
    return { ...feedItem(id), body: "", tags: [], commentCount: 0, commentTree: [] };
  }

  async getUserProfile(userId: string, token: string): Promise<UserProfile> {
    this.record("getUserProfile", userId, token);
    return { id: userId, nickname: "Ann", bio: "", followers: 0, following: 0, likesAndCollects: 0, posts: [] };
  }

  async getMyProfile(): Promise<UserProfile> {
    this.record("getMyProfile");
    return { id: "me", nickname: "me", bio: "", followers: 0, following: 0, likesAndCollects: 0, posts: [] };
  }

  async getMentions(limit: number) {
    this.record("getMentions", limit);
    return [];
  }

  async publish(content: PublishContent): Promise<PublishResult> {
    this.record("publish", content);
    return { postId: "p1", xsecToken: null, title: content.title ?? "", confirmedAt: 1 };
  }

  async comment(input: CommentInput): Promise<WriteResult> {
    this.record("comment", input);
    return { postId: input.postId, commentId: "c1", verified: true, confirmedAt: 1 };
  }

  async reply(input: ReplyInput): Promise<WriteResult> {
    this.record("reply", input);
    return { postId: input.postId, commentId: "r1", verified: true, confirmedAt: 1 };
  }
}

class StubAdapters {
  readonly byIdentity = new Map<string, StubAdapter>();

  get(key: SessionKey): StubAdapter {
    let adapter = this.byIdentity.get(key.identity);
    if (!adapter) {
      adapter = new StubAdapter(key);
      this.byIdentity.set(key.identity, adapter);
    }
    return adapter;
  }
}

describe("platform route order", () => {
  it("should register the reply route before the comment route", () => {
    const routes = extractRouteInfo(createPlatformRoutes({ adapters: new StubAdapters(), store: new MemorySessionStore() }));

    const replyIndex = routes.findIndex((r) => r.path === "/:platform/comments/reply");
    const commentIndex = routes.findIndex((r) => r.path === "/:platform/comments");
    expect(replyIndex).toBeGreaterThanOrEqual(0);
    expect(replyIndex).toBeLessThan(commentIndex);
  });

  it("should expose one route per operation", () => {
    const routes = extractRouteInfo(createPlatformRoutes({ adapters: new StubAdapters(), store: new MemorySessionStore() }));

    expect(routes.map((r) => `${r.method} ${r.path}`)).toEqual([
      "GET /:platform/login/status",
      "POST /:platform/login",
      "POST /:platform/session/import",
      "GET /:platform/feeds",
      "GET /:platform/search",
      "GET /:platform/mentions",
      "POST /:platform/posts/detail",
      "POST /:platform/users/profile",
      "POST /:platform/publish",
      "POST /:platform/comments/reply",
      "POST /:platform/comments",
    ]);
  });
});

describe("statusForError", () => {
  it("should map error kinds to HTTP statuses", () => {
    expect(statusForError(new AuthenticationRequiredError("x", "LOGIN_REQUIRED"))).toBe(401);
    expect(statusForError(new NotFoundError("x", "RESOURCE_MISSING"))).toBe(404);
    expect(statusForError(new SessionUnavailableError("x", "SESSION_LAUNCH_FAILED"))).toBe(503);
    expect(statusForError(new ExtractionFailedError("x", "EXTRACTION_UNUSABLE"))).toBe(502);
    expect(statusForError(new WorkflowFailedError("w", 1, "submit", "boom", ["open"]))).toBe(502);
    expect(statusForError(new OperationCancelledError("x", "CANCELLED"))).toBe(409);
    expect(statusForError(new OperationCancelledError("x", "OPERATION_TIMEOUT"))).toBe(504);
    expect(statusForError(new Error("unexpected"))).toBe(500);
  });

  it("should describe schema failures as validation errors", () => {
    const result = z.object({ keyword: z.string() }).safeParse({});
    if (result.success) throw new Error("schema unexpectedly accepted the input");

    expect(statusForError(result.error)).toBe(400);
    expect(errorBody(result.error)).toEqual({
      error: { kind: "Validation", message: "keyword: Required", code: "REQUEST_INVALID" },
    });
  });
});

describe("platform API", () => {
  const adapters = new StubAdapters();
  const store = new MemorySessionStore();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = createApp({ adapters, store }).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("should answer health checks", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });

  it("should list feeds with a count for the default identity", async () => {
    const res = await fetch(`${baseUrl}/api/xiaohongshu/feeds?limit=1`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ items: [feedItem("a")], count: 1 });
    expect(adapters.get({ platform: "xiaohongshu", identity: "default" }).calls.at(-1)).toEqual({ method: "getFeeds", args: [1] });
  });

  it("should reject a search without a keyword", async () => {
    const res = await fetch(`${baseUrl}/api/xiaohongshu/search?identity=alt`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { kind: "Validation", message: "keyword: Required", code: "REQUEST_INVALID" },
    });
  });

  it("should reject an unknown platform", async () => {
    const res = await fetch(`${baseUrl}/api/myspace/feeds`);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { kind: "Config", code: "CONFIG_INVALID" } });
  });

  it("should route replies and comments to the right operation", async () => {
    const reply = await post("/api/xiaohongshu/comments/reply", { identity: "writer", postId: "n1", commentId: "c9", content: "thanks" });
    const comment = await post("/api/xiaohongshu/comments", { identity: "writer", postId: "n1", content: "nice" });

    expect(await reply.json()).toMatchObject({ commentId: "r1" });
    expect(await comment.json()).toMatchObject({ commentId: "c1" });
    expect(adapters.get({ platform: "xiaohongshu", identity: "writer" }).calls.map((c) => c.method)).toEqual(["reply", "comment"]);
  });

  it("should fall back to the own profile without a user id", async () => {
    const res = await post("/api/xiaohongshu/users/profile", { identity: "profiles" });

    expect(await res.json()).toMatchObject({ id: "me" });
  });

  it("should pass detail options through", async () => {
    await post("/api/xiaohongshu/posts/detail", { identity: "detail", id: "n1", loadAllComments: true });

    expect(adapters.get({ platform: "xiaohongshu", identity: "detail" }).calls).toEqual([
      { method: "getPostDetail", args: ["n1", "", { loadAllComments: true, maxComments: 100 }] },
    ]);
  });

  it("should map adapter failures to statuses with a typed body", async () => {
    adapters.get({ platform: "xiaohongshu", identity: "broken" }).failWith = new AuthenticationRequiredError(
      "comment requires a logged-in session",
      "LOGIN_REQUIRED"
    );

    const res = await post("/api/xiaohongshu/comments", { identity: "broken", postId: "n1", content: "nice" });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { kind: "AuthenticationRequired", message: "comment requires a logged-in session", code: "LOGIN_REQUIRED" },
    });
  });

  it("should import a signed session blob into the store", async () => {
    const now = Math.floor(Date.now() / 1000);
    const blob = createSessionBlob(storageWithCookie("imported"), { secret: "test-secret-0123456789", now, ttlSeconds: 600 });

    const res = await post("/api/xiaohongshu/session/import", { identity: "imported", blob });

    expect(await res.json()).toEqual({ success: true, identity: "imported", importedIssuedAt: now, importedExpiresAt: now + 600 });
    expect((await store.load({ platform: "xiaohongshu", identity: "imported" }))?.storage).toEqual(storageWithCookie("imported"));
  });
});

import { Router } from "express";
import { z } from "zod";
import { logger } from "../../core/logger";
import { DEFAULT_IDENTITY, PublishContentSchema, type SessionKey } from "../../domain/models";
import type { PlatformAdapter } from "../../platforms/adapter";
import { parsePlatform } from "../../platforms/registry";
import { decodeSessionBlob } from "../../services/session-blob";
import type { SessionStore } from "../../services/session-store";

export interface AdapterSource {
  get(key: SessionKey): PlatformAdapter;
}

export interface PlatformRoutesDeps {
  adapters: AdapterSource;
  store: SessionStore;
}

const identityField = z.string().trim().min(1).default(DEFAULT_IDENTITY);

const LimitQuerySchema = z.object({
  identity: identityField,
  limit: z.coerce.number().int().positive().default(20),
});

const SearchQuerySchema = LimitQuerySchema.extend({
  keyword: z.string().trim().min(1, "keyword is required"),
});

const IdentityQuerySchema = z.object({ identity: identityField });

const LoginBodySchema = z.object({
  identity: identityField,
  timeoutSeconds: z.number().int().positive().optional(),
});

const DetailBodySchema = z.object({
  identity: identityField,
  id: z.string().trim().min(1),
  xsecToken: z.string().default(""),
  loadAllComments: z.boolean().default(false),
  maxComments: z.number().int().positive().default(100),
});

const ProfileBodySchema = z.object({
  identity: identityField,
  userId: z.string().trim().min(1).optional(),
  xsecToken: z.string().default(""),
});

const PublishBodySchema = PublishContentSchema.extend({ identity: identityField });

const CommentBodySchema = z.object({
  identity: identityField,
  postId: z.string(),
  xsecToken: z.string().default(""),
  content: z.string(),
});

const ReplyBodySchema = CommentBodySchema.extend({
  commentId: z.string(),
});

const ImportBodySchema = z.object({
  identity: identityField,
  blob: z.string().trim().min(1, "blob is required"),
});

function keyFor(platform: string, identity: string): SessionKey {
  return { platform: parsePlatform(platform), identity };
}

/**
 * One route per adapter operation. Handlers only translate HTTP into adapter
 * calls; failures go to the error handler as typed errors.
 */
export function createPlatformRoutes({ adapters, store }: PlatformRoutesDeps): Router {
  const routes = Router();

  routes.get("/:platform/login/status", async (req, res, next) => {
    try {
      const { identity } = IdentityQuerySchema.parse(req.query);
      const state = await adapters.get(keyFor(req.params.platform, identity)).checkLogin();
      res.json(state);
    } catch (err) {
      next(err);
    }
  });

  routes.post("/:platform/login", async (req, res, next) => {
    try {
      const body = LoginBodySchema.parse(req.body ?? {});
      const result = await adapters.get(keyFor(req.params.platform, body.identity)).login({
        humanTimeoutMs: body.timeoutSeconds !== undefined ? body.timeoutSeconds * 1000 : undefined,
      });
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  routes.post("/:platform/session/import", async (req, res, next) => {
    try {
      const body = ImportBodySchema.parse(req.body ?? {});
      const key = keyFor(req.params.platform, body.identity);
      const decoded = decodeSessionBlob(body.blob);

      await store.save(key, { ...key, storage: decoded.state, lastValidatedAt: null });
      logger.info(
        { platform: key.platform, identity: key.identity, importedIssuedAt: decoded.iat, importedExpiresAt: decoded.exp, cookieCount: decoded.state.cookies.length },
        "Session blob imported via API"
      );

      res.json({ success: true, identity: key.identity, importedIssuedAt: decoded.iat, importedExpiresAt: decoded.exp });
    } catch (err) {
      next(err);
    }
  });

  routes.get("/:platform/feeds", async (req, res, next) => {
    try {
      const { identity, limit } = LimitQuerySchema.parse(req.query);
      const items = await adapters.get(keyFor(req.params.platform, identity)).getFeeds(limit);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  routes.get("/:platform/search", async (req, res, next) => {
    try {
      const { identity, limit, keyword } = SearchQuerySchema.parse(req.query);
      const items = await adapters.get(keyFor(req.params.platform, identity)).search(keyword, limit);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  routes.get("/:platform/mentions", async (req, res, next) => {
    try {
      const { identity, limit } = LimitQuerySchema.parse(req.query);
      const items = await adapters.get(keyFor(req.params.platform, identity)).getMentions(limit);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  routes.post("/:platform/posts/detail", async (req, res, next) => {
    try {
      const body = DetailBodySchema.parse(req.body ?? {});
      const detail = await adapters.get(keyFor(req.params.platform, body.identity)).getPostDetail(body.id, body.xsecToken, {
        loadAllComments: body.loadAllComments,
        maxComments: body.maxComments,
      });
      res.json(detail);
    } catch (err) {
      next(err);
    }
  });

  routes.post("/:platform/users/profile", async (req, res, next) => {
    try {
      const body = ProfileBodySchema.parse(req.body ?? {});
      const adapter = adapters.get(keyFor(req.params.platform, body.identity));
      const profile = body.userId ? await adapter.getUserProfile(body.userId, body.xsecToken) : await adapter.getMyProfile();
      res.json(profile);
    } catch (err) {
      next(err);
    }
  });

  routes.post("/:platform/publish", async (req, res, next) => {
    try {
      const { identity, ...content } = PublishBodySchema.parse(req.body ?? {});
      const result = await adapters.get(keyFor(req.params.platform, identity)).publish(content);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  routes.post("/:platform/comments/reply", async (req, res, next) => {
    try {
      const { identity, ...input } = ReplyBodySchema.parse(req.body ?? {});
      const result = await adapters.get(keyFor(req.params.platform, identity)).reply(input);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  routes.post("/:platform/comments", async (req, res, next) => {
    try {
      const { identity, ...input } = CommentBodySchema.parse(req.body ?? {});
      const result = await adapters.get(keyFor(req.params.platform, identity)).comment(input);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  return routes;
}

import { logger } from "../core/logger";
import { env } from "../core/config";
import { clip, normalizeContent } from "../core/normalize";
import { sleep } from "../core/retry";
import { AuthenticationRequiredError, OperationCancelledError, ValidationError } from "../core/errors";
import type {
  AuthState,
  CommentInput,
  FeedItem,
  Mention,
  Platform,
  PostDetail,
  PublishContent,
  PublishResult,
  ReplyInput,
  SearchResult,
  UserProfile,
  ValidPublishContent,
  WriteResult,
} from "../domain/models";
import { Extractor } from "../services/extractor";
import type { BrowserSessionManager, SessionContext } from "../services/session-manager";
import type { SessionStore } from "../services/session-store";
import {
  validateCommentInput,
  validateLimit,
  validatePublishContent,
  validateReplyInput,
} from "../services/content-validation";
import { WorkflowEngine } from "../orchestration/workflow-engine";
import type {
  LoginOptions,
  LoginResult,
  OperationOptions,
  PlatformAdapter,
  PostDetailOptions,
} from "./adapter";
import { EXISTING_IDS_SNAPSHOT, idList, type PlatformDefinition } from "./definition";

export interface WebPlatformAdapterOptions {
  definition: PlatformDefinition;
  session: BrowserSessionManager;
  store: SessionStore;
  engine?: WorkflowEngine;
  extractor?: Extractor;
  stepTimeoutMs?: number;
  readbackTimeoutMs?: number;
  readbackPollMs?: number;
  operationTimeoutMs?: number;
  loginTimeoutMs?: number;
}

interface PublishedRef {
  postId: string;
  xsecToken: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The one PlatformAdapter implementation. Everything site-specific comes from
 * the PlatformDefinition; reads go through the Extractor, writes through the
 * WorkflowEngine, both on the identity's shared session.
 */
export class WebPlatformAdapter implements PlatformAdapter {
  readonly platform: Platform;
  private readonly definition: PlatformDefinition;
  private readonly session: BrowserSessionManager;
  private readonly store: SessionStore;
  private readonly engine: WorkflowEngine;
  private readonly extractor: Extractor;
  private readonly stepTimeoutMs: number;
  private readonly readbackTimeoutMs: number;
  private readonly readbackPollMs: number;
  private readonly operationTimeoutMs: number;
  private readonly loginTimeoutMs: number;
  private lastValidatedAt: number | null = null;

  constructor(options: WebPlatformAdapterOptions) {
    this.definition = options.definition;
    this.platform = options.definition.platform;
    this.session = options.session;
    this.store = options.store;
    this.engine = options.engine ?? new WorkflowEngine();
    this.extractor = options.extractor ?? new Extractor({ blockedUrlPatterns: options.definition.blockedUrlPatterns });
    this.stepTimeoutMs = options.stepTimeoutMs ?? env.STEP_TIMEOUT_MS;
    this.readbackTimeoutMs = options.readbackTimeoutMs ?? env.READBACK_TIMEOUT_MS;
    this.readbackPollMs = options.readbackPollMs ?? 1000;
    this.operationTimeoutMs = options.operationTimeoutMs ?? env.OPERATION_TIMEOUT_SECONDS * 1000;
    this.loginTimeoutMs = options.loginTimeoutMs ?? env.LOGIN_TIMEOUT_SECONDS * 1000;
  }

  /** When the last successful login probe ran; kept in memory only. */
  getLastValidatedAt(): number | null {
    return this.lastValidatedAt;
  }

  async login(options: LoginOptions = {}): Promise<LoginResult> {
    const humanTimeoutMs = options.humanTimeoutMs ?? this.loginTimeoutMs;

    return this.session.withSession(
      "login",
      async (ctx) => {
        const report = await this.engine.run(ctx.page, this.definition.workflows.login, undefined, {
          signal: ctx.signal,
          humanTimeoutMs,
          onCapture: (label, value) => {
            if (label === "qrCode" && value) options.onQrCode?.(value);
          },
        });

        const state = await ctx.currentState();
        const savedAt = Math.floor(Date.now() / 1000);
        await this.store.save(ctx.key, { ...state, lastValidatedAt: savedAt });
        this.lastValidatedAt = savedAt;

        const qrCode = report.captures.qrCode ?? null;
        logger.info({ platform: this.platform, cookieCount: state.storage.cookies.length, viaQrCode: qrCode !== null }, "Login completed");
        return {
          alreadyLoggedIn: !("qrCode" in report.captures),
          qrCode,
          cookieCount: state.storage.cookies.length,
          savedAt,
        };
      },
      { signal: options.signal, timeoutMs: options.timeoutMs ?? Math.max(this.operationTimeoutMs, humanTimeoutMs + 60_000) }
    );
  }

  async checkLogin(options: OperationOptions = {}): Promise<AuthState> {
    return this.session.withSession("checkLogin", (ctx) => this.probeLogin(ctx), this.scope(options));
  }

  async getFeeds(limit: number, options: OperationOptions = {}): Promise<FeedItem[]> {
    validateLimit(limit);
    const items = await this.session.withSession(
      "getFeeds",
      (ctx) => this.extractor.extract(ctx.page, this.definition.reads.feeds(), ctx.signal),
      this.scope(options)
    );
    return items.slice(0, limit);
  }

  async search(keyword: string, limit: number, options: OperationOptions = {}): Promise<SearchResult[]> {
    const trimmed = keyword.trim();
    if (!trimmed) throw new ValidationError("keyword must not be empty", "KEYWORD_EMPTY");
    validateLimit(limit);

    const items = await this.session.withSession(
      "search",
      (ctx) => this.extractor.extract(ctx.page, this.definition.reads.search(trimmed), ctx.signal),
      this.scope(options)
    );
    return items.slice(0, limit);
  }

  async getPostDetail(id: string, token: string, options: PostDetailOptions = {}): Promise<PostDetail> {
    if (!id.trim()) throw new ValidationError("post id must not be empty", "POST_ID_EMPTY");
    const plan = this.definition.reads.postDetail(id.trim(), token, {
      loadAllComments: options.loadAllComments ?? false,
      maxComments: options.maxComments ?? 100,
    });

    return this.session.withSession("getPostDetail", (ctx) => this.extractor.extract(ctx.page, plan, ctx.signal), this.scope(options));
  }

  async getUserProfile(userId: string, token: string, options: OperationOptions = {}): Promise<UserProfile> {
    if (!userId.trim()) throw new ValidationError("user id must not be empty", "USER_ID_EMPTY");
    const url = this.definition.reads.userProfileUrl(userId.trim(), token);
    const plan = this.definition.reads.userProfile(userId.trim(), url);

    return this.session.withSession("getUserProfile", (ctx) => this.extractor.extract(ctx.page, plan, ctx.signal), this.scope(options));
  }

  async getMyProfile(options: OperationOptions = {}): Promise<UserProfile> {
    return this.session.withSession("getMyProfile", (ctx) => this.readMyProfile(ctx), this.scope(options));
  }

  async getMentions(limit: number, options: OperationOptions = {}): Promise<Mention[]> {
    validateLimit(limit);
    const items = await this.session.withSession(
      "getMentions",
      (ctx) => this.extractor.extract(ctx.page, this.definition.reads.mentions(), ctx.signal),
      this.scope(options)
    );
    return items.slice(0, limit);
  }

  async publish(content: PublishContent, options: OperationOptions = {}): Promise<PublishResult> {
    const valid = validatePublishContent(content, this.definition.limits);

    return this.session.withSession(
      "publish",
      async (ctx) => {
        await this.requireLogin(ctx);
        await this.engine.run(ctx.page, this.definition.workflows.publish, valid, {
          signal: ctx.signal,
          loginRequired: this.definition.auth.loginRequired,
        });
        const confirmedAt = Math.floor(Date.now() / 1000);

        const ref = await this.resolvePublishedPost(ctx, valid);
        logger.info({ platform: this.platform, postId: ref?.postId ?? null }, "Post published");
        return {
          postId: ref?.postId ?? null,
          xsecToken: ref?.xsecToken ?? null,
          title: valid.title,
          confirmedAt,
        };
      },
      this.scope(options)
    );
  }

  async comment(input: CommentInput, options: OperationOptions = {}): Promise<WriteResult> {
    const valid = validateCommentInput(input);

    return this.session.withSession(
      "comment",
      async (ctx) => {
        await this.requireLogin(ctx);
        const report = await this.engine.run(ctx.page, this.definition.workflows.comment, valid, {
          signal: ctx.signal,
          loginRequired: this.definition.auth.loginRequired,
        });
        const commentId = await this.findWrittenId(ctx, this.definition.scripts.commentScope, valid.content, report.snapshots);
        return { postId: valid.postId, commentId, verified: true, confirmedAt: Math.floor(Date.now() / 1000) };
      },
      this.scope(options)
    );
  }

  async reply(input: ReplyInput, options: OperationOptions = {}): Promise<WriteResult> {
    const valid = validateReplyInput(input);

    return this.session.withSession(
      "reply",
      async (ctx) => {
        await this.requireLogin(ctx);
        const report = await this.engine.run(ctx.page, this.definition.workflows.reply, valid, {
          signal: ctx.signal,
          loginRequired: this.definition.auth.loginRequired,
        });
        const commentId = await this.findWrittenId(
          ctx,
          this.definition.scripts.replyScope(valid.commentId),
          valid.content,
          report.snapshots
        );
        return { postId: valid.postId, commentId, verified: true, confirmedAt: Math.floor(Date.now() / 1000) };
      },
      this.scope(options)
    );
  }

  private scope(options: OperationOptions): { signal?: AbortSignal; timeoutMs: number } {
    return { signal: options.signal, timeoutMs: options.timeoutMs ?? this.operationTimeoutMs };
  }

  /**
   * Opens the authenticated-only surface and looks for the logged-in marker.
   * Read-only: the session store is never written here.
   */
  private async probeLogin(ctx: SessionContext): Promise<AuthState> {
    const { auth } = this.definition;
    await ctx.page.goto(auth.probeUrl, this.stepTimeoutMs);
    await this.engine.waitFor(ctx.page, { kind: "anyOf", conditions: [auth.loggedIn, auth.loginRequired] }, this.stepTimeoutMs, ctx.signal);

    const checkedAt = Math.floor(Date.now() / 1000);
    if (await this.engine.waitFor(ctx.page, auth.loggedIn, 0, ctx.signal)) {
      this.lastValidatedAt = checkedAt;
      return { isValid: true, error: null, checkedAt };
    }
    return { isValid: false, error: "SESSION_INVALID: logged-in marker not found", checkedAt };
  }

  private async requireLogin(ctx: SessionContext): Promise<void> {
    const state = await this.probeLogin(ctx);
    if (!state.isValid) {
      logger.warn({ platform: this.platform, operation: ctx.operation }, "Write refused, session is not logged in");
      throw new AuthenticationRequiredError(`${ctx.operation} requires a logged-in session`, "LOGIN_REQUIRED");
    }
  }

  private async readMyProfile(ctx: SessionContext): Promise<UserProfile> {
    const { self } = this.definition;
    await ctx.page.goto(self.url, this.stepTimeoutMs);
    const linked = await this.engine.waitFor(ctx.page, { kind: "attached", selector: self.profileLink }, this.stepTimeoutMs, ctx.signal);

    const href = linked ? await ctx.page.getAttribute(self.profileLink, "href") : null;
    const userId = href ? self.parseUserId(href) : null;
    if (!href || !userId) {
      throw new AuthenticationRequiredError("Own profile link not found, log in first", "LOGIN_REQUIRED");
    }

    const url = new URL(href, self.url).toString();
    return this.extractor.extract(ctx.page, this.definition.reads.userProfile(userId, url), ctx.signal);
  }

  /**
   * Finds the new post on the account's own profile. The platform gives no id
   * on the confirmation page, so this polls until READBACK_TIMEOUT_MS. The post
   * is already live here: only cancellation escapes, every other failure ends
   * in a null id.
   */
  private async resolvePublishedPost(ctx: SessionContext, content: ValidPublishContent): Promise<PublishedRef | null> {
    const wanted = normalizeContent(content.title || clip(content.body, this.definition.limits.titleMaxLength));
    const deadline = Date.now() + this.readbackTimeoutMs;

    for (;;) {
      try {
        const profile = await this.readMyProfile(ctx);
        const match = profile.posts.find((post) => normalizeContent(post.title) === wanted);
        if (match) return { postId: match.id, xsecToken: match.xsecToken };
      } catch (error) {
        if (error instanceof OperationCancelledError) throw error;
        logger.warn({ platform: this.platform, error: describe(error) }, "Profile read-back failed, retrying until deadline");
      }

      if (Date.now() >= deadline) {
        logger.warn({ platform: this.platform, title: content.title }, "Published post not found on profile within read-back window");
        return null;
      }
      await sleep(Math.min(this.readbackPollMs, Math.max(0, deadline - Date.now())), ctx.signal);
    }
  }

  /** The id of the matching item that was not there before the submit, if the page exposes one. */
  private async findWrittenId(
    ctx: SessionContext,
    scope: string,
    content: string,
    snapshots: Readonly<Record<string, unknown>>
  ): Promise<string | null> {
    const before = new Set(idList(snapshots[EXISTING_IDS_SNAPSHOT]));
    const after = idList(await ctx.page.run(this.definition.scripts.findCommentIds, { scope, content }));
    return after.find((id) => id.length > 0 && !before.has(id)) ?? null;
  }
}

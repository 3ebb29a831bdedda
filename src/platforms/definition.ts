import type { Condition, WorkflowDefinition } from "../domain/workflow";
import type {
  FeedItem,
  Mention,
  Platform,
  PostDetail,
  SearchResult,
  UserProfile,
  ValidPublishContent,
} from "../domain/models";
import type { ReadPlan } from "../services/extractor";
import type { DomScript } from "../services/page-driver";

export interface ValidCommentInput {
  postId: string;
  xsecToken: string;
  content: string;
}

export interface ValidReplyInput extends ValidCommentInput {
  commentId: string;
}

/** Snapshot label under which write workflows record matching comment ids before submitting. */
export const EXISTING_IDS_SNAPSHOT = "existingIds";

export function idList(raw: unknown): string[] {
  return Array.isArray(raw) ? raw.filter((id): id is string => typeof id === "string") : [];
}

export interface PostDetailPlanOptions {
  loadAllComments: boolean;
  maxComments: number;
}

/**
 * Everything platform-specific: URLs, selectors, raw-state normalizers and
 * workflow step lists. The adapter and engines consume this as data.
 */
export interface PlatformDefinition {
  readonly platform: Platform;

  readonly auth: {
    /** Authenticated-only surface that the login probe opens. */
    probeUrl: string;
    loggedIn: Condition;
    loginRequired: Condition;
  };

  readonly limits: {
    titleMaxLength: number;
    bodyMaxLength: number;
    maxTags: number;
  };

  readonly blockedUrlPatterns: readonly RegExp[];

  readonly reads: {
    feeds(): ReadPlan<FeedItem[]>;
    search(keyword: string): ReadPlan<SearchResult[]>;
    postDetail(id: string, token: string, options: PostDetailPlanOptions): ReadPlan<PostDetail>;
    userProfile(userId: string, url: string): ReadPlan<UserProfile>;
    userProfileUrl(userId: string, token: string): string;
    mentions(): ReadPlan<Mention[]>;
  };

  /** Where the logged-in account links to its own profile. */
  readonly self: {
    url: string;
    profileLink: string;
    parseUserId(href: string): string | null;
  };

  readonly workflows: {
    login: WorkflowDefinition<void>;
    publish: WorkflowDefinition<ValidPublishContent>;
    comment: WorkflowDefinition<ValidCommentInput>;
    reply: WorkflowDefinition<ValidReplyInput>;
  };

  readonly scripts: {
    /** Returns the ids of every item under `scope` whose text equals `content`. */
    findCommentIds: DomScript;
    commentScope: string;
    replyScope(commentId: string): string;
  };
}

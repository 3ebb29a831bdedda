import { z } from "zod";

export const PlatformSchema = z.enum(["xiaohongshu", "twitter", "linkedin"]);
export type Platform = z.infer<typeof PlatformSchema>;

export const DEFAULT_IDENTITY = "default";

export const SessionKeySchema = z.object({
  platform: PlatformSchema,
  identity: z.string().min(1).default(DEFAULT_IDENTITY),
});
export type SessionKey = z.infer<typeof SessionKeySchema>;

export function sessionKeyToString(key: SessionKey): string {
  return `${key.platform}:${key.identity}`;
}

const CookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string().default("/"),
  expires: z.number().default(-1),
  httpOnly: z.boolean().default(false),
  secure: z.boolean().default(false),
  sameSite: z.enum(["Strict", "Lax", "None"]).default("Lax"),
});

const OriginSchema = z.object({
  origin: z.string(),
  localStorage: z
    .array(
      z.object({
        name: z.string(),
        value: z.string(),
      })
    )
    .default([]),
});

export const StorageStateSchema = z.object({
  cookies: z.array(CookieSchema).default([]),
  origins: z.array(OriginSchema).default([]),
});
export type StorageState = z.infer<typeof StorageStateSchema>;

export const SessionStateSchema = z.object({
  platform: PlatformSchema,
  identity: z.string().min(1),
  storage: StorageStateSchema,
  lastValidatedAt: z.number().nullable(),
});
export type SessionState = z.infer<typeof SessionStateSchema>;

export const AuthorRefSchema = z.object({
  id: z.string(),
  name: z.string(),
});
export type AuthorRef = z.infer<typeof AuthorRefSchema>;

export const FeedItemSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  authorRef: AuthorRefSchema,
  excerpt: z.string(),
  mediaRefs: z.array(z.string()),
  publishedAt: z.number().nullable(),
  xsecToken: z.string(),
  likes: z.number(),
});
export type FeedItem = z.infer<typeof FeedItemSchema>;

export const SearchResultSchema = FeedItemSchema;
export type SearchResult = FeedItem;

export const ReplySchema = z.object({
  id: z.string(),
  authorRef: AuthorRefSchema,
  content: z.string(),
  likes: z.number(),
  createdAt: z.number().nullable(),
});
export type Reply = z.infer<typeof ReplySchema>;

export const CommentSchema = ReplySchema.extend({
  replies: z.array(ReplySchema),
});
export type Comment = z.infer<typeof CommentSchema>;

export const PostDetailSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  body: z.string(),
  authorRef: AuthorRefSchema,
  mediaRefs: z.array(z.string()),
  tags: z.array(z.string()),
  likes: z.number(),
  commentCount: z.number(),
  publishedAt: z.number().nullable(),
  xsecToken: z.string(),
  commentTree: z.array(CommentSchema),
});
export type PostDetail = z.infer<typeof PostDetailSchema>;

export const UserProfileSchema = z.object({
  id: z.string(),
  nickname: z.string(),
  bio: z.string(),
  followers: z.number(),
  following: z.number(),
  likesAndCollects: z.number(),
  posts: z.array(FeedItemSchema),
});
export type UserProfile = z.infer<typeof UserProfileSchema>;

export const MentionSchema = z.object({
  id: z.string(),
  kind: z.string(),
  content: z.string(),
  fromUser: AuthorRefSchema,
  postId: z.string().nullable(),
  createdAt: z.number().nullable(),
});
export type Mention = z.infer<typeof MentionSchema>;

export const SUPPORTED_MEDIA_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp", ".gif"] as const;

export const PublishContentSchema = z.object({
  title: z.string().trim().default(""),
  body: z.string().trim().min(1, "body must not be empty"),
  mediaPaths: z.array(z.string().min(1)).min(1, "at least one media file is required"),
  tags: z.array(z.string().trim().min(1)).default([]),
  scheduleAt: z.coerce.date().optional(),
});
export type PublishContent = z.input<typeof PublishContentSchema>;
export type ValidPublishContent = z.infer<typeof PublishContentSchema>;

export const CommentInputSchema = z.object({
  postId: z.string().trim().min(1),
  xsecToken: z.string().default(""),
  content: z.string().trim().min(1, "content must not be empty").max(500),
});
export type CommentInput = z.input<typeof CommentInputSchema>;

export const ReplyInputSchema = CommentInputSchema.extend({
  commentId: z.string().trim().min(1),
});
export type ReplyInput = z.input<typeof ReplyInputSchema>;

export const AuthStateSchema = z.object({
  isValid: z.boolean(),
  error: z.string().nullable(),
  checkedAt: z.number(),
});
export type AuthState = z.infer<typeof AuthStateSchema>;

export const PublishResultSchema = z.object({
  postId: z.string().nullable(),
  xsecToken: z.string().nullable(),
  title: z.string(),
  confirmedAt: z.number(),
});
export type PublishResult = z.infer<typeof PublishResultSchema>;

export const WriteResultSchema = z.object({
  postId: z.string(),
  commentId: z.string().nullable(),
  verified: z.literal(true),
  confirmedAt: z.number(),
});
export type WriteResult = z.infer<typeof WriteResultSchema>;

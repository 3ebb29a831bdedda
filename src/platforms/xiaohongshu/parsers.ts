import { z } from "zod";
import { clip, parseCompactNumber } from "../../core/normalize";
import type { AuthorRef, Comment, FeedItem, Mention, PostDetail, Reply, UserProfile } from "../../domain/models";

const EXCERPT_LENGTH = 140;

const CountSchema = z.union([z.string(), z.number()]).nullish();

const RawUserSchema = z.object({
  userId: z.string().optional(),
  nickname: z.string().optional(),
  nickName: z.string().optional(),
});

const RawImageSchema = z.object({
  urlDefault: z.string().optional(),
  url: z.string().optional(),
  infoList: z.array(z.object({ url: z.string().optional() })).optional(),
});

const RawInteractSchema = z.object({
  likedCount: CountSchema,
  commentCount: CountSchema,
});

const RawNoteCardSchema = z.object({
  displayTitle: z.string().optional(),
  title: z.string().optional(),
  desc: z.string().optional(),
  user: RawUserSchema.optional(),
  interactInfo: RawInteractSchema.optional(),
  cover: RawImageSchema.optional(),
  time: z.number().optional(),
});

const RawFeedEntrySchema = z.object({
  id: z.string().min(1),
  xsecToken: z.string().optional(),
  modelType: z.string().optional(),
  noteCard: RawNoteCardSchema,
});

const RawSubCommentSchema = z.object({
  id: z.string().min(1),
  content: z.string().default(""),
  userInfo: RawUserSchema.optional(),
  likeCount: CountSchema,
  createTime: z.number().optional(),
});

const RawCommentSchema = RawSubCommentSchema.extend({
  subComments: z.array(RawSubCommentSchema).optional(),
});

const RawNoteSchema = z.object({
  noteId: z.string().min(1),
  title: z.string().optional(),
  desc: z.string().optional(),
  user: RawUserSchema.optional(),
  imageList: z.array(RawImageSchema).optional(),
  tagList: z.array(z.object({ name: z.string().optional() })).optional(),
  interactInfo: RawInteractSchema.optional(),
  time: z.number().optional(),
  xsecToken: z.string().optional(),
});

const RawNoteDetailEntrySchema = z.object({
  note: RawNoteSchema,
  comments: z
    .object({
      list: z.array(z.unknown()).optional(),
    })
    .optional(),
});

const RawUserStateSchema = z.object({
  userPageData: z.object({
    basicInfo: z.object({
      nickname: z.string().optional(),
      nickName: z.string().optional(),
      desc: z.string().optional(),
    }),
    interactions: z
      .array(
        z.object({
          type: z.string().optional(),
          name: z.string().optional(),
          count: CountSchema,
        })
      )
      .optional(),
  }),
  notes: z.array(z.unknown()).optional(),
});

const RawMentionSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  msgId: z.string().optional(),
  type: z.string().optional(),
  msgType: z.string().optional(),
  title: z.string().optional(),
  content: z.string().optional(),
  userInfo: RawUserSchema.optional(),
  fromUser: RawUserSchema.optional(),
  itemInfo: z.object({ id: z.string().optional() }).optional(),
  noteId: z.string().optional(),
  time: z.number().optional(),
});

type RawUser = z.infer<typeof RawUserSchema>;
type RawImage = z.infer<typeof RawImageSchema>;
type RawSubComment = z.infer<typeof RawSubCommentSchema>;

function toAuthorRef(user: RawUser | undefined): AuthorRef {
  return {
    id: user?.userId ?? "",
    name: user?.nickname ?? user?.nickName ?? "",
  };
}

function imageUrl(image: RawImage | undefined): string | null {
  if (!image) return null;
  return image.urlDefault ?? image.url ?? image.infoList?.find((i) => i.url)?.url ?? null;
}

/**
 * Keeps entries that validate and drops the rest. A non-empty list in which
 * nothing validates is reported as unusable rather than empty.
 */
function parseEach<O, T>(raw: unknown, schema: z.ZodType<O, z.ZodTypeDef, unknown>, map: (item: O) => T): T[] | null {
  if (!Array.isArray(raw)) return null;
  const items: T[] = [];
  for (const entry of raw) {
    const result = schema.safeParse(entry);
    if (result.success) items.push(map(result.data));
  }
  return raw.length > 0 && items.length === 0 ? null : items;
}

export function parseFeedEntries(raw: unknown): FeedItem[] | null {
  return parseEach(raw, RawFeedEntrySchema, (entry) => {
    const card = entry.noteCard;
    const cover = imageUrl(card.cover);
    return {
      id: entry.id,
      title: card.displayTitle ?? card.title ?? "",
      authorRef: toAuthorRef(card.user),
      excerpt: clip(card.desc ?? "", EXCERPT_LENGTH),
      mediaRefs: cover ? [cover] : [],
      publishedAt: card.time ?? null,
      xsecToken: entry.xsecToken ?? "",
      likes: parseCompactNumber(card.interactInfo?.likedCount),
    };
  });
}

function toReply(raw: RawSubComment): Reply {
  return {
    id: raw.id,
    authorRef: toAuthorRef(raw.userInfo),
    content: raw.content,
    likes: parseCompactNumber(raw.likeCount),
    createdAt: raw.createTime ?? null,
  };
}

export function parseNoteDetailEntry(raw: unknown, noteId: string, token: string): PostDetail | null {
  const result = RawNoteDetailEntrySchema.safeParse(raw);
  if (!result.success) return null;

  const { note, comments } = result.data;
  if (note.noteId !== noteId) return null;

  const commentTree: Comment[] =
    parseEach(comments?.list ?? [], RawCommentSchema, (c) => ({
      ...toReply(c),
      replies: (c.subComments ?? []).map(toReply),
    })) ?? [];

  return {
    id: note.noteId,
    title: note.title ?? "",
    body: note.desc ?? "",
    authorRef: toAuthorRef(note.user),
    mediaRefs: (note.imageList ?? []).flatMap((image) => {
      const url = imageUrl(image);
      return url ? [url] : [];
    }),
    tags: (note.tagList ?? []).flatMap((tag) => (tag.name ? [tag.name] : [])),
    likes: parseCompactNumber(note.interactInfo?.likedCount),
    commentCount: parseCompactNumber(note.interactInfo?.commentCount),
    publishedAt: note.time ?? null,
    xsecToken: note.xsecToken ?? token,
    commentTree,
  };
}

export function parseUserState(raw: unknown, userId: string): UserProfile | null {
  const result = RawUserStateSchema.safeParse(raw);
  if (!result.success) return null;

  const { basicInfo, interactions = [] } = result.data.userPageData;
  let followers = 0;
  let following = 0;
  let likesAndCollects = 0;
  for (const item of interactions) {
    const type = (item.type ?? "").toLowerCase();
    const name = item.name ?? "";
    const count = parseCompactNumber(item.count);
    if (type === "fans" || name === "粉丝") followers = count;
    else if (type === "follows" || name === "关注") following = count;
    else if (type === "interaction" || name.includes("获赞") || name.includes("收藏")) likesAndCollects = count;
  }

  // Notes come grouped by tab as nested arrays.
  const flatNotes: unknown[] = (result.data.notes ?? []).flatMap((group) => (Array.isArray(group) ? group : [group]));

  return {
    id: userId,
    nickname: basicInfo.nickname ?? basicInfo.nickName ?? "",
    bio: basicInfo.desc ?? "",
    followers,
    following,
    likesAndCollects,
    posts: parseFeedEntries(flatNotes) ?? [],
  };
}

export function parseMentions(raw: unknown): Mention[] | null {
  return parseEach(raw, RawMentionSchema, (m) => ({
    id: String(m.id ?? m.msgId ?? ""),
    kind: m.type ?? m.msgType ?? "",
    content: m.title ?? m.content ?? "",
    fromUser: toAuthorRef(m.userInfo ?? m.fromUser),
    postId: m.itemInfo?.id ?? m.noteId ?? null,
    createdAt: m.time ?? null,
  }));
}

// Shapes produced by the DOM fallback scripts.

const DomCardSchema = z.object({
  id: z.string().min(1),
  xsecToken: z.string(),
  title: z.string(),
  authorId: z.string(),
  authorName: z.string(),
  likes: z.string(),
  cover: z.string().nullable(),
});

const DomCommentSchema = z.object({
  id: z.string().min(1),
  authorId: z.string(),
  authorName: z.string(),
  content: z.string(),
  likes: z.string(),
});

const DomDetailSchema = z.object({
  title: z.string(),
  body: z.string(),
  authorId: z.string(),
  authorName: z.string(),
  images: z.array(z.string()),
  tags: z.array(z.string()),
  likes: z.string(),
  commentTotal: z.string(),
  comments: z.array(
    DomCommentSchema.extend({
      replies: z.array(DomCommentSchema),
    })
  ),
});

const DomProfileSchema = z.object({
  nickname: z.string(),
  bio: z.string(),
  follows: z.string(),
  fans: z.string(),
  interactions: z.string(),
  notes: z.array(DomCardSchema),
});

const DomMentionSchema = z.object({
  id: z.string(),
  kind: z.string(),
  content: z.string(),
  fromName: z.string(),
  fromId: z.string(),
  postId: z.string().nullable(),
});

const InaccessibleSchema = z.object({
  blocked: z.boolean(),
  reason: z.string().nullable(),
});

function cardToFeedItem(card: z.infer<typeof DomCardSchema>): FeedItem {
  return {
    id: card.id,
    title: card.title,
    authorRef: { id: card.authorId, name: card.authorName },
    excerpt: "",
    mediaRefs: card.cover ? [card.cover] : [],
    publishedAt: null,
    xsecToken: card.xsecToken,
    likes: parseCompactNumber(card.likes),
  };
}

export function parseDomCards(raw: unknown): FeedItem[] | null {
  return parseEach(raw, DomCardSchema, cardToFeedItem);
}

function domReply(c: z.infer<typeof DomCommentSchema>): Reply {
  return {
    id: c.id,
    authorRef: { id: c.authorId, name: c.authorName },
    content: c.content,
    likes: parseCompactNumber(c.likes),
    createdAt: null,
  };
}

export function parseDomDetail(raw: unknown, noteId: string, token: string): PostDetail | null {
  const result = DomDetailSchema.safeParse(raw);
  if (!result.success) return null;
  const d = result.data;
  if (!d.title && !d.body && d.images.length === 0) return null;

  const total = d.commentTotal.match(/\d+(?:\.\d+)?[万w]?/i)?.[0];
  return {
    id: noteId,
    title: d.title,
    body: d.body,
    authorRef: { id: d.authorId, name: d.authorName },
    mediaRefs: d.images,
    tags: d.tags.map((t) => t.replace(/^#/, "").trim()).filter((t) => t.length > 0),
    likes: parseCompactNumber(d.likes),
    commentCount: total ? parseCompactNumber(total) : d.comments.length,
    publishedAt: null,
    xsecToken: token,
    commentTree: d.comments.map((c) => ({ ...domReply(c), replies: c.replies.map(domReply) })),
  };
}

export function parseDomProfile(raw: unknown, userId: string): UserProfile | null {
  const result = DomProfileSchema.safeParse(raw);
  if (!result.success || !result.data.nickname) return null;
  const p = result.data;
  return {
    id: userId,
    nickname: p.nickname,
    bio: p.bio,
    followers: parseCompactNumber(p.fans),
    following: parseCompactNumber(p.follows),
    likesAndCollects: parseCompactNumber(p.interactions),
    posts: p.notes.map(cardToFeedItem),
  };
}

export function parseDomMentions(raw: unknown): Mention[] | null {
  return parseEach(raw, DomMentionSchema, (m) => ({
    id: m.id,
    kind: m.kind,
    content: m.content,
    fromUser: { id: m.fromId, name: m.fromName },
    postId: m.postId,
    createdAt: null,
  }));
}

export function parseInaccessible(raw: unknown): string | null {
  const result = InaccessibleSchema.safeParse(raw);
  if (!result.success || !result.data.blocked) return null;
  return result.data.reason ?? "note is not accessible";
}

export function parseUserIdFromHref(href: string): string | null {
  const match = href.match(/\/user\/profile\/([A-Za-z0-9]+)/);
  return match?.[1] ?? null;
}

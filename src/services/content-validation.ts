import { statSync } from "fs";
import { extname, resolve } from "path";
import type { ZodError } from "zod";
import { logger } from "../core/logger";
import { ValidationError } from "../core/errors";
import {
  CommentInputSchema,
  PublishContentSchema,
  ReplyInputSchema,
  SUPPORTED_MEDIA_EXTENSIONS,
  type CommentInput,
  type PublishContent,
  type ReplyInput,
  type ValidPublishContent,
} from "../domain/models";
import type { ValidCommentInput, ValidReplyInput } from "../platforms/definition";

export interface PublishLimits {
  titleMaxLength: number;
  bodyMaxLength: number;
  maxTags: number;
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
}

// Counts code points so that CJK and emoji are one character each.
function charLength(text: string): number {
  return [...text].length;
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

export function validatePublishContent(content: PublishContent, limits: PublishLimits, now = Date.now()): ValidPublishContent {
  const result = PublishContentSchema.safeParse(content);
  if (!result.success) {
    throw new ValidationError(`Invalid publish content: ${formatIssues(result.error)}`, "PUBLISH_CONTENT_INVALID");
  }
  const valid = result.data;

  if (charLength(valid.title) > limits.titleMaxLength) {
    throw new ValidationError(`Title exceeds ${limits.titleMaxLength} characters`, "TITLE_TOO_LONG");
  }
  if (charLength(valid.body) > limits.bodyMaxLength) {
    throw new ValidationError(`Body exceeds ${limits.bodyMaxLength} characters`, "BODY_TOO_LONG");
  }

  const mediaPaths = valid.mediaPaths.map((path) => {
    const extension = extname(path).toLowerCase();
    if (!SUPPORTED_MEDIA_EXTENSIONS.some((supported) => supported === extension)) {
      throw new ValidationError(
        `Unsupported media type "${extension || path}", expected one of ${SUPPORTED_MEDIA_EXTENSIONS.join(" ")}`,
        "MEDIA_UNSUPPORTED"
      );
    }
    const absolute = resolve(path);
    if (!isFile(absolute)) {
      throw new ValidationError(`Media file not found: ${path}`, "MEDIA_NOT_FOUND");
    }
    return absolute;
  });

  if (valid.scheduleAt && valid.scheduleAt.getTime() <= now) {
    throw new ValidationError("scheduleAt must be in the future", "SCHEDULE_IN_PAST");
  }

  const tags = [...new Set(valid.tags.map((tag) => tag.replace(/^#/, "").trim()).filter((tag) => tag.length > 0))];
  if (tags.length > limits.maxTags) {
    logger.warn({ given: tags.length, kept: limits.maxTags }, "Too many tags, extra tags dropped");
  }

  return {
    title: valid.title,
    body: valid.body,
    mediaPaths,
    tags: tags.slice(0, limits.maxTags),
    scheduleAt: valid.scheduleAt,
  };
}

export function validateCommentInput(input: CommentInput): ValidCommentInput {
  const result = CommentInputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid comment: ${formatIssues(result.error)}`, "COMMENT_INVALID");
  }
  return result.data;
}

export function validateReplyInput(input: ReplyInput): ValidReplyInput {
  const result = ReplyInputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid reply: ${formatIssues(result.error)}`, "REPLY_INVALID");
  }
  return result.data;
}

export function validateLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`, "LIMIT_INVALID");
  }
  return limit;
}

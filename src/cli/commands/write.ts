import type { Command } from "commander";
import { ValidationError } from "../../core/errors";
import { runAction, printJson, sessionKeyFrom, type SessionKeyOptions } from "../shared";

interface PublishOptions extends SessionKeyOptions {
  title: string;
  body: string;
  image: string[];
  tag?: string[];
  scheduleAt?: string;
}

interface CommentOptions extends SessionKeyOptions {
  post: string;
  token: string;
  content: string;
}

interface ReplyOptions extends CommentOptions {
  comment: string;
}

function parseScheduleAt(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    throw new ValidationError(`--schedule-at is not a valid date: "${value}"`, "CLI_ARGUMENT_INVALID");
  }
  return date;
}

export const commands = (program: Command) => {
  program
    .command("write:publish")
    .description("Publish an image note")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .requiredOption("--body <text>", "Post body")
    .requiredOption("--image <paths...>", "Image files (space-separated)")
    .option("--title <text>", "Post title", "")
    .option("--tag <tags...>", "Topic tags (space-separated)")
    .option("--schedule-at <datetime>", "Publish later, ISO 8601 local time")
    .option("--identity <name>", "Session identity", "default")
    .action(async (options: PublishOptions) => {
      await runAction(async ({ adapters }) => {
        const result = await adapters.get(sessionKeyFrom(options)).publish({
          title: options.title,
          body: options.body,
          mediaPaths: options.image,
          tags: options.tag ?? [],
          scheduleAt: parseScheduleAt(options.scheduleAt),
        });
        printJson(result);
      });
    });

  program
    .command("write:comment")
    .description("Comment on a post")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .requiredOption("--post <postId>", "Post id")
    .requiredOption("--content <text>", "Comment text")
    .option("--token <xsecToken>", "Access token of the post", "")
    .option("--identity <name>", "Session identity", "default")
    .action(async (options: CommentOptions) => {
      await runAction(async ({ adapters }) => {
        const result = await adapters.get(sessionKeyFrom(options)).comment({
          postId: options.post,
          xsecToken: options.token,
          content: options.content,
        });
        printJson(result);
      });
    });

  program
    .command("write:reply")
    .description("Reply to a comment")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .requiredOption("--post <postId>", "Post id")
    .requiredOption("--comment <commentId>", "Comment id to reply to")
    .requiredOption("--content <text>", "Reply text")
    .option("--token <xsecToken>", "Access token of the post", "")
    .option("--identity <name>", "Session identity", "default")
    .action(async (options: ReplyOptions) => {
      await runAction(async ({ adapters }) => {
        const result = await adapters.get(sessionKeyFrom(options)).reply({
          postId: options.post,
          xsecToken: options.token,
          commentId: options.comment,
          content: options.content,
        });
        printJson(result);
      });
    });
};

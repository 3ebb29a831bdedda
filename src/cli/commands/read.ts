import type { Command } from "commander";
import { runAction, printJson, sessionKeyFrom, parsePositiveInt, type SessionKeyOptions } from "../shared";

interface LimitOptions extends SessionKeyOptions {
  limit: string;
}

interface SearchOptions extends LimitOptions {
  keyword: string;
}

interface DetailOptions extends SessionKeyOptions {
  id: string;
  token: string;
  allComments?: boolean;
  maxComments: string;
}

interface ProfileOptions extends SessionKeyOptions {
  user?: string;
  token: string;
}

export const commands = (program: Command) => {
  program
    .command("read:feeds")
    .description("Read the recommended feed")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .option("--identity <name>", "Session identity", "default")
    .option("--limit <n>", "Maximum items", "20")
    .action(async (options: LimitOptions) => {
      await runAction(async ({ adapters }) => {
        const limit = parsePositiveInt(options.limit, "--limit");
        printJson(await adapters.get(sessionKeyFrom(options)).getFeeds(limit));
      });
    });

  program
    .command("read:search")
    .description("Search posts by keyword")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .requiredOption("--keyword <keyword>", "Search keyword")
    .option("--identity <name>", "Session identity", "default")
    .option("--limit <n>", "Maximum items", "20")
    .action(async (options: SearchOptions) => {
      await runAction(async ({ adapters }) => {
        const limit = parsePositiveInt(options.limit, "--limit");
        printJson(await adapters.get(sessionKeyFrom(options)).search(options.keyword, limit));
      });
    });

  program
    .command("read:detail")
    .description("Read a post with its comments")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .requiredOption("--id <postId>", "Post id")
    .option("--token <xsecToken>", "Access token from the feed or search item", "")
    .option("--identity <name>", "Session identity", "default")
    .option("--all-comments", "Scroll to load more comments")
    .option("--max-comments <n>", "Stop scrolling once this many comments are loaded", "100")
    .action(async (options: DetailOptions) => {
      await runAction(async ({ adapters }) => {
        const maxComments = parsePositiveInt(options.maxComments, "--max-comments");
        const detail = await adapters.get(sessionKeyFrom(options)).getPostDetail(options.id, options.token, {
          loadAllComments: options.allComments === true,
          maxComments,
        });
        printJson(detail);
      });
    });

  program
    .command("read:profile")
    .description("Read a user profile, or your own when --user is omitted")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .option("--user <userId>", "User id")
    .option("--token <xsecToken>", "Access token from a post by the user", "")
    .option("--identity <name>", "Session identity", "default")
    .action(async (options: ProfileOptions) => {
      await runAction(async ({ adapters }) => {
        const adapter = adapters.get(sessionKeyFrom(options));
        const profile = options.user ? await adapter.getUserProfile(options.user, options.token) : await adapter.getMyProfile();
        printJson(profile);
      });
    });

  program
    .command("read:mentions")
    .description("Read comment and @ mentions from notifications")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .option("--identity <name>", "Session identity", "default")
    .option("--limit <n>", "Maximum items", "20")
    .action(async (options: LimitOptions) => {
      await runAction(async ({ adapters }) => {
        const limit = parsePositiveInt(options.limit, "--limit");
        printJson(await adapters.get(sessionKeyFrom(options)).getMentions(limit));
      });
    });
};

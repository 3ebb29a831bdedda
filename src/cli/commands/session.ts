import type { Command } from "commander";
import { readFile, writeFile } from "fs/promises";
import { logger } from "../../core/logger";
import { env } from "../../core/config";
import { createSessionBlob, decodeSessionBlob } from "../../services/session-blob";
import { runAction, printJson, sessionKeyFrom, parsePositiveInt, type SessionKeyOptions } from "../shared";

interface LoginCommandOptions extends SessionKeyOptions {
  timeout: string;
}

interface CheckCommandOptions extends SessionKeyOptions {
  record?: boolean;
}

interface ExportCommandOptions extends SessionKeyOptions {
  out?: string;
  ttl: string;
}

interface ImportCommandOptions extends SessionKeyOptions {
  blob?: string;
  file?: string;
}

export const commands = (program: Command) => {
  program
    .command("session:login")
    .description("Open a visible browser and wait for the QR code login to complete")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .option("--identity <name>", "Session identity", "default")
    .option("--timeout <seconds>", "How long to wait for the scan", String(env.LOGIN_TIMEOUT_SECONDS))
    .action(async (options: LoginCommandOptions) => {
      await runAction(
        async ({ adapters }) => {
          const key = sessionKeyFrom(options);
          const humanTimeoutMs = parsePositiveInt(options.timeout, "--timeout") * 1000;
          logger.info({ platform: key.platform, identity: key.identity }, "Starting headful login");
          const result = await adapters.get(key).login({
            humanTimeoutMs,
            onQrCode: (src) => logger.info({ qrCodeLength: src.length }, "QR code shown in the browser window, scan it with the app"),
          });
          printJson({ ...result, qrCode: result.qrCode ? "(shown in browser)" : null });
        },
        { headless: false }
      );
    });

  program
    .command("session:check")
    .description("Probe whether the stored session is still logged in")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .option("--identity <name>", "Session identity", "default")
    .option("--record", "Store the validation time when the session is valid")
    .action(async (options: CheckCommandOptions) => {
      await runAction(async ({ adapters, store }) => {
        const key = sessionKeyFrom(options);
        const state = await adapters.get(key).checkLogin();
        if (state.isValid && options.record) {
          await store.touchValidated(key, state.checkedAt);
        }
        if (!state.isValid) {
          logger.warn({ platform: key.platform, identity: key.identity, error: state.error }, "Session is invalid");
          process.exitCode = 2;
        }
        printJson(state);
      });
    });

  program
    .command("session:list")
    .description("List stored sessions")
    .action(async () => {
      await runAction(async ({ store }) => {
        printJson(await store.list());
      });
    });

  program
    .command("session:clear")
    .description("Delete the stored session so the next login starts fresh")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .option("--identity <name>", "Session identity", "default")
    .action(async (options: SessionKeyOptions) => {
      await runAction(async ({ store }) => {
        const key = sessionKeyFrom(options);
        const removed = await store.clear(key);
        printJson({ removed });
      });
    });

  program
    .command("session:export")
    .description("Export the stored session as a signed blob for another host")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .option("--identity <name>", "Session identity", "default")
    .option("--out <file>", "Write the blob to a file instead of stdout")
    .option("--ttl <seconds>", "Blob lifetime", String(env.SESSION_BLOB_TTL_SECONDS))
    .action(async (options: ExportCommandOptions) => {
      await runAction(async ({ store }) => {
        const key = sessionKeyFrom(options);
        const ttlSeconds = parsePositiveInt(options.ttl, "--ttl");
        const state = await store.load(key);
        if (!state) {
          logger.error({ platform: key.platform, identity: key.identity }, "No stored session to export");
          process.exitCode = 1;
          return;
        }

        const blob = createSessionBlob(state.storage, { ttlSeconds });
        if (options.out) {
          await writeFile(options.out, `${blob}\n`, "utf-8");
          logger.info({ file: options.out, cookieCount: state.storage.cookies.length }, "Session blob written");
        } else {
          process.stdout.write(`${blob}\n`);
        }
      });
    });

  program
    .command("session:import")
    .description("Import a signed session blob produced by session:export")
    .requiredOption("--platform <platform>", "Platform (xiaohongshu)")
    .option("--identity <name>", "Session identity", "default")
    .option("--blob <blob>", "The blob text")
    .option("--file <file>", "Read the blob from a file")
    .action(async (options: ImportCommandOptions) => {
      await runAction(async ({ store }) => {
        const key = sessionKeyFrom(options);
        const blob = (options.blob ?? (options.file ? await readFile(options.file, "utf-8") : "")).trim();
        if (!blob) {
          logger.error("Pass --blob or --file");
          process.exitCode = 1;
          return;
        }

        const decoded = decodeSessionBlob(blob);
        await store.save(key, { ...key, storage: decoded.state, lastValidatedAt: null });
        logger.info(
          { platform: key.platform, identity: key.identity, issuedAt: decoded.iat, expiresAt: decoded.exp },
          "Session blob imported"
        );
        printJson({ imported: true, cookieCount: decoded.state.cookies.length, issuedAt: decoded.iat, expiresAt: decoded.exp });
      });
    });
};

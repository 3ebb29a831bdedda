import { chromium } from "playwright";
import { mkdir } from "fs/promises";
import { join } from "path";
import { logger } from "../core/logger";
import { env } from "../core/config";
import { sessionKeyToString, type SessionKey } from "../domain/models";
import { PlaywrightPageDriver, type PageDriver } from "./page-driver";

export const PERSISTENT_SESSIONS_DIR = join(process.cwd(), "data", "sessions", "profiles");

export function getPersistentProfileDir(key: SessionKey, baseDir = PERSISTENT_SESSIONS_DIR): string {
  const safeIdentity = key.identity.replace(/[^A-Za-z0-9_-]/g, "_");
  return join(baseDir, `${key.platform}-${safeIdentity}`);
}

/**
 * Produces a fresh page driver for a session key. The manager owns what it
 * returns and closes it on stop.
 */
export interface BrowserLauncher {
  launch(key: SessionKey): Promise<PageDriver>;
}

export interface ChromiumLauncherOptions {
  headless?: boolean;
  slowMo?: number;
  locale?: string;
  profilesDir?: string;
}

export class ChromiumLauncher implements BrowserLauncher {
  constructor(private readonly options: ChromiumLauncherOptions = {}) {}

  async launch(key: SessionKey): Promise<PageDriver> {
    const profileDir = getPersistentProfileDir(key, this.options.profilesDir);
    await mkdir(profileDir, { recursive: true });

    const context = await chromium.launchPersistentContext(profileDir, {
      headless: this.options.headless ?? env.PLAYWRIGHT_HEADLESS,
      slowMo: this.options.slowMo ?? env.PLAYWRIGHT_SLOW_MO,
      viewport: { width: 1280, height: 800 },
      locale: this.options.locale ?? "zh-CN",
      args: [
        "--disable-blink-features=AutomationControlled",
        "--disable-features=IsolateOrigins,site-per-process",
        "--disable-site-isolation-trials",
      ],
    });

    const page = context.pages()[0] ?? (await context.newPage());
    logger.info({ session: sessionKeyToString(key), profileDir }, "Launched persistent browser context");
    return new PlaywrightPageDriver(context, page);
  }
}

export interface BlockCheck {
  isBlocked: boolean;
  reason: string | null;
}

export function detectBlockChallenge(url: string, patterns: readonly RegExp[]): BlockCheck {
  for (const pattern of patterns) {
    const match = url.match(pattern);
    if (match) {
      return { isBlocked: true, reason: `BLOCK_DETECTED:url_pattern:${match[0]}` };
    }
  }
  return { isBlocked: false, reason: null };
}

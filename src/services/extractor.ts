import { logger } from "../core/logger";
import { env } from "../core/config";
import { sleep, throwIfAborted } from "../core/retry";
import {
  AuthenticationRequiredError,
  ExtractionFailedError,
  ExtractionTimeoutError,
  NotFoundError,
} from "../core/errors";
import { detectBlockChallenge } from "./browser-session";
import type { DomScript, PageDriver, ScriptArgs } from "./page-driver";

export interface InaccessibleCheck {
  script: DomScript;
  args?: ScriptArgs;
  /** Turns the script's raw output into a reason, or null when the page is fine. */
  parse(raw: unknown): string | null;
}

export interface ScrollPlan {
  itemSelector: string;
  endMarker: string;
  targetCount: number;
  stepPx: number;
  maxAttempts: number;
}

/**
 * One read, described as data: where to go, what signals readiness, and how
 * to turn embedded state or the rendered DOM into an entity.
 */
export interface ReadPlan<T> {
  name: string;
  url: string;
  readyMarker: string;
  statePath: string;
  /** Null means the state is absent, malformed or incomplete. */
  fromState(raw: unknown): T | null;
  domScript: DomScript;
  domArgs?: ScriptArgs;
  fromDom(raw: unknown): T | null;
  inaccessible?: InaccessibleCheck;
  /** Raise NotFound instead of ExtractionFailed when neither source has the entity. */
  missingIsNotFound?: boolean;
  scroll?: ScrollPlan;
}

export interface ExtractorOptions {
  timeoutMs?: number;
  pollMs?: number;
  navigationTimeoutMs?: number;
  blockedUrlPatterns?: readonly RegExp[];
}

function sameLocation(current: string, target: string): boolean {
  try {
    const a = new URL(current);
    const b = new URL(target);
    if (a.origin !== b.origin || a.pathname.replace(/\/$/, "") !== b.pathname.replace(/\/$/, "")) return false;
    for (const [name, value] of b.searchParams) {
      if (a.searchParams.get(name) !== value) return false;
    }
    return true;
  } catch {
    return current === target;
  }
}

export class Extractor {
  private readonly timeoutMs: number;
  private readonly pollMs: number;
  private readonly navigationTimeoutMs: number;
  private readonly blockedUrlPatterns: readonly RegExp[];

  constructor(options: ExtractorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? env.EXTRACTION_TIMEOUT_MS;
    this.pollMs = options.pollMs ?? env.EXTRACTION_POLL_MS;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? env.STEP_TIMEOUT_MS;
    this.blockedUrlPatterns = options.blockedUrlPatterns ?? [];
  }

  async extract<T>(page: PageDriver, plan: ReadPlan<T>, signal?: AbortSignal): Promise<T> {
    throwIfAborted(signal, plan.name);

    if (!sameLocation(page.url(), plan.url)) {
      logger.debug({ read: plan.name, url: plan.url }, "Navigating for extraction");
      await page.goto(plan.url, this.navigationTimeoutMs);
    }

    const block = detectBlockChallenge(page.url(), this.blockedUrlPatterns);
    if (block.isBlocked) {
      throw new AuthenticationRequiredError(`${plan.name}: platform challenge page reached`, block.reason ?? "BLOCK_DETECTED");
    }

    await this.waitUntilReady(page, plan, signal);

    if (plan.inaccessible) {
      const reason = plan.inaccessible.parse(await page.run(plan.inaccessible.script, plan.inaccessible.args));
      if (reason) {
        throw new NotFoundError(`${plan.name}: ${reason}`, "RESOURCE_INACCESSIBLE");
      }
    }

    if (plan.scroll) {
      await this.scrollForMore(page, plan.scroll, signal);
    }

    const result = (await this.fromState(page, plan)) ?? (await this.fromDom(page, plan));
    if (result === null) {
      if (plan.missingIsNotFound) {
        throw new NotFoundError(`${plan.name}: resource not present in page state or DOM`, "RESOURCE_MISSING");
      }
      throw new ExtractionFailedError(`${plan.name}: neither embedded state nor DOM produced a usable result`, "EXTRACTION_UNUSABLE");
    }

    return structuredClone(result);
  }

  private async waitUntilReady<T>(page: PageDriver, plan: ReadPlan<T>, signal?: AbortSignal): Promise<void> {
    const deadline = Date.now() + this.timeoutMs;

    for (;;) {
      throwIfAborted(signal, plan.name);
      if ((await page.count(plan.readyMarker)) > 0) return;
      if ((await page.readState(plan.statePath)) !== null) return;
      if (plan.inaccessible) {
        const reason = plan.inaccessible.parse(await page.run(plan.inaccessible.script, plan.inaccessible.args));
        if (reason) return;
      }

      if (Date.now() >= deadline) {
        throw new ExtractionTimeoutError(
          `${plan.name}: neither ${plan.readyMarker} nor state ${plan.statePath} appeared within ${this.timeoutMs}ms`,
          "EXTRACTION_TIMEOUT"
        );
      }
      await sleep(this.pollMs, signal);
    }
  }

  private async scrollForMore(page: PageDriver, scroll: ScrollPlan, signal?: AbortSignal): Promise<void> {
    for (let attempt = 0; attempt < scroll.maxAttempts; attempt++) {
      throwIfAborted(signal, "scroll");
      if ((await page.count(scroll.endMarker)) > 0) return;
      if ((await page.count(scroll.itemSelector)) >= scroll.targetCount) return;
      await page.scrollBy(scroll.stepPx);
      await sleep(this.pollMs, signal);
    }
    logger.debug({ attempts: scroll.maxAttempts }, "Stopped scrolling before reaching the end marker");
  }

  private async fromState<T>(page: PageDriver, plan: ReadPlan<T>): Promise<T | null> {
    const raw = await page.readState(plan.statePath);
    if (raw === null) return null;

    const parsed = plan.fromState(raw);
    if (parsed === null) {
      logger.debug({ read: plan.name, path: plan.statePath }, "Embedded state unusable, falling back to DOM");
    }
    return parsed;
  }

  private async fromDom<T>(page: PageDriver, plan: ReadPlan<T>): Promise<T | null> {
    const raw = await page.run(plan.domScript, plan.domArgs);
    const parsed = plan.fromDom(raw);
    if (parsed === null) {
      logger.warn({ read: plan.name, script: plan.domScript.name }, "DOM fallback produced no usable result");
    }
    return parsed;
  }
}

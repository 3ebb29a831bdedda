/// <reference lib="dom" />
import type { BrowserContext, Page } from "playwright";
import { logger } from "../core/logger";
import { StorageStateSchema, type StorageState } from "../domain/models";

export type ScriptArgs = Record<string, string | number | boolean>;

/**
 * A function evaluated inside the page. It is shipped by source text, so it
 * must not close over anything from the Node side; pass inputs via `args`.
 */
export interface DomScript {
  readonly name: string;
  readonly fn: (args: ScriptArgs) => unknown;
}

/**
 * What the engine needs from a rendering engine. Everything crossing this
 * boundary is plain data; no handle into the page ever escapes.
 */
export interface PageDriver {
  url(): string;
  goto(url: string, timeoutMs: number): Promise<void>;
  count(selector: string): Promise<number>;
  isVisible(selector: string): Promise<boolean>;
  texts(selector: string): Promise<string[]>;
  getAttribute(selector: string, name: string): Promise<string | null>;
  click(selector: string, timeoutMs: number): Promise<void>;
  fill(selector: string, text: string, timeoutMs: number): Promise<void>;
  type(text: string, delayMs: number): Promise<void>;
  press(key: string): Promise<void>;
  setInputFiles(selector: string, files: readonly string[], timeoutMs: number): Promise<void>;
  removeElements(selector: string): Promise<number>;
  scrollBy(px: number): Promise<void>;
  /** Reads a dotted path under the page's embedded initial state; null when absent. */
  readState(path: string): Promise<unknown>;
  run(script: DomScript, args?: ScriptArgs): Promise<unknown>;
  storageState(): Promise<StorageState>;
  applyState(state: StorageState): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

// Serialized inside the page: walks window.__INITIAL_STATE__ unwrapping
// reactive refs, and returns JSON so that nothing live crosses over.
function readInitialState(path: string): string | null {
  const unwrap = (value: unknown): unknown => {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      if ("__v_isRef" in value || "_value" in value) {
        const ref = Reflect.get(value, "value");
        return ref !== undefined ? ref : Reflect.get(value, "_value");
      }
    }
    return value;
  };

  let current: unknown = unwrap(Reflect.get(window, "__INITIAL_STATE__"));
  for (const segment of path.split(".").filter((s) => s.length > 0)) {
    if (!current || typeof current !== "object") return null;
    current = unwrap(Reflect.get(current, segment));
  }
  if (current === undefined || current === null) return null;

  const seen = new WeakSet<object>();
  return JSON.stringify(current, (_key, value: unknown) => {
    const unwrapped = unwrap(value);
    if (unwrapped && typeof unwrapped === "object") {
      if (seen.has(unwrapped)) return undefined;
      seen.add(unwrapped);
    }
    return unwrapped;
  });
}

export class PlaywrightPageDriver implements PageDriver {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {}

  url(): string {
    return this.page.url();
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
  }

  async count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async texts(selector: string): Promise<string[]> {
    return this.page.locator(selector).allInnerTexts();
  }

  async getAttribute(selector: string, name: string): Promise<string | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) return null;
    return locator.getAttribute(name);
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: timeoutMs });
  }

  async fill(selector: string, text: string, timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().fill(text, { timeout: timeoutMs });
  }

  async type(text: string, delayMs: number): Promise<void> {
    await this.page.keyboard.type(text, { delay: delayMs });
  }

  async press(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async setInputFiles(selector: string, files: readonly string[], timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().setInputFiles([...files], { timeout: timeoutMs });
  }

  async removeElements(selector: string): Promise<number> {
    return this.page.locator(selector).evaluateAll((nodes) => {
      for (const node of nodes) node.remove();
      return nodes.length;
    });
  }

  async scrollBy(px: number): Promise<void> {
    await this.page.mouse.wheel(0, px);
  }

  async readState(path: string): Promise<unknown> {
    const json = await this.page.evaluate(readInitialState, path);
    if (json === null) return null;
    const parsed: unknown = JSON.parse(json);
    return parsed;
  }

  async run(script: DomScript, args: ScriptArgs = {}): Promise<unknown> {
    const result: unknown = await this.page.evaluate(script.fn, args);
    return result;
  }

  async storageState(): Promise<StorageState> {
    return StorageStateSchema.parse(await this.context.storageState());
  }

  async applyState(state: StorageState): Promise<void> {
    await hydrateContextFromStorageState(this.context, state);
  }

  async ping(): Promise<boolean> {
    if (this.page.isClosed()) return false;
    return this.page
      .evaluate(() => document.readyState)
      .then(() => true)
      .catch(() => false);
  }

  async close(): Promise<void> {
    await closeContextSafely(this.context);
  }
}

async function hydrateContextFromStorageState(context: BrowserContext, storageState: StorageState): Promise<void> {
  if (storageState.cookies.length > 0) {
    await context.addCookies(storageState.cookies);
  }

  for (const originState of storageState.origins) {
    if (originState.localStorage.length === 0) continue;

    const page = await context.newPage();
    try {
      await page.goto(originState.origin, { waitUntil: "domcontentloaded", timeout: 12000 });
      await page.evaluate((entries) => {
        for (const entry of entries) {
          window.localStorage.setItem(entry.name, entry.value);
        }
      }, originState.localStorage);
    } catch (error) {
      logger.warn({ origin: originState.origin, error }, "Failed to restore localStorage for origin");
    } finally {
      await page.close();
    }
  }
}

async function closeContextSafely(context: BrowserContext | null): Promise<void> {
  if (!context) return;

  try {
    for (const page of context.pages()) {
      await page.close();
    }
    await context.close();
  } catch (error) {
    logger.debug({ error }, "Error closing browser context (non-fatal)");
  }
}

import { randomUUID } from "node:crypto";
import { logger } from "../core/logger";
import { SessionLock } from "../core/session-lock";
import { SessionUnavailableError } from "../core/errors";
import { createOperationScope, retryWithBackoff, throwIfAborted } from "../core/retry";
import { sessionKeyToString, type SessionKey, type SessionState, type StorageState } from "../domain/models";
import type { BrowserLauncher } from "./browser-session";
import type { DomScript, PageDriver, ScriptArgs } from "./page-driver";
import type { SessionStore } from "./session-store";

export interface StepRecord {
  step: number;
  operationId: string;
  operation: string;
  action: string;
}

export interface SessionContext {
  readonly key: SessionKey;
  readonly operationId: string;
  readonly operation: string;
  readonly page: PageDriver;
  readonly signal: AbortSignal;
  currentState(): Promise<SessionState>;
}

export interface WithSessionOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface SessionManagerOptions {
  key: SessionKey;
  store: SessionStore;
  launcher: BrowserLauncher;
  maxLaunchAttempts?: number;
  launchRetryDelayMs?: number;
  traceLimit?: number;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Page driver handed to one operation. Every call is stamped on the session's
 * step counter; once the operation releases the session the handle is dead.
 */
class TracingPageDriver implements PageDriver {
  private revoked = false;

  constructor(
    private readonly inner: PageDriver,
    private readonly record: (action: string) => void,
  ) {}

  revoke(): void {
    this.revoked = true;
  }

  private track(action: string): void {
    if (this.revoked) {
      throw new SessionUnavailableError("Page handle used after the session was released", "SESSION_RELEASED");
    }
    this.record(action);
  }

  url(): string {
    this.track("url");
    return this.inner.url();
  }

  goto(url: string, timeoutMs: number): Promise<void> {
    this.track(`goto ${url}`);
    return this.inner.goto(url, timeoutMs);
  }

  count(selector: string): Promise<number> {
    this.track(`count ${selector}`);
    return this.inner.count(selector);
  }

  isVisible(selector: string): Promise<boolean> {
    this.track(`isVisible ${selector}`);
    return this.inner.isVisible(selector);
  }

  texts(selector: string): Promise<string[]> {
    this.track(`texts ${selector}`);
    return this.inner.texts(selector);
  }

  getAttribute(selector: string, name: string): Promise<string | null> {
    this.track(`getAttribute ${selector}@${name}`);
    return this.inner.getAttribute(selector, name);
  }

  click(selector: string, timeoutMs: number): Promise<void> {
    this.track(`click ${selector}`);
    return this.inner.click(selector, timeoutMs);
  }

  fill(selector: string, text: string, timeoutMs: number): Promise<void> {
    this.track(`fill ${selector}`);
    return this.inner.fill(selector, text, timeoutMs);
  }

  type(text: string, delayMs: number): Promise<void> {
    this.track("type");
    return this.inner.type(text, delayMs);
  }

  press(key: string): Promise<void> {
    this.track(`press ${key}`);
    return this.inner.press(key);
  }

  setInputFiles(selector: string, files: readonly string[], timeoutMs: number): Promise<void> {
    this.track(`setInputFiles ${selector}`);
    return this.inner.setInputFiles(selector, files, timeoutMs);
  }

  removeElements(selector: string): Promise<number> {
    this.track(`removeElements ${selector}`);
    return this.inner.removeElements(selector);
  }

  scrollBy(px: number): Promise<void> {
    this.track(`scrollBy ${px}`);
    return this.inner.scrollBy(px);
  }

  readState(path: string): Promise<unknown> {
    this.track(`readState ${path}`);
    return this.inner.readState(path);
  }

  run(script: DomScript, args?: ScriptArgs): Promise<unknown> {
    this.track(`run ${script.name}`);
    return this.inner.run(script, args);
  }

  storageState(): Promise<StorageState> {
    this.track("storageState");
    return this.inner.storageState();
  }

  applyState(state: StorageState): Promise<void> {
    this.track("applyState");
    return this.inner.applyState(state);
  }

  ping(): Promise<boolean> {
    this.track("ping");
    return this.inner.ping();
  }

  close(): Promise<void> {
    throw new SessionUnavailableError("Operations cannot close the shared session", "SESSION_CLOSE_FORBIDDEN");
  }
}

/**
 * Owns the one browser session of a platform identity. All access goes
 * through `withSession`, which serializes callers in arrival order.
 */
export class BrowserSessionManager {
  readonly key: SessionKey;
  private readonly store: SessionStore;
  private readonly launcher: BrowserLauncher;
  private readonly maxLaunchAttempts: number;
  private readonly launchRetryDelayMs: number;
  private readonly traceLimit: number;
  private readonly lock: SessionLock;
  private driver: PageDriver | null = null;
  private stepCounter = 0;
  private trace: StepRecord[] = [];

  constructor(options: SessionManagerOptions) {
    this.key = { platform: options.key.platform, identity: options.key.identity };
    this.store = options.store;
    this.launcher = options.launcher;
    this.maxLaunchAttempts = options.maxLaunchAttempts ?? 2;
    this.launchRetryDelayMs = options.launchRetryDelayMs ?? 1000;
    this.traceLimit = options.traceLimit ?? 5000;
    this.lock = new SessionLock(sessionKeyToString(this.key));
  }

  get name(): string {
    return sessionKeyToString(this.key);
  }

  isStarted(): boolean {
    return this.driver !== null;
  }

  getStepCount(): number {
    return this.stepCounter;
  }

  getStepTrace(): readonly StepRecord[] {
    return this.trace.map((r) => ({ ...r }));
  }

  getQueueLength(): number {
    return this.lock.getQueueLength();
  }

  /** Launches the browser once any running operation has released the session. */
  async start(): Promise<void> {
    await this.exclusive("start", () => this.launch());
  }

  async applyState(state: SessionState): Promise<void> {
    await this.exclusive("applyState", () => this.requireDriver().applyState(state.storage));
  }

  async currentState(): Promise<SessionState> {
    return this.exclusive("currentState", () => this.readState(this.requireDriver()));
  }

  async isAlive(): Promise<boolean> {
    if (!this.driver) return false;
    return this.driver.ping();
  }

  async withSession<T>(operation: string, fn: (ctx: SessionContext) => Promise<T>, options: WithSessionOptions = {}): Promise<T> {
    const operationId = randomUUID();
    const scope = createOperationScope(options.signal, options.timeoutMs, operation);

    try {
      const release = await this.lock.acquire(operationId, operation, scope.signal);
      let handle: TracingPageDriver | null = null;
      const startedAt = Date.now();

      try {
        throwIfAborted(scope.signal, operation);
        await this.ensureRunning();

        const driver = this.requireDriver();
        handle = new TracingPageDriver(driver, (action) => this.recordStep(operationId, operation, action));
        const page = handle;

        logger.info({ session: this.name, operation, operationId }, "Operation started");
        const result = await fn({
          key: { ...this.key },
          operationId,
          operation,
          page,
          signal: scope.signal,
          currentState: () => this.readState(page),
        });
        logger.info({ session: this.name, operation, operationId, durationMs: Date.now() - startedAt }, "Operation finished");
        return result;
      } finally {
        handle?.revoke();
        release();
      }
    } finally {
      scope.dispose();
    }
  }

  async stop(): Promise<void> {
    const driver = this.driver;
    this.driver = null;
    if (!driver) return;
    await driver.close();
    logger.info({ session: this.name }, "Browser session stopped");
  }

  private async exclusive<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.lock.acquire(randomUUID(), operation);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Launches the browser and applies the stored session before anything
   * navigates. One retry; a second consecutive failure is surfaced. Callers
   * hold the lock.
   */
  private async launch(): Promise<void> {
    if (this.driver) return;

    const stored = await this.store.load(this.key);
    try {
      this.driver = await retryWithBackoff(
        async (attempt) => {
          logger.info({ session: this.name, attempt }, "Starting browser session");
          const driver = await this.launcher.launch(this.key);
          if (stored) {
            try {
              await driver.applyState(stored.storage);
            } catch (error) {
              await driver.close();
              throw error;
            }
          }
          return driver;
        },
        { maxAttempts: this.maxLaunchAttempts, baseDelayMs: this.launchRetryDelayMs, maxDelayMs: this.launchRetryDelayMs, jitterMs: 0 },
        `start:${this.name}`
      );
    } catch (error) {
      logger.warn({ session: this.name, error: describe(error) }, "Browser session could not be started");
      throw new SessionUnavailableError(`Browser session ${this.name} could not be started: ${describe(error)}`, "SESSION_LAUNCH_FAILED");
    }

    logger.info({ session: this.name, restored: stored !== null }, "Browser session started");
  }

  private async ensureRunning(): Promise<void> {
    if (this.driver && (await this.driver.ping())) return;

    if (this.driver) {
      logger.warn({ session: this.name }, "Browser session is unresponsive, restarting");
      await this.stop();
    }
    await this.launch();
  }

  private async readState(page: PageDriver): Promise<SessionState> {
    const storage = await page.storageState();
    return {
      platform: this.key.platform,
      identity: this.key.identity,
      storage,
      lastValidatedAt: null,
    };
  }

  private requireDriver(): PageDriver {
    if (!this.driver) {
      throw new SessionUnavailableError(`Browser session ${this.name} is not started`, "SESSION_NOT_STARTED");
    }
    return this.driver;
  }

  private recordStep(operationId: string, operation: string, action: string): void {
    this.stepCounter += 1;
    this.trace.push({ step: this.stepCounter, operationId, operation, action });
    if (this.trace.length > this.traceLimit) {
      this.trace.splice(0, this.trace.length - this.traceLimit);
    }
  }
}

export interface SessionRegistryOptions {
  store: SessionStore;
  launcher: BrowserLauncher;
  maxLaunchAttempts?: number;
  launchRetryDelayMs?: number;
}

/**
 * One manager per platform identity. Different identities never share a
 * lock, so they run concurrently.
 */
export class SessionRegistry {
  private managers = new Map<string, BrowserSessionManager>();

  constructor(private readonly options: SessionRegistryOptions) {}

  get(key: SessionKey): BrowserSessionManager {
    const id = sessionKeyToString(key);
    let manager = this.managers.get(id);
    if (!manager) {
      manager = new BrowserSessionManager({ ...this.options, key });
      this.managers.set(id, manager);
    }
    return manager;
  }

  list(): BrowserSessionManager[] {
    return [...this.managers.values()];
  }

  async shutdown(): Promise<void> {
    const managers = [...this.managers.values()];
    this.managers.clear();
    const results = await Promise.allSettled(managers.map((m) => m.stop()));
    for (const result of results) {
      if (result.status === "rejected") {
        logger.warn({ error: describe(result.reason) }, "Failed to stop browser session");
      }
    }
  }
}

import { OperationCancelledError } from "./errors";
import { logger } from "./logger";

export interface LockHolder {
  operationId: string;
  operation: string;
  acquiredAt: number;
}

interface QueueEntry {
  holder: Omit<LockHolder, "acquiredAt">;
  resolve: (release: () => void) => void;
  reject: (error: unknown) => void;
  cleanup: () => void;
}

/**
 * FIFO mutex guarding one browser session. Waiters are served strictly in
 * arrival order; a waiter whose signal aborts leaves the queue without ever
 * touching the page.
 */
export class SessionLock {
  private current: LockHolder | null = null;
  private queue: QueueEntry[] = [];

  constructor(private readonly name: string) {}

  isLocked(): boolean {
    return this.current !== null;
  }

  getHolder(): LockHolder | null {
    return this.current ? { ...this.current } : null;
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  acquire(operationId: string, operation: string, signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new OperationCancelledError(`${operation} was cancelled before it started`, "CANCELLED_QUEUED"));
    }

    if (!this.current && this.queue.length === 0) {
      return Promise.resolve(this.grant({ operationId, operation }));
    }

    return new Promise((resolve, reject) => {
      const entry: QueueEntry = {
        holder: { operationId, operation },
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener("abort", onAbort),
      };

      const onAbort = () => {
        this.queue = this.queue.filter((e) => e !== entry);
        logger.debug({ lock: this.name, operationId, operation }, "Queued operation cancelled");
        reject(new OperationCancelledError(`${operation} was cancelled while queued`, "CANCELLED_QUEUED"));
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(entry);
      logger.debug(
        { lock: this.name, operationId, operation, queueLength: this.queue.length },
        "Operation queued for session"
      );
    });
  }

  private grant(holder: Omit<LockHolder, "acquiredAt">): () => void {
    this.current = { ...holder, acquiredAt: Date.now() };
    let released = false;

    return () => {
      if (released) return;
      released = true;
      this.current = null;
      this.processQueue();
    };
  }

  private processQueue(): void {
    if (this.current) return;
    const next = this.queue.shift();
    if (!next) return;

    next.cleanup();
    next.resolve(this.grant(next.holder));
  }
}

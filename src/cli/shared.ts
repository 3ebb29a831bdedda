import { logger } from "../core/logger";
import { EngineError, toErrorPayload, ValidationError } from "../core/errors";
import { DEFAULT_IDENTITY, type SessionKey } from "../domain/models";
import { parsePlatform } from "../platforms/registry";
import { createRuntime, type Runtime, type RuntimeOptions } from "../runtime";

export interface SessionKeyOptions {
  platform: string;
  identity?: string;
}

export function sessionKeyFrom(options: SessionKeyOptions): SessionKey {
  return { platform: parsePlatform(options.platform), identity: options.identity ?? DEFAULT_IDENTITY };
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new ValidationError(`${name} must be a positive integer, got "${value}"`, "CLI_ARGUMENT_INVALID");
  }
  return parsed;
}

export function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Runs one CLI action against a fresh runtime, prints failures as the
 * structured error payload and sets the exit code.
 */
export async function runAction(fn: (runtime: Runtime) => Promise<void>, options: RuntimeOptions = {}): Promise<void> {
  let runtime: Runtime | null = null;
  try {
    runtime = createRuntime(options);
    await fn(runtime);
  } catch (error) {
    const payload = toErrorPayload(error);
    if (error instanceof EngineError) {
      logger.warn({ kind: payload.kind, code: payload.code }, payload.message);
    } else {
      logger.error({ err: error }, "Command failed");
    }
    printJson({ error: payload });
    process.exitCode = 1;
  } finally {
    await runtime?.shutdown();
  }
}

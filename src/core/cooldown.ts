import { env } from "./config";
import { ConfigError } from "./errors";
import { sleep } from "./retry";

export interface PacingRange {
  minMs: number;
  maxMs: number;
}

export type RandomSource = () => number;

export function defaultPacing(): PacingRange {
  return { minMs: env.ACTION_DELAY_MIN_MS, maxMs: env.ACTION_DELAY_MAX_MS };
}

export function assertPacingRange(range: PacingRange): void {
  if (range.minMs < 0 || range.maxMs < range.minMs) {
    throw new ConfigError(`Invalid pacing range: ${range.minMs}-${range.maxMs}ms`);
  }
}

export function pickDelay(range: PacingRange, random: RandomSource = Math.random): number {
  return Math.round(range.minMs + random() * (range.maxMs - range.minMs));
}

export async function actionDelay(
  range: PacingRange = defaultPacing(),
  signal?: AbortSignal,
  random: RandomSource = Math.random,
): Promise<number> {
  const delay = pickDelay(range, random);
  if (delay > 0) {
    await sleep(delay, signal);
  }
  return delay;
}

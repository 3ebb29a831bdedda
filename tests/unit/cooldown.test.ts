import { describe, it, expect } from "vitest";
import { actionDelay, assertPacingRange, pickDelay } from "../../src/core/cooldown";
import { ConfigError } from "../../src/core/errors";

describe("Pacing", () => {
  it("should pick delays inside the range from the random source", () => {
    const range = { minMs: 100, maxMs: 300 };
    expect(pickDelay(range, () => 0)).toBe(100);
    expect(pickDelay(range, () => 0.5)).toBe(200);
    expect(pickDelay(range, () => 0.999)).toBe(300);
  });

  it("should reject an inverted range", () => {
    expect(() => assertPacingRange({ minMs: 500, maxMs: 100 })).toThrow(ConfigError);
    expect(() => assertPacingRange({ minMs: -1, maxMs: 100 })).toThrow(ConfigError);
    expect(() => assertPacingRange({ minMs: 0, maxMs: 0 })).not.toThrow();
  });

  it("should not wait for a zero range", async () => {
    await expect(actionDelay({ minMs: 0, maxMs: 0 })).resolves.toBe(0);
  });

  it("should stop waiting when cancelled", async () => {
    const controller = new AbortController();
    const pending = actionDelay({ minMs: 5000, maxMs: 5000 }, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ kind: "Cancelled" });
  });
});

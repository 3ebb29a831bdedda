import { describe, it, expect } from "vitest";
import { createSessionBlob, decodeSessionBlob } from "../../src/services/session-blob";
import { ConfigError, ValidationError } from "../../src/core/errors";
import { storageWithCookie } from "../support/factories";

const secret = "test-secret-0123456789";

describe("Session blob", () => {
  it("should decode what it encodes within the ttl", () => {
    const state = storageWithCookie();
    const blob = createSessionBlob(state, { secret, ttlSeconds: 60, now: 1_000 });

    const decoded = decodeSessionBlob(blob, { secret, now: 1_030 });
    expect(decoded).toEqual({ iat: 1_000, exp: 1_060, state });
  });

  it("should reject a blob signed with another secret", () => {
    const blob = createSessionBlob(storageWithCookie(), { secret, now: 1_000, ttlSeconds: 60 });
    expect(() => decodeSessionBlob(blob, { secret: "other-secret-0123456789", now: 1_000 })).toThrow(
      expect.objectContaining({ code: "SESSION_BLOB_SIGNATURE" })
    );
  });

  it("should reject a tampered payload", () => {
    const blob = createSessionBlob(storageWithCookie("original"), { secret, now: 1_000, ttlSeconds: 60 });
    const envelope = JSON.parse(Buffer.from(blob, "base64url").toString("utf8"));
    envelope.state.cookies[0].value = "forged";
    const tampered = Buffer.from(JSON.stringify(envelope), "utf8").toString("base64url");

    expect(() => decodeSessionBlob(tampered, { secret, now: 1_000 })).toThrow("Invalid session blob signature");
  });

  it("should reject an expired blob", () => {
    const blob = createSessionBlob(storageWithCookie(), { secret, now: 1_000, ttlSeconds: 60 });
    expect(() => decodeSessionBlob(blob, { secret, now: 1_060 })).toThrow("Session blob expired");
  });

  it("should reject garbage as invalid input", () => {
    expect(() => decodeSessionBlob("not-a-blob", { secret })).toThrow(ValidationError);
    const wrongShape = Buffer.from(JSON.stringify({ v: 2 }), "utf8").toString("base64url");
    expect(() => decodeSessionBlob(wrongShape, { secret })).toThrow("Invalid session blob envelope");
  });

  it("should require a secret of at least 16 characters", () => {
    expect(() => createSessionBlob(storageWithCookie(), { secret: "short" })).toThrow(ConfigError);
  });
});

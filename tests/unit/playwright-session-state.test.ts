import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseStorageState, serializeStorageState } from "../../src/services/playwright-session-state";
import { storageWithCookie } from "../support/factories";

describe("Playwright session state", () => {
  it("should fill cookie defaults when parsing", () => {
    const parsed = parseStorageState(JSON.stringify({ cookies: [{ name: "a1", value: "x", domain: ".xiaohongshu.com" }] }));
    expect(parsed).toEqual({
      cookies: [
        { name: "a1", value: "x", domain: ".xiaohongshu.com", path: "/", expires: -1, httpOnly: false, secure: false, sameSite: "Lax" },
      ],
      origins: [],
    });
  });

  it("should parse what it serializes", () => {
    const state = storageWithCookie();
    expect(parseStorageState(serializeStorageState(state))).toEqual(state);
  });

  it("should reject records that are not a storage state", () => {
    expect(() => parseStorageState("{not json")).toThrow(SyntaxError);
    expect(() => parseStorageState(JSON.stringify({ cookies: [{ name: "a1" }] }))).toThrow(ZodError);
  });
});

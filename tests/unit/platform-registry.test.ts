import { describe, it, expect } from "vitest";
import { AdapterRegistry, getPlatformDefinition, parsePlatform, supportedPlatforms } from "../../src/platforms/registry";
import { WebPlatformAdapter } from "../../src/platforms/web-platform.adapter";
import { SessionRegistry } from "../../src/services/session-manager";
import { MemorySessionStore } from "../../src/services/session-store";
import { ConfigError } from "../../src/core/errors";
import { FakeLauncher } from "../support/fake-page-driver";

describe("platform registry", () => {
  it("should only offer platforms that have a definition", () => {
    expect(supportedPlatforms()).toEqual(["xiaohongshu"]);
    expect(getPlatformDefinition("xiaohongshu").platform).toBe("xiaohongshu");
  });

  it("should reject known platforms without a definition", () => {
    expect(() => getPlatformDefinition("twitter")).toThrow(ConfigError);
    expect(() => getPlatformDefinition("linkedin")).toThrow('Platform "linkedin" has no definition, supported: xiaohongshu');
  });

  it("should reject unknown platform names", () => {
    expect(parsePlatform("xiaohongshu")).toBe("xiaohongshu");
    expect(() => parsePlatform("myspace")).toThrow('Unknown platform "myspace", expected one of xiaohongshu, twitter, linkedin');
  });

  it("should reuse one adapter per session key", () => {
    const store = new MemorySessionStore();
    const adapters = new AdapterRegistry(new SessionRegistry({ store, launcher: new FakeLauncher() }), store);

    const first = adapters.get({ platform: "xiaohongshu", identity: "default" });

    expect(first).toBeInstanceOf(WebPlatformAdapter);
    expect(adapters.get({ platform: "xiaohongshu", identity: "default" })).toBe(first);
    expect(adapters.get({ platform: "xiaohongshu", identity: "other" })).not.toBe(first);
    expect(() => adapters.get({ platform: "twitter", identity: "default" })).toThrow(ConfigError);
  });
});

import { ConfigError } from "../core/errors";
import { PlatformSchema, sessionKeyToString, type Platform, type SessionKey } from "../domain/models";
import type { SessionRegistry } from "../services/session-manager";
import type { SessionStore } from "../services/session-store";
import type { PlatformAdapter } from "./adapter";
import type { PlatformDefinition } from "./definition";
import { WebPlatformAdapter, type WebPlatformAdapterOptions } from "./web-platform.adapter";
import { xiaohongshu } from "./xiaohongshu";

const DEFINITIONS: Partial<Record<Platform, PlatformDefinition>> = {
  xiaohongshu,
};

export function supportedPlatforms(): Platform[] {
  return PlatformSchema.options.filter((platform) => DEFINITIONS[platform] !== undefined);
}

export function parsePlatform(value: string): Platform {
  const result = PlatformSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Unknown platform "${value}", expected one of ${PlatformSchema.options.join(", ")}`);
  }
  return result.data;
}

export function getPlatformDefinition(platform: Platform): PlatformDefinition {
  const definition = DEFINITIONS[platform];
  if (!definition) {
    throw new ConfigError(`Platform "${platform}" has no definition, supported: ${supportedPlatforms().join(", ")}`);
  }
  return definition;
}

export type AdapterTuning = Omit<WebPlatformAdapterOptions, "definition" | "session" | "store">;

/**
 * Hands out one adapter per session key, each bound to that key's shared
 * browser session.
 */
export class AdapterRegistry {
  private adapters = new Map<string, PlatformAdapter>();

  constructor(
    private readonly sessions: SessionRegistry,
    private readonly store: SessionStore,
    private readonly tuning: AdapterTuning = {},
  ) {}

  get(key: SessionKey): PlatformAdapter {
    const id = sessionKeyToString(key);
    const existing = this.adapters.get(id);
    if (existing) return existing;

    const adapter = new WebPlatformAdapter({
      ...this.tuning,
      definition: getPlatformDefinition(key.platform),
      session: this.sessions.get(key),
      store: this.store,
    });
    this.adapters.set(id, adapter);
    return adapter;
  }
}

import { eq, and, desc } from "drizzle-orm";
import type { PlatformSessionRow } from "../schema";
import { platformSessions } from "../schema";
import type { AppDatabase } from "../client";
import { logger } from "../../core/logger";

export interface UpsertPlatformSession {
  platform: string;
  identity: string;
  stateJson: string;
  stateHash: string;
  lastValidatedAt: number | null;
}

export class PlatformSessionsRepository {
  constructor(private db: AppDatabase) {}

  async findByKey(platform: string, identity: string): Promise<PlatformSessionRow | null> {
    const [result] = await this.db
      .select()
      .from(platformSessions)
      .where(and(eq(platformSessions.platform, platform), eq(platformSessions.identity, identity)))
      .limit(1);
    return result ?? null;
  }

  async upsert(data: UpsertPlatformSession): Promise<PlatformSessionRow> {
    const now = Math.floor(Date.now() / 1000);
    const result = await this.db
      .insert(platformSessions)
      .values({ ...data, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [platformSessions.platform, platformSessions.identity],
        set: {
          stateJson: data.stateJson,
          stateHash: data.stateHash,
          lastValidatedAt: data.lastValidatedAt,
          updatedAt: now,
        },
      })
      .returning();

    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to save platform session");
    }
    logger.debug({ platform: data.platform, identity: data.identity, stateHash: data.stateHash }, "Platform session saved");
    return result[0];
  }

  async touchValidated(platform: string, identity: string, validatedAt: number): Promise<boolean> {
    const result = await this.db
      .update(platformSessions)
      .set({ lastValidatedAt: validatedAt, updatedAt: Math.floor(Date.now() / 1000) })
      .where(and(eq(platformSessions.platform, platform), eq(platformSessions.identity, identity)))
      .returning({ id: platformSessions.id });
    return result.length > 0;
  }

  async delete(platform: string, identity: string): Promise<boolean> {
    const result = await this.db
      .delete(platformSessions)
      .where(and(eq(platformSessions.platform, platform), eq(platformSessions.identity, identity)))
      .returning({ id: platformSessions.id });
    return result.length > 0;
  }

  async list(): Promise<PlatformSessionRow[]> {
    return this.db.select().from(platformSessions).orderBy(desc(platformSessions.updatedAt));
  }
}

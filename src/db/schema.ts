import { sqliteTable, text, integer, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const platformSessions = sqliteTable(
  "platform_sessions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    platform: text("platform").notNull(),
    identity: text("identity").notNull(),
    stateJson: text("state_json").notNull(),
    stateHash: text("state_hash").notNull(),
    lastValidatedAt: integer("last_validated_at"),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    platformIdentityIdx: uniqueIndex("platform_sessions_platform_identity_idx").on(table.platform, table.identity),
  })
);

export type PlatformSessionRow = typeof platformSessions.$inferSelect;

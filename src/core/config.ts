import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

dotenvConfig();

const envSchema = z.object({
  DATABASE_PATH: z.string().default("./data/app.db"),
  PLAYWRIGHT_HEADLESS: z.string().default("true").transform((v) => v === "true"),
  PLAYWRIGHT_SLOW_MO: z.coerce.number().default(0),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  ACTION_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(300),
  ACTION_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(800),
  STEP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  EXTRACTION_POLL_MS: z.coerce.number().int().positive().default(250),
  LOGIN_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(120),
  OPERATION_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  READBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  API_ENABLED: z.string().default("true").transform((v) => v === "true"),
  API_HOST: z.string().default("127.0.0.1"),
  API_PORT: z.coerce.number().int().positive().default(3000),
  SESSION_BLOB_SECRET: z.string().optional(),
  SESSION_BLOB_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
});

export const env = envSchema.parse(process.env);

export type Env = typeof env;

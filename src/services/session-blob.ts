import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { env } from "../core/config";
import { ConfigError, ValidationError } from "../core/errors";
import { StorageStateSchema, type StorageState } from "./playwright-session-state";

const SessionBlobEnvelopeSchema = z.object({
  v: z.literal(1),
  iat: z.number().int().positive(),
  exp: z.number().int().positive(),
  state: StorageStateSchema,
  sig: z.string().min(1),
});

export interface SessionBlobPayload {
  iat: number;
  exp: number;
  state: StorageState;
}

export interface SessionBlobOptions {
  secret?: string;
  ttlSeconds?: number;
  now?: number;
}

function getBlobSecret(secret = env.SESSION_BLOB_SECRET): string {
  if (!secret || secret.length < 16) {
    throw new ConfigError(
      "SESSION_BLOB_SECRET is missing or too short (min 16 chars). Set it in .env on both exporter and importer.",
    );
  }
  return secret;
}

function buildUnsignedPayload(payload: SessionBlobPayload): string {
  return JSON.stringify({
    v: 1,
    iat: payload.iat,
    exp: payload.exp,
    state: payload.state,
  });
}

function signPayload(unsignedPayload: string, secret: string): string {
  return createHmac("sha256", secret).update(unsignedPayload).digest("base64url");
}

export function createSessionBlob(state: StorageState, options: SessionBlobOptions = {}): string {
  const now = options.now ?? Math.floor(Date.now() / 1000);
  const payload: SessionBlobPayload = {
    iat: now,
    exp: now + (options.ttlSeconds ?? env.SESSION_BLOB_TTL_SECONDS),
    state,
  };

  const secret = getBlobSecret(options.secret);
  const sig = signPayload(buildUnsignedPayload(payload), secret);

  const envelope = {
    v: 1 as const,
    iat: payload.iat,
    exp: payload.exp,
    state: payload.state,
    sig,
  };

  return Buffer.from(JSON.stringify(envelope), "utf8").toString("base64url");
}

export function decodeSessionBlob(blob: string, options: SessionBlobOptions = {}): SessionBlobPayload {
  const decoded = Buffer.from(blob.trim(), "base64url").toString("utf8");

  let parsedEnvelope: unknown;
  try {
    parsedEnvelope = JSON.parse(decoded);
  } catch {
    throw new ValidationError("Invalid session blob JSON", "SESSION_BLOB_INVALID");
  }

  const result = SessionBlobEnvelopeSchema.safeParse(parsedEnvelope);
  if (!result.success) {
    throw new ValidationError("Invalid session blob envelope", "SESSION_BLOB_INVALID");
  }
  const envelope = result.data;

  const payload: SessionBlobPayload = {
    iat: envelope.iat,
    exp: envelope.exp,
    state: envelope.state,
  };

  const secret = getBlobSecret(options.secret);
  const expectedBuffer = Buffer.from(signPayload(buildUnsignedPayload(payload), secret));
  const actualBuffer = Buffer.from(envelope.sig);

  if (expectedBuffer.length !== actualBuffer.length || !timingSafeEqual(expectedBuffer, actualBuffer)) {
    throw new ValidationError("Invalid session blob signature", "SESSION_BLOB_SIGNATURE");
  }

  const now = options.now ?? Math.floor(Date.now() / 1000);
  if (payload.exp <= now) {
    throw new ValidationError("Session blob expired", "SESSION_BLOB_EXPIRED");
  }

  return payload;
}

import crypto from "crypto";

export function computeSnapshotHash(data: unknown): string {
  const str = typeof data === "string" ? data : JSON.stringify(data);
  return crypto.createHash("sha256").update(str).digest("hex");
}

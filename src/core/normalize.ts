export function normalizeContent(content: string): string {
  return content
    .trim()
    .replace(/\s+/g, " ")
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[\u200B-\u200D\uFEFF]/g, "")
    .replace(/\\u200B/g, "");
}

export function clip(text: string, maxLength: number): string {
  const cleaned = text.replace(/\s+/g, " ").trim();
  return cleaned.length > maxLength ? cleaned.slice(0, maxLength).trim() : cleaned;
}

export function parseCompactNumber(value: string | number | null | undefined): number {
  if (typeof value === "number") return Number.isFinite(value) ? Math.round(value) : 0;
  if (!value) return 0;

  const normalized = value.trim().replace(/[,\s+]/g, "");
  const match = normalized.match(/^(\d+(?:\.\d+)?)(万|w|k)?$/i);
  if (!match) return 0;

  const base = Number.parseFloat(match[1] || "");
  if (!Number.isFinite(base)) return 0;

  const suffix = (match[2] || "").toLowerCase();
  if (suffix === "万" || suffix === "w") return Math.round(base * 10_000);
  if (suffix === "k") return Math.round(base * 1_000);
  return Math.round(base);
}

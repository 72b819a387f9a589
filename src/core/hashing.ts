import { createHash } from "crypto";

export type ContentHash = `sha256:${string}`;

export function contentHash(data: string | Buffer): ContentHash {
  return `sha256:${createHash("sha256").update(data).digest("hex")}`;
}

// Key order is normalized and undefined members dropped, so equal settings hash equally.
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((v) => (v === undefined ? null : sortKeys(v)));
  if (typeof value !== "object" || value === null) return value;
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (v !== undefined) out[key] = sortKeys(v);
  }
  return out;
}

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

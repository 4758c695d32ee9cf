import { createHash } from "crypto";

/**
 * Hash a remote payload for change detection when it carries no revision
 * marker of its own. Keys are sorted at every depth so the hash is stable
 * regardless of property order.
 */
export function hashEntity(entity: Record<string, unknown>): string {
  return createHash("sha256").update(JSON.stringify(stableSortKeys(entity))).digest("hex");
}

function stableSortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stableSortKeys);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = stableSortKeys(val ?? null);
    }
    return sorted;
  }
  return value;
}

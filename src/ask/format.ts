// src/ask/format.ts
export const NO_RESULTS = "No results.";

function isScalar(v: unknown): v is string | number | boolean {
  return typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

function toJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // last resort
    return String(value);
  }
}

/**
 * Renders a tool result as the single line of text the `ask` field returns.
 * Lists of plain values read as "a, b, c"; anything structured stays JSON.
 */
export function formatResult(value: unknown): string {
  if (value === null || value === undefined) return NO_RESULTS;
  if (typeof value === "string") return value.trim() ? value : NO_RESULTS;
  if (isScalar(value) || typeof value === "bigint") return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return NO_RESULTS;
    if (value.every(isScalar)) return value.map(String).join(", ");
    return toJson(value);
  }

  return toJson(value);
}

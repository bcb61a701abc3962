import { CallToolResultSchema } from "./types.js";

export type NormalizedToolResult =
  | { isError: false; value: unknown }
  | { isError: true; message: string };

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Unwraps an MCP `tools/call` result (content blocks, structuredContent,
 * isError) into a plain value. Anything that does not look like one is
 * passed through untouched, so direct-method results keep their shape.
 */
export function normalizeToolResult(raw: unknown): NormalizedToolResult {
  if (!isObject(raw) || !Array.isArray(raw.content)) {
    return { isError: false, value: raw };
  }

  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) return { isError: false, value: raw };

  const { content, structuredContent, isError } = parsed.data;
  const texts = content
    .map((c) => (c.type === "text" && typeof c.text === "string" ? c.text : null))
    .filter((t): t is string => t !== null);

  if (isError) {
    return { isError: true, message: texts.join("\n") || "Unknown MCP error" };
  }

  if (structuredContent !== undefined && structuredContent !== null) {
    return { isError: false, value: structuredContent };
  }

  if (texts.length === 0) return { isError: false, value: null };
  if (texts.length === 1) return { isError: false, value: tryJson(texts[0]) };
  return { isError: false, value: texts.join("\n") };
}

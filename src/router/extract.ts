import type { ParameterDescriptor, Scalar, ToolDescriptor } from "../tools/types.js";
import { defaultLexicon, type Lexicon } from "./lexicon.js";
import { escapeRegExp, splitWords } from "./text.js";
import type { CallerContext, ExtractionResult } from "./types.js";

/** Value used for identity parameters when the caller is anonymous. */
export const CALLER_PLACEHOLDER = "me";

type Span = { start: number; end: number };

class SpanTracker {
  private readonly used: Span[] = [];

  free(s: Span) {
    return !this.used.some((u) => s.start < u.end && u.start < s.end);
  }

  take(s: Span) {
    this.used.push(s);
  }
}

const PROPER_NOUN_AFTER_PREPOSITION =
  /\b(?:in|for|at|from|to|named|called|about)\s+([A-Z][\w'-]*(?:\s+[A-Z][\w'-]*)*)/g;

function normalizeName(name: string) {
  return name.toLowerCase().replace(/[^a-z0-9_]/g, "");
}

function coerce(raw: string, spec: ParameterDescriptor): unknown {
  const v = raw.trim();
  switch (spec.type) {
    case "number": {
      const n = Number(v);
      return v !== "" && Number.isFinite(n) ? n : undefined;
    }
    case "integer": {
      const n = Number(v);
      return v !== "" && Number.isInteger(n) ? n : undefined;
    }
    case "boolean": {
      const t = v.toLowerCase();
      if (["true", "yes", "on", "1"].includes(t)) return true;
      if (["false", "no", "off", "0"].includes(t)) return false;
      return undefined;
    }
    case "array":
      return v
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
    default:
      return v;
  }
}

function matchEnum(value: unknown, options: readonly Scalar[]): Scalar | undefined {
  if (typeof value === "string") {
    const lower = value.toLowerCase();
    return options.find((o) => String(o).toLowerCase() === lower);
  }
  return options.find((o) => o === value);
}

function accept(value: unknown, spec: ParameterDescriptor): unknown {
  if (value === undefined) return undefined;
  if (spec.enum && spec.enum.length) return matchEnum(value, spec.enum);
  return value;
}

// What a model may hand back for a parameter; strings go through `coerce`
function coerceSuggested(value: unknown, spec: ParameterDescriptor): unknown {
  if (typeof value === "string") return coerce(value, spec);
  switch (spec.type) {
    case "number":
      return typeof value === "number" && Number.isFinite(value) ? value : undefined;
    case "integer":
      return typeof value === "number" && Number.isInteger(value) ? value : undefined;
    case "boolean":
      return typeof value === "boolean" ? value : undefined;
    case "array":
      return Array.isArray(value) ? value : undefined;
    default:
      return typeof value === "number" || typeof value === "boolean" ? String(value) : undefined;
  }
}

function explicitPattern(param: string) {
  const name = param
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map(escapeRegExp)
    .join("[\\s_-]+");
  return new RegExp(`\\b${name}\\s*(?:=|:|\\s+is\\s+)\\s*(?:"([^"]*)"|'([^']*)'|([^\\s,;]+))`, "i");
}

function stripTrailingPunctuation(s: string) {
  return s.replace(/[.?!]+$/, "");
}

export type ExtractOptions = {
  lexicon?: Lexicon;
  /** Arguments a model scorer read off the prompt; they fill gaps only */
  suggested?: Readonly<Record<string, unknown>>;
};

/**
 * Pulls tool arguments out of free text. Every parameter goes through the
 * same passes in order (explicit `name = value`, enum literal, suggested
 * value, caller identity, bare number, quoted string or capitalised name,
 * schema default). Each pass only fills what earlier passes left empty, and
 * a stretch of the prompt feeds at most one parameter.
 */
export function extractArguments(
  prompt: string,
  tool: ToolDescriptor,
  caller?: CallerContext,
  options: ExtractOptions = {},
): ExtractionResult {
  const lexicon = options.lexicon ?? defaultLexicon();
  const params = Object.entries(tool.parameterSchema);
  const args: Record<string, unknown> = {};
  const spans = new SpanTracker();

  const identity = caller?.id ?? caller?.username ?? caller?.email ?? CALLER_PLACEHOLDER;
  const isIdentityParam = (name: string, spec: ParameterDescriptor) =>
    spec.type === "string" && lexicon.identityParameters.has(normalizeName(name));
  // "owner is me" names the caller, not a user called "me"
  const resolveSelf = (name: string, spec: ParameterDescriptor, value: unknown) =>
    isIdentityParam(name, spec) && typeof value === "string" && lexicon.selfReferences.has(value.toLowerCase())
      ? identity
      : value;

  // 1. explicit assignments
  for (const [name, spec] of params) {
    const m = explicitPattern(name).exec(prompt);
    if (!m) continue;
    const raw = m[1] ?? m[2] ?? stripTrailingPunctuation(m[3] ?? "");
    const value = accept(coerce(raw, spec), spec);
    if (value === undefined) continue;
    args[name] = resolveSelf(name, spec, value);
    spans.take({ start: m.index, end: m.index + m[0].length });
  }

  // 2. enum literals mentioned anywhere
  for (const [name, spec] of params) {
    if (name in args || !spec.enum?.length) continue;
    let best: { value: Scalar; span: Span } | null = null;
    for (const option of spec.enum) {
      const re = new RegExp(`\\b${escapeRegExp(String(option))}\\b`, "i");
      const m = re.exec(prompt);
      if (!m) continue;
      const span = { start: m.index, end: m.index + m[0].length };
      if (!spans.free(span)) continue;
      if (!best || span.start < best.span.start) best = { value: option, span };
    }
    if (best) {
      args[name] = best.value;
      spans.take(best.span);
    }
  }

  // 3. suggestions from the scorer
  const suggested = options.suggested ?? {};
  for (const [name, spec] of params) {
    if (name in args || !Object.hasOwn(suggested, name)) continue;
    const value = accept(coerceSuggested(suggested[name], spec), spec);
    if (value === undefined) continue;
    args[name] = resolveSelf(name, spec, value);
  }

  // 4. caller identity
  const words = splitWords(prompt);
  const selfReference = words.some((w) => lexicon.selfReferences.has(w));
  for (const [name, spec] of params) {
    if (name in args || !isIdentityParam(name, spec)) continue;
    if (selfReference || spec.required) args[name] = identity;
  }

  // 5. bare numbers and quoted or capitalised strings, first unused occurrence
  for (const [name, spec] of params) {
    if (name in args) continue;

    if (spec.type === "number" || spec.type === "integer") {
      // standalone numbers only; "alpha2" states no count
      for (const m of prompt.matchAll(/(?<![\w.-])-?\d+(?:\.\d+)?(?!\w|\.\d)/g)) {
        const span = { start: m.index ?? 0, end: (m.index ?? 0) + m[0].length };
        if (!spans.free(span)) continue;
        const value = accept(coerce(m[0], spec), spec);
        if (value === undefined) continue;
        args[name] = value;
        spans.take(span);
        break;
      }
    } else if (spec.type === "string") {
      for (const m of prompt.matchAll(/"([^"]+)"|“([^”]+)”/g)) {
        const span = { start: m.index ?? 0, end: (m.index ?? 0) + m[0].length };
        if (!spans.free(span)) continue;
        const value = accept(m[1] ?? m[2], spec);
        if (value === undefined) continue;
        args[name] = value;
        spans.take(span);
        break;
      }
      if (name in args) continue;
      // "weather in New York", "a user named Ada": capitalised words after a preposition
      for (const m of prompt.matchAll(PROPER_NOUN_AFTER_PREPOSITION)) {
        const offset = m[0].length - m[1].length;
        const span = { start: (m.index ?? 0) + offset, end: (m.index ?? 0) + m[0].length };
        if (!spans.free(span)) continue;
        const value = accept(m[1], spec);
        if (value === undefined) continue;
        args[name] = value;
        spans.take(span);
        break;
      }
    }
  }

  // 6. defaults
  for (const [name, spec] of params) {
    if (!(name in args) && spec.default !== undefined) args[name] = spec.default;
  }

  const missing = params.filter(([name, spec]) => spec.required && !(name in args)).map(([name]) => name);
  return { arguments: args, missing };
}

import { readFileSync } from "node:fs";
import { z } from "zod";

const LexiconSchema = z.object({
  stopWords: z.array(z.string()),
  synonyms: z.record(z.array(z.string())),
  selfReferences: z.array(z.string()),
  identityParameters: z.array(z.string()),
});

export type LexiconData = z.infer<typeof LexiconSchema>;

export type Lexicon = {
  stopWords: ReadonlySet<string>;
  /** stemmed variant -> canonical term */
  canonical: ReadonlyMap<string, string>;
  selfReferences: ReadonlySet<string>;
  identityParameters: ReadonlySet<string>;
};

const LEXICON_URL = new URL("../../data/lexicon.json", import.meta.url);

/**
 * Light suffix stripping; enough to make "alphas", "owned" and "listing"
 * meet "alpha", "own" and "list".
 */
export function stem(word: string): string {
  let w = word;
  if (w.length <= 3) return w;

  if (w.endsWith("ies") && w.length > 4) w = w.slice(0, -3) + "y";
  else if (/(ss|sh|ch|x|z)es$/.test(w)) w = w.slice(0, -2);
  else if (w.endsWith("s") && !/(ss|us|is)$/.test(w)) w = w.slice(0, -1);

  if (w.endsWith("ing") && w.length > 5) w = w.slice(0, -3);
  else if (w.endsWith("ed") && w.length > 4) w = w.slice(0, -2);

  return w;
}

export function buildLexicon(data: LexiconData): Lexicon {
  const canonical = new Map<string, string>();
  for (const [term, variants] of Object.entries(data.synonyms)) {
    const root = stem(term.toLowerCase());
    canonical.set(root, root);
    for (const v of variants) canonical.set(stem(v.toLowerCase()), root);
  }

  return {
    stopWords: new Set(data.stopWords.map((w) => w.toLowerCase())),
    canonical,
    selfReferences: new Set(data.selfReferences.map((w) => w.toLowerCase())),
    identityParameters: new Set(data.identityParameters.map((w) => w.toLowerCase())),
  };
}

let cached: Lexicon | null = null;

export function defaultLexicon(): Lexicon {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(LEXICON_URL, "utf8"));
    cached = buildLexicon(LexiconSchema.parse(raw));
  }
  return cached;
}

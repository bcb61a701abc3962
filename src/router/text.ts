import { stem, type Lexicon } from "./lexicon.js";

/** Lowercase words, with snake_case, kebab-case and camelCase split apart. */
export function splitWords(text: string): string[] {
  const spaced = text.replace(/([a-z0-9])([A-Z])/g, "$1 $2");
  return spaced.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

export function toTerm(word: string, lexicon: Lexicon): string {
  const s = stem(word);
  return lexicon.canonical.get(s) ?? s;
}

/** Content terms: stop words dropped, the rest stemmed and folded onto synonyms. */
export function terms(text: string, lexicon: Lexicon): string[] {
  return splitWords(text)
    .filter((w) => !lexicon.stopWords.has(w))
    .map((w) => toTerm(w, lexicon));
}

export function termSet(text: string, lexicon: Lexicon): Set<string> {
  return new Set(terms(text, lexicon));
}

export function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

import lexicon from "../data/lexicon.json";

export interface Lexicon {
  genericIndustryTerms: ReadonlySet<string>;
  audienceMarkers: ReadonlySet<string>;
  actionVerbs: ReadonlySet<string>;
  categoryNouns: ReadonlySet<string>;
  vagueTerms: ReadonlySet<string>;
}

export const LEXICON: Lexicon = Object.freeze({
  genericIndustryTerms: new Set(lexicon.genericIndustryTerms),
  audienceMarkers: new Set(lexicon.audienceMarkers),
  actionVerbs: new Set(lexicon.actionVerbs),
  categoryNouns: new Set(lexicon.categoryNouns),
  vagueTerms: new Set(lexicon.vagueTerms),
});

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Visibility baseline shared by every audit: 40 plus the code-point sum of
 * the text modulo 51, so always within 40..90.
 */
export function checksumScore(text: string): number {
  let sum = 0;
  for (const ch of text) {
    sum += ch.codePointAt(0) ?? 0;
  }
  return 40 + (sum % 51);
}

export function tokenize(text: string): string[] {
  const normalized = normalizeWhitespace(text).toLowerCase();
  if (normalized.length === 0) {
    return [];
  }
  return normalized
    .split(" ")
    .map((word) => word.replace(/^[^\p{L}\p{N}&-]+|[^\p{L}\p{N}&-]+$/gu, ""))
    .filter((word) => word.length > 0);
}

export function distinct(words: readonly string[]): string[] {
  return [...new Set(words)];
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function percentage(part: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return Math.floor((part / total) * 100);
}

export function sameName(a: string, b: string): boolean {
  return normalizeWhitespace(a).toLowerCase() === normalizeWhitespace(b).toLowerCase();
}

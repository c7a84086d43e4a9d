import type { Word } from "../types.js";
import type { Normalizer } from "../normalizer.js";

export class CaseFoldNormalizer implements Normalizer {
  normalize(word: string): Word {
    return word.trim().toLowerCase();
  }
}

export interface KnownWords {
  has(word: Word): boolean;
}

/** [suffix, replacement], tried in order. */
const INFLECTION_RULES: ReadonlyArray<readonly [string, string]> = [
  ["ses", "s"],
  ["xes", "x"],
  ["zes", "z"],
  ["ches", "ch"],
  ["shes", "sh"],
  ["men", "man"],
  ["ies", "y"],
  ["s", ""],
  ["ing", ""],
  ["ing", "e"],
  ["ed", ""],
  ["ed", "e"],
  ["es", ""],
  ["es", "e"],
];

/**
 * Rule-based lemmatizer: strips a regular inflection when the result is a
 * known word, otherwise leaves the (case-folded) word alone.
 *
 * Known words are returned unchanged, so normalizing twice is the same as
 * normalizing once.
 */
export class SuffixLemmatizer implements Normalizer {
  constructor(
    private readonly known: KnownWords,
    private readonly base: Normalizer = new CaseFoldNormalizer(),
  ) {}

  normalize(word: string): Word {
    const folded = this.base.normalize(word);
    if (this.known.has(folded)) return folded;

    for (const [suffix, replacement] of INFLECTION_RULES) {
      if (folded.length <= suffix.length || !folded.endsWith(suffix)) continue;
      const lemma = folded.slice(0, folded.length - suffix.length) + replacement;
      if (this.known.has(lemma)) return lemma;
    }
    return folded;
  }
}

export function chainNormalizers(...normalizers: Normalizer[]): Normalizer {
  return {
    normalize(word) {
      return normalizers.reduce<string>((w, n) => n.normalize(w), word);
    },
  };
}

/** Shared core types used by module contracts. */

export type Word = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Word;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  /** Optional character offsets into the source text. */
  startOffset?: number;
  endOffset?: number;
}

export interface Suggestion {
  word: Word;
  /** count / vocabulary total, in [0, 1] */
  probability: number;
}

/** Which candidate tier produced the surviving words. */
export type MatchTier = "exact" | "one-edit" | "two-edit" | "none";

export interface Explanation {
  input: string;
  normalized: Word;
  tier: MatchTier;
  suggestions: Suggestion[];
}

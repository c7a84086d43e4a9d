import type { Word } from "./types.js";

/**
 * Candidate neighborhoods of a query word, kept apart so the filter can
 * prefer closer edits.
 */
export interface CandidateTiers {
  readonly word: Word;
  readonly oneEdit: ReadonlySet<Word>;
  /** Built on first access; includes `oneEdit` and `word` itself. */
  readonly twoEdit: ReadonlySet<Word>;
}

export interface CandidateGenerator {
  oneEdit(word: Word): Set<Word>;
  twoEdit(word: Word): Set<Word>;
  tiers(word: Word): CandidateTiers;
}

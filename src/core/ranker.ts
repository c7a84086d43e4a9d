import type { Suggestion, Word } from "./types.js";
import type { Vocabulary } from "./vocabulary.js";

/**
 * Scores surviving candidates.
 *
 * Output order is total: probability descending, then word ascending.
 */
export interface Ranker {
  rank(words: Iterable<Word>, vocabulary: Vocabulary, limit?: number): Suggestion[];
}

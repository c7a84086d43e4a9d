import type { CandidateTiers } from "./candidateGenerator.js";
import type { MatchTier, Word } from "./types.js";
import type { Vocabulary } from "./vocabulary.js";

export interface FilterResult {
  tier: MatchTier;
  /** Unordered; ranking decides the order. */
  words: Word[];
}

/**
 * Intersects candidate tiers with a vocabulary.
 *
 * The closest non-empty tier wins outright: an exact match stops the search,
 * and the two-edit tier is only read when the one-edit tier has no hits.
 */
export interface VocabularyFilter {
  filter(tiers: CandidateTiers, vocabulary: Vocabulary): FilterResult;
}

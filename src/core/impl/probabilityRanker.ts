import type { Suggestion, Word } from "../types.js";
import type { Vocabulary } from "../vocabulary.js";
import type { Ranker } from "../ranker.js";
import type { TopKSelector } from "../heap.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

/** Probability descending, then word ascending (UTF-16 code unit order). */
export function compareSuggestions(a: Suggestion, b: Suggestion): number {
  return b.probability - a.probability || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0);
}

/**
 * Ranks by corpus probability: count(w) / total over the whole vocabulary,
 * not just over the surviving candidates.
 */
export class ProbabilityRanker implements Ranker {
  constructor(private readonly selector: TopKSelector<Suggestion> = new MinHeapTopKSelector<Suggestion>()) {}

  rank(words: Iterable<Word>, vocabulary: Vocabulary, limit?: number): Suggestion[] {
    const scored: Suggestion[] = [];
    for (const word of new Set(words)) {
      scored.push({ word, probability: vocabulary.count(word) / vocabulary.total });
    }

    if (limit === undefined || limit >= scored.length) return scored.sort(compareSuggestions);
    return this.selector.topK(scored, limit, compareSuggestions);
  }
}

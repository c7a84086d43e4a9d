import type { Word } from "../types.js";
import type { Vocabulary } from "../vocabulary.js";
import type { CandidateTiers } from "../candidateGenerator.js";
import type { FilterResult, VocabularyFilter } from "../filter.js";

function intersect(candidates: Iterable<Word>, vocabulary: Vocabulary): Word[] {
  const out: Word[] = [];
  for (const w of candidates) {
    if (vocabulary.has(w)) out.push(w);
  }
  return out;
}

/**
 * exact -> one-edit -> two-edit, stopping at the first tier with a known word.
 * A frequent two-edit word never competes with an available one-edit word.
 */
export class StagedVocabularyFilter implements VocabularyFilter {
  filter(tiers: CandidateTiers, vocabulary: Vocabulary): FilterResult {
    if (vocabulary.has(tiers.word)) return { tier: "exact", words: [tiers.word] };

    const oneEdit = intersect(tiers.oneEdit, vocabulary);
    if (oneEdit.length) return { tier: "one-edit", words: oneEdit };

    // only reached once the one-edit tier is known to be empty
    const twoEdit = intersect(tiers.twoEdit, vocabulary);
    if (twoEdit.length) return { tier: "two-edit", words: twoEdit };

    return { tier: "none", words: [] };
  }
}

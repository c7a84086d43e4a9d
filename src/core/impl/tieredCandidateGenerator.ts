import type { Word } from "../types.js";
import type { EditOperator } from "../editOperator.js";
import type { CandidateGenerator, CandidateTiers } from "../candidateGenerator.js";
import { AlphabetEditOperator } from "./alphabetEditOperator.js";

/**
 * Two bounded tiers instead of open-ended expansion:
 * - one edit: `edits(word)`
 * - two edits: `edits(w1)` for every one-edit `w1`, plus the one-edit tier and `word`
 */
export class TieredCandidateGenerator implements CandidateGenerator {
  constructor(private readonly operator: EditOperator = new AlphabetEditOperator()) {}

  oneEdit(word: Word): Set<Word> {
    return this.operator.edits(word);
  }

  twoEdit(word: Word): Set<Word> {
    return this.expand(word, this.oneEdit(word));
  }

  tiers(word: Word): CandidateTiers {
    const oneEdit = this.oneEdit(word);
    let twoEdit: Set<Word> | undefined;
    const expand = (): Set<Word> => (twoEdit ??= this.expand(word, oneEdit));

    return {
      word,
      oneEdit,
      get twoEdit() {
        return expand();
      },
    };
  }

  private expand(word: Word, oneEdit: ReadonlySet<Word>): Set<Word> {
    const out = new Set<Word>(oneEdit);
    out.add(word);
    for (const w1 of oneEdit) {
      for (const w2 of this.operator.edits(w1)) out.add(w2);
    }
    return out;
  }
}

import type { Explanation, Suggestion, Word } from "../types.js";
import type { Vocabulary } from "../vocabulary.js";
import type { CandidateGenerator } from "../candidateGenerator.js";
import type { VocabularyFilter } from "../filter.js";
import type { Ranker } from "../ranker.js";
import type { Normalizer } from "../normalizer.js";
import { ConfigurationError, InvalidArgumentError } from "../errors.js";
import { TieredCandidateGenerator } from "./tieredCandidateGenerator.js";
import { StagedVocabularyFilter } from "./stagedVocabularyFilter.js";
import { ProbabilityRanker } from "./probabilityRanker.js";
import { CaseFoldNormalizer } from "./normalizers.js";

export interface PipelineDeps {
  vocabulary: Vocabulary;
  generator?: CandidateGenerator;
  filter?: VocabularyFilter;
  ranker?: Ranker;
  normalizer?: Normalizer;
  /** Longest normalized word accepted, in code points. */
  maxWordLength?: number;
}

/**
 * The two-edit tier grows with the square of the word length; past this many
 * characters a single query takes seconds.
 */
export const MAX_WORD_LENGTH = 20;

/**
 * normalize -> candidate tiers -> staged filter -> rank -> first n.
 *
 * Holds read-only references only; one instance can serve any number of
 * callers. Any character is accepted in the query word; characters outside
 * the vocabulary's alphabet simply never match.
 */
export class SuggestionPipeline {
  readonly vocabulary: Vocabulary;
  private readonly generator: CandidateGenerator;
  private readonly filter: VocabularyFilter;
  private readonly ranker: Ranker;
  private readonly normalizer: Normalizer;
  private readonly maxWordLength: number;

  constructor(deps: PipelineDeps) {
    const { vocabulary } = deps;
    if (vocabulary.size === 0) throw new ConfigurationError("vocabulary is empty");
    if (!(vocabulary.total > 0)) throw new ConfigurationError("vocabulary total count is zero");

    this.vocabulary = vocabulary;
    this.generator = deps.generator ?? new TieredCandidateGenerator();
    this.filter = deps.filter ?? new StagedVocabularyFilter();
    this.ranker = deps.ranker ?? new ProbabilityRanker();
    this.normalizer = deps.normalizer ?? new CaseFoldNormalizer();
    this.maxWordLength = deps.maxWordLength ?? MAX_WORD_LENGTH;
  }

  suggest(word: string, n: number): Suggestion[] {
    return this.explain(word, n).suggestions;
  }

  explain(input: string, n: number): Explanation {
    if (!Number.isSafeInteger(n) || n <= 0) {
      throw new InvalidArgumentError(`n must be a positive integer, got ${String(n)}`);
    }

    const normalized = this.normalizer.normalize(input);
    const length = Array.from(normalized).length;
    if (length > this.maxWordLength) {
      throw new InvalidArgumentError(`word must be at most ${this.maxWordLength} characters, got ${length}`);
    }

    const survivors = this.filter.filter(this.generator.tiers(normalized), this.vocabulary);
    if (survivors.words.length === 0) {
      return { input, normalized, tier: "none", suggestions: [] };
    }

    return {
      input,
      normalized,
      tier: survivors.tier,
      suggestions: this.ranker.rank(survivors.words, this.vocabulary, n),
    };
  }

  /** Best single correction, or undefined when nothing is close enough. */
  correct(word: string): Word | undefined {
    return this.suggest(word, 1)[0]?.word;
  }
}

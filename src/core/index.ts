export type { Word, Token, Suggestion, MatchTier, Explanation } from "./types.js";
export type { EditOperator } from "./editOperator.js";
export type { CandidateGenerator, CandidateTiers } from "./candidateGenerator.js";
export type { Vocabulary } from "./vocabulary.js";
export type { FilterResult, VocabularyFilter } from "./filter.js";
export type { Ranker } from "./ranker.js";
export type { Heap, TopKSelector } from "./heap.js";
export type { Normalizer } from "./normalizer.js";
export type { Tokenizer, TokenizeOptions } from "./tokenizer.js";
export * from "./errors.js";
export * from "./impl/index.js";

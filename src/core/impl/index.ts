export { AlphabetEditOperator, ENGLISH_LOWERCASE } from "./alphabetEditOperator.js";
export { TieredCandidateGenerator } from "./tieredCandidateGenerator.js";
export { MemoryVocabulary, type CountSource } from "./memoryVocabulary.js";
export { StagedVocabularyFilter } from "./stagedVocabularyFilter.js";
export { ProbabilityRanker, compareSuggestions } from "./probabilityRanker.js";
export { ArrayHeap, MinHeapTopKSelector } from "./minHeapTopK.js";
export { SimpleTokenizer } from "./simpleTokenizer.js";
export { CaseFoldNormalizer, SuffixLemmatizer, chainNormalizers, type KnownWords } from "./normalizers.js";
export { SuggestionPipeline, MAX_WORD_LENGTH, type PipelineDeps } from "./suggestionPipeline.js";

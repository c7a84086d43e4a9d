import type { Word } from "./types.js";

/**
 * Read-only word -> occurrence count table.
 *
 * Contract notes:
 * - keys are already normalized (case-folded)
 * - `total` is the sum of all counts, fixed at construction and > 0
 */
export interface Vocabulary {
  readonly size: number;
  readonly total: number;

  has(word: Word): boolean;
  /** 0 for unknown words. */
  count(word: Word): number;
  probability(word: Word): number;
  entries(): IterableIterator<[Word, number]>;
}

import type { Word } from "./types.js";

/**
 * Generates strings reachable from a word by exactly one edit.
 *
 * Contract notes:
 * - pure: output depends only on the word and the operator's alphabet
 * - `edits` is the deduplicated union of the four operations
 */
export interface EditOperator {
  readonly alphabet: readonly string[];

  deletes(word: Word): Word[];
  inserts(word: Word): Word[];
  /** Never yields the identity substitution. */
  substitutes(word: Word): Word[];
  /** Adjacent swaps; swaps of two equal characters are skipped. */
  transposes(word: Word): Word[];

  edits(word: Word): Set<Word>;
}

import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If true, normalize case (implementation-defined, usually lowercase). */
  normalizeCase?: boolean;
}

/**
 * Turns corpus text into a stream of word tokens.
 *
 * Contract notes:
 * - should be deterministic for given input+options
 * - should avoid allocations where possible (iterators/generators ok)
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Token>;
}

import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

function isWordChar(code: number): boolean {
  return (
    (code >= 48 && code <= 57) ||
    (code >= 65 && code <= 90) ||
    (code >= 97 && code <= 122) ||
    code === 95
  );
}

/**
 * Corpus tokenizer:
 * - a word is a maximal run of ASCII letters, digits or `_`
 * - lowercases unless told otherwise
 * - yields token positions (token index) and character offsets
 */
export class SimpleTokenizer implements Tokenizer {
  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const normalizeCase = options?.normalizeCase ?? true;

    const n = text.length;
    let i = 0;
    let position = 0;

    while (i < n) {
      while (i < n && !isWordChar(text.charCodeAt(i))) i++;
      if (i >= n) break;

      const start = i;
      while (i < n && isWordChar(text.charCodeAt(i))) i++;

      const raw = text.slice(start, i);
      yield { term: normalizeCase ? raw.toLowerCase() : raw, position, startOffset: start, endOffset: i };
      position++;
    }
  }
}

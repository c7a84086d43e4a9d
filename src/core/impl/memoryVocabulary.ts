import type { Word } from "../types.js";
import type { Vocabulary } from "../vocabulary.js";
import type { Tokenizer } from "../tokenizer.js";
import { ConfigurationError } from "../errors.js";
import { SimpleTokenizer } from "./simpleTokenizer.js";

export type CountSource = Iterable<readonly [string, number]> | Readonly<Record<string, number>>;

function foldCase(word: string): Word {
  return word.toLowerCase();
}

function isPairIterable(v: CountSource): v is Iterable<readonly [string, number]> {
  return Symbol.iterator in v;
}

/**
 * Immutable in-memory vocabulary.
 *
 * Keys are case-folded on the way in; keys that fold together have their
 * counts merged. The total is computed once here and never again.
 */
export class MemoryVocabulary implements Vocabulary {
  readonly total: number;
  private readonly counts: ReadonlyMap<Word, number>;

  private constructor(counts: Map<Word, number>) {
    let total = 0;
    for (const c of counts.values()) total += c;

    if (counts.size === 0) throw new ConfigurationError("vocabulary is empty");
    if (total <= 0) throw new ConfigurationError("vocabulary total count is zero");
    if (!Number.isSafeInteger(total)) throw new ConfigurationError(`vocabulary total count ${total} exceeds ${Number.MAX_SAFE_INTEGER}`);

    this.counts = counts;
    this.total = total;
    Object.freeze(this);
  }

  static fromCounts(source: CountSource): MemoryVocabulary {
    const pairs = isPairIterable(source) ? source : Object.entries(source);
    const counts = new Map<Word, number>();

    for (const [raw, count] of pairs) {
      if (!Number.isSafeInteger(count) || count < 0) {
        throw new ConfigurationError(`invalid count for "${raw}": ${String(count)}`);
      }
      const word = foldCase(raw);
      counts.set(word, (counts.get(word) ?? 0) + count);
    }

    return new MemoryVocabulary(counts);
  }

  static fromWords(words: Iterable<string>): MemoryVocabulary {
    const counts = new Map<Word, number>();
    for (const raw of words) {
      const word = foldCase(raw);
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
    return new MemoryVocabulary(counts);
  }

  static fromText(text: string, tokenizer: Tokenizer = new SimpleTokenizer()): MemoryVocabulary {
    const words: Word[] = [];
    for (const tok of tokenizer.tokenize(text, { normalizeCase: true })) words.push(tok.term);
    return MemoryVocabulary.fromWords(words);
  }

  get size(): number {
    return this.counts.size;
  }

  has(word: Word): boolean {
    return this.counts.has(word);
  }

  count(word: Word): number {
    return this.counts.get(word) ?? 0;
  }

  probability(word: Word): number {
    return this.count(word) / this.total;
  }

  entries(): IterableIterator<[Word, number]> {
    return this.counts.entries();
  }
}

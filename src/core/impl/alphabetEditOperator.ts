import type { Word } from "../types.js";
import type { EditOperator } from "../editOperator.js";

export const ENGLISH_LOWERCASE = "abcdefghijklmnopqrstuvwxyz";

/**
 * Single-edit neighborhood over a fixed alphabet.
 *
 * Words are edited by code point, so a character outside the BMP is deleted,
 * replaced or swapped whole. For a word of L code points and alphabet size A:
 * - deletes: L
 * - inserts: (L + 1) * A
 * - substitutes: L * (A - 1) when the word only uses alphabet characters
 * - transposes: at most L - 1
 */
export class AlphabetEditOperator implements EditOperator {
  readonly alphabet: readonly string[];

  constructor(alphabet: string | Iterable<string> = ENGLISH_LOWERCASE) {
    this.alphabet = Object.freeze(Array.from(new Set(alphabet)));
  }

  deletes(word: Word): Word[] {
    const chars = Array.from(word);
    return chars.map((_, i) => join(chars, 0, i) + join(chars, i + 1));
  }

  inserts(word: Word): Word[] {
    const chars = Array.from(word);
    const out: Word[] = [];
    for (let i = 0; i <= chars.length; i++) {
      const head = join(chars, 0, i);
      const tail = join(chars, i);
      for (const ch of this.alphabet) out.push(head + ch + tail);
    }
    return out;
  }

  substitutes(word: Word): Word[] {
    const chars = Array.from(word);
    const out: Word[] = [];
    chars.forEach((current, i) => {
      const head = join(chars, 0, i);
      const tail = join(chars, i + 1);
      for (const ch of this.alphabet) {
        if (ch !== current) out.push(head + ch + tail);
      }
    });
    return out;
  }

  transposes(word: Word): Word[] {
    const chars = Array.from(word);
    const out: Word[] = [];
    for (let i = 0; i + 1 < chars.length; i++) {
      const a = chars[i];
      const b = chars[i + 1];
      if (a === undefined || b === undefined || a === b) continue;
      out.push(join(chars, 0, i) + b + a + join(chars, i + 2));
    }
    return out;
  }

  edits(word: Word): Set<Word> {
    const out = new Set<Word>();
    for (const w of this.deletes(word)) out.add(w);
    for (const w of this.transposes(word)) out.add(w);
    for (const w of this.substitutes(word)) out.add(w);
    for (const w of this.inserts(word)) out.add(w);
    return out;
  }
}

function join(chars: readonly string[], start: number, end?: number): string {
  return chars.slice(start, end).join("");
}

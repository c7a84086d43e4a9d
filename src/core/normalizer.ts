import type { Word } from "./types.js";

/** Maps a raw query word onto the key space of the vocabulary. */
export interface Normalizer {
  normalize(word: string): Word;
}

import { readFile } from "node:fs/promises";

import { ConfigurationError, CorpusNotFoundError } from "./core/errors.js";
import { MemoryVocabulary } from "./core/impl/memoryVocabulary.js";
import { SuggestionPipeline } from "./core/impl/suggestionPipeline.js";
import { SuffixLemmatizer } from "./core/impl/normalizers.js";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** Reads a UTF-8 text corpus and counts its words. */
export async function loadCorpusFile(path: string): Promise<MemoryVocabulary> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    if (isNotFound(e)) throw new CorpusNotFoundError(path, { cause: e });
    throw e;
  }

  try {
    return MemoryVocabulary.fromText(text);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      throw new ConfigurationError(`corpus ${path} contains no words`, { cause: e });
    }
    throw e;
  }
}

export function createPipeline(vocabulary: MemoryVocabulary, opts: { lemmatize?: boolean } = {}): SuggestionPipeline {
  return new SuggestionPipeline({
    vocabulary,
    normalizer: opts.lemmatize ? new SuffixLemmatizer(vocabulary) : undefined,
  });
}

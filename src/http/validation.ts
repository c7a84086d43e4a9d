import type { FieldError } from "./problem.js";
import { MAX_WORD_LENGTH } from "../core/impl/suggestionPipeline.js";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export interface SuggestRequest {
  word: string;
  n: number;
}

/**
 * Checks a POST /suggest body. Returns the request or the list of field errors;
 * the empty string is a valid word.
 */
export function parseSuggestRequest(
  body: unknown,
  defaults: { n: number; maxN: number },
): { ok: true; value: SuggestRequest } | { ok: false; errors: FieldError[] } {
  if (!isRecord(body)) return { ok: false, errors: [{ path: "$", message: "body must be an object" }] };

  const errors: FieldError[] = [];
  const word = body.word;
  if (typeof word !== "string") errors.push({ path: "$.word", message: "must be a string" });
  else if (Array.from(word).length > MAX_WORD_LENGTH) errors.push({ path: "$.word", message: `must be at most ${MAX_WORD_LENGTH} characters` });

  const rawN = body.n ?? defaults.n;
  if (typeof rawN !== "number" || !Number.isInteger(rawN)) {
    errors.push({ path: "$.n", message: "must be an integer" });
  } else if (rawN < 1 || rawN > defaults.maxN) {
    errors.push({ path: "$.n", message: `must be between 1 and ${defaults.maxN}` });
  }

  if (errors.length || typeof word !== "string" || typeof rawN !== "number") return { ok: false, errors };
  return { ok: true, value: { word, n: rawN } };
}

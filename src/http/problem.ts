import type { ErrorCode } from "../core/errors.js";

export interface FieldError {
  path: string;
  message: string;
}

/** RFC 7807 problem details. */
export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code: ProblemCode;
  requestId?: string;
  errors?: FieldError[];
}

export type ProblemCode = ErrorCode | "UNSUPPORTED_MEDIA_TYPE" | "NOT_FOUND" | "INTERNAL";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

const TITLES: Record<ProblemCode, string> = {
  INVALID_ARGUMENT: "Invalid argument",
  CONFIGURATION: "Configuration error",
  CORPUS_NOT_FOUND: "Corpus not found",
  UNSUPPORTED_MEDIA_TYPE: "Unsupported media type",
  NOT_FOUND: "Not found",
  INTERNAL: "Internal error",
};

export function problem(params: Omit<Problem, "type" | "title">): Problem {
  return {
    type: `https://errors.spell-suggest.local/${params.code.toLowerCase().replace(/_/g, "-")}`,
    title: TITLES[params.code],
    ...params,
  };
}

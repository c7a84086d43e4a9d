import { ConfigurationError } from "./core/errors.js";

export interface Config {
  port: number;
  metricsEnabled: boolean;
  corpusPath: string;
  /** n when the caller does not ask for a count */
  suggestLimit: number;
  maxSuggestions: number;
  lemmatize: boolean;
}

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const suggestLimit = intVar(env, "SUGGEST_LIMIT", 3, 1);
  const maxSuggestions = intVar(env, "MAX_SUGGESTIONS", 50, 1);
  if (suggestLimit > maxSuggestions) {
    throw new ConfigurationError(`SUGGEST_LIMIT (${suggestLimit}) exceeds MAX_SUGGESTIONS (${maxSuggestions})`);
  }

  return {
    port: intVar(env, "PORT", 3000, 0),
    metricsEnabled: env.METRICS_ENABLED === "1",
    corpusPath: env.CORPUS_PATH || "final.txt",
    suggestLimit,
    maxSuggestions,
    lemmatize: env.LEMMATIZE === "1",
  };
}

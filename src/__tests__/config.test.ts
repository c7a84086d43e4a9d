import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigurationError } from "../core/errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      metricsEnabled: false,
      corpusPath: "final.txt",
      suggestLimit: 3,
      maxSuggestions: 50,
      lemmatize: false,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      METRICS_ENABLED: "1",
      CORPUS_PATH: "/data/books.txt",
      SUGGEST_LIMIT: "5",
      MAX_SUGGESTIONS: "20",
      LEMMATIZE: "1",
    });
    expect(config).toEqual({
      port: 8080,
      metricsEnabled: true,
      corpusPath: "/data/books.txt",
      suggestLimit: 5,
      maxSuggestions: 20,
      lemmatize: true,
    });
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ SUGGEST_LIMIT: "0" })).toThrow('SUGGEST_LIMIT must be an integer >= 1, got "0"');
  });

  it("rejects a default limit above the maximum", () => {
    expect(() => loadConfig({ SUGGEST_LIMIT: "10", MAX_SUGGESTIONS: "5" })).toThrow(
      "SUGGEST_LIMIT (10) exceeds MAX_SUGGESTIONS (5)",
    );
  });
});

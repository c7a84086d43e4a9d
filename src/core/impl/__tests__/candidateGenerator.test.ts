import { describe, expect, it, vi } from "vitest";
import { AlphabetEditOperator } from "../alphabetEditOperator.js";
import { TieredCandidateGenerator } from "../tieredCandidateGenerator.js";

describe("TieredCandidateGenerator", () => {
  const op = new AlphabetEditOperator("ab");
  const gen = new TieredCandidateGenerator(op);

  it("one-edit tier is the operator's neighborhood", () => {
    expect(gen.oneEdit("a")).toEqual(new Set(["", "b", "aa", "ba", "ab"]));
  });

  it("two-edit tier includes the word, the one-edit tier and their edits", () => {
    const two = gen.twoEdit("a");
    expect(two.has("a")).toBe(true);
    for (const w of gen.oneEdit("a")) expect(two.has(w)).toBe(true);
    expect(two.has("bb")).toBe(true);
    expect(two.has("aab")).toBe(true);
    expect(two.has("bbb")).toBe(false);
    expect(two.size).toBe(14);
  });

  it("builds the two-edit tier lazily and only once", () => {
    const counted = new AlphabetEditOperator("ab");
    const spy = vi.spyOn(counted, "edits");
    const tiers = new TieredCandidateGenerator(counted).tiers("a");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(tiers.oneEdit.size).toBe(5);

    expect(tiers.twoEdit.size).toBe(14);
    expect(spy).toHaveBeenCalledTimes(6);

    expect(tiers.twoEdit.size).toBe(14);
    expect(spy).toHaveBeenCalledTimes(6);
  });

  it("keeps short words within a few thousand two-edit candidates", () => {
    const size = new TieredCandidateGenerator().twoEdit("teh").size;
    expect(size).toBeGreaterThan(1000);
    expect(size).toBeLessThan(100000);
  });
});

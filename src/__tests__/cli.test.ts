import { Readable } from "node:stream";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { SpellSuggestCLI } from "../cli.js";
import { startServer } from "../http/server.js";
import { MemoryVocabulary } from "../core/impl/memoryVocabulary.js";
import { SuggestionPipeline } from "../core/impl/suggestionPipeline.js";

function harness(lines: string[] = []) {
  const out: string[] = [];
  const err: string[] = [];
  const cli = new SpellSuggestCLI({
    input: Readable.from(lines),
    stdout: { write: (s: string) => out.push(s) },
    stderr: { write: (s: string) => err.push(s) },
  });
  return { cli, stdout: () => out.join(""), stderr: () => err.join("") };
}

describe("SpellSuggestCLI", () => {
  let dir: string;
  let corpus: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "spell-suggest-cli-"));
    corpus = join(dir, "final.txt");
    await writeFile(corpus, "the the the threw threw there\n", "utf8");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints suggestions per word", async () => {
    const h = harness();
    const code = await h.cli.run(["suggest", "teh", "thre", "xyz", "-d", corpus, "-k", "3"]);
    expect(code).toBe(0);
    expect(h.stdout()).toBe("teh: the\nthre: the, threw, there\nxyz: (no suggestions)\n");
  });

  it("prints JSON when asked", async () => {
    const h = harness();
    await h.cli.run(["suggest", "thre", "-d", corpus, "-k", "1", "--json"]);
    expect(JSON.parse(h.stdout())).toEqual([
      { input: "thre", normalized: "thre", tier: "one-edit", suggestions: [{ word: "the", probability: 0.5 }] },
    ]);
  });

  it("fails with exit code 1 when the dataset is missing", async () => {
    const h = harness();
    const missing = join(dir, "nope.txt");
    expect(await h.cli.run(["suggest", "teh", "-d", missing])).toBe(1);
    expect(h.stderr()).toBe(`[Error] corpus not found: ${missing}\n`);
  });

  it("rejects a non-positive k", async () => {
    const h = harness();
    expect(await h.cli.run(["suggest", "teh", "-d", corpus, "-k", "0"])).toBe(1);
    expect(h.stderr()).toContain("must be a positive integer");
  });

  it("runs an interactive loop until exit", async () => {
    const h = harness(["teh\n", "123\n", "xyz\n", "exit\n", "thre\n"]);
    expect(await h.cli.run(["repl", "-d", corpus, "-k", "2"])).toBe(0);
    expect(h.stdout()).toBe(
      "Ready. Type a word to get suggestions. Type 'exit' to quit.\n" +
        "Enter a word: Top suggestions: the\n" +
        "Enter a word: Please enter only alphabetic characters (a-z).\n" +
        "Enter a word: (No suggestions found)\n" +
        "Enter a word: \nGoodbye!\n",
    );
  });

  it("answers over-long words in the interactive loop", async () => {
    const h = harness([`${"a".repeat(21)}\n`]);
    expect(await h.cli.run(["repl", "-d", corpus])).toBe(0);
    expect(h.stdout()).toContain("Enter a word: word must be at most 20 characters, got 21\n");
  });

  it("serves over HTTP until stopped", async () => {
    const h = harness();
    expect(await h.cli.run(["serve", "-d", corpus, "-p", "0"])).toBe(0);
    const port = /listening on :(\d+)/.exec(h.stdout())?.[1];
    expect(port).toBeDefined();

    try {
      const res = await fetch(`http://127.0.0.1:${port}/health`);
      expect(await res.json()).toMatchObject({ status: "ok", vocabularySize: 3 });
    } finally {
      await h.cli.stop();
    }
  });

  it("reports a port that is already taken", async () => {
    const vocabulary = MemoryVocabulary.fromCounts({ the: 1 });
    const { server, port } = await startServer({ pipeline: new SuggestionPipeline({ vocabulary }), port: 0 });
    try {
      const h = harness();
      expect(await h.cli.run(["serve", "-d", corpus, "-p", String(port)])).toBe(1);
      expect(h.stderr()).toContain(`[Error] cannot listen on :${port}: `);
      expect(h.stderr()).toContain("EADDRINUSE");
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

import type http from "node:http";
import { createInterface } from "node:readline";
import { Command, CommanderError, InvalidArgumentError as OptionValueError } from "commander";

import { loadConfig } from "./config.js";
import { createPipeline, loadCorpusFile } from "./corpus.js";
import { closeOnSignals, startServer } from "./http/server.js";
import { ConfigurationError, InvalidArgumentError, SpellError } from "./core/errors.js";
import type { SuggestionPipeline } from "./core/impl/suggestionPipeline.js";

interface Output {
  write(chunk: string): unknown;
}

export interface CLIStreams {
  input: NodeJS.ReadableStream;
  stdout: Output;
  stderr: Output;
}

interface SuggestOptions {
  dataset: string;
  k: number;
  lemmatize?: boolean;
  json?: boolean;
}

interface ServeOptions {
  dataset: string;
  port: number;
  lemmatize?: boolean;
}

const ALPHABETIC = /^[a-z]+$/;

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 1) throw new OptionValueError("must be a positive integer");
  return n;
}

function port(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 0 || n > 65535) throw new OptionValueError("must be a port number");
  return n;
}

/**
 * Command-line interface: one-shot suggestions, an interactive prompt, and the HTTP server.
 */
export class SpellSuggestCLI {
  private serving?: { server: http.Server; release: () => void };

  constructor(private readonly io: CLIStreams = { input: process.stdin, stdout: process.stdout, stderr: process.stderr }) {}

  /** Runs with user arguments (no node/script prefix); resolves to the exit code. */
  async run(args: string[]): Promise<number> {
    try {
      await this.program().parseAsync(args, { from: "user" });
      return 0;
    } catch (e) {
      if (e instanceof CommanderError) return e.exitCode;
      if (e instanceof SpellError) {
        this.io.stderr.write(`[Error] ${e.message}\n`);
        return 1;
      }
      throw e;
    }
  }

  private program(): Command {
    const config = loadConfig();
    const program = new Command();

    program
      .name("spell-suggest")
      .description("Suggest spelling corrections from word frequencies in a text corpus")
      .version("0.1.0")
      .exitOverride()
      .configureOutput({
        writeOut: (s) => this.io.stdout.write(s),
        writeErr: (s) => this.io.stderr.write(s),
      });

    program
      .command("suggest")
      .description("print suggestions for each word")
      .argument("<words...>", "words to correct")
      .option("-d, --dataset <path>", "text corpus to count words from", config.corpusPath)
      .option("-k, --k <n>", "number of suggestions per word", positiveInt, config.suggestLimit)
      .option("--lemmatize", "reduce inflected input to a known base form first", config.lemmatize)
      .option("--json", "print JSON instead of text")
      .action(async (words: string[], options: SuggestOptions) => {
        const pipeline = await this.pipeline(options);
        this.printSuggestions(pipeline, words, options);
      });

    program
      .command("repl")
      .description("read words interactively and print suggestions")
      .option("-d, --dataset <path>", "text corpus to count words from", config.corpusPath)
      .option("-k, --k <n>", "number of suggestions per word", positiveInt, config.suggestLimit)
      .option("--lemmatize", "reduce inflected input to a known base form first", config.lemmatize)
      .action(async (options: SuggestOptions) => {
        const pipeline = await this.pipeline(options);
        await this.repl(pipeline, options.k);
      });

    program
      .command("serve")
      .description("serve suggestions over HTTP")
      .option("-d, --dataset <path>", "text corpus to count words from", config.corpusPath)
      .option("-p, --port <port>", "port to listen on", port, config.port)
      .option("--lemmatize", "reduce inflected input to a known base form first", config.lemmatize)
      .action(async (options: ServeOptions) => {
        const pipeline = await this.pipeline(options);
        let started: Awaited<ReturnType<typeof startServer>>;
        try {
          started = await startServer({
            pipeline,
            port: options.port,
            metricsEnabled: config.metricsEnabled,
            defaultSuggestions: config.suggestLimit,
            maxSuggestions: config.maxSuggestions,
          });
        } catch (e) {
          const reason = e instanceof Error ? e.message : String(e);
          throw new ConfigurationError(`cannot listen on :${options.port}: ${reason}`, { cause: e });
        }
        this.serving = { server: started.server, release: closeOnSignals(started.server) };
        this.io.stdout.write(`listening on :${started.port}\n`);
      });

    return program;
  }

  /** Stops a server started by `serve`, if any. */
  async stop(): Promise<void> {
    const serving = this.serving;
    if (!serving) return;
    this.serving = undefined;
    serving.release();
    serving.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => serving.server.close((e) => (e ? reject(e) : resolve())));
  }

  private async pipeline(options: { dataset: string; lemmatize?: boolean }): Promise<SuggestionPipeline> {
    const vocabulary = await loadCorpusFile(options.dataset);
    return createPipeline(vocabulary, { lemmatize: options.lemmatize });
  }

  private printSuggestions(pipeline: SuggestionPipeline, words: string[], options: SuggestOptions): void {
    const results = words.map((w) => pipeline.explain(w, options.k));
    if (options.json) {
      this.io.stdout.write(JSON.stringify(results, null, 2) + "\n");
      return;
    }
    for (const r of results) {
      const list = r.suggestions.length ? r.suggestions.map((s) => s.word).join(", ") : "(no suggestions)";
      this.io.stdout.write(`${r.input}: ${list}\n`);
    }
  }

  private async repl(pipeline: SuggestionPipeline, k: number): Promise<void> {
    const out = this.io.stdout;
    const rl = createInterface({ input: this.io.input, terminal: false });

    out.write("Ready. Type a word to get suggestions. Type 'exit' to quit.\n");
    out.write("Enter a word: ");

    for await (const line of rl) {
      const input = line.trim().toLowerCase();
      if (input === "exit" || input === "quit") break;

      if (!ALPHABETIC.test(input)) {
        out.write("Please enter only alphabetic characters (a-z).\n");
      } else {
        out.write(this.replyTo(pipeline, input, k));
      }
      out.write("Enter a word: ");
    }

    out.write("\nGoodbye!\n");
  }

  private replyTo(pipeline: SuggestionPipeline, input: string, k: number): string {
    try {
      const suggestions = pipeline.suggest(input, k);
      return suggestions.length
        ? `Top suggestions: ${suggestions.map((s) => s.word).join(", ")}\n`
        : "(No suggestions found)\n";
    } catch (e) {
      if (e instanceof InvalidArgumentError) return `${e.message}\n`;
      throw e;
    }
  }
}

import { closeOnSignals, startServer } from "./http/server.js";
import { loadConfig } from "./config.js";
import { createPipeline, loadCorpusFile } from "./corpus.js";

const config = loadConfig();
const vocabulary = await loadCorpusFile(config.corpusPath);

const { server, port } = await startServer({
  pipeline: createPipeline(vocabulary, { lemmatize: config.lemmatize }),
  port: config.port,
  metricsEnabled: config.metricsEnabled,
  defaultSuggestions: config.suggestLimit,
  maxSuggestions: config.maxSuggestions,
});

closeOnSignals(server);

console.log(`loaded ${vocabulary.size} words (${vocabulary.total} tokens) from ${config.corpusPath}`);
console.log(`listening on :${port}`);

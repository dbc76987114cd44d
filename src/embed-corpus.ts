/**
 * Offline step: (re)build the embedding store from the chunk artifact.
 *
 *   npm run embed-corpus            embed only chunks without a stored vector
 *   npm run embed-corpus -- --force re-embed every chunk
 *
 * Run after the extraction pipeline updates rag_chunks.json, before restarting the server.
 */
import { getConfig } from "./config";
import { describeError } from "./errors";
import { loadCorpus, loadEmbedder } from "./startup";

const config = getConfig();
const force = process.argv.slice(2).includes("--force");

try {
  const embedder = await loadEmbedder(config);
  const corpus = await loadCorpus(config, embedder, { force });
  console.error(
    `[FAQ] Embedding store ready at ${config.EMBEDDINGS_PATH}: ${corpus.chunks.length} chunks, dim=${corpus.dimension}`,
  );
} catch (e) {
  console.error(`[FAQ] embed-corpus failed: ${describeError(e)}`);
  process.exit(1);
}

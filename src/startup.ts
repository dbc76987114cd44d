import { createAppContext, type AppContext } from "./app-context";
import { configureTransformersCache } from "./cache";
import type { Config } from "./config";
import { listFunds, readChunkArtifact } from "./corpus";
import { Embeddings } from "./embeddings";
import { selectAnswerGenerator } from "./generation";
import { Indexer, type BuildOptions } from "./indexer";
import { EmbeddingStore } from "./persistence";
import type { Corpus } from "./types";

/** Point the model cache somewhere stable, then load the embedding model. */
export async function loadEmbedder(config: Config): Promise<Embeddings> {
  await configureTransformersCache(config.TRANSFORMERS_CACHE);
  const embedder = new Embeddings(config.MODEL_NAME);
  await embedder.init();
  return embedder;
}

/** Validate the chunk artifact and pair it with stored or freshly computed embeddings. */
export async function loadCorpus(
  config: Config,
  embedder: Embeddings,
  opts: BuildOptions = {},
): Promise<Corpus> {
  const records = await readChunkArtifact(config.RAG_CHUNKS_PATH);
  console.error(`[FAQ] Loaded ${records.length} chunks from ${config.RAG_CHUNKS_PATH}`);
  const indexer = new Indexer({
    records,
    embedder,
    store: new EmbeddingStore(config.EMBEDDINGS_PATH, config.VERBOSE),
    verbose: config.VERBOSE,
  });
  const corpus = await indexer.build(opts);
  console.error(`[FAQ] Corpus ready: ${listFunds(corpus).length} funds, dim=${corpus.dimension}`);
  return corpus;
}

/**
 * Full startup: embedding model, corpus, answer strategy. Any failure here is fatal;
 * the caller must not start serving.
 */
export async function initializeAppContext(config: Config): Promise<AppContext> {
  const embedder = await loadEmbedder(config);
  const corpus = await loadCorpus(config, embedder);
  return createAppContext({ config, corpus, embedder, generator: selectAnswerGenerator(config) });
}

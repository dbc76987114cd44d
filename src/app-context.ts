import type { Config } from "./config";
import type { AnswerGenerator } from "./generation";
import { GuardrailClassifier } from "./guardrail";
import { QueryPipeline } from "./pipeline";
import { StatusManager } from "./status";
import type { Corpus, Embedder } from "./types";

/**
 * Everything a request handler needs, created once at startup and frozen. Handlers get
 * it passed in; there are no module-level singletons.
 */
export interface AppContext {
  readonly config: Config;
  readonly corpus: Corpus;
  readonly embedder: Embedder;
  readonly generator: AnswerGenerator;
  readonly pipeline: QueryPipeline;
  readonly status: StatusManager;
}

export interface AppContextParts {
  config: Config;
  corpus: Corpus;
  embedder: Embedder;
  generator: AnswerGenerator;
  status?: StatusManager;
}

/** Assemble (and freeze) a context from already-initialized parts. */
export function createAppContext(parts: AppContextParts): AppContext {
  const { config, corpus, embedder, generator } = parts;
  if (embedder.dimension !== corpus.dimension) {
    throw new Error(
      `Embedder dimension ${embedder.dimension} does not match corpus dimension ${corpus.dimension}`,
    );
  }
  const status = parts.status ?? new StatusManager();
  status.setModelName(embedder.modelName);
  status.setGenerator(generator.kind);
  status.setCorpus(corpus);
  status.markReady();

  const pipeline = new QueryPipeline({
    corpus,
    embedder,
    guardrail: new GuardrailClassifier(),
    generator,
    threshold: config.SIMILARITY_THRESHOLD,
    topK: config.TOP_K,
    maxQuestionLength: config.MAX_QUESTION_LENGTH,
    verbose: config.VERBOSE,
  });
  return Object.freeze({ config, corpus, embedder, generator, pipeline, status });
}

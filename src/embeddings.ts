import { pipeline, type FeatureExtractionPipeline } from "@xenova/transformers";
import { DEFAULT_MODEL_NAME } from "./config";
import { ModelUnavailableError, describeError } from "./errors";
import type { Embedder } from "./types";

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/**
 * Sentence encoder backed by a @xenova/transformers feature-extraction pipeline.
 * One instance is created at startup and shared read-only by every request.
 */
export class Embeddings implements Embedder {
  public readonly modelName: string;
  private embedder: FeatureExtractionPipeline | null = null;
  private dim = 0;

  public constructor(modelName?: string) {
    this.modelName = modelName?.trim() || DEFAULT_MODEL_NAME;
  }

  public get dimension(): number {
    return this.dim;
  }

  /**
   * Load the model and probe its output dimension (idempotent).
   *
   * @throws {ModelUnavailableError} If the model cannot be loaded or produces no output.
   */
  public async init(): Promise<void> {
    if (this.embedder) return;
    console.error(`[FAQ] Loading embedding model: ${this.modelName}`);
    try {
      const embedder = await pipeline("feature-extraction", this.modelName);
      const probe = await this.run(embedder, "dimension probe");
      if (probe.length === 0) throw new Error("model produced an empty embedding");
      this.embedder = embedder;
      this.dim = probe.length;
    } catch (e) {
      throw new ModelUnavailableError(this.modelName, e);
    }
    console.error(`[FAQ] Model ready: ${this.modelName} (dim=${this.dim})`);
  }

  /**
   * Embed a single text with mean pooling and L2 normalization.
   *
   * Blank input or a failure inside the model yields an all-zero vector, which scores 0
   * against every chunk and therefore never passes the retrieval threshold.
   *
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   */
  public async embed(text: string): Promise<Float32Array> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    if (!text.trim()) return new Float32Array(this.dim);
    try {
      return await this.run(this.embedder, text);
    } catch (e) {
      console.error(`[FAQ] Embedding failed, using neutral vector: ${describeError(e)}`);
      return new Float32Array(this.dim);
    }
  }

  private async run(embedder: FeatureExtractionPipeline, text: string): Promise<Float32Array> {
    const output = await embedder(text, { pooling: "mean", normalize: true });
    return output.data as Float32Array;
  }
}

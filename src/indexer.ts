import { createCorpus } from "./corpus";
import { CorpusError } from "./errors";
import type { EmbeddingStore } from "./persistence";
import type { ChunkRecord, Corpus, Embedder, FactValue } from "./types";

export interface IndexerOptions {
  records: readonly ChunkRecord[];
  embedder: Embedder;
  store: EmbeddingStore;
  verbose?: boolean;
}

export interface BuildOptions {
  /** Ignore stored vectors and re-embed every chunk. */
  force?: boolean;
}

function flattenValue(value: FactValue): string {
  return typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Text a chunk is embedded from. The fund name is repeated to weigh it more heavily
 * than the field names, which are shared by every fund of the same type.
 */
export function chunkEmbeddingText(record: ChunkRecord): string {
  const fields = Object.entries(record.data)
    .map(([k, v]) => `${k}: ${flattenValue(v)}`)
    .join(" ");
  return `${record.fundName} ${record.fundName} ${record.chunkType} ${fields}`;
}

/**
 * Pairs validated chunk records with embeddings. Stored vectors are reused when they
 * match the current model and dimension; anything missing is embedded and the store is
 * rewritten. Runs once before serving, never during request handling.
 */
export class Indexer {
  private readonly records: readonly ChunkRecord[];
  private readonly embedder: Embedder;
  private readonly store: EmbeddingStore;
  private readonly verbose: boolean;

  public constructor(opts: IndexerOptions) {
    this.records = opts.records;
    this.embedder = opts.embedder;
    this.store = opts.store;
    this.verbose = !!opts.verbose;
  }

  public async build(opts: BuildOptions = {}): Promise<Corpus> {
    const dimension = this.embedder.dimension;
    if (dimension <= 0) throw new CorpusError("Embedder reports no output dimension");

    const stored = opts.force ? null : await this.store.load({ modelName: this.embedder.modelName });
    const vectors = new Map<string, Float32Array>();
    const missing: ChunkRecord[] = [];
    for (const r of this.records) {
      const v = stored?.get(r.id);
      if (v && v.length === dimension && v.some((x) => x !== 0)) vectors.set(r.id, v);
      else missing.push(r);
    }

    if (missing.length) {
      console.error(
        `[FAQ] Embedding ${missing.length}/${this.records.length} chunks (first run may take a while)`,
      );
      for (let i = 0; i < missing.length; i++) {
        if (this.verbose && i % 50 === 0) {
          console.error(`[FAQ][verbose] Embedding progress: ${i}/${missing.length}`);
        }
        const vec = await this.embedder.embed(chunkEmbeddingText(missing[i]));
        if (!vec.some((x) => x !== 0)) {
          throw new CorpusError(`Could not embed chunk ${missing[i].id}`);
        }
        vectors.set(missing[i].id, vec);
      }
      // Only vectors for current chunks are kept; ids dropped from the artifact vanish.
      await this.store.save({ modelName: this.embedder.modelName, dimension, embeddings: vectors });
    } else {
      console.error(`[FAQ] All ${this.records.length} chunks have stored embeddings.`);
    }

    return createCorpus(this.records, vectors, dimension, this.embedder.modelName);
  }
}

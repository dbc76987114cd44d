/**
 * Closed set of fact categories a chunk can belong to. Corpus loading and
 * routing both reject anything outside this list.
 */
export const CHUNK_TYPES = [
  "expense_information",
  "nav_sip_information",
  "fund_characteristics",
  "performance_metrics",
  "holdings_information",
  "risk_metrics",
] as const;

export type ChunkType = (typeof CHUNK_TYPES)[number];

/**
 * A single extracted field value. Most are literals ("0.97%", 38.5) but the
 * extraction pipeline also emits nested maps (risk ratios) and lists (top holdings).
 */
export type FactValue =
  | string
  | number
  | boolean
  | null
  | readonly FactValue[]
  | { readonly [key: string]: FactValue };

export type FactData = { readonly [field: string]: FactValue };

/** Validated chunk as read from the corpus artifact, before embeddings are attached. */
export interface ChunkRecord {
  /** Corpus-wide unique id (explicit in the artifact or `<chunk_type>:<index>`). */
  readonly id: string;
  readonly fundName: string;
  readonly chunkType: ChunkType;
  /** Field name -> value, in artifact order. Never empty. */
  readonly data: FactData;
  readonly sourceUrl: string;
}

/** A retrievable chunk with its embedding and corpus insertion order. */
export interface Chunk extends ChunkRecord {
  /** 0-based position in the corpus; used to break score ties. */
  readonly position: number;
  readonly embedding: Float32Array;
}

/** Immutable, process-wide set of chunks loaded once at startup. */
export interface Corpus {
  readonly chunks: readonly Chunk[];
  /** Embedding dimension shared by every chunk and the query embedder. */
  readonly dimension: number;
  /** Model identifier the embeddings were produced with. */
  readonly modelName: string;
}

/** Anything that can turn text into a fixed-length vector. */
export interface Embedder {
  readonly modelName: string;
  /** Output vector length. Only meaningful after initialization. */
  readonly dimension: number;
  embed(text: string): Promise<Float32Array>;
}

export interface ScoredChunk {
  readonly chunk: Chunk;
  readonly score: number;
}

/** One attribution entry in an answer, serialized as-is on the wire. */
export interface SourceRef {
  fund_name: string;
  url: string;
  type: ChunkType;
}

/** Body of a successful `/ask` response. */
export interface AskResponse {
  response: string;
  sources: SourceRef[];
}

import { createCorpus } from "./corpus";
import type { ChunkRecord, ChunkType, Corpus, Embedder, FactData } from "./types";

export const ELSS_FUND = "UTI ELSS Tax Saver Fund";
export const ELSS_URL = "https://groww.in/mutual-funds/uti-elss-tax-saver-fund-direct-growth";
export const FLEXI_FUND = "Meridian Flexi Cap Fund";
export const FLEXI_URL = "https://example.com/funds/meridian-flexi-cap-fund";

/**
 * Embedder stand-in: exact text -> vector lookup, zero vector for anything unknown.
 * Records every text it was asked to embed.
 */
export class StubEmbedder implements Embedder {
  public readonly modelName: string;
  public readonly calls: string[] = [];
  private readonly vectors: Map<string, Float32Array>;

  public constructor(
    public readonly dimension: number,
    vectors: Record<string, number[]> = {},
    modelName = "stub-model",
  ) {
    this.modelName = modelName;
    this.vectors = new Map(Object.entries(vectors).map(([k, v]) => [k, Float32Array.from(v)] as const));
  }

  public async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    return this.vectors.get(text) ?? new Float32Array(this.dimension);
  }
}

export interface ChunkFixture {
  id: string;
  fundName: string;
  chunkType: ChunkType;
  data: FactData;
  sourceUrl: string;
  embedding: number[];
}

/** Build a frozen corpus straight from fixtures (embeddings given inline). */
export function makeCorpus(fixtures: readonly ChunkFixture[], modelName = "stub-model"): Corpus {
  const records: ChunkRecord[] = fixtures.map(({ embedding: _embedding, ...r }) => r);
  const vectors = new Map(fixtures.map((f) => [f.id, Float32Array.from(f.embedding)] as const));
  const dimension = fixtures[0]?.embedding.length ?? 0;
  return createCorpus(records, vectors, dimension, modelName);
}

/**
 * Small two-fund catalogue in a 4-dimensional space. Axis 0 is "ELSS expense", axis 1
 * "ELSS nav", axis 2 "flexi risk"; axis 3 belongs to nothing.
 */
export const SAMPLE_FIXTURES: readonly ChunkFixture[] = [
  {
    id: "elss-expense",
    fundName: ELSS_FUND,
    chunkType: "expense_information",
    data: { expense_ratio: "0.91%", stamp_duty: "0.005%" },
    sourceUrl: ELSS_URL,
    embedding: [1, 0, 0, 0],
  },
  {
    id: "elss-nav",
    fundName: ELSS_FUND,
    chunkType: "nav_sip_information",
    data: { nav: "₹187.45", nav_date: "10 Oct 2025", min_sip: "₹500", exit_load: "Nil" },
    sourceUrl: ELSS_URL,
    embedding: [0, 1, 0, 0],
  },
  {
    id: "flexi-expense",
    fundName: FLEXI_FUND,
    chunkType: "expense_information",
    data: { expense_ratio: "0.63%", stamp_duty: "0.005%" },
    sourceUrl: FLEXI_URL,
    embedding: [0.8, 0.6, 0, 0],
  },
  {
    id: "flexi-risk",
    fundName: FLEXI_FUND,
    chunkType: "risk_metrics",
    data: { risk_level: "Very High", ratios: { sharpe: 1.12, beta: 0.87 } },
    sourceUrl: FLEXI_URL,
    embedding: [0, 0, 1, 0],
  },
];

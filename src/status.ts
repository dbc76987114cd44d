import { APP_VERSION } from "./config";
import type { ChunkType, Corpus } from "./types";

/** Counters describing the loaded corpus. */
export interface CorpusStatus {
  chunks: number;
  funds: number;
  dimension: number;
  byType: Record<ChunkType, number>;
}

/**
 * Snapshot served by `GET /health`. `ready` flips to true once the corpus is loaded and
 * the embedder is initialized; it never flips back.
 */
export interface ServerStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  /** Embedding model identifier (empty before init). */
  modelName: string;
  /** Active transport: 'http' | 'stdio' | 'unknown'. */
  transport: string;
  /** Answer strategy chosen at startup. */
  generator: "remote" | "template" | "unknown";
  ready: boolean;
  /** ISO timestamp when the process started. */
  startedAt: string;
  corpus: CorpusStatus;
}

function emptyCounts(): Record<ChunkType, number> {
  return {
    expense_information: 0,
    nav_sip_information: 0,
    fund_characteristics: 0,
    performance_metrics: 0,
    holdings_information: 0,
    risk_metrics: 0,
  };
}

/**
 * Startup-time status holder. Written only while the process boots; request handlers
 * read it.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      generator: initial?.generator ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      corpus: initial?.corpus ?? { chunks: 0, funds: 0, dimension: 0, byType: emptyCounts() },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  public setGenerator(kind: "remote" | "template") {
    this.data.generator = kind;
  }

  /** Record corpus counters after load. */
  public setCorpus(corpus: Corpus) {
    const byType = emptyCounts();
    for (const c of corpus.chunks) byType[c.chunkType] += 1;
    this.data.corpus = {
      chunks: corpus.chunks.length,
      funds: new Set(corpus.chunks.map((c) => c.fundName)).size,
      dimension: corpus.dimension,
      byType,
    };
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Copy of the current status. */
  public getStatus(): ServerStatus {
    return { ...this.data, corpus: { ...this.data.corpus, byType: { ...this.data.corpus.byType } } };
  }
}

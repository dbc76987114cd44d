import { MAX_TOP_K } from "./config";
import { cosine } from "./similarity";
import type { ChunkType, Corpus, ScoredChunk } from "./types";

export interface RankOptions {
  /** Minimum cosine score a chunk needs to be kept (inclusive). */
  threshold: number;
  /** Maximum number of chunks forwarded to context building. */
  topK: number;
  /** Question as asked; enables narrowing to funds it names. */
  question?: string;
}

/**
 * Score every chunk of the candidate types against the query embedding.
 *
 * Order is by descending score; equal scores keep corpus order (Array#sort is stable
 * and candidates are visited in corpus order). An empty result means nothing relevant
 * was found and is not an error.
 */
export function rankChunks(
  corpus: Corpus,
  queryEmbedding: Float32Array,
  candidateTypes: readonly ChunkType[],
  opts: RankOptions,
): ScoredChunk[] {
  const allowed = new Set(candidateTypes);
  const scored: ScoredChunk[] = [];
  for (const chunk of corpus.chunks) {
    if (!allowed.has(chunk.chunkType)) continue;
    scored.push({ chunk, score: cosine(queryEmbedding, chunk.embedding) });
  }
  scored.sort((a, b) => b.score - a.score);

  const kept = scored.filter((s) => s.score >= opts.threshold);
  const focused = opts.question ? focusOnNamedFunds(opts.question, kept) : kept;
  return focused.slice(0, Math.max(1, opts.topK));
}

/**
 * If the question names one or more funds verbatim, drop matches for other funds so a
 * close-but-wrong scheme does not crowd the answer. Otherwise returns the input.
 */
export function focusOnNamedFunds(question: string, ranked: ScoredChunk[]): ScoredChunk[] {
  const q = question.toLowerCase();
  const named = new Set(
    ranked.map((s) => s.chunk.fundName).filter((name) => q.includes(name.toLowerCase())),
  );
  return named.size ? ranked.filter((s) => named.has(s.chunk.fundName)) : ranked;
}

/**
 * Honour "list 5 funds"-style questions by widening the cap, never above
 * {@link MAX_TOP_K}. Returns `fallback` when the question asks for no count.
 */
export function requestedTopK(question: string, fallback: number): number {
  const m = /(\d+)\s+funds?\b/i.exec(question);
  if (!m) return fallback;
  const n = Number(m[1]);
  return n > 0 ? Math.min(n, MAX_TOP_K) : fallback;
}

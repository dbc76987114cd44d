import { chunkTypeLabel, formatFactLines } from "./format";
import type { Chunk, ScoredChunk } from "./types";

/** One chunk admitted into the context, with the tag its lines carry. */
export interface ContextEntry {
  /** `C1`, `C2`, ... in context order. */
  readonly ref: string;
  readonly chunk: Chunk;
  readonly score: number;
}

export interface ContextBlock {
  /** Entries grouped by fund, then by chunk type. */
  readonly entries: readonly ContextEntry[];
  /** Prompt-ready rendering of {@link entries}. */
  readonly text: string;
}

/**
 * Build the attributable context for an answer.
 *
 * Keeps only the best-scoring chunk per (fund, chunk type) and never the same chunk
 * twice; input is assumed to be in descending score order, as the ranker returns it.
 * Funds appear in the order of their best chunk. Nothing outside the supplied chunks
 * is emitted.
 */
export function buildContext(ranked: readonly ScoredChunk[]): ContextBlock {
  const seenIds = new Set<string>();
  const seenPairs = new Set<string>();
  const byFund = new Map<string, ScoredChunk[]>();
  for (const s of ranked) {
    const pair = `${s.chunk.fundName}\u0000${s.chunk.chunkType}`;
    if (seenIds.has(s.chunk.id) || seenPairs.has(pair)) continue;
    seenIds.add(s.chunk.id);
    seenPairs.add(pair);
    const group = byFund.get(s.chunk.fundName);
    if (group) group.push(s);
    else byFund.set(s.chunk.fundName, [s]);
  }

  const entries: ContextEntry[] = [];
  const lines: string[] = [];
  for (const [fundName, group] of byFund) {
    lines.push(`Fund: ${fundName}`);
    for (const s of group) {
      const ref = `C${entries.length + 1}`;
      entries.push({ ref, chunk: s.chunk, score: s.score });
      lines.push(`  [${ref}] ${chunkTypeLabel(s.chunk.chunkType)}`);
      lines.push(...formatFactLines(s.chunk.data, "    "));
      lines.push(`    Source: ${s.chunk.sourceUrl}`);
    }
  }
  return { entries, text: lines.join("\n") };
}

import fs from "node:fs/promises";
import { z } from "zod";
import { CorpusError } from "./errors";
import {
  CHUNK_TYPES,
  type Chunk,
  type ChunkRecord,
  type Corpus,
  type FactData,
  type FactValue,
} from "./types";

export const chunkTypeSchema = z.enum(CHUNK_TYPES);

const factValueSchema: z.ZodType<FactValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(factValueSchema),
    z.record(z.string(), factValueSchema),
  ]),
);

const factDataSchema: z.ZodType<FactData> = z
  .record(z.string(), factValueSchema)
  .refine((data) => Object.keys(data).length > 0, { message: "data must not be empty" });

/** One entry of the chunk artifact as written by the extraction pipeline. */
export const artifactChunkSchema = z.object({
  id: z.string().trim().min(1).optional(),
  fund_name: z.string().trim().min(1),
  chunk_type: chunkTypeSchema,
  data: factDataSchema,
  source_url: z.string().url(),
});

/** The artifact groups chunks by type: `{ "<chunk_type>": [chunk, ...] }`. */
export const chunkArtifactSchema = z.record(z.string(), z.array(artifactChunkSchema));

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    .join("; ");
}

/**
 * Validate a parsed chunk artifact and flatten it into corpus order (group order, then
 * entry order). Every invariant violation is fatal: a corpus that only partly loads
 * could silently answer from the wrong facts.
 */
export function parseChunkArtifact(input: unknown): ChunkRecord[] {
  const parsed = chunkArtifactSchema.safeParse(input);
  if (!parsed.success) {
    throw new CorpusError(`Invalid chunk artifact: ${formatIssues(parsed.error)}`);
  }

  const records: ChunkRecord[] = [];
  const seen = new Set<string>();
  for (const [group, entries] of Object.entries(parsed.data)) {
    entries.forEach((entry, idx) => {
      if (entry.chunk_type !== group) {
        throw new CorpusError(
          `Chunk ${group}[${idx}] declares chunk_type '${entry.chunk_type}' but is listed under '${group}'`,
        );
      }
      const id = entry.id ?? `${entry.chunk_type}:${idx}`;
      if (seen.has(id)) throw new CorpusError(`Duplicate chunk id: ${id}`);
      seen.add(id);
      records.push({
        id,
        fundName: entry.fund_name,
        chunkType: entry.chunk_type,
        data: entry.data,
        sourceUrl: entry.source_url,
      });
    });
  }
  if (!records.length) throw new CorpusError("Chunk artifact contains no chunks");
  return records;
}

/** Read and validate the chunk artifact at `filePath`. */
export async function readChunkArtifact(filePath: string): Promise<ChunkRecord[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    throw new CorpusError(`Cannot read chunk artifact at ${filePath}`, e);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new CorpusError(`Chunk artifact at ${filePath} is not valid JSON`, e);
  }
  return parseChunkArtifact(json);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !ArrayBuffer.isView(value)) {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

/**
 * Attach embeddings to validated records and freeze the result. Every record must
 * have an embedding of exactly `dimension` values.
 */
export function createCorpus(
  records: readonly ChunkRecord[],
  embeddings: ReadonlyMap<string, Float32Array>,
  dimension: number,
  modelName: string,
): Corpus {
  if (dimension <= 0) throw new CorpusError(`Invalid embedding dimension: ${dimension}`);
  const chunks: Chunk[] = records.map((r, position) => {
    const embedding = embeddings.get(r.id);
    if (!embedding) throw new CorpusError(`Missing embedding for chunk ${r.id}`);
    if (embedding.length !== dimension) {
      throw new CorpusError(
        `Embedding for chunk ${r.id} has dimension ${embedding.length}, expected ${dimension}`,
      );
    }
    // Typed arrays cannot be frozen; the chunk object and its data can.
    return Object.freeze({ ...r, data: deepFreeze(r.data), position, embedding });
  });
  return Object.freeze({ chunks: Object.freeze(chunks), dimension, modelName });
}

/** Distinct fund names in corpus order. */
export function listFunds(corpus: Corpus): string[] {
  return [...new Set(corpus.chunks.map((c) => c.fundName))];
}

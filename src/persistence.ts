import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";

/**
 * On-disk layout of the embedding store. Vectors are keyed by chunk id and encoded as
 * base64 little-endian float32 (plain number arrays are accepted on load as well).
 */
const storeSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    modelName: z.string().optional(),
    dimension: z.number().int().positive().optional(),
    chunkCount: z.number().int().nonnegative().optional(),
    savedAt: z.string().optional(),
    embEncoding: z.string().optional(),
  }),
  embeddings: z.record(z.string(), z.union([z.string(), z.array(z.number())])),
});

export interface LoadParams {
  /** Model the caller will embed queries with; a store built with another model is ignored. */
  modelName: string;
}

export interface SaveParams {
  modelName: string;
  dimension: number;
  embeddings: ReadonlyMap<string, Float32Array>;
}

function decodeVector(value: string | number[]): Float32Array | null {
  if (Array.isArray(value)) return new Float32Array(value);
  const buf = Buffer.from(value, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy out of the (possibly shared, unaligned) Buffer pool
  const out = new Float32Array(buf.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = buf.readFloatLE(i * 4);
  return out;
}

function encodeVector(v: Float32Array): string {
  const buf = Buffer.alloc(v.length * 4);
  for (let i = 0; i < v.length; i++) buf.writeFloatLE(v[i], i * 4);
  return buf.toString("base64");
}

/**
 * Load/save of precomputed chunk embeddings. A store that is missing, unreadable or
 * produced by a different model loads as `null`, which makes the indexer re-embed.
 */
export class EmbeddingStore {
  public constructor(
    private readonly storePath: string,
    private readonly verbose = false,
  ) {}

  public async load(params: LoadParams): Promise<Map<string, Float32Array> | null> {
    if (!fsSync.existsSync(this.storePath)) return null;
    try {
      const raw = await fs.readFile(this.storePath, "utf8");
      const parsed = storeSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        console.error(`[FAQ] Embedding store at ${this.storePath} has an unknown layout. Ignoring it.`);
        return null;
      }
      const { meta, embeddings } = parsed.data;
      if (meta.modelName && meta.modelName !== params.modelName) {
        console.error(
          `[FAQ] Embedding store was built with ${meta.modelName}, not ${params.modelName}. Ignoring it.`,
        );
        return null;
      }
      const out = new Map<string, Float32Array>();
      for (const [id, value] of Object.entries(embeddings)) {
        const vec = decodeVector(value);
        if (vec) out.set(id, vec);
      }
      console.error(`[FAQ] Loaded embedding store: ${out.size} vectors.`);
      if (this.verbose) console.error(`[FAQ][verbose] Loaded from ${this.storePath}`);
      return out;
    } catch (e) {
      console.error(`[FAQ] Failed to load embedding store at ${this.storePath}:`, e);
      return null;
    }
  }

  public async save(params: SaveParams): Promise<void> {
    const { modelName, dimension, embeddings } = params;
    const out = {
      version: 1,
      meta: {
        modelName,
        dimension,
        chunkCount: embeddings.size,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      embeddings: Object.fromEntries(
        [...embeddings].map(([id, v]) => [id, encodeVector(v)] as const),
      ),
    };
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    await fs.writeFile(this.storePath, JSON.stringify(out));
    if (this.verbose) console.error(`[FAQ][verbose] Persisted embedding store to ${this.storePath}`);
  }
}

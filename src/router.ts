import { z } from "zod";
import { chunkTypeSchema } from "./corpus";
import { CHUNK_TYPES, type ChunkType } from "./types";
import routingTable from "./tables/routing-rules.json" with { type: "json" };

export interface RoutingRule {
  readonly chunkType: ChunkType;
  /** Lower-case phrases; any one appearing in the question selects the rule. */
  readonly keywords: readonly string[];
}

const routingTableSchema = z.object({
  version: z.number().int().positive(),
  rules: z
    .array(
      z.object({
        chunkType: chunkTypeSchema,
        keywords: z.array(z.string().trim().min(1).toLowerCase()).min(1),
      }),
    )
    .min(1),
});

const parsedTable = routingTableSchema.parse(routingTable);

/** Version of the bundled routing table (bump when keywords change). */
export const ROUTING_TABLE_VERSION = parsedTable.version;

/** Ordered keyword -> chunk type rules, evaluated top to bottom. */
export const ROUTING_RULES: readonly RoutingRule[] = Object.freeze(
  parsedTable.rules.map((r) => Object.freeze({ chunkType: r.chunkType, keywords: Object.freeze(r.keywords) })),
);

/**
 * Map a question to the chunk types worth searching. Every rule with a keyword that
 * occurs in the question (case-insensitive substring) contributes its type, in table
 * order. No match means "search everything". Never returns an empty list.
 */
export function routeQuery(
  question: string,
  rules: readonly RoutingRule[] = ROUTING_RULES,
): ChunkType[] {
  const q = question.toLowerCase();
  const out: ChunkType[] = [];
  for (const rule of rules) {
    if (out.includes(rule.chunkType)) continue;
    if (rule.keywords.some((k) => q.includes(k.toLowerCase()))) out.push(rule.chunkType);
  }
  return out.length ? out : [...CHUNK_TYPES];
}

import { z } from "zod";
import phraseTable from "./tables/guardrail-phrases.json" with { type: "json" };

export type GuardrailVerdict =
  | { readonly kind: "advice"; readonly matched: string }
  | { readonly kind: "greeting"; readonly matched: string }
  | { readonly kind: "factual" };

export interface GuardrailTables {
  readonly advicePhrases: readonly string[];
  readonly greetings: readonly string[];
}

const phraseTableSchema = z.object({
  version: z.number().int().positive(),
  advicePhrases: z.array(z.string().trim().min(1)).min(1),
  greetings: z.array(z.string().trim().min(1)).min(1),
});

const parsedTable = phraseTableSchema.parse(phraseTable);

export const GUARDRAIL_TABLE_VERSION = parsedTable.version;

/** Longest question (in words) still treated as a bare greeting, e.g. "hello there friend". */
const MAX_GREETING_WORDS = 3;

/** Lower-case, turn punctuation into spaces, collapse whitespace. Apostrophes are dropped. */
export function normalizeQuestion(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compilePhrase(phrase: string): { phrase: string; re: RegExp } {
  const norm = normalizeQuestion(phrase);
  return { phrase: norm, re: new RegExp(`(?:^| )${escapeRegExp(norm)}(?: |$)`) };
}

/**
 * Pre-retrieval intent check. Advice-seeking wins over greeting, so "hi, which fund is
 * best?" is refused rather than welcomed.
 */
export class GuardrailClassifier {
  private readonly advice: { phrase: string; re: RegExp }[];
  private readonly greetings: string[];

  public constructor(tables: GuardrailTables = parsedTable) {
    this.advice = tables.advicePhrases.map(compilePhrase);
    this.greetings = tables.greetings.map(normalizeQuestion);
  }

  public classify(question: string): GuardrailVerdict {
    const q = normalizeQuestion(question);

    const advice = this.advice.find((a) => a.re.test(q));
    if (advice) return { kind: "advice", matched: advice.phrase };

    const words = q ? q.split(" ").length : 0;
    const greeting = this.greetings.find(
      (g) => q === g || (q.startsWith(`${g} `) && words <= MAX_GREETING_WORDS),
    );
    if (greeting) return { kind: "greeting", matched: greeting };

    return { kind: "factual" };
  }
}

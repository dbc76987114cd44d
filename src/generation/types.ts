import type { ContextBlock } from "../context";

/** Which path produced an answer; `template-fallback` means the remote call failed. */
export type GenerationStrategy = "remote" | "template" | "template-fallback";

export interface GeneratedAnswer {
  readonly text: string;
  readonly strategy: GenerationStrategy;
}

/**
 * Turns a question plus retrieved context into answer text. Implementations may only
 * restate facts present in `context`.
 */
export interface AnswerGenerator {
  /** Strategy selected at startup (`remote` or `template`). */
  readonly kind: "remote" | "template";
  generate(question: string, context: ContextBlock): Promise<GeneratedAnswer>;
}

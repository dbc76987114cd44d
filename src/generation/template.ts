import type { ContextBlock } from "../context";
import { chunkTypeLabel, formatFactLines } from "../format";
import type { AnswerGenerator, GeneratedAnswer } from "./types";

export const TEMPLATE_INTRO = "Here is what I found:";

/**
 * Deterministic answer: every retrieved field, verbatim, grouped per chunk with its
 * source. Used when no remote credential is configured and as the remote fallback.
 */
export class TemplateAnswerGenerator implements AnswerGenerator {
  public readonly kind = "template" as const;

  public render(context: ContextBlock): string {
    const blocks = context.entries.map(({ chunk }) =>
      [
        `${chunk.fundName} (${chunkTypeLabel(chunk.chunkType)})`,
        ...formatFactLines(chunk.data, "", "- "),
        `Source: ${chunk.sourceUrl}`,
      ].join("\n"),
    );
    return [TEMPLATE_INTRO, ...blocks].join("\n\n");
  }

  public async generate(_question: string, context: ContextBlock): Promise<GeneratedAnswer> {
    return { text: this.render(context), strategy: "template" };
  }
}

import type { Config } from "../config";
import { GeminiAnswerGenerator, createGeminiModel, type TextModel } from "./gemini";
import { TemplateAnswerGenerator } from "./template";
import type { AnswerGenerator } from "./types";

export type { AnswerGenerator, GeneratedAnswer, GenerationStrategy } from "./types";
export { TemplateAnswerGenerator } from "./template";
export { GeminiAnswerGenerator } from "./gemini";

/**
 * Pick the answer strategy once at startup: remote when a Google API key is
 * configured, template otherwise. `model` overrides the Gemini client (tests).
 */
export function selectAnswerGenerator(
  config: Pick<Config, "GOOGLE_API_KEY" | "GEMINI_MODEL" | "GENERATION_TIMEOUT_MS" | "VERBOSE">,
  model?: TextModel,
): AnswerGenerator {
  const template = new TemplateAnswerGenerator();
  if (!config.GOOGLE_API_KEY) {
    console.error("[FAQ] No GOOGLE_API_KEY configured; answers use the template strategy.");
    return template;
  }
  console.error(`[FAQ] Remote generation enabled with ${config.GEMINI_MODEL}.`);
  return new GeminiAnswerGenerator({
    model:
      model ??
      createGeminiModel(config.GOOGLE_API_KEY, config.GEMINI_MODEL, config.GENERATION_TIMEOUT_MS),
    fallback: template,
    timeoutMs: config.GENERATION_TIMEOUT_MS,
    verbose: config.VERBOSE,
  });
}

import { GoogleGenerativeAI } from "@google/generative-ai";
import type { ContextBlock } from "../context";
import { GenerationError, describeError } from "../errors";
import type { TemplateAnswerGenerator } from "./template";
import type { AnswerGenerator, GeneratedAnswer } from "./types";

/**
 * The slice of the Gemini SDK this module relies on. `GenerativeModel` satisfies it;
 * tests substitute an in-process fake.
 */
export interface TextModel {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

export interface GeminiGeneratorOptions {
  model: TextModel;
  fallback: TemplateAnswerGenerator;
  /** Upper bound for one remote call before the template answer is used. */
  timeoutMs: number;
  verbose?: boolean;
}

const NAV_QUESTION = /\bnav\b|net asset value/i;

// Numbers worth checking: anything with a decimal point or percent sign, or three or
// more digits. Short bare integers (list markers, "5 funds") are ignored.
const NUMBER_TOKEN = /\d[\d,]*(?:\.\d+)?%?/g;

export function buildPrompt(question: string, context: ContextBlock): string {
  const format = NAV_QUESTION.test(question)
    ? 'Answer directly in the form "The NAV of <fund> is <value> as on <date>." using the values exactly as written.'
    : "Answer accurately and concisely in a clear, easy-to-read format.";
  return `You answer factual questions about mutual fund schemes.
Use ONLY the facts in the context below. Copy every number, percentage and date exactly as written.
Do not add facts, estimates or opinions that are not in the context.
If the context does not contain the answer, say you don't have this information.
This is factual information only. Never give investment advice or recommendations.
${format}

Context:
${context.text}

Question: ${question}

Response:`;
}

/** Whole number tokens of `text`, commas dropped, each also without its trailing "%". */
function numberTokens(text: string): Set<string> {
  const out = new Set<string>();
  for (const token of text.match(NUMBER_TOKEN) ?? []) {
    const t = token.replace(/,/g, "");
    out.add(t);
    out.add(t.replace(/%$/, ""));
  }
  return out;
}

/**
 * Every checked number in `answer` must appear as a whole token in the context (or the
 * question). Commas are ignored so "18,234.56" matches "18234.56".
 */
export function findUngroundedNumbers(answer: string, context: ContextBlock, question: string): string[] {
  const grounded = numberTokens(`${context.text}\n${question}`);
  const out: string[] = [];
  for (const token of answer.match(NUMBER_TOKEN) ?? []) {
    const t = token.replace(/,/g, "");
    const digits = t.replace(/\D/g, "").length;
    if (!t.includes(".") && !t.includes("%") && digits < 3) continue;
    if (!grounded.has(t)) out.push(token);
  }
  return out;
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new GenerationError(`Remote generation timed out after ${ms}ms`, "TIMEOUT")),
      ms,
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Remote strategy: phrases the answer with Gemini. Any failure of a single call
 * (timeout, service error, empty or ungrounded text) falls back to the template answer
 * for that request. There are no retries.
 */
export class GeminiAnswerGenerator implements AnswerGenerator {
  public readonly kind = "remote" as const;
  private readonly model: TextModel;
  private readonly fallback: TemplateAnswerGenerator;
  private readonly timeoutMs: number;
  private readonly verbose: boolean;

  public constructor(opts: GeminiGeneratorOptions) {
    this.model = opts.model;
    this.fallback = opts.fallback;
    this.timeoutMs = opts.timeoutMs;
    this.verbose = !!opts.verbose;
  }

  public async generate(question: string, context: ContextBlock): Promise<GeneratedAnswer> {
    try {
      const text = await this.callRemote(question, context);
      return { text, strategy: "remote" };
    } catch (e) {
      console.error(`[FAQ] Remote generation failed, using template answer: ${describeError(e)}`);
      return { text: this.fallback.render(context), strategy: "template-fallback" };
    }
  }

  private async callRemote(question: string, context: ContextBlock): Promise<string> {
    let text: string;
    try {
      const result = await withTimeout(
        this.model.generateContent(buildPrompt(question, context)),
        this.timeoutMs,
      );
      text = result.response.text().trim();
    } catch (e) {
      if (e instanceof GenerationError) throw e;
      throw new GenerationError("Remote generation service error", "SERVICE", e);
    }
    if (!text) throw new GenerationError("Remote generation returned no text", "EMPTY");

    const ungrounded = findUngroundedNumbers(text, context, question);
    if (ungrounded.length) {
      throw new GenerationError(
        `Remote answer cites values absent from context: ${ungrounded.join(", ")}`,
        "UNGROUNDED",
      );
    }
    if (this.verbose) console.error(`[FAQ][verbose] Remote answer: ${text.length} chars`);
    return text;
  }
}

/** Gemini model handle with the SDK's own request timeout set as well. */
export function createGeminiModel(apiKey: string, modelName: string, timeoutMs: number): TextModel {
  return new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName }, { timeout: timeoutMs });
}

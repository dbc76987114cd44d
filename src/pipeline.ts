import { buildContext, type ContextBlock } from "./context";
import { ValidationError } from "./errors";
import type { AnswerGenerator, GeneratedAnswer, GenerationStrategy } from "./generation";
import type { GuardrailClassifier, GuardrailVerdict } from "./guardrail";
import { rankChunks, requestedTopK } from "./ranker";
import {
  NO_INFORMATION_TEXT,
  REFUSAL_TEXT,
  WELCOME_TEXT,
  answeredResponse,
  unsourcedResponse,
} from "./response";
import { routeQuery } from "./router";
import type { AskResponse, ChunkType, Corpus, Embedder, ScoredChunk } from "./types";

export type TerminalState = "REFUSED" | "GREETED" | "NO_MATCH" | "ANSWERED";

export type QueryState =
  | "RECEIVED"
  | "GUARDRAIL_CHECKED"
  | "ROUTED"
  | "RETRIEVED"
  | "CONTEXT_BUILT"
  | TerminalState;

/** Per-query state; each variant carries exactly what the next transition needs. */
type Step =
  | { state: "RECEIVED" }
  | { state: "GUARDRAIL_CHECKED"; verdict: GuardrailVerdict }
  | { state: "ROUTED"; routes: ChunkType[] }
  | { state: "RETRIEVED"; routes: ChunkType[]; ranked: ScoredChunk[] }
  | { state: "CONTEXT_BUILT"; routes: ChunkType[]; ranked: ScoredChunk[]; context: ContextBlock }
  | { state: "REFUSED" | "GREETED"; response: AskResponse }
  | { state: "NO_MATCH"; routes: ChunkType[]; response: AskResponse }
  | {
      state: "ANSWERED";
      routes: ChunkType[];
      ranked: ScoredChunk[];
      answer: GeneratedAnswer;
      response: AskResponse;
    };

type TerminalStep = Extract<Step, { state: TerminalState }>;

export interface QueryOutcome {
  readonly state: TerminalState;
  /** States visited, RECEIVED first, terminal state last. */
  readonly trace: readonly QueryState[];
  readonly response: AskResponse;
  /** Chunk types searched; empty when the guardrail ended the query. */
  readonly routes: readonly ChunkType[];
  /** Chunks that cleared the threshold, best first. */
  readonly ranked: readonly ScoredChunk[];
  /** How the answer text was produced; null for canned responses. */
  readonly strategy: GenerationStrategy | null;
}

export interface PipelineDeps {
  corpus: Corpus;
  embedder: Embedder;
  guardrail: GuardrailClassifier;
  generator: AnswerGenerator;
  threshold: number;
  topK: number;
  maxQuestionLength: number;
  verbose?: boolean;
}

function isTerminal(step: Step): step is TerminalStep {
  return (
    step.state === "REFUSED" ||
    step.state === "GREETED" ||
    step.state === "NO_MATCH" ||
    step.state === "ANSWERED"
  );
}

/**
 * Per-query control flow as an explicit state machine:
 *
 *   RECEIVED -> GUARDRAIL_CHECKED -> REFUSED | GREETED | ROUTED
 *   ROUTED -> RETRIEVED -> NO_MATCH | CONTEXT_BUILT -> ANSWERED
 *
 * Every terminal state is a successful answer. Only invalid input (ValidationError) and
 * unexpected faults escape {@link run}. Holds no per-query state between calls.
 */
export class QueryPipeline {
  public constructor(private readonly deps: PipelineDeps) {}

  /**
   * @throws {ValidationError} If the question is empty or too long.
   */
  public async run(rawQuestion: string): Promise<QueryOutcome> {
    const question = rawQuestion.trim();
    if (!question) throw new ValidationError("question is required");
    if (question.length > this.deps.maxQuestionLength) {
      throw new ValidationError(
        `question must be at most ${this.deps.maxQuestionLength} characters`,
      );
    }

    const trace: QueryState[] = [];
    let step: Step = { state: "RECEIVED" };
    trace.push(step.state);
    while (!isTerminal(step)) {
      step = await this.transition(step, question);
      trace.push(step.state);
    }

    if (this.deps.verbose) console.error(`[FAQ][verbose] ${trace.join(" -> ")}`);
    return {
      state: step.state,
      trace,
      response: step.response,
      routes: "routes" in step ? step.routes : [],
      ranked: "ranked" in step ? step.ranked : [],
      strategy: step.state === "ANSWERED" ? step.answer.strategy : null,
    };
  }

  private async transition(step: Exclude<Step, TerminalStep>, question: string): Promise<Step> {
    switch (step.state) {
      case "RECEIVED":
        return { state: "GUARDRAIL_CHECKED", verdict: this.deps.guardrail.classify(question) };

      case "GUARDRAIL_CHECKED":
        if (step.verdict.kind === "advice") {
          return { state: "REFUSED", response: unsourcedResponse(REFUSAL_TEXT) };
        }
        if (step.verdict.kind === "greeting") {
          return { state: "GREETED", response: unsourcedResponse(WELCOME_TEXT) };
        }
        return { state: "ROUTED", routes: routeQuery(question) };

      case "ROUTED": {
        const embedding = await this.deps.embedder.embed(question);
        const ranked = rankChunks(this.deps.corpus, embedding, step.routes, {
          threshold: this.deps.threshold,
          topK: requestedTopK(question, this.deps.topK),
          question,
        });
        return { state: "RETRIEVED", routes: step.routes, ranked };
      }

      case "RETRIEVED":
        if (!step.ranked.length) {
          return {
            state: "NO_MATCH",
            routes: step.routes,
            response: unsourcedResponse(NO_INFORMATION_TEXT),
          };
        }
        return { ...step, state: "CONTEXT_BUILT", context: buildContext(step.ranked) };

      case "CONTEXT_BUILT": {
        const answer = await this.deps.generator.generate(question, step.context);
        return {
          state: "ANSWERED",
          routes: step.routes,
          ranked: step.ranked,
          answer,
          response: answeredResponse(answer.text, step.context),
        };
      }
    }
  }
}

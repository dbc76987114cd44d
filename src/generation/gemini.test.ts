import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildContext } from "../context";
import { ELSS_FUND, SAMPLE_FIXTURES, makeCorpus } from "../test-support";
import { GeminiAnswerGenerator, buildPrompt, findUngroundedNumbers, type TextModel } from "./gemini";
import { selectAnswerGenerator } from "./index";
import { TemplateAnswerGenerator } from "./template";

const corpus = makeCorpus(SAMPLE_FIXTURES);
const context = buildContext([{ chunk: corpus.chunks[0], score: 1 }]);
const question = `What is the expense ratio of ${ELSS_FUND}?`;
const templateText = new TemplateAnswerGenerator().render(context);

function replying(text: string): TextModel {
  return { generateContent: async () => ({ response: { text: () => text } }) };
}

function remote(model: TextModel, timeoutMs = 1000) {
  return new GeminiAnswerGenerator({ model, fallback: new TemplateAnswerGenerator(), timeoutMs });
}

describe("buildPrompt", () => {
  it("embeds the context and the question", () => {
    const prompt = buildPrompt(question, context);
    expect(prompt).toContain(`Context:\n${context.text}\n`);
    expect(prompt).toContain(`Question: ${question}`);
    expect(prompt).toContain("Never give investment advice");
  });

  it("asks for the NAV sentence form on NAV questions only", () => {
    expect(buildPrompt(`What is the NAV of ${ELSS_FUND}?`, context)).toContain(
      '"The NAV of <fund> is <value> as on <date>."',
    );
    expect(buildPrompt("How do I navigate this?", context)).toContain(
      "Answer accurately and concisely",
    );
  });
});

describe("findUngroundedNumbers", () => {
  it("accepts numbers present in the context", () => {
    expect(findUngroundedNumbers("It is 0.91% plus 0.005% stamp duty.", context, question)).toEqual([]);
  });

  it("flags numbers missing from the context", () => {
    expect(findUngroundedNumbers("It is 1.25% as of 2024.", context, question)).toEqual([
      "1.25%",
      "2024",
    ]);
  });

  it("flags numbers that only occur inside a context number", () => {
    expect(findUngroundedNumbers("The ratio is 91% or 1%, roughly 0.9.", context, question)).toEqual([
      "91%",
      "1%",
      "0.9",
    ]);
  });

  it("ignores short bare integers and thousands separators", () => {
    const navContext = buildContext([
      {
        chunk: makeCorpus([{ ...SAMPLE_FIXTURES[1], data: { nav: "₹18,234.56" } }]).chunks[0],
        score: 1,
      },
    ]);
    expect(findUngroundedNumbers("Top 3 picks: NAV is 18234.56", navContext, "nav?")).toEqual([]);
  });
});

describe("GeminiAnswerGenerator", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns a grounded remote answer as-is (trimmed)", async () => {
    const answer = await remote(replying("  The expense ratio is 0.91%.  ")).generate(question, context);
    expect(answer).toEqual({ text: "The expense ratio is 0.91%.", strategy: "remote" });
  });

  it("falls back to the template answer on timeout", async () => {
    const hanging: TextModel = { generateContent: () => new Promise(() => {}) };
    const answer = await remote(hanging, 20).generate(question, context);
    expect(answer).toEqual({ text: templateText, strategy: "template-fallback" });
    expect(console.error).toHaveBeenCalledWith(
      "[FAQ] Remote generation failed, using template answer: GenerationError: Remote generation timed out after 20ms",
    );
  });

  it("falls back on a service error", async () => {
    const failing: TextModel = {
      generateContent: async () => {
        throw new Error("quota exceeded");
      },
    };
    const answer = await remote(failing).generate(question, context);
    expect(answer).toEqual({ text: templateText, strategy: "template-fallback" });
    expect(console.error).toHaveBeenCalledWith(
      "[FAQ] Remote generation failed, using template answer: GenerationError: Remote generation service error",
    );
  });

  it("falls back on an empty reply", async () => {
    const answer = await remote(replying("   ")).generate(question, context);
    expect(answer.strategy).toBe("template-fallback");
    expect(console.error).toHaveBeenCalledWith(
      "[FAQ] Remote generation failed, using template answer: GenerationError: Remote generation returned no text",
    );
  });

  it("falls back when the reply cites values absent from the context", async () => {
    const answer = await remote(replying("The expense ratio is 1.25%.")).generate(question, context);
    expect(answer).toEqual({ text: templateText, strategy: "template-fallback" });
    expect(console.error).toHaveBeenCalledWith(
      "[FAQ] Remote generation failed, using template answer: GenerationError: Remote answer cites values absent from context: 1.25%",
    );
  });

  it("sends the grounded prompt to the model", async () => {
    const generateContent = vi.fn(async (_prompt: string) => ({ response: { text: () => "0.91%" } }));
    await remote({ generateContent }).generate(question, context);
    expect(generateContent).toHaveBeenCalledWith(buildPrompt(question, context));
  });
});

describe("selectAnswerGenerator", () => {
  const base = { GEMINI_MODEL: "gemini-1.5-flash", GENERATION_TIMEOUT_MS: 1000, VERBOSE: false };

  it("uses the template strategy without an API key", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(selectAnswerGenerator({ ...base, GOOGLE_API_KEY: undefined }).kind).toBe("template");
    spy.mockRestore();
  });

  it("uses the remote strategy when an API key is configured", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const generator = selectAnswerGenerator(
      { ...base, GOOGLE_API_KEY: "test-secret" },
      replying("ok"),
    );
    expect(generator.kind).toBe("remote");
    spy.mockRestore();
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EmbedderNotInitializedError, Embeddings } from "./embeddings";
import { ModelUnavailableError } from "./errors";

const mocks = vi.hoisted(() => ({ pipeline: vi.fn() }));

vi.mock("@xenova/transformers", () => ({ pipeline: mocks.pipeline, env: {} }));

/** Feature extractor whose successive calls return `outputs` (an Error is thrown). */
function extractor(...outputs: Array<number[] | Error>) {
  const fn = vi.fn();
  for (const out of outputs) {
    if (out instanceof Error) fn.mockRejectedValueOnce(out);
    else fn.mockResolvedValueOnce({ data: Float32Array.from(out) });
  }
  return fn;
}

describe("Embeddings", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    mocks.pipeline.mockReset();
    vi.restoreAllMocks();
  });

  it("probes the output dimension on init and embeds with mean pooling", async () => {
    const fn = extractor([0.6, 0.8, 0], [0, 1, 0]);
    mocks.pipeline.mockResolvedValue(fn);
    const embeddings = new Embeddings("test-model");
    await embeddings.init();

    expect(mocks.pipeline).toHaveBeenCalledWith("feature-extraction", "test-model");
    expect(embeddings.dimension).toBe(3);
    expect(Array.from(await embeddings.embed("What is the NAV?"))).toEqual([0, 1, 0]);
    expect(fn).toHaveBeenLastCalledWith("What is the NAV?", { pooling: "mean", normalize: true });
  });

  it("raises ModelUnavailableError when the model cannot be loaded", async () => {
    mocks.pipeline.mockRejectedValue(new Error("offline"));
    await expect(new Embeddings("test-model").init()).rejects.toThrow(
      new ModelUnavailableError("test-model"),
    );
  });

  it("raises ModelUnavailableError when the model returns an empty vector", async () => {
    mocks.pipeline.mockResolvedValue(extractor([]));
    const embeddings = new Embeddings("test-model");
    await expect(embeddings.init()).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(embeddings.embed("nav")).rejects.toBeInstanceOf(EmbedderNotInitializedError);
  });

  it("returns a zero vector when a single embedding call fails", async () => {
    mocks.pipeline.mockResolvedValue(extractor([0.6, 0.8], new Error("tensor error")));
    const embeddings = new Embeddings("test-model");
    await embeddings.init();

    const vec = await embeddings.embed("What is the exit load?");
    expect(vec).toBeInstanceOf(Float32Array);
    expect(Array.from(vec)).toEqual([0, 0]);
    expect(console.error).toHaveBeenCalledWith(
      "[FAQ] Embedding failed, using neutral vector: Error: tensor error",
    );
  });

  it("returns a zero vector for blank input without calling the model", async () => {
    const fn = extractor([0.6, 0.8]);
    mocks.pipeline.mockResolvedValue(fn);
    const embeddings = new Embeddings("test-model");
    await embeddings.init();

    expect(Array.from(await embeddings.embed("   "))).toEqual([0, 0]);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("refuses to embed before init", async () => {
    await expect(new Embeddings("test-model").embed("nav")).rejects.toThrow(
      new EmbedderNotInitializedError(),
    );
  });
});

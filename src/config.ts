import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Single dotenv load. Prefer the project-root .env next to package.json, then fall back
// to the current working directory.
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
  else dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export const DEFAULT_MODEL_NAME = "Xenova/all-MiniLM-L6-v2";
export const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";
/** Hard ceiling for a single remote generation call. */
export const MAX_GENERATION_TIMEOUT_MS = 300_000;
/** Upper bound for a per-question "N funds" request. */
export const MAX_TOP_K = 15;

export type TransportMode = "http" | "stdio";

export interface Config {
  PORT: number;
  HOST: string;
  TRANSPORT: TransportMode;
  RAG_CHUNKS_PATH: string;
  EMBEDDINGS_PATH: string;
  MODEL_NAME: string;
  TRANSFORMERS_CACHE: string | undefined;
  /** Presence selects the remote (Gemini) answer strategy. */
  GOOGLE_API_KEY: string | undefined;
  GEMINI_MODEL: string;
  GENERATION_TIMEOUT_MS: number;
  SIMILARITY_THRESHOLD: number;
  TOP_K: number;
  MAX_QUESTION_LENGTH: number;
  VERBOSE: boolean;
}

type Env = Record<string, string | undefined>;

function readInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

/**
 * Resolve runtime configuration from environment variables. Pure apart from reading
 * `env`; tests pass their own map.
 */
export function getConfig(env: Env = process.env): Config {
  const PORT = readInt(env.PORT, 5000, 1, 65535);
  const HOST = env.HOST?.trim() || "127.0.0.1";

  const TRANSPORT: TransportMode =
    (env.TRANSPORT ?? "").trim().toLowerCase() === "stdio" ? "stdio" : "http";

  // Corpus artifacts default to the project-local rag_data/ folder.
  const RAG_CHUNKS_PATH = path.resolve(env.RAG_CHUNKS_PATH?.trim() || "rag_data/rag_chunks.json");
  const EMBEDDINGS_PATH = path.resolve(env.EMBEDDINGS_PATH?.trim() || "rag_data/embeddings.json");

  const MODEL_NAME = env.MODEL_NAME?.trim() || DEFAULT_MODEL_NAME;
  const TRANSFORMERS_CACHE = env.TRANSFORMERS_CACHE?.trim() || undefined;

  const GOOGLE_API_KEY = env.GOOGLE_API_KEY?.trim() || undefined;
  const GEMINI_MODEL = env.GEMINI_MODEL?.trim() || DEFAULT_GEMINI_MODEL;
  const GENERATION_TIMEOUT_MS = readInt(
    env.GENERATION_TIMEOUT_MS,
    30_000,
    1,
    MAX_GENERATION_TIMEOUT_MS,
  );

  // Cosine threshold must stay inside [-1, 1]; anything else falls back to the default.
  const SIMILARITY_THRESHOLD = (() => {
    const raw = env.SIMILARITY_THRESHOLD?.trim();
    if (!raw) return 0.2;
    const n = Number(raw);
    return Number.isFinite(n) && n >= -1 && n <= 1 ? n : 0.2;
  })();

  const TOP_K = readInt(env.TOP_K, 10, 1, MAX_TOP_K);
  const MAX_QUESTION_LENGTH = readInt(env.MAX_QUESTION_LENGTH, 2000, 1, 100_000);

  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  return {
    PORT,
    HOST,
    TRANSPORT,
    RAG_CHUNKS_PATH,
    EMBEDDINGS_PATH,
    MODEL_NAME,
    TRANSFORMERS_CACHE,
    GOOGLE_API_KEY,
    GEMINI_MODEL,
    GENERATION_TIMEOUT_MS,
    SIMILARITY_THRESHOLD,
    TOP_K,
    MAX_QUESTION_LENGTH,
    VERBOSE,
  };
}

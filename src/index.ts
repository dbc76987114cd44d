/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env at the project root, then process env).
 * 2. Configure the on-disk transformers cache and load the embedding model. A model that
 *    cannot load is fatal: the process exits without serving.
 * 3. Validate the chunk artifact and attach embeddings (reusing the embedding store,
 *    embedding whatever is missing and persisting the result).
 * 4. Select the answer strategy once: Gemini when GOOGLE_API_KEY is set, template otherwise.
 * 5. Serve over HTTP (default) or as an MCP tool server over stdio (TRANSPORT=stdio).
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - PORT / HOST            HTTP bind address (default 127.0.0.1:5000).
 *  - TRANSPORT              'http' (default) or 'stdio'.
 *  - RAG_CHUNKS_PATH        Chunk artifact (default rag_data/rag_chunks.json).
 *  - EMBEDDINGS_PATH        Embedding store (default rag_data/embeddings.json).
 *  - MODEL_NAME             Sentence encoder (default Xenova/all-MiniLM-L6-v2).
 *  - TRANSFORMERS_CACHE     Model download directory (default .cache/transformers).
 *  - GOOGLE_API_KEY         Enables remote answer generation.
 *  - GEMINI_MODEL           Remote model (default gemini-1.5-flash).
 *  - GENERATION_TIMEOUT_MS  Remote call budget (default 30000, max 300000).
 *  - SIMILARITY_THRESHOLD   Minimum cosine score (default 0.2).
 *  - TOP_K                  Max chunks per answer (default 10, max 15).
 *  - MAX_QUESTION_LENGTH    Longest accepted question (default 2000).
 *  - VERBOSE                '1'/'true'/'yes'/'on' for extra logging.
 */
import { getConfig } from "./config";
import { describeError } from "./errors";
import { createMcpServer } from "./mcp-server";
import { initializeAppContext } from "./startup";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();

try {
  const ctx = await initializeAppContext(config);
  ctx.status.markTransport(config.TRANSPORT);
  if (config.TRANSPORT === "stdio") {
    await startStdioTransport(() => createMcpServer(ctx));
  } else {
    await startHttpTransport(ctx);
  }
} catch (e) {
  console.error(`[FAQ] Fatal startup error: ${describeError(e)}`);
  if (e instanceof Error && e.cause) console.error("[FAQ] Caused by:", e.cause);
  process.exit(1);
}

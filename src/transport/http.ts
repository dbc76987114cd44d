/**
 * HTTP transport for the assistant.
 *
 * Endpoints:
 *  - POST /ask    : `{ "question": string }` -> `{ response, sources }`
 *  - GET  /health : status snapshot (version, model, corpus counters, answer strategy)
 *
 * Error policy:
 *  - Missing / empty / over-long question, or a body that is not JSON => 400 `{ error }`.
 *  - Anything unexpected => 500 `{ error: "Internal server error" }`; details only reach
 *    the server log.
 *
 * Environment variables (via config): PORT (default 5000), HOST (default 127.0.0.1).
 *
 * Keep this file a thin shim: all answering logic lives in the query pipeline.
 */
import express from "express";
import type { Server } from "node:http";
import { z } from "zod";
import type { AppContext } from "../app-context";
import { ValidationError } from "../errors";

const askBodySchema = z.object({
  question: z.string({
    required_error: "question is required",
    invalid_type_error: "question must be a string",
  }),
});

/** Cross-origin access for the separately hosted chat UI. */
function allowCors(req: express.Request, res: express.Response, next: express.NextFunction) {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  if (req.method === "OPTIONS") {
    res.sendStatus(204);
    return;
  }
  next();
}

/**
 * Build the express application around an initialized context. Exposed separately from
 * {@link startHttpTransport} so tests can bind it to an ephemeral port.
 */
export function createHttpApp(ctx: AppContext): express.Express {
  const app = express();
  app.use(allowCors);
  app.use(express.json({ limit: "64kb" }));

  app.post("/ask", async (req, res, next) => {
    try {
      const parsed = askBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid request" });
        return;
      }
      const outcome = await ctx.pipeline.run(parsed.data.question);
      if (ctx.config.VERBOSE) {
        console.error(
          `[FAQ][verbose] /ask -> ${outcome.state} (${outcome.response.sources.length} sources)`,
        );
      }
      res.json(outcome.response);
    } catch (err) {
      next(err);
    }
  });

  app.get("/health", (_req, res) => {
    res.json(ctx.status.getStatus());
  });

  app.use(
    (err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      if (err instanceof ValidationError) {
        res.status(400).json({ error: err.message });
        return;
      }
      // body-parser marks malformed JSON with type "entity.parse.failed"
      if (err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed") {
        res.status(400).json({ error: "Request body must be valid JSON" });
        return;
      }
      const status = clientErrorStatus(err);
      if (status) {
        res.status(status).json({ error: err instanceof Error ? err.message : "Bad request" });
        return;
      }
      console.error("[FAQ] Unhandled error while answering:", err);
      res.status(500).json({ error: "Internal server error" });
    },
  );

  return app;
}

/** 4xx status body-parser (or http-errors) attached to `err`, if any. */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status =
    "status" in err && typeof err.status === "number"
      ? err.status
      : "statusCode" in err && typeof err.statusCode === "number"
        ? err.statusCode
        : undefined;
  return status !== undefined && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Bind the HTTP app on the configured host/port.
 *
 * @returns The listening server once bound.
 */
export async function startHttpTransport(ctx: AppContext): Promise<Server> {
  const app = createHttpApp(ctx);
  const { PORT: port, HOST: host } = ctx.config;
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      console.error(`[FAQ] HTTP listening at http://${host}:${port}/ask`);
      resolve(server);
    });
    server.once("error", reject);
  });
}

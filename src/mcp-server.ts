import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { AppContext } from "./app-context";
import { APP_VERSION } from "./config";
import { ValidationError } from "./errors";
import type { ChunkType } from "./types";

const askArgsSchema = z.object({ question: z.string() });

export interface FundListing {
  fund_name: string;
  url: string;
  types: ChunkType[];
}

/** Distinct funds in corpus order with the fact categories available for each. */
export function describeFunds(ctx: AppContext): FundListing[] {
  const byFund = new Map<string, FundListing>();
  for (const c of ctx.corpus.chunks) {
    const entry = byFund.get(c.fundName);
    if (!entry) byFund.set(c.fundName, { fund_name: c.fundName, url: c.sourceUrl, types: [c.chunkType] });
    else if (!entry.types.includes(c.chunkType)) entry.types.push(c.chunkType);
  }
  return [...byFund.values()];
}

function textResult(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

/**
 * Build an MCP server exposing the answering pipeline as tools.
 *
 * Tool contracts:
 *  ask_fund_question
 *    Input:  { question: string }
 *    Output: text content holding `{ response, sources }`, same as HTTP POST /ask.
 *    Errors: InvalidParams for a missing/empty question.
 *
 *  list_funds
 *    Input:  {}
 *    Output: text content holding `{ funds: [{ fund_name, url, types }] }`.
 */
export function createMcpServer(ctx: AppContext): Server {
  const server = new Server(
    { name: "fund-facts-assistant", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "ask_fund_question",
        description:
          "Answer a factual question about the mutual fund schemes in the catalogue (NAV, expense ratio, exit load, SIP, returns, holdings, risk). Returns the answer and the source pages it was drawn from. Does not give investment advice.",
        inputSchema: {
          type: "object" as const,
          properties: {
            question: {
              type: "string",
              description: "Natural-language question, e.g. 'What is the expense ratio of <fund>?'",
            },
          },
          required: ["question"],
        },
      },
      {
        name: "list_funds",
        description: "List the fund schemes in the catalogue with their source page and available fact categories.",
        inputSchema: { type: "object" as const, properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    if (req.params.name === "ask_fund_question") {
      const args = askArgsSchema.safeParse(req.params.arguments ?? {});
      if (!args.success) throw new McpError(ErrorCode.InvalidParams, "Missing question");
      try {
        const outcome = await ctx.pipeline.run(args.data.question);
        return textResult(outcome.response);
      } catch (e) {
        if (e instanceof ValidationError) throw new McpError(ErrorCode.InvalidParams, e.message);
        throw e;
      }
    }

    if (req.params.name === "list_funds") {
      return textResult({ funds: describeFunds(ctx) });
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
  });

  return server;
}

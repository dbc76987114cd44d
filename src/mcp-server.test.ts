import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createAppContext } from "./app-context";
import { getConfig } from "./config";
import { TemplateAnswerGenerator } from "./generation";
import { createMcpServer, describeFunds } from "./mcp-server";
import { REFUSAL_TEXT } from "./response";
import {
  ELSS_FUND,
  ELSS_URL,
  FLEXI_FUND,
  FLEXI_URL,
  SAMPLE_FIXTURES,
  StubEmbedder,
  makeCorpus,
} from "./test-support";

const ELSS_EXPENSE_Q = `What is the expense ratio of ${ELSS_FUND}?`;

const ctx = createAppContext({
  config: getConfig({}),
  corpus: makeCorpus(SAMPLE_FIXTURES),
  embedder: new StubEmbedder(4, { [ELSS_EXPENSE_Q]: [1, 0, 0, 0] }),
  generator: new TemplateAnswerGenerator(),
});

/** Text of the single content item a tool returned, parsed as JSON. */
function toolJson(result: unknown): unknown {
  const [item] = CallToolResultSchema.parse(result).content;
  if (item?.type !== "text") throw new Error("expected a text result");
  return JSON.parse(item.text);
}

describe("describeFunds", () => {
  it("lists each fund once with its chunk types", () => {
    expect(describeFunds(ctx)).toEqual([
      { fund_name: ELSS_FUND, url: ELSS_URL, types: ["expense_information", "nav_sip_information"] },
      { fund_name: FLEXI_FUND, url: FLEXI_URL, types: ["expense_information", "risk_metrics"] },
    ]);
  });
});

describe("MCP server", () => {
  let client: Client;
  let server: ReturnType<typeof createMcpServer>;

  beforeEach(async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server = createMcpServer(ctx);
    client = new Client({ name: "test-client", version: "1.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("advertises both tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["ask_fund_question", "list_funds"]);
  });

  it("answers a question with the same payload as POST /ask", async () => {
    const result = await client.callTool({
      name: "ask_fund_question",
      arguments: { question: ELSS_EXPENSE_Q },
    });
    expect(toolJson(result)).toEqual((await ctx.pipeline.run(ELSS_EXPENSE_Q)).response);
  });

  it("refuses advice through the tool as well", async () => {
    const result = await client.callTool({
      name: "ask_fund_question",
      arguments: { question: "Which fund is better than the other?" },
    });
    expect(toolJson(result)).toEqual({ response: REFUSAL_TEXT, sources: [] });
  });

  it("lists the funds", async () => {
    const result = await client.callTool({ name: "list_funds", arguments: {} });
    expect(toolJson(result)).toEqual({ funds: describeFunds(ctx) });
  });

  it("rejects a missing or blank question as invalid params", async () => {
    await expect(
      client.callTool({ name: "ask_fund_question", arguments: {} }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    await expect(
      client.callTool({ name: "ask_fund_question", arguments: { question: "  " } }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it("rejects unknown tools", async () => {
    await expect(client.callTool({ name: "nope", arguments: {} })).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });
});

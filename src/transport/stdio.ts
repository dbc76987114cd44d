import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Serve MCP over stdio. Logging goes to stderr, so stdout carries protocol frames only.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  console.error("[FAQ] MCP stdio transport connected");
}

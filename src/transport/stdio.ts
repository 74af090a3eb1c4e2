import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Connect a single MCP server over stdin/stdout. Stdout then belongs to the
 * protocol, which is why every log line in this project goes to stderr.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  console.error("[MCP] stdio transport connected");
  return server;
}

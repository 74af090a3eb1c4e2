/**
 * Streamable HTTP transport for the study RAG server.
 *
 * Session model:
 *  - A client starts with a JSON-RPC `initialize` request to POST /mcp WITHOUT an
 *    `mcp-session-id` header. A new transport + MCP Server pair is created and the
 *    generated session id is returned in the response headers.
 *  - Every later request for that session carries the same `mcp-session-id` header.
 *  - When the transport closes, the session is evicted from the in-memory map.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : Streaming channel for an existing session.
 *  - DELETE /mcp  : Session teardown.
 *  - GET  /health : Status snapshot from the {@link StatusManager}.
 *
 * DNS rebinding protection is on unless `ENABLE_DNS_REBINDING_PROTECTION=false`;
 * allowed hosts default to the local interface and the bound host/port unless
 * `ALLOWED_HOSTS` (comma-separated host[:port]) is set.
 *
 * Errors: unknown or missing session => 400 (-32000); uncaught failures => 500 (-32603).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { parseBool, parseBoundedInt } from "../config";
import type { StatusManager } from "../status";

export interface HttpTransportOptions {
  /** Produces a new, unconnected MCP Server for each session. */
  createServer: () => Server;
  status: StatusManager;
  env?: Record<string, string | undefined>;
}

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" && header ? header : undefined;
}

/** Express app exposing /mcp and /health; not yet listening. */
export function createHttpApp(opts: HttpTransportOptions & { port: number; host: string }): express.Express {
  const { createServer, status, port, host } = opts;
  const env = opts.env ?? process.env;
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const defaultAllowedHosts = Array.from(
    new Set<string>(["127.0.0.1", `127.0.0.1:${port}`, "localhost", `localhost:${port}`, host, `${host}:${port}`]),
  );
  const allowedHosts = (env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const enableDnsRebindingProtection = parseBool(env.ENABLE_DNS_REBINDING_PROTECTION, true);

  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // Session creation path: only when no header AND the body is a valid initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // Detach before server.close(): it closes the transport again, which would re-enter here.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[MCP] Error closing session server:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[MCP] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp only make sense for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[MCP] HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(status.getStatus());
  });

  return app;
}

/**
 * Bind the HTTP transport on `MCP_PORT` (default 3000) and `HOST` (default 127.0.0.1).
 *
 * @returns Resolves once the listener is bound.
 */
export async function startHttpTransport(opts: HttpTransportOptions): Promise<void> {
  const env = opts.env ?? process.env;
  const port = parseBoundedInt(env.MCP_PORT, 3000, 1, 65535);
  const host = (env.HOST ?? "127.0.0.1").trim();
  const app = createHttpApp({ ...opts, port, host });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}

import { createServer as createHttpServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createLogger, errorMessage } from "seobridge";
import { createServer } from "./server.js";
import type { ServerContext } from "./context.js";

const log = createLogger("mcp-http");

export const MCP_PATH = "/mcp";

function sendJsonRpcError(res: ServerResponse, status: number, code: number, message: string) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code, message }, id: null }));
}

/** Stateless streamable HTTP: a fresh server and transport per request */
async function handleHttp(ctx: ServerContext, req: IncomingMessage, res: ServerResponse) {
  const path = new URL(req.url ?? "/", "http://localhost").pathname;
  if (path !== MCP_PATH) {
    sendJsonRpcError(res, 404, -32000, `Not found: ${path}`);
    return;
  }
  if (req.method !== "POST") {
    sendJsonRpcError(res, 405, -32000, "Method not allowed.");
    return;
  }

  const server = createServer(ctx);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on("close", () => {
    transport.close().catch((err) => log.warn({ err: errorMessage(err) }, "transport close failed"));
    server.close().catch((err) => log.warn({ err: errorMessage(err) }, "server close failed"));
  });

  try {
    await server.connect(transport);
    await transport.handleRequest(req, res);
  } catch (err) {
    log.error({ err: errorMessage(err) }, "MCP HTTP request failed");
    if (!res.headersSent) sendJsonRpcError(res, 500, -32603, "Internal server error");
  }
}

export function createHttpApp(ctx: ServerContext): Server {
  return createHttpServer((req, res) => {
    handleHttp(ctx, req, res).catch((err) => log.error({ err: errorMessage(err) }, "unhandled HTTP error"));
  });
}

/**
 * Start listening. Rejects on a bind failure such as EADDRINUSE; errors
 * after start-up are logged.
 */
export function listenHttp(http: Server, port: number, host?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onStartError = (err: Error) => reject(err);
    http.once("error", onStartError);
    http.listen(port, host, () => {
      http.off("error", onStartError);
      http.on("error", (err) => log.error({ err: errorMessage(err) }, "HTTP server error"));
      resolve();
    });
  });
}

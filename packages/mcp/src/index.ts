#!/usr/bin/env -S npx tsx
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, errorMessage, loadEnvironment, resolveServerSettings } from "seobridge";
import { createContext, createServer } from "./server.js";
import { MCP_PATH, createHttpApp, listenHttp } from "./http.js";

const log = createLogger("mcp");

async function main() {
  loadEnvironment();
  const settings = resolveServerSettings();
  const ctx = createContext({ papersDir: settings.papersDir });

  if (settings.transport === "http") {
    await listenHttp(createHttpApp(ctx), settings.port);
    log.info({ port: settings.port, path: MCP_PATH }, "MCP server listening (streamable HTTP)");
    return;
  }

  const server = createServer(ctx);
  await server.connect(new StdioServerTransport());
  log.info("MCP server running on stdio");
}

main().catch((err) => {
  log.fatal({ err: errorMessage(err) }, "MCP server failed to start");
  process.exit(1);
});

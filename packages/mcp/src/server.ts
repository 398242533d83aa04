import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "./context.js";
import { registerAhrefsTools, registerPaperTools, registerTopvisorTools } from "./tools/index.js";
import { registerPaperResources } from "./resources/index.js";
import { registerSearchPrompt } from "./prompts/search.js";

export const SERVER_NAME = "seobridge";
export const SERVER_VERSION = "0.1.0";

/** Build an MCP server with every tool, resource and prompt registered */
export function createServer(ctx: ServerContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Register tools
  registerTopvisorTools(server, ctx);
  registerAhrefsTools(server, ctx);
  registerPaperTools(server, ctx);

  // Register resources
  registerPaperResources(server, ctx);

  // Register prompts
  registerSearchPrompt(server);

  return server;
}

export { createContext, envProviderFactory } from "./context.js";
export type { ContextOptions, ProviderFactory, ServerContext } from "./context.js";
export { searchPromptText } from "./prompts/search.js";

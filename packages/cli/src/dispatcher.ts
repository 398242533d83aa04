import { createLogger, errorMessage } from "seobridge";
import type { ServerConfig } from "./config.js";
import type { Connector, ServerConnection } from "./connection.js";
import { ToolRegistry } from "./registry.js";

const log = createLogger("dispatcher");

export type DispatcherState = "uninitialized" | "connecting" | "ready" | "closed";

export type DispatchResult =
  | { status: "ok"; text: string; isError?: boolean }
  | { status: "not_found"; message: string }
  | { status: "failed"; message: string };

export interface ConnectSummary {
  connected: string[];
  failed: Array<{ name: string; error: string }>;
}

/**
 * Owns the server connections and routes calls through the registry.
 * No retry or failover: a failed call is reported once.
 */
export class Dispatcher {
  private readonly connections: ServerConnection[] = [];
  private current: DispatcherState = "uninitialized";

  constructor(
    readonly registry: ToolRegistry,
    private readonly connector: Connector,
  ) {}

  get state(): DispatcherState {
    return this.current;
  }

  async connectAll(config: ServerConfig): Promise<ConnectSummary> {
    if (this.current !== "uninitialized") {
      throw new Error(`Cannot connect from state ${this.current}`);
    }
    this.current = "connecting";
    const summary: ConnectSummary = { connected: [], failed: [] };

    for (const [name, entry] of Object.entries(config.mcpServers)) {
      let connection: ServerConnection | undefined;
      try {
        connection = await this.connector(name, entry);
        const catalog = await connection.listCatalog();

        for (const tool of catalog.tools) this.registry.registerTool(tool, connection);
        for (const prompt of catalog.prompts) this.registry.registerPrompt(prompt, connection);
        for (const uri of catalog.resources) this.registry.registerResource(uri, connection);

        this.connections.push(connection);
        summary.connected.push(name);
        log.info(
          { server: name, tools: catalog.tools.length, prompts: catalog.prompts.length, resources: catalog.resources.length },
          "Connected to server",
        );
      } catch (err) {
        const error = errorMessage(err);
        log.error({ server: name, err: error }, "Failed to connect to server");
        summary.failed.push({ name, error });
        if (connection) await this.closeQuietly(connection);
      }
    }

    this.current = "ready";
    return summary;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<DispatchResult> {
    const connection = this.registry.lookupTool(name);
    if (!connection) return { status: "not_found", message: `Tool '${name}' not found.` };
    try {
      const outcome = await connection.callTool(name, args);
      return { status: "ok", text: outcome.text, isError: outcome.isError };
    } catch (err) {
      return { status: "failed", message: errorMessage(err) };
    }
  }

  async getPrompt(name: string, args: Record<string, string>): Promise<DispatchResult> {
    const connection = this.registry.lookupPrompt(name);
    if (!connection) return { status: "not_found", message: `Prompt '${name}' not found.` };
    try {
      return { status: "ok", text: await connection.getPrompt(name, args) };
    } catch (err) {
      return { status: "failed", message: errorMessage(err) };
    }
  }

  async readResource(uri: string): Promise<DispatchResult> {
    const connection = this.registry.lookupResource(uri);
    if (!connection) return { status: "not_found", message: `Resource '${uri}' not found.` };
    try {
      const text = await connection.readResource(uri);
      return { status: "ok", text: text ?? "No content available." };
    } catch (err) {
      return { status: "failed", message: errorMessage(err) };
    }
  }

  async close(): Promise<void> {
    if (this.current === "closed") return;
    this.current = "closed";
    for (const connection of this.connections.splice(0)) {
      await this.closeQuietly(connection);
    }
  }

  private async closeQuietly(connection: ServerConnection): Promise<void> {
    try {
      await connection.close();
    } catch (err) {
      log.warn({ server: connection.name, err: errorMessage(err) }, "Error while closing connection");
    }
  }
}

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ServerEntry } from "./config.js";

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema: {
    type: "object";
    properties?: Record<string, unknown>;
    required?: string[];
    [key: string]: unknown;
  };
}

export interface PromptArgumentDescriptor {
  name: string;
  description?: string;
  required?: boolean;
}

export interface PromptDescriptor {
  name: string;
  description?: string;
  arguments: PromptArgumentDescriptor[];
}

/** Everything one server offers */
export interface ServerCatalog {
  tools: ToolDescriptor[];
  prompts: PromptDescriptor[];
  resources: string[];
}

export interface ToolCallOutcome {
  text: string;
  isError: boolean;
}

/** A live session with one tool server */
export interface ServerConnection {
  readonly name: string;
  listCatalog(): Promise<ServerCatalog>;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallOutcome>;
  /** Text of the first message the prompt renders to */
  getPrompt(name: string, args: Record<string, string>): Promise<string>;
  /** Text of the first content item, or null when the resource is empty */
  readResource(uri: string): Promise<string | null>;
  close(): Promise<void>;
}

export type Connector = (name: string, entry: ServerEntry) => Promise<ServerConnection>;

/** MCP client over a stdio child process */
export class McpServerConnection implements ServerConnection {
  private constructor(
    readonly name: string,
    private readonly client: Client,
  ) {}

  static async connect(name: string, entry: ServerEntry): Promise<McpServerConnection> {
    const transport = new StdioClientTransport({
      command: entry.command,
      args: entry.args,
      env: { ...getDefaultEnvironment(), ...entry.env },
      cwd: entry.cwd,
      stderr: "inherit",
    });
    const client = new Client({ name: "seobridge-chat", version: "0.1.0" }, { capabilities: {} });
    await client.connect(transport);
    return new McpServerConnection(name, client);
  }

  async listCatalog(): Promise<ServerCatalog> {
    const capabilities = this.client.getServerCapabilities();
    const catalog: ServerCatalog = { tools: [], prompts: [], resources: [] };

    if (capabilities?.tools) {
      const { tools } = await this.client.listTools();
      catalog.tools = tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      }));
    }

    if (capabilities?.prompts) {
      const { prompts } = await this.client.listPrompts();
      catalog.prompts = prompts.map((prompt) => ({
        name: prompt.name,
        description: prompt.description,
        arguments: prompt.arguments ?? [],
      }));
    }

    if (capabilities?.resources) {
      const { resources } = await this.client.listResources();
      catalog.resources = resources.map((resource) => resource.uri);
      // Templates are registered by their pattern so papers://{topic} is routable
      const { resourceTemplates } = await this.client.listResourceTemplates();
      catalog.resources.push(...resourceTemplates.map((template) => template.uriTemplate));
    }

    return catalog;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallOutcome> {
    const raw = await this.client.callTool({ name, arguments: args });
    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      return { text: "No result returned", isError: true };
    }
    const text = parsed.data.content
      .map((item) => (item.type === "text" ? item.text : ""))
      .filter((part) => part.length > 0)
      .join("\n");
    return { text, isError: parsed.data.isError === true };
  }

  async getPrompt(name: string, args: Record<string, string>): Promise<string> {
    const result = await this.client.getPrompt({ name, arguments: args });
    const first = result.messages[0];
    if (!first) return "";
    return first.content.type === "text" ? first.content.text : "";
  }

  async readResource(uri: string): Promise<string | null> {
    const result = await this.client.readResource({ uri });
    const first = result.contents[0];
    if (!first) return null;
    return "text" in first && typeof first.text === "string" ? first.text : null;
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/** Default connector used by the chat program */
export const connectStdio: Connector = (name, entry) => McpServerConnection.connect(name, entry);

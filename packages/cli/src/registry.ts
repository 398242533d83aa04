import type { PromptDescriptor, ServerConnection, ToolDescriptor } from "./connection.js";

interface Entry<T> {
  connection: ServerConnection;
  descriptor: T;
}

/**
 * Routes tool names, prompt names and resource URIs to the connection that
 * serves them. Registering a name again replaces the earlier mapping.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Entry<ToolDescriptor>>();
  private readonly prompts = new Map<string, Entry<PromptDescriptor>>();
  private readonly resources = new Map<string, ServerConnection>();

  /** URI schemes whose unknown URIs fall back to any resource of the same scheme */
  constructor(private readonly fallbackSchemes: readonly string[] = ["papers"]) {}

  registerTool(descriptor: ToolDescriptor, connection: ServerConnection): void {
    this.tools.set(descriptor.name, { connection, descriptor });
  }

  registerPrompt(descriptor: PromptDescriptor, connection: ServerConnection): void {
    this.prompts.set(descriptor.name, { connection, descriptor });
  }

  registerResource(uri: string, connection: ServerConnection): void {
    this.resources.set(uri, connection);
  }

  lookupTool(name: string): ServerConnection | undefined {
    return this.tools.get(name)?.connection;
  }

  lookupPrompt(name: string): ServerConnection | undefined {
    return this.prompts.get(name)?.connection;
  }

  lookupResource(uri: string): ServerConnection | undefined {
    const exact = this.resources.get(uri);
    if (exact) return exact;

    const scheme = schemeOf(uri);
    if (!scheme || !this.fallbackSchemes.includes(scheme)) return undefined;

    for (const [registered, connection] of this.resources) {
      if (schemeOf(registered) === scheme) return connection;
    }
    return undefined;
  }

  toolDescriptors(): ToolDescriptor[] {
    return [...this.tools.values()].map((entry) => entry.descriptor);
  }

  promptDescriptors(): PromptDescriptor[] {
    return [...this.prompts.values()].map((entry) => entry.descriptor);
  }

  resourceUris(): string[] {
    return [...this.resources.keys()];
  }
}

function schemeOf(uri: string): string | null {
  const match = /^([a-z][a-z0-9+.-]*):\/\//i.exec(uri);
  return match ? match[1].toLowerCase() : null;
}

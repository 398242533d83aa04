import Anthropic from "@anthropic-ai/sdk";
import type { ChatSettings } from "seobridge";
import type { DispatchResult } from "./dispatcher.js";
import type { ToolDescriptor } from "./connection.js";

export interface ChatRequest {
  messages: Anthropic.MessageParam[];
  tools: Anthropic.Tool[];
}

/** One model round trip. Swapped for a scripted model in tests. */
export interface ChatModel {
  complete(request: ChatRequest): Promise<Anthropic.ContentBlock[]>;
}

export class AnthropicChatModel implements ChatModel {
  constructor(
    private readonly client: Anthropic,
    private readonly settings: ChatSettings,
  ) {}

  async complete({ messages, tools }: ChatRequest): Promise<Anthropic.ContentBlock[]> {
    const response = await this.client.messages.create({
      model: this.settings.model,
      max_tokens: this.settings.maxTokens,
      messages,
      tools,
    });
    return response.content;
  }
}

/** The slice of the dispatcher the driver needs */
export interface ToolCaller {
  callTool(name: string, args: Record<string, unknown>): Promise<DispatchResult>;
}

export interface DriverOutput {
  text(line: string): void;
  toolCall(name: string, args: Record<string, unknown>): void;
}

export function toAnthropicTool(descriptor: ToolDescriptor): Anthropic.Tool {
  return {
    name: descriptor.name,
    description: descriptor.description ?? "",
    input_schema: descriptor.inputSchema,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toolResult(id: string, result: DispatchResult): Anthropic.ToolResultBlockParam {
  switch (result.status) {
    case "ok":
      return { type: "tool_result", tool_use_id: id, content: result.text, is_error: result.isError === true };
    case "not_found":
    case "failed":
      return { type: "tool_result", tool_use_id: id, content: result.message, is_error: true };
  }
}

/**
 * Runs one user query to completion: the model is called again after every
 * batch of tool calls until it answers without requesting a tool.
 */
export class ConversationDriver {
  constructor(
    private readonly model: ChatModel,
    private readonly tools: ToolCaller,
    private readonly definitions: () => ToolDescriptor[],
    private readonly output: DriverOutput,
  ) {}

  async run(query: string): Promise<Anthropic.MessageParam[]> {
    const messages: Anthropic.MessageParam[] = [{ role: "user", content: query }];
    const tools = this.definitions().map(toAnthropicTool);

    for (;;) {
      const blocks = await this.model.complete({ messages, tools });
      const assistant: Anthropic.ContentBlockParam[] = [];
      const results: Anthropic.ToolResultBlockParam[] = [];

      for (const block of blocks) {
        if (block.type === "text") {
          this.output.text(block.text);
          assistant.push({ type: "text", text: block.text });
        } else if (block.type === "tool_use") {
          const args = isRecord(block.input) ? block.input : {};
          assistant.push({ type: "tool_use", id: block.id, name: block.name, input: args });
          this.output.toolCall(block.name, args);
          results.push(toolResult(block.id, await this.tools.callTool(block.name, args)));
        }
      }

      messages.push({ role: "assistant", content: assistant });
      if (results.length === 0) return messages;
      messages.push({ role: "user", content: results });
    }
  }
}

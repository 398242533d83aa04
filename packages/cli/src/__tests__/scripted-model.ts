import type Anthropic from "@anthropic-ai/sdk";
import type { ChatModel, ChatRequest } from "../llm.js";

export function text(value: string): Anthropic.ContentBlock {
  return { type: "text", text: value, citations: null };
}

export function toolUse(id: string, name: string, input: unknown): Anthropic.ContentBlock {
  return { type: "tool_use", id, name, input };
}

/** Replays canned responses and keeps a copy of every request */
export class ScriptedModel implements ChatModel {
  readonly requests: ChatRequest[] = [];

  constructor(private readonly responses: Anthropic.ContentBlock[][]) {}

  async complete(request: ChatRequest): Promise<Anthropic.ContentBlock[]> {
    this.requests.push({ messages: [...request.messages], tools: request.tools });
    const next = this.responses.shift();
    if (!next) throw new Error("model called more often than scripted");
    return next;
  }
}

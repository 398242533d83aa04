import { createInterface } from "node:readline/promises";
import chalk from "chalk";
import { errorMessage } from "seobridge";
import { classifyInput, resolveCommand } from "./commands.js";
import type { CommandAction } from "./commands.js";
import type { Dispatcher } from "./dispatcher.js";
import { ConversationDriver } from "./llm.js";
import type { ChatModel } from "./llm.js";

export interface Printer {
  line(text: string): void;
  dim(text: string): void;
  error(text: string): void;
}

export const consolePrinter: Printer = {
  line: (text) => console.log(text),
  dim: (text) => console.log(chalk.dim(text)),
  error: (text) => console.log(chalk.red(text)),
};

export interface ChatSessionOptions {
  dispatcher: Dispatcher;
  model: ChatModel;
  printer?: Printer;
}

/** Pretty-print JSON tool output; anything else passes through */
export function formatToolOutput(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}

export class ChatSession {
  private readonly dispatcher: Dispatcher;
  private readonly printer: Printer;
  private readonly driver: ConversationDriver;

  constructor(options: ChatSessionOptions) {
    this.dispatcher = options.dispatcher;
    this.printer = options.printer ?? consolePrinter;
    this.driver = new ConversationDriver(
      options.model,
      this.dispatcher,
      () => this.dispatcher.registry.toolDescriptors(),
      {
        text: (line) => this.printer.line(line),
        toolCall: (name, args) => this.printer.dim(`Calling tool ${name} with args ${JSON.stringify(args)}`),
      },
    );
  }

  /** Read lines until `quit` or end of input */
  async run(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<void> {
    const rl = createInterface({ input, output, terminal: false });
    rl.setPrompt("\nQuery: ");
    rl.prompt();
    try {
      for await (const line of rl) {
        if ((await this.handleLine(line)) === "quit") break;
        rl.prompt();
      }
    } finally {
      rl.close();
    }
  }

  /** Process one input line completely. Errors are printed, never thrown. */
  async handleLine(line: string): Promise<"continue" | "quit"> {
    const input = classifyInput(line);
    try {
      switch (input.kind) {
        case "empty":
          break;
        case "quit":
          return "quit";
        case "resource":
          await this.showResource(input.uri);
          break;
        case "command":
          await this.perform(resolveCommand(input.command, input.args));
          break;
        case "query":
          await this.driver.run(input.text);
          break;
      }
    } catch (err) {
      this.printer.error(`\nError: ${errorMessage(err)}`);
    }
    return "continue";
  }

  private async perform(action: CommandAction): Promise<void> {
    switch (action.type) {
      case "help":
      case "usage":
        this.printer.line(action.text);
        return;
      case "error":
      case "unknown":
        this.printer.error(action.message);
        return;
      case "list_prompts":
        this.listPrompts();
        return;
      case "prompt":
        await this.runPrompt(action.name, action.args);
        return;
      case "tool":
        await this.runTool(action.tool, action.args);
        return;
    }
  }

  private async showResource(uri: string): Promise<void> {
    const result = await this.dispatcher.readResource(uri);
    switch (result.status) {
      case "ok":
        this.printer.line(`\nResource: ${uri}`);
        this.printer.line("Content:");
        this.printer.line(result.text);
        return;
      case "not_found":
        this.printer.error(result.message);
        return;
      case "failed":
        this.printer.error(`Error: ${result.message}`);
        return;
    }
  }

  private listPrompts(): void {
    const prompts = this.dispatcher.registry.promptDescriptors();
    if (prompts.length === 0) {
      this.printer.line("No prompts available.");
      return;
    }
    this.printer.line("\nAvailable prompts:");
    for (const prompt of prompts) {
      this.printer.line(`- ${prompt.name}: ${prompt.description ?? ""}`);
      if (prompt.arguments.length > 0) {
        this.printer.line("  Arguments:");
        for (const arg of prompt.arguments) this.printer.line(`    - ${arg.name}`);
      }
    }
  }

  private async runPrompt(name: string, args: Record<string, string>): Promise<void> {
    const result = await this.dispatcher.getPrompt(name, args);
    if (result.status !== "ok") {
      this.printer.error(result.status === "failed" ? `Error: ${result.message}` : result.message);
      return;
    }
    this.printer.line(`\nExecuting prompt '${name}'...`);
    await this.driver.run(result.text);
  }

  private async runTool(tool: string, args: Record<string, unknown>): Promise<void> {
    const result = await this.dispatcher.callTool(tool, args);
    switch (result.status) {
      case "ok":
        this.printer.line(result.text ? formatToolOutput(result.text) : "No result returned");
        return;
      case "not_found":
        this.printer.error(`Tool '${tool}' not found. Make sure the seo server is running.`);
        return;
      case "failed":
        this.printer.error(`Error calling ${tool}: ${result.message}`);
        return;
    }
  }
}

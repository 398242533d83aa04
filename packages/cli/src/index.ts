import Anthropic from "@anthropic-ai/sdk";
import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import type { Ora } from "ora";
import { ConfigurationError, loadEnvironment, resolveChatSettings } from "seobridge";
import { DEFAULT_CONFIG_FILE, loadServerConfig } from "./config.js";
import { connectStdio } from "./connection.js";
import type { Connector } from "./connection.js";
import { Dispatcher } from "./dispatcher.js";
import type { ConnectSummary } from "./dispatcher.js";
import { AnthropicChatModel } from "./llm.js";
import { ToolRegistry } from "./registry.js";
import { ChatSession } from "./session.js";
import { WELCOME_TEXT } from "./commands.js";

const cliVersion = "0.1.0";

async function connect(configPath: string, connector: Connector): Promise<Dispatcher> {
  const config = await loadServerConfig(configPath);
  const dispatcher = new Dispatcher(new ToolRegistry(), connector);

  const spinner = ora("Starting tool servers...").start();
  const summary = await dispatcher.connectAll(config);
  reportConnections(spinner, summary);
  return dispatcher;
}

function reportConnections(spinner: Ora, summary: ConnectSummary): void {
  const count = summary.connected.length;
  const label = `Connected to ${count} server${count !== 1 ? "s" : ""}`;
  if (summary.failed.length === 0) {
    spinner.succeed(label);
    return;
  }
  spinner.warn(label);
  for (const failure of summary.failed) {
    console.log(chalk.yellow(`  ${failure.name}: ${failure.error}`));
  }
}

function requireAnthropicKey(): string {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError(
      "Anthropic API key not found. Set ANTHROPIC_API_KEY in the environment or .env file.",
      "ANTHROPIC_API_KEY",
    );
  }
  return apiKey;
}

export function createProgram(connector: Connector = connectStdio): Command {
  const program = new Command();

  program
    .name("seobridge")
    .description("Chat with an LLM that can call Topvisor, Ahrefs and arXiv tools")
    .version(cliVersion);

  program
    .command("chat", { isDefault: true })
    .description("Start the interactive chat session")
    .option("-c, --config <path>", "Server config file", DEFAULT_CONFIG_FILE)
    .action(async (opts: { config: string }) => {
      loadEnvironment();
      const model = new AnthropicChatModel(new Anthropic({ apiKey: requireAnthropicKey() }), resolveChatSettings());
      const dispatcher = await connect(opts.config, connector);

      try {
        console.log(chalk.bold(`\n${WELCOME_TEXT}`));
        await new ChatSession({ dispatcher, model }).run(process.stdin, process.stdout);
      } finally {
        await dispatcher.close();
      }
    });

  program
    .command("tools")
    .description("List the tools, prompts and resources the configured servers expose")
    .option("-c, --config <path>", "Server config file", DEFAULT_CONFIG_FILE)
    .action(async (opts: { config: string }) => {
      loadEnvironment();
      const dispatcher = await connect(opts.config, connector);

      try {
        const { registry } = dispatcher;
        console.log(chalk.bold("\nTools"));
        for (const tool of registry.toolDescriptors()) {
          console.log(`  ${chalk.cyan(tool.name)}  ${chalk.dim(tool.description ?? "")}`);
        }
        console.log(chalk.bold("\nPrompts"));
        for (const prompt of registry.promptDescriptors()) {
          console.log(`  ${chalk.cyan(prompt.name)}  ${chalk.dim(prompt.description ?? "")}`);
        }
        console.log(chalk.bold("\nResources"));
        for (const uri of registry.resourceUris()) {
          console.log(`  ${chalk.cyan(uri)}`);
        }
      } finally {
        await dispatcher.close();
      }
    });

  return program;
}

export { Dispatcher, ToolRegistry, ChatSession, AnthropicChatModel, connectStdio };
export { ConversationDriver } from "./llm.js";
export { classifyInput, resolveCommand } from "./commands.js";
export { loadServerConfig, parseServerConfig } from "./config.js";
export type { ChatModel, ChatRequest } from "./llm.js";
export type { DispatchResult, DispatcherState } from "./dispatcher.js";
export type { ServerConnection, ServerCatalog, Connector } from "./connection.js";
export type { ServerConfig, ServerEntry } from "./config.js";

import { existsSync } from "node:fs";
import { join } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";

export type Env = Record<string, string | undefined>;

let envLoaded = false;

/**
 * Load `.env` from the working directory into process.env.
 * Existing variables win. Safe to call more than once.
 */
export function loadEnvironment(cwd: string = process.cwd()): void {
  if (envLoaded) return;
  loadDotenv({ path: join(cwd, ".env") });
  envLoaded = true;
}

/** Whether a `.env` file exists in the working directory */
export function hasEnvFile(cwd: string = process.cwd()): boolean {
  return existsSync(join(cwd, ".env"));
}

// --- Server settings ---

const serverSettingsSchema = z.object({
  MCP_SERVER_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  PAPERS_DIR: z.string().min(1).default("papers"),
});

export interface ServerSettings {
  transport: "stdio" | "http";
  port: number;
  papersDir: string;
}

/** Resolve MCP server settings from the environment */
export function resolveServerSettings(env: Env = process.env): ServerSettings {
  const parsed = serverSettingsSchema.parse(env);
  return {
    transport: parsed.MCP_SERVER_TRANSPORT,
    port: parsed.MCP_SERVER_PORT,
    papersDir: parsed.PAPERS_DIR,
  };
}

// --- Chat settings ---

const chatSettingsSchema = z.object({
  ANTHROPIC_MODEL: z.string().min(1).default("claude-3-7-sonnet-20250219"),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(2024),
});

export interface ChatSettings {
  model: string;
  maxTokens: number;
}

/** Resolve LLM settings for the chat client */
export function resolveChatSettings(env: Env = process.env): ChatSettings {
  const parsed = chatSettingsSchema.parse(env);
  return { model: parsed.ANTHROPIC_MODEL, maxTokens: parsed.ANTHROPIC_MAX_TOKENS };
}

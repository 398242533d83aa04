import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "seobridge";

export const DEFAULT_CONFIG_FILE = "server_config.json";

const serverEntrySchema = z.object({
  /** Executable started as a stdio child process */
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().optional(),
});

const serverConfigSchema = z.object({
  mcpServers: z.record(z.string(), serverEntrySchema),
});

export type ServerEntry = z.infer<typeof serverEntrySchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;

/** Validate an already-parsed config object */
export function parseServerConfig(raw: unknown, source = DEFAULT_CONFIG_FILE): ServerConfig {
  const parsed = serverConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new ConfigurationError(`Invalid ${source}: ${where}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}

/**
 * Load the list of tool servers to connect to.
 * Relative paths resolve against `cwd`.
 */
export async function loadServerConfig(
  path: string = DEFAULT_CONFIG_FILE,
  cwd: string = process.cwd(),
): Promise<ServerConfig> {
  const fullPath = resolve(cwd, path);
  if (!existsSync(fullPath)) {
    throw new ConfigurationError(`Server config not found: ${fullPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(fullPath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${fullPath}: ${errorMessage(err)}`);
  }
  return parseServerConfig(raw, fullPath);
}

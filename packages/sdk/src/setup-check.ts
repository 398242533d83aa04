/**
 * Credential and connectivity checks for each provider.
 *
 * Missing key → error (`configuration`). Key present but the probe call
 * fails → warning. Probe succeeds → success.
 */

import { hasEnvFile } from "./config.js";
import type { Env } from "./config.js";
import { createLogger } from "./logger.js";
import { errorEnvelope, successEnvelope, warningEnvelope } from "./normalize/envelope.js";
import { extractBalance } from "./normalize/topvisor.js";
import { AhrefsClient } from "./providers/ahrefs.js";
import { TopvisorClient } from "./providers/topvisor.js";
import type { FetchLike, JsonObject, ProviderResult, ResultEnvelope } from "./types.js";

const log = createLogger("setup-check");

export interface SetupCheckOptions {
  env?: Env;
  /** Directory searched for `.env` */
  cwd?: string;
  fetch?: FetchLike;
}

interface Checks {
  env_file: boolean;
  api_key_set: boolean;
  api_connection: boolean;
  [key: string]: boolean;
}

const PROBLEM_HELP = "Check API key validity and account balance";

function missingKey(variable: string, envFile: boolean): ResultEnvelope {
  const checks: Checks = { env_file: envFile, api_key_set: false, api_connection: false };
  return errorEnvelope("configuration", "API key not found", {
    checks,
    help: `Create .env file and add ${variable}=your_key`,
  });
}

/** The probe body, or the reason the probe failed */
function probeBody(result: ProviderResult<JsonObject>): { body: JsonObject } | { problem: string } {
  if (!result.ok) return { problem: result.failure.message };
  const { error } = result.data;
  if (error === undefined || error === null) return { body: result.data };
  return { problem: typeof error === "string" ? error : JSON.stringify(error) };
}

function degraded(problem: string, envFile: boolean): ResultEnvelope {
  const checks: Checks = { env_file: envFile, api_key_set: true, api_connection: false };
  return warningEnvelope(`API key found, but there is a problem: ${problem}`, { checks, help: PROBLEM_HELP });
}

function unexpectedResponse(body: JsonObject, envFile: boolean): ResultEnvelope {
  const checks: Checks = { env_file: envFile, api_key_set: true, api_connection: false };
  return errorEnvelope("shape", "Unexpected response from API", {
    checks,
    details: JSON.stringify(body).slice(0, 500),
  });
}

export async function checkTopvisorSetup(options: SetupCheckOptions = {}): Promise<ResultEnvelope> {
  const env = options.env ?? process.env;
  const envFile = hasEnvFile(options.cwd);
  if (!env.TOPVISOR_API_KEY) return missingKey("TOPVISOR_API_KEY", envFile);

  const client = TopvisorClient.fromEnv(env, { fetch: options.fetch });
  const result = await client.getBalance();

  const probe = probeBody(result);
  if ("problem" in probe) {
    log.warn({ problem: probe.problem }, "topvisor probe failed");
    return degraded(probe.problem, envFile);
  }

  const { body } = probe;
  if (body.result === undefined || body.result === null) return unexpectedResponse(body, envFile);

  const balance = extractBalance(body.result);
  const checks: Checks = { env_file: envFile, api_key_set: true, api_connection: true };
  return successEnvelope({
    message: `Everything is set up correctly! Balance: ${typeof balance === "string" ? balance : JSON.stringify(balance)}`,
    checks,
    balance,
  });
}

export async function checkAhrefsSetup(options: SetupCheckOptions = {}): Promise<ResultEnvelope> {
  const env = options.env ?? process.env;
  const envFile = hasEnvFile(options.cwd);
  if (!env.AHREFS_API_KEY) return missingKey("AHREFS_API_KEY", envFile);

  const client = AhrefsClient.fromEnv(env, { fetch: options.fetch });
  const result = await client.getRefdomains("example.com", { limit: 1 });

  const probe = probeBody(result);
  if ("problem" in probe) {
    log.warn({ problem: probe.problem }, "ahrefs probe failed");
    return degraded(probe.problem, envFile);
  }

  const { body } = probe;
  if (!Array.isArray(body.refdomains)) return unexpectedResponse(body, envFile);

  const checks: Checks = { env_file: envFile, api_key_set: true, api_connection: true };
  return successEnvelope({
    message: "Everything is set up correctly! Ahrefs API is working",
    checks,
    test_result: "Test request successful",
  });
}

import { z } from "zod";
import { ConfigurationError, errorEnvelope, serializeEnvelope } from "seobridge";
import type { ResultEnvelope } from "seobridge";

// -- Results --

/** MCP tool result carrying one serialized envelope */
export function envelopeResult(envelope: ResultEnvelope) {
  return {
    content: [{ type: "text" as const, text: serializeEnvelope(envelope) }],
    isError: envelope.status === "error",
  };
}

export function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

/**
 * Build a client and run one call. A missing credential becomes a
 * configuration error envelope; anything else propagates.
 */
export async function withClient<C>(
  build: () => C,
  run: (client: C) => Promise<ResultEnvelope>,
): Promise<ResultEnvelope> {
  let client: C;
  try {
    client = build();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return errorEnvelope("configuration", err.message, {
        help: err.variable ? `Create .env file and add ${err.variable}=your_key` : undefined,
      });
    }
    throw err;
  }
  return run(client);
}

// -- Shared schema --

export const projectId = z.number().int().positive().describe("Project ID in Topvisor");

export const dateArg = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .describe("Date in YYYY-MM-DD format");

export const targetDomain = z.string().min(1).describe('Target domain (e.g. "example.com")');

export const resultLimit = z
  .number()
  .int()
  .min(1)
  .max(1000)
  .optional()
  .describe("Number of results (maximum 1000, default 100)");

export const orderBy = z.string().optional().describe('Sort expression (e.g. "domain_rating:desc")');

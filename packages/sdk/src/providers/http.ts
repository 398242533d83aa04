/**
 * Shared transport for provider clients: one fetch per call, a fixed
 * timeout, and classification of every outcome into a ProviderResult.
 */

import { z } from "zod";
import { errorMessage, failure } from "../errors.js";
import { createLogger } from "../logger.js";
import type {
  FetchLike,
  JsonObject,
  JsonValue,
  ProviderFailure,
  ProviderResult,
  QueryParams,
  RawResponse,
} from "../types.js";

const log = createLogger("http");

export const DEFAULT_TIMEOUT_MS = 60_000;

/** Per-provider wording for the status codes it distinguishes */
export interface StatusMessages {
  /** 401 */
  unauthorized: string;
  /** 403 */
  forbidden: string;
  /** 429, for providers that tag rate limits */
  rateLimited?: string;
}

export interface ProviderRequest {
  provider: string;
  url: string;
  init: RequestInit;
  timeoutMs: number;
  fetch: FetchLike;
  messages: StatusMessages;
}

/**
 * Map a non-200 response to a failure. Providers without `rateLimited`
 * see 429 as a generic API error.
 */
export function classifyStatus(
  response: RawResponse,
  messages: StatusMessages,
): ProviderFailure {
  const { httpStatus, body } = response;
  if (httpStatus === 401) {
    return failure("authentication", messages.unauthorized, { statusCode: 401 });
  }
  if (httpStatus === 403) {
    return failure("authorization", messages.forbidden, { statusCode: 403 });
  }
  if (httpStatus === 429 && messages.rateLimited) {
    return failure("rate_limit", messages.rateLimited, { statusCode: 429 });
  }
  return failure("provider", `API error ${httpStatus}`, {
    statusCode: httpStatus,
    details: body,
  });
}

/** Map a thrown fetch error to a failure */
export function classifyThrown(err: unknown): ProviderFailure {
  // undici rejects with TypeError("fetch failed") for DNS, refused and reset connections
  if (err instanceof TypeError) {
    return failure("transport", "No internet connection or API unavailable", {
      details: errorMessage(err.cause ?? err),
    });
  }
  return failure("unexpected", `Unexpected error: ${errorMessage(err)}`);
}

/** Drop undefined values, keeping insertion order */
export function compactParams(params: QueryParams): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Perform the request and return the raw body text on HTTP 200 */
export async function requestText(req: ProviderRequest): Promise<ProviderResult<string>> {
  log.debug({ provider: req.provider, url: req.url, method: req.init.method }, "provider request");

  let response: Response;
  let body: string;
  try {
    response = await req.fetch(req.url, {
      ...req.init,
      signal: AbortSignal.timeout(req.timeoutMs),
    });
    body = await response.text();
  } catch (err) {
    const classified = classifyThrown(err);
    log.warn({ provider: req.provider, kind: classified.kind }, classified.message);
    return { ok: false, failure: classified };
  }

  log.debug({ provider: req.provider, status: response.status }, "provider response");

  if (response.status !== 200) {
    const classified = classifyStatus({ httpStatus: response.status, body }, req.messages);
    log.warn({ provider: req.provider, status: response.status, kind: classified.kind }, classified.message);
    return { ok: false, failure: classified };
  }

  return { ok: true, data: body };
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), jsonValueSchema);

/** Decode a 200 body into a JSON object, once, at the client boundary */
export function decodeJsonObject(body: string): ProviderResult<JsonObject> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    return { ok: false, failure: failure("unexpected", `Unexpected error: ${errorMessage(err)}`) };
  }

  const decoded = jsonObjectSchema.safeParse(parsed);
  if (!decoded.success) {
    return {
      ok: false,
      failure: failure("shape", "Unexpected response shape: expected a JSON object", {
        statusCode: 200,
        details: body.slice(0, 500),
      }),
    };
  }
  return { ok: true, data: decoded.data };
}

/** requestText + decodeJsonObject */
export async function requestJson(req: ProviderRequest): Promise<ProviderResult<JsonObject>> {
  const text = await requestText(req);
  if (!text.ok) return text;
  return decodeJsonObject(text.data);
}

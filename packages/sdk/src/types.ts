// ============================================================================
// seobridge — Type definitions
// ============================================================================

// --------------------------------------------------------------------------
// JSON values
// --------------------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// --------------------------------------------------------------------------
// Errors
// --------------------------------------------------------------------------

/** Tag carried in the `error` field of every error envelope. */
export type ErrorKind =
  | "configuration"
  | "authentication"
  | "authorization"
  | "rate_limit"
  | "transport"
  | "provider"
  | "shape"
  | "unexpected"
  | "argument";

/** A classified failure from a provider call. */
export interface ProviderFailure {
  kind: ErrorKind;
  /** Short human-readable reason (e.g., "Invalid API key") */
  message: string;
  /** HTTP status when the provider answered */
  statusCode?: number;
  /** Raw response body or other diagnostic text */
  details?: string;
}

/**
 * Outcome of a single provider call. Clients never throw past their own
 * boundary; every failure path comes back as `{ ok: false }`.
 */
export type ProviderResult<T> =
  | { ok: true; data: T }
  | { ok: false; failure: ProviderFailure };

// --------------------------------------------------------------------------
// Credentials & requests
// --------------------------------------------------------------------------

export interface ProviderCredential {
  readonly baseUrl: string;
  readonly apiKey: string;
  /** Account/user id some providers require alongside the key */
  readonly accountId?: string;
}

export type QueryParams = Record<string, JsonValue | undefined>;

export interface QueryRequest {
  endpoint: string;
  params: QueryParams;
}

export interface RawResponse {
  httpStatus: number;
  body: string;
}

/** Minimal fetch signature so tests can inject a fake. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ClientOptions {
  /** API key. Construction fails when absent. */
  apiKey?: string;
  /** Override the provider base URL */
  baseUrl?: string;
  /** Per-request timeout in ms (default: 60000) */
  timeoutMs?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

// --------------------------------------------------------------------------
// Result envelope
// --------------------------------------------------------------------------

export type EnvelopeStatus = "success" | "warning" | "error";

/** Successful call: payload fields sit beside `status`. Never has `error`. */
export interface SuccessEnvelope {
  status: "success";
  [key: string]: JsonValue | undefined;
}

/** Key present but degraded (e.g. setup check reached the API and failed) */
export interface WarningEnvelope {
  status: "warning";
  message: string;
  [key: string]: JsonValue | undefined;
}

/** Failed call. `error` holds the kind tag and is always present. */
export interface ErrorEnvelope {
  status: "error";
  error: ErrorKind;
  message: string;
  details?: string;
  status_code?: number;
  help?: string;
  [key: string]: JsonValue | undefined;
}

/** The only contract tool callers depend on. */
export type ResultEnvelope = SuccessEnvelope | WarningEnvelope | ErrorEnvelope;

// --------------------------------------------------------------------------
// Papers
// --------------------------------------------------------------------------

export interface PaperRecord {
  id: string;
  title: string;
  authors: string[];
  summary: string;
  pdf_url: string;
  /** Publication date, YYYY-MM-DD */
  published: string;
}

import type {
  ErrorEnvelope,
  ErrorKind,
  JsonObject,
  JsonValue,
  ProviderFailure,
  ProviderResult,
  ResultEnvelope,
  SuccessEnvelope,
  WarningEnvelope,
} from "../types.js";

/** What every normalizer accepts: a raw client result, or its own output */
export type NormalizerInput = ProviderResult<JsonObject> | ResultEnvelope;

const STATUSES = new Set(["success", "warning", "error"]);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Whether a value already has the envelope shape. Success and error are
 * mutually exclusive on the `error` key.
 */
export function isResultEnvelope(value: unknown): value is ResultEnvelope {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  if (!("status" in value) || typeof value.status !== "string" || !STATUSES.has(value.status)) {
    return false;
  }
  if ("ok" in value) return false;
  const hasError = "error" in value;
  if (value.status === "error") {
    return hasError && "message" in value && typeof value.message === "string";
  }
  return !hasError;
}

// --- Builders ---

export function successEnvelope(payload: JsonObject): SuccessEnvelope {
  const { error: _dropped, status: _status, ...rest } = payload;
  return { status: "success", ...rest };
}

export function warningEnvelope(message: string, payload: JsonObject = {}): WarningEnvelope {
  const { error: _dropped, status: _status, message: _message, ...rest } = payload;
  return { status: "warning", message, ...rest };
}

export function errorEnvelope(
  kind: ErrorKind,
  message: string,
  extra: { details?: string; statusCode?: number; help?: string; [key: string]: JsonValue | undefined } = {},
): ErrorEnvelope {
  const { details, statusCode, help, status: _status, error: _error, message: _message, ...rest } = extra;
  const envelope: ErrorEnvelope = { status: "error", error: kind, message, ...rest };
  if (details !== undefined) envelope.details = details;
  if (statusCode !== undefined) envelope.status_code = statusCode;
  if (help !== undefined) envelope.help = help;
  return envelope;
}

/** Envelope for a classified provider failure: "API error: <message>" */
export function failureEnvelope(failure: ProviderFailure): ErrorEnvelope {
  return errorEnvelope(failure.kind, `API error: ${failure.message}`, {
    details: failure.details,
    statusCode: failure.statusCode,
  });
}

/** Pretty-printed JSON, the text every tool returns */
export function serializeEnvelope(envelope: ResultEnvelope): string {
  return JSON.stringify(envelope, null, 2);
}

// --- Input resolution ---

/**
 * Collapse the three cases shared by every normalizer: already-normalized
 * input, transport failure, and an `error`/`errors` key in the body.
 * Returns the body when it still needs endpoint-specific mapping.
 */
export function resolveInput(input: NormalizerInput): { envelope: ResultEnvelope } | { body: JsonObject } {
  if (isResultEnvelope(input)) return { envelope: input };
  if (!input.ok) return { envelope: failureEnvelope(input.failure) };

  const body = input.data;
  const bodyError = extractBodyError(body);
  if (bodyError) return { envelope: bodyError };
  return { body };
}

function extractBodyError(body: JsonObject): ErrorEnvelope | null {
  const { error, errors } = body;
  if (error !== undefined && error !== null) {
    const message = typeof error === "string" ? error : JSON.stringify(error);
    return errorEnvelope("provider", `API error: ${message}`, {
      details: typeof body.details === "string" ? body.details : undefined,
    });
  }
  if (Array.isArray(errors) && errors.length > 0) {
    const first = errors[0];
    const message =
      isJsonObject(first) && typeof first.string === "string" ? first.string : JSON.stringify(first);
    return errorEnvelope("provider", `API error: ${message}`, { details: JSON.stringify(errors) });
  }
  return null;
}

/** Human-readable type of a JSON value for shape diagnostics */
export function describeValue(value: JsonValue | undefined): string {
  if (value === undefined) return "missing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

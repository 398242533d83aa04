import type { JsonObject, JsonValue } from "../types.js";
import { describeValue, errorEnvelope, isJsonObject, resolveInput, successEnvelope } from "./envelope.js";
import type { NormalizerInput } from "./envelope.js";
import type { ResultEnvelope } from "../types.js";

/**
 * One whitelisted output field. A bare string copies the same-named field;
 * the object form renames (`from`) and/or supplies a default for missing
 * values (`fallback`, otherwise null).
 */
export type FieldSpec = string | { name: string; from?: string; fallback?: JsonValue };

export interface CollectionSpec {
  /** Key holding the item array in the raw body */
  source: string;
  /** Key the normalized items are written under */
  output: string;
  fields: readonly FieldSpec[];
  /** Message for an unexpected body shape */
  failureMessage: string;
}

/** Copy only whitelisted fields; unknown fields are dropped */
export function pickFields(item: JsonObject, fields: readonly FieldSpec[]): JsonObject {
  const out: JsonObject = {};
  for (const field of fields) {
    if (typeof field === "string") {
      out[field] = item[field] ?? null;
    } else {
      const value = item[field.from ?? field.name];
      out[field.name] = value ?? field.fallback ?? null;
    }
  }
  return out;
}

/** Normalize a list endpoint into `{ status, ...context, [output]: items, total_count }` */
export function normalizeCollection(
  input: NormalizerInput,
  spec: CollectionSpec,
  context: JsonObject = {},
): ResultEnvelope {
  const resolved = resolveInput(input);
  if ("envelope" in resolved) return resolved.envelope;

  const raw = resolved.body[spec.source];
  if (!Array.isArray(raw)) {
    return errorEnvelope("shape", spec.failureMessage, {
      details: `Expected an array under '${spec.source}', got ${describeValue(raw)}`,
    });
  }

  const items = raw.filter(isJsonObject).map((item) => pickFields(item, spec.fields));
  return successEnvelope({ ...context, [spec.output]: items, total_count: items.length });
}

/** Normalize an endpoint whose `result` is passed through as one object */
export function normalizeResultObject(
  input: NormalizerInput,
  failureMessage: string,
  build: (result: JsonValue) => JsonObject,
): ResultEnvelope {
  const resolved = resolveInput(input);
  if ("envelope" in resolved) return resolved.envelope;

  const result = resolved.body.result;
  if (result === undefined || result === null) {
    return errorEnvelope("shape", failureMessage, {
      details: `Expected 'result' in the response, got ${describeValue(result)}`,
    });
  }
  return successEnvelope(build(result));
}

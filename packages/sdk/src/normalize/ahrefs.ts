import type { ResultEnvelope } from "../types.js";
import { BACKLINK_FIELDS, ORGANIC_KEYWORD_FIELDS, REFDOMAIN_FIELDS } from "../providers/ahrefs.js";
import type { NormalizerInput } from "./envelope.js";
import { normalizeCollection } from "./fields.js";
import type { CollectionSpec } from "./fields.js";

export const REFDOMAINS: CollectionSpec = {
  source: "refdomains",
  output: "refdomains",
  fields: REFDOMAIN_FIELDS,
  failureMessage: "Failed to get referring domains data",
};

export const BACKLINKS: CollectionSpec = {
  source: "backlinks",
  output: "backlinks",
  fields: BACKLINK_FIELDS,
  failureMessage: "Failed to get backlinks data",
};

export const ORGANIC_KEYWORDS: CollectionSpec = {
  source: "keywords",
  output: "keywords",
  fields: ORGANIC_KEYWORD_FIELDS,
  failureMessage: "Failed to get organic keywords data",
};

export function normalizeRefdomains(input: NormalizerInput, target: string): ResultEnvelope {
  return normalizeCollection(input, REFDOMAINS, { target });
}

export function normalizeBacklinks(input: NormalizerInput, target: string): ResultEnvelope {
  return normalizeCollection(input, BACKLINKS, { target });
}

export function normalizeOrganicKeywords(input: NormalizerInput, target: string, date: string): ResultEnvelope {
  return normalizeCollection(input, ORGANIC_KEYWORDS, { target, date });
}

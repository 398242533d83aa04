/**
 * Keyword position history.
 *
 * Topvisor returns `result.keywords[]`, each with a `positionsData` object
 * keyed by `"<date>:<project_id>:<region>"`. Each value has a `position`
 * that is either a rank ("5") or "--" when the keyword is not ranking.
 */

import type { JsonObject, JsonValue, ResultEnvelope } from "../types.js";
import { describeValue, errorEnvelope, isJsonObject, resolveInput, successEnvelope } from "./envelope.js";
import type { NormalizerInput } from "./envelope.js";

export const NOT_RANKING = "--";

export interface PositionKey {
  date: string;
  projectId: string;
  region: string;
}

export interface PositionValue {
  position_numeric: number | null;
  is_not_ranking: boolean;
}

export interface PositionEntry extends PositionValue {
  keyword_name: string;
  date: string;
  position: string;
  project_id: string;
  region: string;
}

export interface PositionsContext {
  projectId: number;
  regionsIndexes: string[];
  date1?: string;
  date2?: string;
  limit: number;
  offset: number;
}

/** Split a composite key; null unless it has at least 3 `:`-separated parts */
export function parsePositionKey(key: string): PositionKey | null {
  const parts = key.split(":");
  if (parts.length < 3) return null;
  return { date: parts[0], projectId: parts[1], region: parts[2] };
}

/** "--" is not ranking; a digit string is an integer rank; anything else has no rank */
export function parsePositionValue(position: string): PositionValue {
  return {
    position_numeric: /^\d+$/.test(position) ? parseInt(position, 10) : null,
    is_not_ranking: position === NOT_RANKING,
  };
}

/** Flatten the nested history into one entry per keyword and date */
export function extractPositions(result: JsonObject): PositionEntry[] {
  const keywords = result.keywords;
  if (!Array.isArray(keywords)) return [];

  const entries: PositionEntry[] = [];
  for (const keyword of keywords) {
    if (!isJsonObject(keyword)) continue;
    const name = typeof keyword.name === "string" ? keyword.name : "unknown";
    const positionsData = keyword.positionsData;
    if (!isJsonObject(positionsData)) continue;

    for (const [compositeKey, info] of Object.entries(positionsData)) {
      if (!isJsonObject(info)) continue;
      const raw = info.position;
      if (typeof raw !== "string" && typeof raw !== "number") continue;

      const key = parsePositionKey(compositeKey);
      if (!key) continue;

      const position = String(raw);
      entries.push({
        keyword_name: name,
        date: key.date,
        position,
        project_id: key.projectId,
        region: key.region,
        ...parsePositionValue(position),
      });
    }
  }
  return entries;
}

function dateRange(entries: PositionEntry[]): { start: string; end: string } {
  if (entries.length === 0) return { start: "no_data", end: "no_data" };
  const dates = entries.map((e) => e.date).sort();
  return { start: dates[0], end: dates[dates.length - 1] };
}

function toJson(entry: PositionEntry): JsonObject {
  return { ...entry };
}

export function normalizePositionsHistory(input: NormalizerInput, context: PositionsContext): ResultEnvelope {
  const resolved = resolveInput(input);
  if ("envelope" in resolved) return resolved.envelope;

  const result: JsonValue | undefined = resolved.body.result;
  if (result === null || result === undefined) {
    return errorEnvelope("shape", "API returned no position data for the specified period", {
      details: `Expected 'result' in the response, got ${describeValue(result)}`,
    });
  }
  if (!isJsonObject(result)) {
    return errorEnvelope("shape", "Failed to get position data", {
      details: `Expected an object under 'result', got ${describeValue(result)}`,
    });
  }

  const entries = extractPositions(result);
  return successEnvelope({
    project_id: context.projectId,
    regions_indexes: context.regionsIndexes,
    period: `${context.date1 ?? "auto"} - ${context.date2 ?? "auto"}`,
    positions: entries.map(toJson),
    total_count: entries.length,
    unique_keywords: new Set(entries.map((e) => e.keyword_name)).size,
    date_range: dateRange(entries),
    limit: context.limit,
    offset: context.offset,
  });
}

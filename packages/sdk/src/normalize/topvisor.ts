import type { JsonObject, JsonValue, ResultEnvelope } from "../types.js";
import { REGION_COLUMNS } from "../providers/topvisor.js";
import { isJsonObject, resolveInput, successEnvelope } from "./envelope.js";
import type { NormalizerInput } from "./envelope.js";
import { normalizeCollection, normalizeResultObject } from "./fields.js";
import type { CollectionSpec } from "./fields.js";

// --- Field whitelists ---

export const PROJECTS: CollectionSpec = {
  source: "result",
  output: "projects",
  fields: ["id", "name", "url", "status", { name: "created", from: "date_add" }],
  failureMessage: "Failed to get project data",
};

export const KEYWORDS: CollectionSpec = {
  source: "result",
  output: "keywords",
  fields: ["id", "name", "folder_id", "group_id", "url", { name: "tags", fallback: [] }],
  failureMessage: "Failed to get keyword data",
};

export const COMPETITORS: CollectionSpec = {
  source: "result",
  output: "competitors",
  fields: ["id", "name", "url", { name: "status", from: "on" }, "enabled"],
  failureMessage: "Failed to get competitor data",
};

export const FOLDERS: CollectionSpec = {
  source: "result",
  output: "folders",
  fields: ["id", "name", "parent_id", { name: "keywords_count", from: "count_keywords" }],
  failureMessage: "Failed to get folder data",
};

export const GROUPS: CollectionSpec = {
  source: "result",
  output: "groups",
  fields: [
    "id",
    "name",
    "folder_id",
    { name: "keywords_count", from: "count_keywords" },
    { name: "enabled", from: "on" },
  ],
  failureMessage: "Failed to get group data",
};

export const REGIONS: CollectionSpec = {
  source: "result",
  output: "regions",
  fields: REGION_COLUMNS,
  failureMessage: "Failed to get region data",
};

// --- Normalizers ---

export function normalizeProjects(input: NormalizerInput): ResultEnvelope {
  return normalizeCollection(input, PROJECTS);
}

export function normalizeKeywords(input: NormalizerInput, projectId: number): ResultEnvelope {
  return normalizeCollection(input, KEYWORDS, { project_id: projectId });
}

export function normalizeCompetitors(input: NormalizerInput, projectId: number): ResultEnvelope {
  return normalizeCollection(input, COMPETITORS, { project_id: projectId });
}

export function normalizeFolders(input: NormalizerInput, projectId: number): ResultEnvelope {
  return normalizeCollection(input, FOLDERS, { project_id: projectId });
}

export function normalizeGroups(input: NormalizerInput, projectId: number, folderId?: number): ResultEnvelope {
  return normalizeCollection(input, GROUPS, { project_id: projectId, folder_id: folderId ?? null });
}

export function normalizeRegions(input: NormalizerInput, projectId: number): ResultEnvelope {
  return normalizeCollection(input, REGIONS, { project_id: projectId });
}

/** `result` is passed through untouched as `summary` */
export function normalizePositionsSummary(
  input: NormalizerInput,
  projectId: number,
  date1?: string,
  date2?: string,
): ResultEnvelope {
  return normalizeResultObject(input, "Failed to get position summary", (summary) => ({
    project_id: projectId,
    period: `${date1 ?? "auto"} - ${date2 ?? "auto"}`,
    summary,
  }));
}

export function normalizeBalance(input: NormalizerInput): ResultEnvelope {
  return normalizeResultObject(input, "Failed to get balance data", (result) => {
    const first = accountInfo(result);
    const info: JsonObject = isJsonObject(first) ? first : {};
    return {
      balance: info.balance ?? null,
      currency: info.currency ?? "RUB",
      xml_limits: info.xml_limits ?? {},
      account_info: result,
    };
  });
}

/** Diagnostic view: the raw keywords body, unfiltered */
export function normalizeProjectKeywords(input: NormalizerInput, projectId: number): ResultEnvelope {
  const resolved = resolveInput(input);
  if ("envelope" in resolved) return resolved.envelope;
  return successEnvelope({ project_id: projectId, keywords_data: resolved.body });
}

/** Some accounts get `bank_2/info` back as a one-element list instead of an object */
function accountInfo(result: JsonValue | undefined): JsonValue | undefined {
  return Array.isArray(result) ? result[0] : result;
}

/** Balance as reported by `bank_2/info` */
export function extractBalance(result: JsonValue | undefined): JsonValue {
  const info = accountInfo(result);
  if (isJsonObject(info) && info.balance !== undefined) return info.balance;
  return "N/A";
}

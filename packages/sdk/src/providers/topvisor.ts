/**
 * Topvisor rank-tracking API client.
 *
 * POST JSON to https://api.topvisor.com/v2/json/get/<endpoint>.
 * Auth: `Authorization: bearer <key>` plus a `User-Id` header.
 */

import { ConfigurationError } from "../errors.js";
import type {
  ClientOptions,
  FetchLike,
  JsonObject,
  ProviderCredential,
  ProviderResult,
  QueryRequest,
} from "../types.js";
import type { Env } from "../config.js";
import { parseDelimited, rowsToRecords } from "./csv.js";
import { defaultPeriod } from "./dates.js";
import { DEFAULT_TIMEOUT_MS, compactParams, requestJson, requestText } from "./http.js";
import type { ProviderRequest, StatusMessages } from "./http.js";

export const TOPVISOR_BASE_URL = "https://api.topvisor.com/v2/json/get";

/** Column order of the searchers/regions CSV export */
export const REGION_COLUMNS = [
  "search_engine_key",
  "name",
  "country_code",
  "language",
  "region_device",
  "depth",
] as const;

export const DEFAULT_REGION_INDEXES = ["33"];

const STATUS_MESSAGES: StatusMessages = {
  unauthorized: "Invalid API key",
  forbidden: "Insufficient access permissions",
};

export interface TopvisorClientOptions extends ClientOptions {
  /** Value of the User-Id header */
  userId?: string;
}

export interface PositionsHistoryOptions {
  /** Region indexes (default: ["33"]) */
  regionsIndexes?: string[];
  /** Period start YYYY-MM-DD (default: 7 days ago) */
  date1?: string;
  /** Period end YYYY-MM-DD (default: today) */
  date2?: string;
  /** Number of records (default: 100) */
  limit?: number;
  /** Pagination offset (default: 0) */
  offset?: number;
}

export class TopvisorClient {
  readonly credential: ProviderCredential;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: TopvisorClientOptions = {}) {
    if (!options.apiKey) {
      throw new ConfigurationError(
        "Topvisor API key not found. Set TOPVISOR_API_KEY in the environment or .env file.",
        "TOPVISOR_API_KEY",
      );
    }
    this.credential = Object.freeze({
      baseUrl: options.baseUrl ?? TOPVISOR_BASE_URL,
      apiKey: options.apiKey,
      accountId: options.userId,
    });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Build a client from TOPVISOR_API_KEY / TOPVISOR_USER_ID */
  static fromEnv(env: Env = process.env, options: Omit<TopvisorClientOptions, "apiKey" | "userId"> = {}): TopvisorClient {
    return new TopvisorClient({
      ...options,
      apiKey: env.TOPVISOR_API_KEY,
      userId: env.TOPVISOR_USER_ID,
    });
  }

  // --- Projects ---

  /** List the user's projects */
  getProjects(): Promise<ProviderResult<JsonObject>> {
    return this.post({ endpoint: "projects_2/projects", params: {} });
  }

  getCompetitors(projectId: number): Promise<ProviderResult<JsonObject>> {
    return this.post({ endpoint: "projects_2/competitors", params: { project_id: projectId } });
  }

  // --- Keywords ---

  /** Project keywords, optionally narrowed to a folder and/or group */
  getKeywords(projectId: number, folderId?: number, groupId?: number): Promise<ProviderResult<JsonObject>> {
    return this.post({
      endpoint: "keywords_2/keywords",
      params: { project_id: projectId, folder_id: folderId || undefined, group_id: groupId || undefined },
    });
  }

  getKeywordFolders(projectId: number): Promise<ProviderResult<JsonObject>> {
    return this.post({ endpoint: "keywords_2/folders", params: { project_id: projectId } });
  }

  getKeywordGroups(projectId: number, folderId?: number): Promise<ProviderResult<JsonObject>> {
    return this.post({
      endpoint: "keywords_2/groups",
      params: { project_id: projectId, folder_id: folderId || undefined },
    });
  }

  // --- Positions ---

  /** Keyword position history for a period */
  getPositionsHistory(projectId: number, options: PositionsHistoryOptions = {}): Promise<ProviderResult<JsonObject>> {
    const period = defaultPeriod();
    return this.post({
      endpoint: "positions_2/history",
      params: {
        project_id: projectId,
        regions_indexes: options.regionsIndexes ?? DEFAULT_REGION_INDEXES,
        date1: options.date1 ?? period.date1,
        date2: options.date2 ?? period.date2,
        limit: options.limit ?? 100,
        offset: options.offset ?? 0,
      },
    });
  }

  getPositionsSummary(projectId: number, date1?: string, date2?: string): Promise<ProviderResult<JsonObject>> {
    const period = defaultPeriod();
    return this.post({
      endpoint: "positions_2/summary",
      params: { project_id: projectId, date1: date1 ?? period.date1, date2: date2 ?? period.date2 },
    });
  }

  /**
   * Project search engines and regions. This endpoint only exports CSV
   * (semicolon-delimited), so the body is parsed here into `{ result: rows }`.
   */
  async getRegions(projectId: number): Promise<ProviderResult<JsonObject>> {
    const text = await requestText(
      this.buildRequest({ endpoint: "positions_2/searchers_regions/export", params: { project_id: projectId } }),
    );
    if (!text.ok) return text;

    const rows = rowsToRecords(parseDelimited(text.data, ";"), REGION_COLUMNS);
    return { ok: true, data: { result: rows } };
  }

  // --- Account ---

  getBalance(): Promise<ProviderResult<JsonObject>> {
    return this.post({ endpoint: "bank_2/info", params: {} });
  }

  // --- Transport ---

  private post(request: QueryRequest): Promise<ProviderResult<JsonObject>> {
    return requestJson(this.buildRequest(request));
  }

  private buildRequest(request: QueryRequest): ProviderRequest {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Authorization: `bearer ${this.credential.apiKey}`,
    };
    if (this.credential.accountId) headers["User-Id"] = this.credential.accountId;

    return {
      provider: "topvisor",
      url: `${this.credential.baseUrl}/${request.endpoint}`,
      init: { method: "POST", headers, body: JSON.stringify(compactParams(request.params)) },
      timeoutMs: this.timeoutMs,
      fetch: this.fetchImpl,
      messages: STATUS_MESSAGES,
    };
  }
}

/**
 * Ahrefs backlink-analytics API client (v3 Site Explorer).
 *
 * GET https://api.ahrefs.com/v3/<endpoint>?target=…&select=…
 * Auth: `Authorization: Bearer <key>`. `select` is required by the API.
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
import { DEFAULT_TIMEOUT_MS, compactParams, requestJson } from "./http.js";
import type { ProviderRequest, StatusMessages } from "./http.js";
import { isoDate } from "./dates.js";

export const AHREFS_BASE_URL = "https://api.ahrefs.com/v3";

export const REFDOMAIN_FIELDS = [
  "domain",
  "domain_rating",
  "links_to_target",
  "first_seen",
  "last_seen",
  "traffic_domain",
] as const;

export const BACKLINK_FIELDS = [
  "url_from",
  "url_to",
  "domain_rating_source",
  "domain_rating_target",
  "traffic",
  "traffic_domain",
  "anchor",
  "name_source",
  "name_target",
  "noindex",
  "page_size",
  "positions",
  "title",
  "url_rating_source",
] as const;

export const ORGANIC_KEYWORD_FIELDS = [
  "keyword",
  "best_position",
  "best_position_url",
  "keyword_country",
  "keyword_difficulty",
  "last_update",
  "sum_traffic",
  "volume",
  "volume_desktop_pct",
  "volume_mobile_pct",
] as const;

export const DEFAULT_ORDER = {
  refdomains: "domain_rating:desc",
  backlinks: "domain_rating_source:desc",
  organicKeywords: "best_position:asc",
} as const;

export const DEFAULT_LIMIT = 100;

const STATUS_MESSAGES: StatusMessages = {
  unauthorized: "Invalid API key",
  forbidden: "Insufficient access permissions or credits",
  rateLimited: "Request limit exceeded",
};

export interface TargetQueryOptions {
  /** Number of results, max 1000 (default: 100) */
  limit?: number;
  /** Sort expression, e.g. "domain_rating:desc" */
  orderBy?: string;
  /** Comma-separated field list (default: the endpoint's documented fields) */
  select?: string;
}

export interface OrganicKeywordsOptions extends TargetQueryOptions {
  /** YYYY-MM-DD (default: today) */
  date?: string;
}

export class AhrefsClient {
  readonly credential: ProviderCredential;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ClientOptions = {}) {
    if (!options.apiKey) {
      throw new ConfigurationError(
        "Ahrefs API key not found. Set AHREFS_API_KEY in the environment or .env file.",
        "AHREFS_API_KEY",
      );
    }
    this.credential = Object.freeze({
      baseUrl: options.baseUrl ?? AHREFS_BASE_URL,
      apiKey: options.apiKey,
    });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Build a client from AHREFS_API_KEY */
  static fromEnv(env: Env = process.env, options: Omit<ClientOptions, "apiKey"> = {}): AhrefsClient {
    return new AhrefsClient({ ...options, apiKey: env.AHREFS_API_KEY });
  }

  /** Referring domains for a target domain */
  getRefdomains(target: string, options: TargetQueryOptions = {}): Promise<ProviderResult<JsonObject>> {
    return this.get({
      endpoint: "site-explorer/refdomains",
      params: {
        target,
        limit: options.limit ?? DEFAULT_LIMIT,
        order_by: options.orderBy ?? DEFAULT_ORDER.refdomains,
        select: options.select ?? REFDOMAIN_FIELDS.join(","),
      },
    });
  }

  /** All backlinks pointing at a target domain */
  getBacklinks(target: string, options: TargetQueryOptions = {}): Promise<ProviderResult<JsonObject>> {
    return this.get({
      endpoint: "site-explorer/all-backlinks",
      params: {
        target,
        limit: options.limit ?? DEFAULT_LIMIT,
        order_by: options.orderBy ?? DEFAULT_ORDER.backlinks,
        select: options.select ?? BACKLINK_FIELDS.join(","),
      },
    });
  }

  /** Organic keywords a target ranks for on a given date */
  getOrganicKeywords(target: string, options: OrganicKeywordsOptions = {}): Promise<ProviderResult<JsonObject>> {
    return this.get({
      endpoint: "site-explorer/organic-keywords",
      params: {
        target,
        limit: options.limit ?? DEFAULT_LIMIT,
        date: options.date ?? isoDate(new Date()),
        order_by: options.orderBy ?? DEFAULT_ORDER.organicKeywords,
        select: options.select ?? ORGANIC_KEYWORD_FIELDS.join(","),
      },
    });
  }

  private get(request: QueryRequest): Promise<ProviderResult<JsonObject>> {
    return requestJson(this.buildRequest(request));
  }

  private buildRequest(request: QueryRequest): ProviderRequest {
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(compactParams(request.params))) {
      query.set(key, String(value));
    }

    return {
      provider: "ahrefs",
      url: `${this.credential.baseUrl}/${request.endpoint}?${query.toString()}`,
      init: {
        method: "GET",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.credential.apiKey}`,
        },
      },
      timeoutMs: this.timeoutMs,
      fetch: this.fetchImpl,
      messages: STATUS_MESSAGES,
    };
  }
}

// ============================================================================
// seobridge — SEO data providers behind one result envelope
// ============================================================================
//
// Usage:
//   import { TopvisorClient, normalizeProjects, serializeEnvelope } from 'seobridge'
//
// ============================================================================

// Provider clients
export { TopvisorClient, DEFAULT_REGION_INDEXES } from "./providers/topvisor.js";
export type { TopvisorClientOptions, PositionsHistoryOptions } from "./providers/topvisor.js";
export { AhrefsClient, DEFAULT_ORDER, DEFAULT_LIMIT } from "./providers/ahrefs.js";
export type { TargetQueryOptions, OrganicKeywordsOptions } from "./providers/ahrefs.js";
export { isoDate } from "./providers/dates.js";

// Envelope
export { errorEnvelope, failureEnvelope, serializeEnvelope } from "./normalize/envelope.js";
export type { NormalizerInput } from "./normalize/envelope.js";

// Normalizers
export {
  normalizeProjects,
  normalizeKeywords,
  normalizeCompetitors,
  normalizeFolders,
  normalizeGroups,
  normalizeRegions,
  normalizePositionsSummary,
  normalizeBalance,
  normalizeProjectKeywords,
} from "./normalize/topvisor.js";
export { normalizePositionsHistory } from "./normalize/positions.js";
export type { PositionsContext } from "./normalize/positions.js";
export { normalizeRefdomains, normalizeBacklinks, normalizeOrganicKeywords } from "./normalize/ahrefs.js";

// Setup checks
export { checkTopvisorSetup, checkAhrefsSetup } from "./setup-check.js";
export type { SetupCheckOptions } from "./setup-check.js";

// Papers
export { ArxivClient } from "./papers/arxiv.js";
export type { ArxivClientOptions } from "./papers/arxiv.js";
export { PaperStore } from "./papers/store.js";
export { formatTopicList, formatTopicPapers } from "./papers/markdown.js";

// Errors, config, logging
export { ConfigurationError, ArgumentError, errorMessage } from "./errors.js";
export { loadEnvironment, resolveServerSettings, resolveChatSettings } from "./config.js";
export type { Env, ServerSettings, ChatSettings } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Types
export type {
  JsonValue,
  JsonObject,
  ErrorKind,
  ProviderFailure,
  ProviderResult,
  FetchLike,
  SuccessEnvelope,
  WarningEnvelope,
  ErrorEnvelope,
  ResultEnvelope,
  PaperRecord,
} from "./types.js";

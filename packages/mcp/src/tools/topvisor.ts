import { z } from "zod";
import {
  DEFAULT_REGION_INDEXES,
  checkTopvisorSetup,
  normalizeBalance,
  normalizeCompetitors,
  normalizeFolders,
  normalizeGroups,
  normalizeKeywords,
  normalizePositionsHistory,
  normalizePositionsSummary,
  normalizeProjectKeywords,
  normalizeProjects,
  normalizeRegions,
} from "seobridge";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { dateArg, envelopeResult, projectId, withClient } from "./shared.js";

const optionalId = (what: string) => z.number().int().positive().optional().describe(`${what} ID (optional)`);

export function registerTopvisorTools(server: McpServer, ctx: ServerContext) {
  const topvisor = () => ctx.providers.topvisor();

  server.tool(
    "check_topvisor_setup",
    "Check Topvisor API setup: whether a .env file exists, whether TOPVISOR_API_KEY is set, and whether the API answers. Reports the account balance on success.",
    async () => envelopeResult(await checkTopvisorSetup(ctx.setup)),
  );

  server.tool(
    "get_topvisor_projects",
    "List all Topvisor projects with id, name, url, status and creation date.",
    async () =>
      envelopeResult(await withClient(topvisor, async (client) => normalizeProjects(await client.getProjects()))),
  );

  server.tool(
    "get_topvisor_keywords",
    "List the keywords of a Topvisor project, optionally narrowed to a folder or group.",
    {
      project_id: projectId,
      folder_id: optionalId("Folder"),
      group_id: optionalId("Group"),
    },
    async (args) =>
      envelopeResult(
        await withClient(topvisor, async (client) =>
          normalizeKeywords(await client.getKeywords(args.project_id, args.folder_id, args.group_id), args.project_id),
        ),
      ),
  );

  server.tool(
    "get_topvisor_positions_history",
    "Keyword position history for a Topvisor project. One entry per keyword and date; '--' means not ranking. Dates default to the last 7 days.",
    {
      project_id: projectId,
      regions_indexes: z.array(z.string()).optional().describe('Region indexes (default ["33"])'),
      date1: dateArg.optional().describe("Period start, YYYY-MM-DD (default 7 days ago)"),
      date2: dateArg.optional().describe("Period end, YYYY-MM-DD (default today)"),
      limit: z.number().int().positive().optional().describe("Number of records (default 100)"),
      offset: z.number().int().min(0).optional().describe("Pagination offset (default 0)"),
    },
    async (args) => {
      const regionsIndexes = args.regions_indexes ?? DEFAULT_REGION_INDEXES;
      const limit = args.limit ?? 100;
      const offset = args.offset ?? 0;
      return envelopeResult(
        await withClient(topvisor, async (client) =>
          normalizePositionsHistory(
            await client.getPositionsHistory(args.project_id, {
              regionsIndexes,
              date1: args.date1,
              date2: args.date2,
              limit,
              offset,
            }),
            { projectId: args.project_id, regionsIndexes, date1: args.date1, date2: args.date2, limit, offset },
          ),
        ),
      );
    },
  );

  server.tool(
    "get_topvisor_positions_summary",
    "Position summary for a Topvisor project over a period (default: the last 7 days).",
    {
      project_id: projectId,
      date1: dateArg.optional().describe("Period start, YYYY-MM-DD"),
      date2: dateArg.optional().describe("Period end, YYYY-MM-DD"),
    },
    async (args) =>
      envelopeResult(
        await withClient(topvisor, async (client) =>
          normalizePositionsSummary(
            await client.getPositionsSummary(args.project_id, args.date1, args.date2),
            args.project_id,
            args.date1,
            args.date2,
          ),
        ),
      ),
  );

  server.tool(
    "get_topvisor_competitors",
    "List the competitors tracked in a Topvisor project.",
    { project_id: projectId },
    async (args) =>
      envelopeResult(
        await withClient(topvisor, async (client) =>
          normalizeCompetitors(await client.getCompetitors(args.project_id), args.project_id),
        ),
      ),
  );

  server.tool(
    "get_topvisor_regions",
    "List the search engines and regions configured for a Topvisor project.",
    { project_id: projectId },
    async (args) =>
      envelopeResult(
        await withClient(topvisor, async (client) =>
          normalizeRegions(await client.getRegions(args.project_id), args.project_id),
        ),
      ),
  );

  server.tool(
    "get_topvisor_keyword_folders",
    "List the keyword folders of a Topvisor project.",
    { project_id: projectId },
    async (args) =>
      envelopeResult(
        await withClient(topvisor, async (client) =>
          normalizeFolders(await client.getKeywordFolders(args.project_id), args.project_id),
        ),
      ),
  );

  server.tool(
    "get_topvisor_keyword_groups",
    "List the keyword groups of a Topvisor project, optionally within one folder.",
    { project_id: projectId, folder_id: optionalId("Folder") },
    async (args) =>
      envelopeResult(
        await withClient(topvisor, async (client) =>
          normalizeGroups(
            await client.getKeywordGroups(args.project_id, args.folder_id),
            args.project_id,
            args.folder_id,
          ),
        ),
      ),
  );

  server.tool(
    "get_topvisor_balance",
    "Topvisor account balance, currency and XML limits.",
    async () =>
      envelopeResult(await withClient(topvisor, async (client) => normalizeBalance(await client.getBalance()))),
  );

  server.tool(
    "get_topvisor_project_keywords",
    "Raw keywords response for a Topvisor project, for diagnostics.",
    { project_id: projectId },
    async (args) =>
      envelopeResult(
        await withClient(topvisor, async (client) =>
          normalizeProjectKeywords(await client.getKeywords(args.project_id), args.project_id),
        ),
      ),
  );
}

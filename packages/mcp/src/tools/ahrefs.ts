import {
  checkAhrefsSetup,
  isoDate,
  normalizeBacklinks,
  normalizeOrganicKeywords,
  normalizeRefdomains,
} from "seobridge";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { dateArg, envelopeResult, orderBy, resultLimit, targetDomain, withClient } from "./shared.js";

export function registerAhrefsTools(server: McpServer, ctx: ServerContext) {
  const ahrefs = () => ctx.providers.ahrefs();

  server.tool(
    "check_ahrefs_setup",
    "Check Ahrefs API setup: whether a .env file exists, whether AHREFS_API_KEY is set, and whether a test request succeeds.",
    async () => envelopeResult(await checkAhrefsSetup(ctx.setup)),
  );

  server.tool(
    "get_ahrefs_refdomains",
    "Referring domains for a target domain, sorted by domain rating.",
    { target: targetDomain, limit: resultLimit, order_by: orderBy },
    async (args) =>
      envelopeResult(
        await withClient(ahrefs, async (client) =>
          normalizeRefdomains(
            await client.getRefdomains(args.target, { limit: args.limit, orderBy: args.order_by }),
            args.target,
          ),
        ),
      ),
  );

  server.tool(
    "get_ahrefs_backlinks",
    "Backlinks pointing at a target domain, sorted by source domain rating.",
    { target: targetDomain, limit: resultLimit, order_by: orderBy },
    async (args) =>
      envelopeResult(
        await withClient(ahrefs, async (client) =>
          normalizeBacklinks(
            await client.getBacklinks(args.target, { limit: args.limit, orderBy: args.order_by }),
            args.target,
          ),
        ),
      ),
  );

  server.tool(
    "get_ahrefs_organic_keywords",
    "Organic keywords a target domain ranks for on a given date (default today), sorted by best position.",
    {
      target: targetDomain,
      limit: resultLimit,
      order_by: orderBy,
      date: dateArg.optional().describe("Date in YYYY-MM-DD format (default today)"),
    },
    async (args) => {
      const date = args.date ?? isoDate(new Date());
      return envelopeResult(
        await withClient(ahrefs, async (client) =>
          normalizeOrganicKeywords(
            await client.getOrganicKeywords(args.target, { limit: args.limit, orderBy: args.order_by, date }),
            args.target,
            date,
          ),
        ),
      );
    },
  );
}

import { z } from "zod";
import { createLogger, errorEnvelope, errorMessage, failureEnvelope } from "seobridge";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { envelopeResult, textResult } from "./shared.js";

const log = createLogger("paper-tools");

export function registerPaperTools(server: McpServer, ctx: ServerContext) {
  server.tool(
    "search_papers",
    "Search arXiv for papers on a topic and save their details under that topic. Returns the list of paper IDs found.",
    {
      topic: z.string().min(1).describe("The topic to search for"),
      max_results: z.number().int().min(1).max(100).default(5).describe("Maximum number of results (default 5)"),
    },
    async (args) => {
      const result = await ctx.providers.arxiv().search(args.topic, args.max_results);
      if (!result.ok) return envelopeResult(failureEnvelope(result.failure));

      try {
        await ctx.papers.save(args.topic, result.data);
      } catch (err) {
        log.error({ topic: args.topic, err: errorMessage(err) }, "could not save papers");
        return envelopeResult(errorEnvelope("unexpected", `Failed to save papers: ${errorMessage(err)}`));
      }
      return textResult(JSON.stringify(result.data.map((paper) => paper.id)));
    },
  );

  server.tool(
    "extract_info",
    "Look up a saved paper by ID across all topics and return its details.",
    { paper_id: z.string().min(1).describe("The ID of the paper to look for") },
    async (args) => {
      const paper = await ctx.papers.find(args.paper_id);
      if (!paper) return textResult(`There's no saved information related to paper ${args.paper_id}.`);

      const { id: _id, ...info } = paper;
      return textResult(JSON.stringify(info, null, 2));
    },
  );
}

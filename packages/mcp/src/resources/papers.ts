import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { formatTopicList, formatTopicPapers } from "seobridge";
import type { ServerContext } from "../context.js";

export const FOLDERS_URI = "papers://folders";

export function registerPaperResources(server: McpServer, ctx: ServerContext) {
  server.resource(
    "paper-folders",
    FOLDERS_URI,
    {
      description: "Markdown list of the topics that have saved papers.",
      mimeType: "text/markdown",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "text/markdown",
          text: formatTopicList(await ctx.papers.listTopics()),
        },
      ],
    }),
  );

  server.resource(
    "topic-papers",
    new ResourceTemplate("papers://{topic}", { list: undefined }),
    {
      description: "Saved papers for one topic, with summaries clipped to 500 characters.",
      mimeType: "text/markdown",
    },
    async (uri, variables) => {
      const raw = variables.topic;
      const topic = decodeURIComponent(Array.isArray(raw) ? raw.join("/") : raw);
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "text/markdown",
            text: formatTopicPapers(topic, await ctx.papers.readTopic(topic)),
          },
        ],
      };
    },
  );
}

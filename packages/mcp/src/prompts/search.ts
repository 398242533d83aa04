import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export const DEFAULT_NUM_PAPERS = "5";

export function searchPromptText(topic: string, numPapers: string): string {
  return `Search for ${numPapers} academic papers about '${topic}' using the search_papers tool.

Follow these instructions:
1. First, search for papers using search_papers(topic='${topic}', max_results=${numPapers})
2. For each paper found, extract and organize the following information:
   - Paper title
   - Authors
   - Publication date
   - Brief summary of the key findings
   - Main contributions or innovations
   - Methodologies used
   - Relevance to the topic '${topic}'

3. Provide a comprehensive summary that includes:
   - Overview of the current state of research in '${topic}'
   - Common themes and trends across the papers
   - Key research gaps or areas for future investigation
   - Most impactful or influential papers in this area

4. Organize your findings in a clear, structured format with headings and bullet points for easy readability.

Please present both detailed information about each paper and a high-level synthesis of the research landscape in ${topic}.`;
}

export function registerSearchPrompt(server: McpServer) {
  server.prompt(
    "generate_search_prompt",
    "Generate a prompt to find and discuss academic papers on a specific topic.",
    {
      topic: z.string().describe("Research topic"),
      num_papers: z.string().optional().describe("Number of papers to search for (default 5)"),
    },
    (args) => ({
      messages: [
        {
          role: "user" as const,
          content: { type: "text" as const, text: searchPromptText(args.topic, args.num_papers || DEFAULT_NUM_PAPERS) },
        },
      ],
    }),
  );
}

import type { PaperRecord } from "../types.js";
import type { TopicReadResult } from "./store.js";

export const SUMMARY_PREVIEW_CHARS = 500;

/** Markdown list of topics, with a hint for the `@topic` shortcut */
export function formatTopicList(topics: string[]): string {
  let content = "# Available Topics\n\n";
  if (topics.length === 0) return `${content}No topics found.\n`;

  for (const topic of topics) content += `- ${topic}\n`;
  content += `\nUse @${topics[topics.length - 1]} to access papers in that topic.\n`;
  return content;
}

/** "machine_learning" → "Machine Learning" */
export function topicTitle(topic: string): string {
  return topic
    .replace(/_/g, " ")
    .split(" ")
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(" ");
}

function formatPaper(paper: PaperRecord): string {
  return [
    `## ${paper.title}`,
    `- **Paper ID**: ${paper.id}`,
    `- **Authors**: ${paper.authors.join(", ")}`,
    `- **Published**: ${paper.published}`,
    `- **PDF URL**: [${paper.pdf_url}](${paper.pdf_url})`,
    "",
    "### Summary",
    `${paper.summary.slice(0, SUMMARY_PREVIEW_CHARS)}...`,
    "",
    "---",
    "",
    "",
  ].join("\n");
}

export function formatTopicPapers(topic: string, result: TopicReadResult): string {
  switch (result.kind) {
    case "missing":
      return `# No papers found for topic: ${topic}\n\nTry searching for papers on this topic first.`;
    case "corrupt":
      return `# Error reading papers data for ${topic}\n\nThe papers data file is corrupted.`;
    case "ok":
      return (
        `# Papers on ${topicTitle(topic)}\n\n` +
        `Total papers: ${result.papers.length}\n\n` +
        result.papers.map(formatPaper).join("")
      );
  }
}

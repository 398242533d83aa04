import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { glob } from "glob";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { PaperRecord } from "../types.js";

const log = createLogger("paper-store");

export const INDEX_FILE = "papers_info.json";

const storedPaperSchema = z.object({
  title: z.string(),
  authors: z.array(z.string()),
  summary: z.string(),
  pdf_url: z.string(),
  published: z.string(),
});

const topicIndexSchema = z.record(z.string(), storedPaperSchema);

/** On-disk shape: records keyed by paper id, without the id itself */
export type TopicIndex = z.infer<typeof topicIndexSchema>;

export type TopicReadResult =
  | { kind: "ok"; papers: PaperRecord[] }
  | { kind: "missing" }
  | { kind: "corrupt"; reason: string };

/**
 * "Machine Learning" → "machine_learning". Path separators and `..` become
 * underscores so a topic always names one directory directly under the root.
 */
export function topicSlug(topic: string): string {
  const slug = topic
    .toLowerCase()
    .replace(/ /g, "_")
    .replace(/[\/\\]/g, "_")
    .replace(/\.{2,}/g, "_");
  return slug === "." ? "_" : slug;
}

function toRecords(index: TopicIndex): PaperRecord[] {
  return Object.entries(index).map(([id, paper]) => ({ id, ...paper }));
}

/**
 * Per-topic JSON index of papers under one root directory:
 * `<root>/<topic_slug>/papers_info.json`. Every write rewrites the whole
 * file; there is no locking.
 */
export class PaperStore {
  constructor(readonly rootDir: string) {}

  indexPath(topic: string): string {
    return join(this.rootDir, topicSlug(topic), INDEX_FILE);
  }

  /** Merge papers into the topic index; returns the file written */
  async save(topic: string, papers: PaperRecord[]): Promise<string> {
    const filePath = this.indexPath(topic);
    const current = await this.readTopic(topic);
    if (current.kind === "corrupt") {
      log.warn({ filePath, reason: current.reason }, "replacing unreadable paper index");
    }

    const index: TopicIndex = {};
    if (current.kind === "ok") {
      for (const { id, ...paper } of current.papers) index[id] = paper;
    }
    for (const { id, ...paper } of papers) index[id] = paper;

    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(index, null, 2), "utf-8");
    log.info({ filePath, count: papers.length }, "papers saved");
    return filePath;
  }

  async readTopic(topic: string): Promise<TopicReadResult> {
    const filePath = this.indexPath(topic);
    if (!existsSync(filePath)) return { kind: "missing" };

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(filePath, "utf-8"));
    } catch (err) {
      return { kind: "corrupt", reason: errorMessage(err) };
    }

    const index = topicIndexSchema.safeParse(parsed);
    if (!index.success) return { kind: "corrupt", reason: index.error.issues[0]?.message ?? "invalid index" };
    return { kind: "ok", papers: toRecords(index.data) };
  }

  /** Topic slugs that have an index file, sorted */
  async listTopics(): Promise<string[]> {
    if (!existsSync(this.rootDir)) return [];
    const files = await glob(`*/${INDEX_FILE}`, { cwd: this.rootDir, posix: true });
    return files.map((file) => file.split("/")[0]).sort();
  }

  /** Look a paper up across every topic; unreadable indexes are skipped */
  async find(paperId: string): Promise<PaperRecord | null> {
    for (const topic of await this.listTopics()) {
      const result = await this.readTopic(topic);
      if (result.kind === "corrupt") {
        log.warn({ topic, reason: result.reason }, "skipping unreadable paper index");
        continue;
      }
      if (result.kind !== "ok") continue;
      const paper = result.papers.find((p) => p.id === paperId);
      if (paper) return paper;
    }
    return null;
  }
}

/**
 * arXiv search over the public Atom API.
 *
 * The feed is small and flat, so entries are pulled out with regular
 * expressions rather than a full XML parser.
 */

import type { FetchLike, PaperRecord, ProviderResult } from "../types.js";
import { DEFAULT_TIMEOUT_MS, requestText } from "../providers/http.js";
import type { StatusMessages } from "../providers/http.js";

export const ARXIV_API_URL = "https://export.arxiv.org/api/query";

const STATUS_MESSAGES: StatusMessages = {
  unauthorized: "arXiv rejected the request",
  forbidden: "arXiv rejected the request",
};

export interface ArxivClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|apos);/g, (entity) => ENTITIES[entity] ?? entity);
}

function tagText(entry: string, tag: string): string {
  const match = new RegExp(`<${tag}[^>]*>([\\s\\S]*?)</${tag}>`).exec(entry);
  return match ? decodeEntities(match[1].replace(/\s+/g, " ").trim()) : "";
}

/** Short id from `<id>http://arxiv.org/abs/2101.00001v2</id>` → "2101.00001v2" */
export function shortId(entry: string): string {
  const match = /<id>[^<]*\/abs\/([^<]+)<\/id>/.exec(entry);
  return match ? match[1].trim() : "";
}

function pdfUrl(entry: string, id: string): string {
  for (const link of entry.matchAll(/<link\b[^>]*>/g)) {
    const tag = link[0];
    if (!/title="pdf"/.test(tag)) continue;
    const href = /href="([^"]+)"/.exec(tag);
    if (href) return decodeEntities(href[1]);
  }
  return `https://arxiv.org/pdf/${id}`;
}

/** Parse every `<entry>` of an Atom feed */
export function parseAtomFeed(xml: string): PaperRecord[] {
  const papers: PaperRecord[] = [];
  for (const match of xml.matchAll(/<entry>([\s\S]*?)<\/entry>/g)) {
    const entry = match[1];
    const id = shortId(entry);
    if (!id) continue;

    const authors = [...entry.matchAll(/<author>\s*<name>([\s\S]*?)<\/name>/g)].map((a) =>
      decodeEntities(a[1].trim()),
    );

    papers.push({
      id,
      title: tagText(entry, "title"),
      authors,
      summary: tagText(entry, "summary"),
      pdf_url: pdfUrl(entry, id),
      published: tagText(entry, "published").slice(0, 10),
    });
  }
  return papers;
}

export class ArxivClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ArxivClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? ARXIV_API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Most relevant papers for a free-text topic */
  async search(topic: string, maxResults = 5): Promise<ProviderResult<PaperRecord[]>> {
    const query = new URLSearchParams({
      search_query: `all:${topic}`,
      start: "0",
      max_results: String(maxResults),
      sortBy: "relevance",
      sortOrder: "descending",
    });

    const text = await requestText({
      provider: "arxiv",
      url: `${this.baseUrl}?${query.toString()}`,
      init: { method: "GET" },
      timeoutMs: this.timeoutMs,
      fetch: this.fetchImpl,
      messages: STATUS_MESSAGES,
    });
    if (!text.ok) return text;

    return { ok: true, data: parseAtomFeed(text.data).slice(0, maxResults) };
  }
}

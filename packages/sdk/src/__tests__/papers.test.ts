import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { ArxivClient, parseAtomFeed } from "../papers/arxiv.js";
import { PaperStore, topicSlug } from "../papers/store.js";
import { formatTopicList, formatTopicPapers, topicTitle } from "../papers/markdown.js";
import type { PaperRecord } from "../types.js";
import { fakeFetch } from "./fake-fetch.js";

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <id>http://arxiv.org/api/query-id</id>
  <title>ArXiv Query</title>
  <entry>
    <id>http://arxiv.org/abs/2401.00001v2</id>
    <published>2024-01-02T10:00:00Z</published>
    <title>Ranking  Signals
      &amp; Links</title>
    <summary>  A study of
      link graphs.  </summary>
    <author>
      <name>Ada Example</name>
    </author>
    <author>
      <name>Bo Sample</name>
    </author>
    <link href="http://arxiv.org/abs/2401.00001v2" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/2401.00001v2" rel="related" type="application/pdf"/>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/2402.00002v1</id>
    <published>2024-02-03T00:00:00Z</published>
    <title>Second</title>
    <summary>Short.</summary>
    <author><name>Cy Person</name></author>
  </entry>
</feed>`;

function paper(id: string, title = `Paper ${id}`): PaperRecord {
  return {
    id,
    title,
    authors: ["A. Author"],
    summary: "Summary text.",
    pdf_url: `http://arxiv.org/pdf/${id}`,
    published: "2024-01-01",
  };
}

describe("parseAtomFeed", () => {
  it("extracts one record per entry", () => {
    expect(parseAtomFeed(FEED)).toEqual([
      {
        id: "2401.00001v2",
        title: "Ranking Signals & Links",
        authors: ["Ada Example", "Bo Sample"],
        summary: "A study of link graphs.",
        pdf_url: "http://arxiv.org/pdf/2401.00001v2",
        published: "2024-01-02",
      },
      {
        id: "2402.00002v1",
        title: "Second",
        authors: ["Cy Person"],
        summary: "Short.",
        pdf_url: "https://arxiv.org/pdf/2402.00002v1",
        published: "2024-02-03",
      },
    ]);
  });

  it("returns nothing for a feed without entries", () => {
    expect(parseAtomFeed("<feed></feed>")).toEqual([]);
  });
});

describe("ArxivClient", () => {
  it("queries by relevance with the requested size", async () => {
    const { fetch, calls } = fakeFetch({ status: 200, body: FEED });
    const result = await new ArxivClient({ fetch }).search("link graphs", 1);

    const url = new URL(calls[0].url);
    expect(`${url.origin}${url.pathname}`).toBe("https://export.arxiv.org/api/query");
    expect(url.searchParams.get("search_query")).toBe("all:link graphs");
    expect(url.searchParams.get("max_results")).toBe("1");
    expect(url.searchParams.get("sortBy")).toBe("relevance");
    expect(result.ok && result.data.map((p) => p.id)).toEqual(["2401.00001v2"]);
  });

  it("classifies a failed request", async () => {
    const { fetch } = fakeFetch({ status: 503, body: "down" });
    const result = await new ArxivClient({ fetch }).search("x");
    expect(result).toEqual({
      ok: false,
      failure: { kind: "provider", message: "API error 503", statusCode: 503, details: "down" },
    });
  });
});

describe("PaperStore", () => {
  let root: string;
  let store: PaperStore;

  beforeEach(() => {
    root = mkdtempSync(join(process.cwd(), ".test-papers-"));
    store = new PaperStore(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("slugs topics", () => {
    expect(topicSlug("Machine Learning Basics")).toBe("machine_learning_basics");
    expect(topicSlug("Web 2.0")).toBe("web_2.0");
  });

  it("keeps path segments out of topic slugs", () => {
    expect(topicSlug("../../escaped")).toBe("____escaped");
    expect(topicSlug("a/b\\c")).toBe("a_b_c");
    expect(topicSlug(".")).toBe("_");
  });

  it("writes traversal-looking topics inside the root", async () => {
    const filePath = await store.save("../../escaped", [paper("1")]);

    expect(filePath).toBe(join(root, "____escaped", "papers_info.json"));
    expect(await store.listTopics()).toEqual(["____escaped"]);
  });

  it("writes an index keyed by paper id without the id field", async () => {
    const filePath = await store.save("Link Graphs", [paper("1")]);

    expect(filePath).toBe(join(root, "link_graphs", "papers_info.json"));
    expect(JSON.parse(readFileSync(filePath, "utf-8"))).toEqual({
      "1": {
        title: "Paper 1",
        authors: ["A. Author"],
        summary: "Summary text.",
        pdf_url: "http://arxiv.org/pdf/1",
        published: "2024-01-01",
      },
    });
  });

  it("merges later searches into the same topic", async () => {
    await store.save("seo", [paper("1"), paper("2")]);
    await store.save("seo", [paper("2", "Updated"), paper("3")]);

    const result = await store.readTopic("seo");
    expect(result.kind === "ok" && result.papers.map((p) => [p.id, p.title])).toEqual([
      ["1", "Paper 1"],
      ["2", "Updated"],
      ["3", "Paper 3"],
    ]);
  });

  it("lists only topics that have an index", async () => {
    await store.save("b topic", [paper("1")]);
    await store.save("a topic", [paper("2")]);
    mkdirSync(join(root, "empty"));

    expect(await store.listTopics()).toEqual(["a_topic", "b_topic"]);
  });

  it("lists nothing when the root does not exist", async () => {
    expect(await new PaperStore(join(root, "missing")).listTopics()).toEqual([]);
  });

  it("finds a paper across topics and skips unreadable indexes", async () => {
    mkdirSync(join(root, "aaa"));
    writeFileSync(join(root, "aaa", "papers_info.json"), "{not json");
    await store.save("zzz", [paper("42")]);

    expect(await store.find("42")).toEqual(paper("42"));
    expect(await store.find("missing")).toBeNull();
  });

  it("distinguishes missing and corrupt topics", async () => {
    expect(await store.readTopic("nothing")).toEqual({ kind: "missing" });

    mkdirSync(join(root, "bad"));
    writeFileSync(join(root, "bad", "papers_info.json"), JSON.stringify({ "1": { title: 3 } }));
    expect((await store.readTopic("bad")).kind).toBe("corrupt");
  });
});

describe("markdown formatting", () => {
  it("lists topics with a shortcut hint", () => {
    expect(formatTopicList(["ai", "seo"])).toBe("# Available Topics\n\n- ai\n- seo\n\nUse @seo to access papers in that topic.\n");
    expect(formatTopicList([])).toBe("# Available Topics\n\nNo topics found.\n");
  });

  it("title-cases slugs", () => {
    expect(topicTitle("link_graphs")).toBe("Link Graphs");
  });

  it("renders papers with a clipped summary", () => {
    const long = { ...paper("7"), summary: "x".repeat(600) };
    const text = formatTopicPapers("link_graphs", { kind: "ok", papers: [long] });

    expect(text).toBe(
      "# Papers on Link Graphs\n\n" +
        "Total papers: 1\n\n" +
        "## Paper 7\n" +
        "- **Paper ID**: 7\n" +
        "- **Authors**: A. Author\n" +
        "- **Published**: 2024-01-01\n" +
        "- **PDF URL**: [http://arxiv.org/pdf/7](http://arxiv.org/pdf/7)\n\n" +
        "### Summary\n" +
        `${"x".repeat(500)}...\n\n` +
        "---\n\n",
    );
  });

  it("explains missing and corrupt topics", () => {
    expect(formatTopicPapers("seo", { kind: "missing" })).toBe(
      "# No papers found for topic: seo\n\nTry searching for papers on this topic first.",
    );
    expect(formatTopicPapers("seo", { kind: "corrupt", reason: "x" })).toBe(
      "# Error reading papers data for seo\n\nThe papers data file is corrupted.",
    );
  });
});

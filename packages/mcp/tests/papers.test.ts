import { describe, it, expect, afterEach } from "vitest";
import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { fakeFetch, startHarness } from "./harness.js";
import type { Harness } from "./harness.js";

let harness: Harness | undefined;

afterEach(async () => {
  await harness?.close();
  harness = undefined;
});

const FEED = `<feed>
  <entry>
    <id>http://arxiv.org/abs/2401.00001v1</id>
    <published>2024-01-02T00:00:00Z</published>
    <title>Crawl Budgets</title>
    <summary>How crawlers spend time.</summary>
    <author><name>Ada Example</name></author>
    <link title="pdf" href="http://arxiv.org/pdf/2401.00001v1" rel="related" type="application/pdf"/>
  </entry>
</feed>`;

function seedTopic(papersDir: string, slug: string, papers: Record<string, unknown>) {
  mkdirSync(join(papersDir, slug), { recursive: true });
  writeFileSync(join(papersDir, slug, "papers_info.json"), JSON.stringify(papers));
}

describe("paper tools", () => {
  it("searches, saves and then extracts a paper", async () => {
    const { fetch } = fakeFetch({ status: 200, body: FEED });
    harness = await startHarness({ fetch });

    const search = await harness.callText("search_papers", { topic: "Crawl Budget" });
    expect(JSON.parse(search.text)).toEqual(["2401.00001v1"]);

    const info = await harness.callText("extract_info", { paper_id: "2401.00001v1" });
    expect(JSON.parse(info.text)).toEqual({
      title: "Crawl Budgets",
      authors: ["Ada Example"],
      summary: "How crawlers spend time.",
      pdf_url: "http://arxiv.org/pdf/2401.00001v1",
      published: "2024-01-02",
    });
  });

  it("returns an error envelope when the papers cannot be saved", async () => {
    const { fetch } = fakeFetch({ status: 200, body: FEED });
    harness = await startHarness({ fetch });
    writeFileSync(harness.papersDir, "not a directory");

    const { text, isError } = await harness.callText("search_papers", { topic: "x" });
    const envelope = JSON.parse(text);

    expect(isError).toBe(true);
    expect(envelope).toMatchObject({ status: "error", error: "unexpected" });
    expect(envelope.message).toMatch(/^Failed to save papers: ENOTDIR/);
  });

  it("keeps a traversal-looking topic inside the papers directory", async () => {
    const { fetch } = fakeFetch({ status: 200, body: FEED });
    harness = await startHarness({ fetch });

    const { text } = await harness.callText("search_papers", { topic: "../../escaped" });

    expect(JSON.parse(text)).toEqual(["2401.00001v1"]);
    expect(existsSync(join(harness.papersDir, "____escaped", "papers_info.json"))).toBe(true);
  });

  it("says when a paper is unknown", async () => {
    harness = await startHarness();
    const { text } = await harness.callText("extract_info", { paper_id: "9999.0000" });
    expect(text).toBe("There's no saved information related to paper 9999.0000.");
  });
});

describe("paper resources", () => {
  it("lists topic folders", async () => {
    harness = await startHarness();
    seedTopic(harness.papersDir, "seo", {});

    const result = await harness.client.readResource({ uri: "papers://folders" });
    const first = result.contents[0];

    expect(first.uri).toBe("papers://folders");
    expect("text" in first && first.text).toBe(
      "# Available Topics\n\n- seo\n\nUse @seo to access papers in that topic.\n",
    );
  });

  it("renders a topic through the template", async () => {
    harness = await startHarness();
    seedTopic(harness.papersDir, "link_graphs", {
      "1": { title: "T", authors: ["A", "B"], summary: "S", pdf_url: "u", published: "2024-01-01" },
    });

    const result = await harness.client.readResource({ uri: "papers://link_graphs" });
    const first = result.contents[0];

    expect("text" in first && first.text).toBe(
      "# Papers on Link Graphs\n\nTotal papers: 1\n\n" +
        "## T\n- **Paper ID**: 1\n- **Authors**: A, B\n- **Published**: 2024-01-01\n" +
        "- **PDF URL**: [u](u)\n\n### Summary\nS...\n\n---\n\n",
    );
  });

  it("explains an unknown topic", async () => {
    harness = await startHarness();
    const result = await harness.client.readResource({ uri: "papers://nothing" });
    const first = result.contents[0];
    expect("text" in first && first.text).toBe(
      "# No papers found for topic: nothing\n\nTry searching for papers on this topic first.",
    );
  });
});

describe("search prompt", () => {
  it("fills in the topic and defaults to five papers", async () => {
    harness = await startHarness();
    const prompt = await harness.client.getPrompt({ name: "generate_search_prompt", arguments: { topic: "crawling" } });
    const message = prompt.messages[0];

    expect(message.role).toBe("user");
    expect(message.content.type === "text" && message.content.text.split("\n")[0]).toBe(
      "Search for 5 academic papers about 'crawling' using the search_papers tool.",
    );
  });

  it("lists every tool", async () => {
    harness = await startHarness();
    const { tools } = await harness.client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(
      [
        "check_ahrefs_setup",
        "check_topvisor_setup",
        "extract_info",
        "get_ahrefs_backlinks",
        "get_ahrefs_organic_keywords",
        "get_ahrefs_refdomains",
        "get_topvisor_balance",
        "get_topvisor_competitors",
        "get_topvisor_keyword_folders",
        "get_topvisor_keyword_groups",
        "get_topvisor_keywords",
        "get_topvisor_positions_history",
        "get_topvisor_positions_summary",
        "get_topvisor_project_keywords",
        "get_topvisor_projects",
        "get_topvisor_regions",
        "search_papers",
      ].sort(),
    );
  });
});

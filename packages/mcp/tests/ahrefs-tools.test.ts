import { describe, it, expect, afterEach } from "vitest";
import { fakeFetch, startHarness } from "./harness.js";
import type { Harness } from "./harness.js";

let harness: Harness | undefined;

afterEach(async () => {
  await harness?.close();
  harness = undefined;
});

const REFDOMAIN = {
  domain: "ref.test",
  domain_rating: 71,
  links_to_target: 2,
  first_seen: "2024-03-01",
  last_seen: "2025-08-01",
  traffic_domain: 900,
};

describe("Ahrefs tools", () => {
  it("returns refdomains for a target", async () => {
    const { fetch, calls } = fakeFetch({ status: 200, body: JSON.stringify({ refdomains: [REFDOMAIN] }) });
    harness = await startHarness({ env: { AHREFS_API_KEY: "test-secret" }, fetch });

    const { text } = await harness.callText("get_ahrefs_refdomains", { target: "example.com", limit: 1 });

    expect(new URL(calls[0].url).searchParams.get("limit")).toBe("1");
    expect(text).toBe(
      JSON.stringify({ status: "success", target: "example.com", refdomains: [REFDOMAIN], total_count: 1 }, null, 2),
    );
  });

  it("carries the requested date on organic keywords", async () => {
    const { fetch, calls } = fakeFetch({ status: 200, body: JSON.stringify({ keywords: [] }) });
    harness = await startHarness({ env: { AHREFS_API_KEY: "test-secret" }, fetch });

    const { text } = await harness.callText("get_ahrefs_organic_keywords", {
      target: "example.com",
      date: "2025-08-15",
    });

    expect(new URL(calls[0].url).searchParams.get("date")).toBe("2025-08-15");
    expect(JSON.parse(text)).toEqual({
      status: "success",
      target: "example.com",
      date: "2025-08-15",
      keywords: [],
      total_count: 0,
    });
  });

  it("reports a rate limit", async () => {
    const { fetch } = fakeFetch({ status: 429, body: "" });
    harness = await startHarness({ env: { AHREFS_API_KEY: "test-secret" }, fetch });

    const { text, isError } = await harness.callText("get_ahrefs_backlinks", { target: "example.com" });

    expect(isError).toBe(true);
    expect(JSON.parse(text)).toEqual({
      status: "error",
      error: "rate_limit",
      message: "API error: Request limit exceeded",
      status_code: 429,
    });
  });

  it("reports a dropped connection as a transport error", async () => {
    const { fetch } = fakeFetch(new TypeError("fetch failed"));
    harness = await startHarness({ env: { AHREFS_API_KEY: "test-secret" }, fetch });

    const { text, isError } = await harness.callText("get_ahrefs_refdomains", { target: "example.com" });

    expect(isError).toBe(true);
    expect(JSON.parse(text)).toEqual({
      status: "error",
      error: "transport",
      message: "API error: No internet connection or API unavailable",
      details: "fetch failed",
    });
  });

  it("returns a warning from the setup check when the probe fails", async () => {
    const { fetch } = fakeFetch({ status: 403, body: "" });
    harness = await startHarness({ env: { AHREFS_API_KEY: "test-secret" }, fetch });

    const { text, isError } = await harness.callText("check_ahrefs_setup");

    expect(isError).toBe(false);
    expect(JSON.parse(text)).toEqual({
      status: "warning",
      message: "API key found, but there is a problem: Insufficient access permissions or credits",
      checks: { env_file: false, api_key_set: true, api_connection: false },
      help: "Check API key validity and account balance",
    });
  });
});

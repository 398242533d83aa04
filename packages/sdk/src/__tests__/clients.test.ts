import { describe, it, expect } from "vitest";
import { TopvisorClient } from "../providers/topvisor.js";
import { AhrefsClient } from "../providers/ahrefs.js";
import { ConfigurationError } from "../errors.js";
import { fakeFetch, json, sentBody, sentHeaders } from "./fake-fetch.js";

describe("TopvisorClient", () => {
  it("refuses to construct without an API key and never calls fetch", () => {
    const { fetch, calls } = fakeFetch();
    expect(() => new TopvisorClient({ fetch })).toThrow(ConfigurationError);
    expect(() => TopvisorClient.fromEnv({ TOPVISOR_API_KEY: "" }, { fetch })).toThrow(/TOPVISOR_API_KEY/);
    expect(calls).toHaveLength(0);
  });

  it("exposes the variable to set on the configuration error", () => {
    try {
      new TopvisorClient();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.variable).toBe("TOPVISOR_API_KEY");
        expect(err.kind).toBe("configuration");
      }
    }
  });

  it("posts JSON with bearer auth and the user id header", async () => {
    const { fetch, calls } = fakeFetch(json(200, { result: [] }));
    const client = TopvisorClient.fromEnv({ TOPVISOR_API_KEY: "test-secret", TOPVISOR_USER_ID: "42" }, { fetch });

    const result = await client.getProjects();

    expect(result).toEqual({ ok: true, data: { result: [] } });
    expect(calls[0].url).toBe("https://api.topvisor.com/v2/json/get/projects_2/projects");
    expect(calls[0].init?.method).toBe("POST");
    expect(sentBody(calls[0])).toEqual({});
    expect(sentHeaders(calls[0])).toEqual({
      "content-type": "application/json",
      authorization: "bearer test-secret",
      "user-id": "42",
    });
  });

  it("omits the User-Id header when no user id is configured", async () => {
    const { fetch, calls } = fakeFetch(json(200, { result: {} }));
    await new TopvisorClient({ apiKey: "test-secret", fetch }).getBalance();

    expect(calls[0].url).toBe("https://api.topvisor.com/v2/json/get/bank_2/info");
    expect(sentHeaders(calls[0])["user-id"]).toBeUndefined();
  });

  it("drops unset optional ids from the keywords payload", async () => {
    const { fetch, calls } = fakeFetch(json(200, { result: [] }), json(200, { result: [] }));
    const client = new TopvisorClient({ apiKey: "test-secret", fetch });

    await client.getKeywords(7);
    await client.getKeywords(7, 3, 9);

    expect(sentBody(calls[0])).toEqual({ project_id: 7 });
    expect(sentBody(calls[1])).toEqual({ project_id: 7, folder_id: 3, group_id: 9 });
  });

  it("fills position history defaults", async () => {
    const { fetch, calls } = fakeFetch(json(200, { result: {} }));
    await new TopvisorClient({ apiKey: "test-secret", fetch }).getPositionsHistory(5, {
      date1: "2025-08-01",
      date2: "2025-08-08",
    });

    expect(calls[0].url).toBe("https://api.topvisor.com/v2/json/get/positions_2/history");
    expect(sentBody(calls[0])).toEqual({
      project_id: 5,
      regions_indexes: ["33"],
      date1: "2025-08-01",
      date2: "2025-08-08",
      limit: 100,
      offset: 0,
    });
  });

  it("defaults the summary period to the last seven days", async () => {
    const { fetch, calls } = fakeFetch(json(200, { result: {} }));
    await new TopvisorClient({ apiKey: "test-secret", fetch }).getPositionsSummary(5);

    const body = sentBody(calls[0]);
    expect(body).toMatchObject({ project_id: 5 });
    expect(body).toHaveProperty("date1", expect.stringMatching(/^\d{4}-\d{2}-\d{2}$/));
    expect(body).toHaveProperty("date2", expect.stringMatching(/^\d{4}-\d{2}-\d{2}$/));
  });

  it("parses the regions CSV export into fixed columns", async () => {
    const csv = ['0;"Yandex; Moscow";RU;ru;0;100', "", "1;Google;US;en;1"].join("\n");
    const { fetch, calls } = fakeFetch({ status: 200, body: csv });

    const result = await new TopvisorClient({ apiKey: "test-secret", fetch }).getRegions(11);

    expect(calls[0].url).toBe("https://api.topvisor.com/v2/json/get/positions_2/searchers_regions/export");
    expect(result).toEqual({
      ok: true,
      data: {
        result: [
          {
            search_engine_key: "0",
            name: "Yandex; Moscow",
            country_code: "RU",
            language: "ru",
            region_device: "0",
            depth: "100",
          },
          {
            search_engine_key: "1",
            name: "Google",
            country_code: "US",
            language: "en",
            region_device: "1",
            depth: null,
          },
        ],
      },
    });
  });

  describe("status classification", () => {
    it("maps 401 to an authentication failure", async () => {
      const { fetch } = fakeFetch({ status: 401, body: "nope" });
      const result = await new TopvisorClient({ apiKey: "test-secret", fetch }).getProjects();
      expect(result).toEqual({
        ok: false,
        failure: { kind: "authentication", message: "Invalid API key", statusCode: 401 },
      });
    });

    it("maps 403 to an authorization failure", async () => {
      const { fetch } = fakeFetch({ status: 403, body: "" });
      const result = await new TopvisorClient({ apiKey: "test-secret", fetch }).getProjects();
      expect(result).toEqual({
        ok: false,
        failure: { kind: "authorization", message: "Insufficient access permissions", statusCode: 403 },
      });
    });

    it("treats 429 as a generic API error", async () => {
      const { fetch } = fakeFetch({ status: 429, body: "slow down" });
      const result = await new TopvisorClient({ apiKey: "test-secret", fetch }).getProjects();
      expect(result).toEqual({
        ok: false,
        failure: { kind: "provider", message: "API error 429", statusCode: 429, details: "slow down" },
      });
    });

    it("maps a fetch TypeError to a transport failure", async () => {
      const { fetch } = fakeFetch(new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND") }));
      const result = await new TopvisorClient({ apiKey: "test-secret", fetch }).getProjects();
      expect(result).toEqual({
        ok: false,
        failure: {
          kind: "transport",
          message: "No internet connection or API unavailable",
          details: "getaddrinfo ENOTFOUND",
        },
      });
    });

    it("maps a timeout to an unexpected failure", async () => {
      const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
      const { fetch } = fakeFetch(timeout);
      const result = await new TopvisorClient({ apiKey: "test-secret", fetch }).getProjects();
      expect(result).toEqual({
        ok: false,
        failure: { kind: "unexpected", message: "Unexpected error: The operation was aborted due to timeout" },
      });
    });

    it("reports an invalid JSON body as unexpected", async () => {
      const { fetch } = fakeFetch({ status: 200, body: "<html>" });
      const result = await new TopvisorClient({ apiKey: "test-secret", fetch }).getProjects();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.kind).toBe("unexpected");
        expect(result.failure.message).toMatch(/^Unexpected error: /);
      }
    });

    it("reports a non-object JSON body as a shape failure", async () => {
      const { fetch } = fakeFetch({ status: 200, body: "[1,2]" });
      const result = await new TopvisorClient({ apiKey: "test-secret", fetch }).getProjects();
      expect(result).toEqual({
        ok: false,
        failure: {
          kind: "shape",
          message: "Unexpected response shape: expected a JSON object",
          statusCode: 200,
          details: "[1,2]",
        },
      });
    });
  });
});

describe("AhrefsClient", () => {
  it("refuses to construct without an API key", () => {
    const { fetch, calls } = fakeFetch();
    expect(() => AhrefsClient.fromEnv({}, { fetch })).toThrow(
      "Ahrefs API key not found. Set AHREFS_API_KEY in the environment or .env file.",
    );
    expect(calls).toHaveLength(0);
  });

  it("sends refdomains as a GET with ordered query parameters", async () => {
    const { fetch, calls } = fakeFetch(json(200, { refdomains: [] }));
    await new AhrefsClient({ apiKey: "test-secret", fetch }).getRefdomains("example.com", { limit: 1 });

    const url = new URL(calls[0].url);
    expect(`${url.origin}${url.pathname}`).toBe("https://api.ahrefs.com/v3/site-explorer/refdomains");
    expect([...url.searchParams.keys()]).toEqual(["target", "limit", "order_by", "select"]);
    expect(url.searchParams.get("target")).toBe("example.com");
    expect(url.searchParams.get("limit")).toBe("1");
    expect(url.searchParams.get("order_by")).toBe("domain_rating:desc");
    expect(url.searchParams.get("select")).toBe(
      "domain,domain_rating,links_to_target,first_seen,last_seen,traffic_domain",
    );
    expect(calls[0].init?.method).toBe("GET");
    expect(sentHeaders(calls[0]).authorization).toBe("Bearer test-secret");
  });

  it("uses the backlinks endpoint and its default ordering", async () => {
    const { fetch, calls } = fakeFetch(json(200, { backlinks: [] }));
    await new AhrefsClient({ apiKey: "test-secret", fetch }).getBacklinks("example.com");

    const url = new URL(calls[0].url);
    expect(url.pathname).toBe("/v3/site-explorer/all-backlinks");
    expect(url.searchParams.get("limit")).toBe("100");
    expect(url.searchParams.get("order_by")).toBe("domain_rating_source:desc");
  });

  it("passes the date for organic keywords", async () => {
    const { fetch, calls } = fakeFetch(json(200, { keywords: [] }));
    await new AhrefsClient({ apiKey: "test-secret", fetch }).getOrganicKeywords("example.com", {
      date: "2025-08-15",
      orderBy: "volume:desc",
    });

    const url = new URL(calls[0].url);
    expect(url.pathname).toBe("/v3/site-explorer/organic-keywords");
    expect([...url.searchParams.keys()]).toEqual(["target", "limit", "date", "order_by", "select"]);
    expect(url.searchParams.get("date")).toBe("2025-08-15");
    expect(url.searchParams.get("order_by")).toBe("volume:desc");
  });

  it("maps 429 to a rate limit failure", async () => {
    const { fetch } = fakeFetch({ status: 429, body: "" });
    const result = await new AhrefsClient({ apiKey: "test-secret", fetch }).getBacklinks("example.com");
    expect(result).toEqual({
      ok: false,
      failure: { kind: "rate_limit", message: "Request limit exceeded", statusCode: 429 },
    });
  });

  it("names credits in the 403 message", async () => {
    const { fetch } = fakeFetch({ status: 403, body: "" });
    const result = await new AhrefsClient({ apiKey: "test-secret", fetch }).getBacklinks("example.com");
    expect(result).toEqual({
      ok: false,
      failure: {
        kind: "authorization",
        message: "Insufficient access permissions or credits",
        statusCode: 403,
      },
    });
  });
});

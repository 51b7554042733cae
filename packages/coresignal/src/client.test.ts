import { afterEach, describe, it, expect, vi } from "vitest";
import { ConfigError, NetworkError, ProviderError, resetBaseConfig } from "@sourcer/core";
import { CoreSignalClient, getCoreSignalClient, resetClient } from "./client.js";

function jsonResponse(body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function makeClient(fetchImpl: typeof fetch): CoreSignalClient {
  return new CoreSignalClient({
    apiKey: "test-secret",
    baseUrl: "https://provider.test/cdapi/",
    timeoutMs: 1000,
    fetchImpl,
  });
}

describe("CoreSignalClient", () => {
  it("posts the search body with the api key and reads the next-page cursor", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse([101, "102"], { "x-next-page-after": "cursor-2" })
    );
    const client = makeClient(fetchMock);
    const body = { query: { bool: { must: [] } } };

    const page = await client.searchEmployeeIds(body);

    expect(page).toEqual({ ids: ["101", "102"], nextAfter: "cursor-2" });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://provider.test/cdapi/v2/employee_multi_source/search/es_dsl");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify(body));
    expect(new Headers(init?.headers).get("apikey")).toBe("test-secret");
  });

  it("passes the cursor on follow-up id pages and omits an absent one", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(["7"]));
    const client = makeClient(fetchMock);

    const page = await client.searchEmployeeIds({ query: {} }, "cursor 2");

    expect(page).toEqual({ ids: ["7"], nextAfter: undefined });
    expect(fetchMock.mock.calls[0][0]).toBe(
      "https://provider.test/cdapi/v2/employee_multi_source/search/es_dsl?after=cursor%202"
    );
  });

  it("normalizes collected profiles", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        id: 55,
        full_name: "Dana Example",
        inferred_skills: null,
        experience: [{ company_id: 9, company_name: "Acme", date_from_year: "2021", active_experience: 1 }],
      })
    );
    const client = makeClient(fetchMock);

    const profile = await client.collectEmployee("55");

    expect(profile.id).toBe("55");
    expect(profile.inferred_skills).toEqual([]);
    expect(profile.experience[0]).toMatchObject({
      company_id: "9",
      company_name: "Acme",
      date_from_year: 2021,
      active_experience: true,
    });
    expect(fetchMock.mock.calls[0][1]?.method).toBe("GET");
  });

  it("maps rate limits to a retryable provider error", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response("slow down", { status: 429 })
    );
    const client = makeClient(fetchMock);

    const error = await client.collectCompany("1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ statusCode: 429, retryable: true });
  });

  it("treats client errors as non-retryable", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response("bad query", { status: 422 })
    );
    const client = makeClient(fetchMock);

    await expect(client.previewEmployees({ query: {} })).rejects.toMatchObject({
      code: "PROVIDER_ERROR",
      statusCode: 422,
      retryable: false,
    });
  });

  it("rejects payloads that fail validation", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ unexpected: true }));
    const client = makeClient(fetchMock);

    await expect(client.searchCompaniesByName("Acme")).rejects.toThrow(
      "CoreSignal API response failed validation"
    );
  });

  it("wraps transport failures in NetworkError", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new Error("socket hang up"));
    const client = makeClient(fetchMock);

    await expect(client.collectEmployee("1")).rejects.toBeInstanceOf(NetworkError);
  });

  it("limits company search results", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse([
        { id: 1, name: "Acme" },
        { id: 2, name: "Acme Global" },
        { id: 3, name: "Acme Labs" },
      ])
    );
    const client = makeClient(fetchMock);

    const results = await client.searchCompaniesByWebsite("acme.com", 2);

    expect(results.map((c) => c.name)).toEqual(["Acme", "Acme Global"]);
  });
});

describe("getCoreSignalClient", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetBaseConfig();
    resetClient();
  });

  it("reuses one client until it is reset", () => {
    vi.stubEnv("CORESIGNAL_API_KEY", "test-secret");
    resetBaseConfig();

    const first = getCoreSignalClient();

    expect(getCoreSignalClient()).toBe(first);
    resetClient();
    expect(getCoreSignalClient()).not.toBe(first);
  });

  it("refuses to build a client without an api key", () => {
    vi.stubEnv("CORESIGNAL_API_KEY", "");
    resetBaseConfig();

    expect(() => getCoreSignalClient()).toThrow(ConfigError);
  });
});

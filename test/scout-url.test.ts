import { describe, expect, it } from "vitest";
import { ScoutClient } from "../src/core/client.js";
import { fetchScoutUrl } from "../src/core/scout-url.js";
import { fakeHttp, ok, type FakeResponse } from "./helpers.js";

const BASE = "https://scoutapm.com/api/v0";
const ENDPOINT_ID = "Q29udHJvbGxlci9Vc2Vyc0NvbnRyb2xsZXIvc2hvdw";
const ENDPOINT_NAME = "Controller/UsersController/show";
const ENDPOINT = { name: "UsersController#show", link: `/apps/123/endpoints/${ENDPOINT_ID}` };
const TRACE_URL = `https://scoutapm.com/apps/123/endpoints/${ENDPOINT_ID}/trace/456`;

function clientFor(...responses: FakeResponse[]) {
  const http = fakeHttp(...responses);
  return { client: new ScoutClient({ apiKey: "test-secret", adapter: http.adapter }), requests: http.requests };
}

describe("fetchScoutUrl", () => {
  it("fetches the trace behind a trace URL", async () => {
    const { client, requests } = clientFor(ok({ trace: { id: 456 } }));
    const result = await fetchScoutUrl(client, TRACE_URL);

    expect(result.url).toBe(TRACE_URL);
    expect(result.parsed.url_type).toBe("trace");
    expect(result.data).toEqual({ trace: { id: 456 } });
    expect(requests.map((r) => r.url)).toEqual([`${BASE}/apps/123/traces/456`]);
  });

  it("adds the endpoint when asked", async () => {
    const { client, requests } = clientFor(
      ok({ trace: { id: 456 } }),
      ok([{ name: "other", link: "/apps/123/endpoints/xyz" }, ENDPOINT])
    );
    const result = await fetchScoutUrl(client, TRACE_URL, { includeEndpoint: true });

    expect(result.data).toEqual({
      trace: { id: 456 },
      endpoint: ENDPOINT,
      decoded_endpoint: ENDPOINT_NAME,
    });
    expect(requests).toHaveLength(2);
    expect(requests[1].url).toMatch(new RegExp(`^${BASE}/apps/123/endpoints\\?from=`));
  });

  it("reports a missing endpoint without failing", async () => {
    const { client } = clientFor(ok({ trace: { id: 456 } }), ok([]));
    const result = await fetchScoutUrl(client, TRACE_URL, { includeEndpoint: true });

    expect(result.data).toEqual({
      trace: { id: 456 },
      endpoint_error: "Endpoint not found in the last 7 days",
      decoded_endpoint: ENDPOINT_NAME,
    });
  });

  it("reports an endpoint lookup failure without failing", async () => {
    const { client } = clientFor(ok({ trace: { id: 456 } }), {
      status: 500,
      body: { header: { status: { code: 500, message: "boom" } } },
    });
    const result = await fetchScoutUrl(client, TRACE_URL, { includeEndpoint: true });

    expect(result.data.endpoint_error).toBe("Failed to fetch endpoint: boom");
    expect(result.data.decoded_endpoint).toBe(ENDPOINT_NAME);
  });

  it("finds an endpoint among recent endpoints", async () => {
    const { client } = clientFor(ok([ENDPOINT]));
    const result = await fetchScoutUrl(client, `https://scoutapm.com/apps/123/endpoints/${ENDPOINT_ID}`);
    expect(result.data).toEqual({ endpoint: ENDPOINT, decoded_endpoint: ENDPOINT_NAME });
  });

  it("fails when the endpoint is not recent", async () => {
    const { client } = clientFor(ok([]));
    await expect(
      fetchScoutUrl(client, `https://scoutapm.com/apps/123/endpoints/${ENDPOINT_ID}`)
    ).rejects.toMatchObject({
      kind: "not_found",
      message: "Endpoint not found in the last 7 days. Try scout_list_endpoints with a longer time range.",
    });
  });

  it("fetches error groups", async () => {
    const { client, requests } = clientFor(ok({ error_group: { id: 789 } }));
    const result = await fetchScoutUrl(client, "https://scoutapm.com/apps/123/error_groups/789");
    expect(result.data).toEqual({ error_group: { id: 789 } });
    expect(requests[0].url).toBe(`${BASE}/apps/123/error_groups/789`);
  });

  it("fetches one insight type or all of them", async () => {
    const typed = clientFor(ok({ n_plus_one: [] }));
    expect(
      (await fetchScoutUrl(typed.client, "https://scoutapm.com/apps/123/insights/n_plus_one")).data
    ).toEqual({ insight: { n_plus_one: [] }, insight_type: "n_plus_one" });
    expect(typed.requests[0].url).toBe(`${BASE}/apps/123/insights/n_plus_one`);

    const all = clientFor(ok({ slow_query: [] }));
    expect((await fetchScoutUrl(all.client, "https://scoutapm.com/apps/123/insights")).data).toEqual({
      insights: { slow_query: [] },
    });
    expect(all.requests[0].url).toBe(`${BASE}/apps/123/insights`);
  });

  it("fetches apps", async () => {
    const { client } = clientFor(ok({ app: { id: 123 } }));
    expect((await fetchScoutUrl(client, "https://scoutapm.com/apps/123")).data).toEqual({ app: { id: 123 } });
  });

  it("rejects unsupported URLs without a request", async () => {
    const { client, requests } = clientFor(ok({}));
    await expect(fetchScoutUrl(client, "https://scoutapm.com/apps/123/settings")).rejects.toThrow(
      "Unknown or unsupported ScoutAPM URL format: https://scoutapm.com/apps/123/settings"
    );
    await expect(fetchScoutUrl(client, "https://scoutapm.com/pricing")).rejects.toThrow(
      "Unable to determine URL type from: https://scoutapm.com/pricing"
    );
    expect(requests).toHaveLength(0);
  });
});

import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../src/core/errors.js";
import { getEndpointId, parseScoutUrl } from "../src/core/url.js";

const ENDPOINT_ID = "Q29udHJvbGxlci9Vc2Vyc0NvbnRyb2xsZXIvc2hvdw";
const ENDPOINT_NAME = "Controller/UsersController/show";

describe("parseScoutUrl", () => {
  it("parses trace URLs", () => {
    expect(parseScoutUrl(`https://scoutapm.com/apps/123/endpoints/${ENDPOINT_ID}/trace/456`)).toEqual({
      app_id: 123,
      url_type: "trace",
      endpoint_id: ENDPOINT_ID,
      trace_id: 456,
      decoded_endpoint: ENDPOINT_NAME,
    });
  });

  it("only extracts trace ids under an endpoint", () => {
    expect(parseScoutUrl("https://scoutapm.com/apps/123/trace/456")).toEqual({
      app_id: 123,
      url_type: "trace",
    });
  });

  it("parses endpoint URLs", () => {
    expect(parseScoutUrl(`https://scoutapm.com/apps/123/endpoints/${ENDPOINT_ID}`)).toEqual({
      app_id: 123,
      url_type: "endpoint",
      endpoint_id: ENDPOINT_ID,
      decoded_endpoint: ENDPOINT_NAME,
    });
  });

  it("parses error group URLs", () => {
    expect(parseScoutUrl("https://scoutapm.com/apps/123/error_groups/789")).toEqual({
      app_id: 123,
      url_type: "error_group",
      error_id: 789,
    });
  });

  it("parses insight URLs with and without a type", () => {
    expect(parseScoutUrl("https://scoutapm.com/apps/123/insights/n_plus_one")).toEqual({
      app_id: 123,
      url_type: "insight",
      insight_type: "n_plus_one",
    });
    expect(parseScoutUrl("https://scoutapm.com/apps/123/insights")).toEqual({
      app_id: 123,
      url_type: "insight",
    });
  });

  it("parses app URLs", () => {
    expect(parseScoutUrl("https://scoutapm.com/apps/123")).toEqual({ app_id: 123, url_type: "app" });
    expect(parseScoutUrl("https://scoutapm.com/apps/123/")).toEqual({ app_id: 123, url_type: "app" });
  });

  it("marks other app pages as unknown", () => {
    expect(parseScoutUrl("https://scoutapm.com/apps/123/settings")).toEqual({
      app_id: 123,
      url_type: "unknown",
    });
  });

  it("collects query parameters, last duplicate winning", () => {
    const parsed = parseScoutUrl(
      `https://scoutapm.com/apps/123/endpoints/${ENDPOINT_ID}?range=1day&from=a&from=b`
    );
    expect(parsed.query_params).toEqual({ range: "1day", from: "b" });
  });

  it("returns an empty result without an apps segment", () => {
    expect(parseScoutUrl("https://scoutapm.com/dashboard")).toEqual({});
  });

  it("rejects non-numeric ids", () => {
    expect(() => parseScoutUrl("https://scoutapm.com/apps/abc")).toThrow(
      'Invalid app id in URL: "abc" (https://scoutapm.com/apps/abc)'
    );
    expect(() => parseScoutUrl("https://scoutapm.com/apps")).toThrow(
      "Invalid app id in URL: missing (https://scoutapm.com/apps)"
    );
    expect(() => parseScoutUrl("https://scoutapm.com/apps/1/error_groups/x1")).toThrow(InvalidArgumentError);
  });

  it("rejects ids beyond the safe integer range", () => {
    const url = "https://scoutapm.com/apps/1/error_groups/12345678901234567890";
    expect(() => parseScoutUrl(url)).toThrow(`Invalid error group id in URL: "12345678901234567890" (${url})`);
    expect(parseScoutUrl("https://scoutapm.com/apps/9007199254740991").app_id).toBe(9007199254740991);
  });

  it("rejects strings that are not URLs", () => {
    expect(() => parseScoutUrl("not a url")).toThrow("Invalid URL: not a url");
  });
});

describe("getEndpointId", () => {
  it("takes the last segment of the link", () => {
    expect(getEndpointId({ link: `/apps/123/endpoints/${ENDPOINT_ID}` })).toBe(ENDPOINT_ID);
    expect(getEndpointId({ link: `/apps/123/endpoints/${ENDPOINT_ID}/` })).toBe(ENDPOINT_ID);
  });

  it("returns an empty string without a usable link", () => {
    expect(getEndpointId({})).toBe("");
    expect(getEndpointId({ link: "" })).toBe("");
    expect(getEndpointId({ link: 42 })).toBe("");
  });
});

import { describe, expect, it } from "vitest";
import { decodeEndpointId, encodeEndpointId } from "../src/core/endpoint-id.js";

describe("decodeEndpointId", () => {
  it("decodes URL-safe base64 with or without padding", () => {
    expect(decodeEndpointId("Q29udHJvbGxlci9Vc2Vyc0NvbnRyb2xsZXIvc2hvdw")).toBe(
      "Controller/UsersController/show"
    );
    expect(decodeEndpointId("Q29udHJvbGxlci9Vc2Vyc0NvbnRyb2xsZXIvc2hvdw==")).toBe(
      "Controller/UsersController/show"
    );
  });

  it("decodes multi-byte names", () => {
    expect(decodeEndpointId("w7wvw6k")).toBe("ü/é");
  });

  it("falls back to the standard alphabet", () => {
    expect(decodeEndpointId("Pz8/")).toBe("???");
    expect(decodeEndpointId("Pz8_")).toBe("???");
  });

  it("returns the input when it is not canonical base64", () => {
    expect(decodeEndpointId("not-base64-encoded")).toBe("not-base64-encoded");
    expect(decodeEndpointId("abc123")).toBe("abc123");
    expect(decodeEndpointId("A")).toBe("A");
    expect(decodeEndpointId("")).toBe("");
  });

  it("returns the input when the bytes are not UTF-8", () => {
    expect(decodeEndpointId("__79")).toBe("__79");
  });
});

describe("encodeEndpointId", () => {
  it("produces unpadded URL-safe base64", () => {
    expect(encodeEndpointId("Job/ReportWorker")).toBe("Sm9iL1JlcG9ydFdvcmtlcg");
    expect(encodeEndpointId("???")).toBe("Pz8_");
  });

  it("is reversed by decodeEndpointId", () => {
    const name = "Controller/Api::V2::OrdersController/index";
    expect(decodeEndpointId(encodeEndpointId(name))).toBe(name);
  });
});

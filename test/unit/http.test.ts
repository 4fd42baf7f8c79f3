import { describe, it, expect } from "vitest";
import { buildProxyRequest, headersToRecord, readBoundedText } from "../../src/proxy/http.js";
import { UpstreamError, ValidationError } from "../../src/errors.js";
import type { DiscoveryResource } from "../../src/types/x402.js";

function httpResource(url: string, input?: Record<string, unknown>): DiscoveryResource {
  return {
    resource: url,
    type: "http",
    x402Version: 1,
    accepts: input ? [{ scheme: "exact", outputSchema: { input } }] : [],
  };
}

const weather = httpResource("http://x/weather", { type: "http", method: "GET", queryParams: { city: "City" } });

describe("buildProxyRequest", () => {
  it("encodes query values, serializing non-strings", () => {
    const request = buildProxyRequest(weather, { query: { city: "SF", days: 3, opts: { a: 1 } } });

    expect(request.method).toBe("GET");
    expect(request.url).toBe("http://x/weather?city=SF&days=3&opts=%7B%22a%22%3A1%7D");
    expect(request.body).toBeUndefined();
    expect(request.headers.get("accept")).toBe("application/json");
    expect(request.headers.get("content-type")).toBeNull();
  });

  it("overwrites query entries already on the resource URL", () => {
    const resource = httpResource("http://x/weather?units=f&city=NYC");
    expect(buildProxyRequest(resource, { query: { city: "SF" } }).url).toBe("http://x/weather?units=f&city=SF");
  });

  it("sends a body as JSON and upgrades GET to POST", () => {
    const request = buildProxyRequest(weather, { body: { days: 3 } });

    expect(request.method).toBe("POST");
    expect(request.body).toBe('{"days":3}');
    expect(request.headers.get("content-type")).toBe("application/json");
  });

  it("keeps a non-GET method when a body is present", () => {
    const resource = httpResource("http://x/weather", { method: "put", body: {} });
    expect(buildProxyRequest(resource, { body: ["a"] }).method).toBe("PUT");
  });

  it("ignores a null body", () => {
    const request = buildProxyRequest(weather, { body: null });
    expect(request.method).toBe("GET");
    expect(request.body).toBeUndefined();
  });

  it("applies caller headers last so they win", () => {
    const request = buildProxyRequest(weather, {
      body: "raw",
      headers: { Accept: "text/plain", "content-type": "text/csv", "X-Trace": 7 },
    });

    expect(request.headers.get("accept")).toBe("text/plain");
    expect(request.headers.get("content-type")).toBe("text/csv");
    expect(request.headers.get("x-trace")).toBe("7");
  });

  it("defaults to GET without a method hint", () => {
    expect(buildProxyRequest(httpResource("http://x/weather"), {}).method).toBe("GET");
  });

  it("takes the method from metadata.input", () => {
    const resource: DiscoveryResource = {
      resource: "http://x/weather",
      type: "http",
      x402Version: 1,
      metadata: { input: { method: "delete" } },
    };
    expect(buildProxyRequest(resource, {}).method).toBe("DELETE");
  });

  it("rejects header names that HTTP does not allow", () => {
    expect(() => buildProxyRequest(weather, { headers: { "bad header": "x" } })).toThrow(
      new ValidationError('invalid header "bad header"'),
    );
  });

  it("fails on an unparseable resource URL", () => {
    expect(() => buildProxyRequest(httpResource("not a url"), {})).toThrow(UpstreamError);
  });
});

describe("readBoundedText", () => {
  it("reads the whole body under the limit", async () => {
    expect(await readBoundedText(new Response('{"temperature":71}'))).toBe('{"temperature":71}');
  });

  it("returns an empty string without a body", async () => {
    expect(await readBoundedText(new Response(null, { status: 204 }))).toBe("");
  });

  it("truncates at the limit and cancels the stream", async () => {
    const encoder = new TextEncoder();
    let cancelled = false;
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode("aaa"));
        controller.enqueue(encoder.encode("bbb"));
        controller.enqueue(encoder.encode("ccc"));
      },
      cancel() {
        cancelled = true;
      },
    });

    expect(await readBoundedText(new Response(stream), 5)).toBe("aaabb");
    expect(cancelled).toBe(true);
  });
});

describe("headersToRecord", () => {
  it("flattens headers with lowercased names", () => {
    const headers = new Headers({ "Content-Type": "application/json", "X-Request-Id": "abc" });
    expect(headersToRecord(headers)).toEqual({ "content-type": "application/json", "x-request-id": "abc" });
  });
});

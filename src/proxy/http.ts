// Outbound request construction and bounded response reads for proxied calls

import type { DiscoveryResource, JsonObject } from "../types/x402.js";
import { isObject } from "../types/guards.js";
import { resolveMethod } from "../tools/synthesize.js";
import { UpstreamError, ValidationError } from "../errors.js";

/** Fixed network timeout per outbound request */
export const PROXY_TIMEOUT_MS = 30_000;

/** Response bodies are truncated past this many bytes */
export const MAX_PROXY_RESPONSE_BYTES = 1 << 20;

export interface ProxyRequest {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (isObject(value) || Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}

/**
 * Turn proxy_tool_call parameters into an HTTP request for the resource.
 *
 * - query entries overwrite any already on the resource URL
 * - a non-null body is sent as JSON and upgrades GET to POST
 * - caller headers are applied last and win over the defaults
 */
export function buildProxyRequest(resource: DiscoveryResource, parameters: JsonObject): ProxyRequest {
  let method = resolveMethod(resource) ?? "GET";

  let url: URL;
  try {
    url = new URL(resource.resource);
  } catch (err) {
    throw new UpstreamError(`invalid resource url: ${resource.resource}`, { resource: resource.resource }, { cause: err });
  }

  const query = parameters["query"];
  if (isObject(query)) {
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, stringify(value));
    }
  }

  let body: string | undefined;
  const rawBody = parameters["body"];
  if (rawBody !== undefined && rawBody !== null) {
    body = JSON.stringify(rawBody);
    if (method === "GET") method = "POST";
  }

  const headers = new Headers({ Accept: "application/json" });
  if (body !== undefined) {
    headers.set("Content-Type", "application/json");
  }

  const callerHeaders = parameters["headers"];
  if (isObject(callerHeaders)) {
    for (const [key, value] of Object.entries(callerHeaders)) {
      try {
        headers.set(key, stringify(value));
      } catch {
        throw new ValidationError(`invalid header ${JSON.stringify(key)}`);
      }
    }
  }

  return { url: url.toString(), method, headers, body };
}

/** Read at most `limit` bytes of the body; the rest is discarded */
export async function readBoundedText(response: Response, limit = MAX_PROXY_RESPONSE_BYTES): Promise<string> {
  if (!response.body) return "";

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;

  while (size < limit) {
    const { done, value } = await reader.read();
    if (done) break;
    const chunk: Uint8Array = value;
    const remaining = limit - size;
    const kept = chunk.byteLength > remaining ? chunk.subarray(0, remaining) : chunk;
    chunks.push(kept);
    size += kept.byteLength;
  }

  // Stop the upstream stream once the cap is hit
  await reader.cancel();
  return Buffer.concat(chunks).toString("utf-8");
}

export function headersToRecord(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

// Deterministic tool names: sanitized method + URL, plus a short SHA-1 suffix

import { createHash } from "node:crypto";

const FALLBACK_NAME = "resource";

/** Lowercase ASCII letters, keep digits, everything else becomes "_" */
export function sanitizeToolName(value: string): string {
  let out = "";
  for (const ch of value) {
    if ((ch >= "a" && ch <= "z") || (ch >= "0" && ch <= "9")) {
      out += ch;
    } else if (ch >= "A" && ch <= "Z") {
      out += ch.toLowerCase();
    } else {
      out += "_";
    }
  }
  const trimmed = out.replace(/^_+|_+$/g, "");
  return trimmed === "" ? FALLBACK_NAME : trimmed;
}

/** First 4 bytes of sha1(method + ":" + url), hex */
export function toolNameHash(method: string, resourceUrl: string): string {
  return createHash("sha1").update(`${method}:${resourceUrl}`).digest("hex").slice(0, 8);
}

/**
 * x402_{method_}{sanitized_url}_{hash}
 * Pure in (method, url): no clock, no randomness.
 */
export function toolNameFromResource(resourceUrl: string, method: string | undefined): string {
  const m = method ?? "";
  const prefix = m === "" ? "" : `${sanitizeToolName(m.toLowerCase())}_`;
  return `x402_${prefix}${sanitizeToolName(resourceUrl)}_${toolNameHash(m, resourceUrl)}`;
}

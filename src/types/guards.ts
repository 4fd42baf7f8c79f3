import type { JsonObject } from "./x402.js";

/** Non-null, non-array object */
export function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

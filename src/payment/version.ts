// x402 protocol version detection.
// Detectors run in order and the first match wins: shape beats the explicit tag.

import type { JsonObject } from "../types/x402.js";
import { isObject } from "../types/guards.js";

export interface VersionDetector {
  readonly name: string;
  /** Returns the detected major version, or undefined for "no match" */
  detect(value: JsonObject): number | undefined;
}

/** resource + accepted objects only exist in the v2 envelope */
export const envelopeDetector: VersionDetector = {
  name: "envelope",
  detect(value) {
    return isObject(value["resource"]) && isObject(value["accepted"]) ? 2 : undefined;
  },
};

export const explicitVersionDetector: VersionDetector = {
  name: "explicit",
  detect(value) {
    const version = value["x402Version"];
    if (typeof version === "number" && Number.isInteger(version) && version > 0) {
      return version;
    }
    return undefined;
  },
};

export const DEFAULT_DETECTORS: readonly VersionDetector[] = [envelopeDetector, explicitVersionDetector];

export function detectX402Version(
  value: unknown,
  detectors: readonly VersionDetector[] = DEFAULT_DETECTORS,
): number | undefined {
  if (!isObject(value)) return undefined;
  for (const detector of detectors) {
    const version = detector.detect(value);
    if (version !== undefined) return version;
  }
  return undefined;
}

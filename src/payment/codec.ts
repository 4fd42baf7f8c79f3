// Payment header codec: credential -> request header, response -> payment signals

import {
  PaymentPayloadV1Schema,
  PaymentPayloadV2Schema,
} from "../types/schemas.js";
import type {
  JsonObject,
  PaymentCredential,
  PaymentHeader,
  PaymentRequiredEnvelope,
  SettlementEnvelope,
} from "../types/x402.js";
import {
  PAYMENT_REQUIRED_HEADER,
  PAYMENT_RESPONSE_HEADER,
  PAYMENT_SIGNATURE_HEADER,
  X_PAYMENT_HEADER,
  X_PAYMENT_RESPONSE_HEADER,
} from "../types/x402.js";
import { isObject } from "../types/guards.js";
import { DecodeError, EncodeError, ValidationError } from "../errors.js";
import { detectX402Version } from "./version.js";

const PADDED_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const UNPADDED_BASE64 = /^[A-Za-z0-9+/]*$/;

/** The parts of an HTTP response the decoders look at */
export interface ResponseSignals {
  status: number;
  headers: Headers;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isObject(value)) {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/** JSON with object keys sorted recursively */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

/**
 * Single entry point from untyped x402/payment metadata to a credential.
 * Throws ValidationError for malformed input and EncodeError when the
 * protocol version cannot be determined.
 */
export function parsePaymentCredential(raw: unknown): PaymentCredential {
  if (!isObject(raw)) {
    throw new ValidationError("x402/payment metadata must be an object");
  }
  if (raw["payload"] === undefined || raw["payload"] === null) {
    throw new ValidationError("x402/payment metadata missing payload");
  }

  const version = detectX402Version(raw);
  if (version === undefined) {
    throw new EncodeError("unable to determine x402 version of payment payload");
  }

  if (version >= 2) {
    if (!isObject(raw["resource"])) {
      throw new ValidationError("x402/payment metadata missing resource for v2 payment");
    }
    if (!isObject(raw["accepted"])) {
      throw new ValidationError("x402/payment metadata missing accepted for v2 payment");
    }
    const parsed = PaymentPayloadV2Schema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`invalid v2 payment: ${parsed.error.message}`);
    }
    return { protocol: "v2", version, payment: parsed.data };
  }

  const parsed = PaymentPayloadV1Schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`invalid v1 payment: ${parsed.error.message}`);
  }
  return { protocol: "v1", version, payment: parsed.data };
}

/** v1 travels in X-PAYMENT, v2+ in PAYMENT-SIGNATURE; both base64 JSON */
export function encodePaymentHeader(credential: PaymentCredential): PaymentHeader {
  const json = canonicalJson(credential.payment);
  return {
    name: credential.version >= 2 ? PAYMENT_SIGNATURE_HEADER : X_PAYMENT_HEADER,
    value: Buffer.from(json, "utf-8").toString("base64"),
    version: credential.version,
  };
}

/** Standard base64, padded or unpadded, holding a JSON object */
export function decodeBase64Json(raw: string): JsonObject {
  const padded = raw.endsWith("=");
  const wellFormed = padded
    ? PADDED_BASE64.test(raw)
    : UNPADDED_BASE64.test(raw) && raw.length % 4 !== 1;
  if (raw === "" || !wellFormed) {
    throw new DecodeError("header is not valid base64");
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(raw, "base64").toString("utf-8"));
  } catch {
    throw new DecodeError("header does not contain JSON");
  }
  if (!isObject(decoded)) {
    throw new DecodeError("header JSON is not an object");
  }
  return decoded;
}

function decodeHeader(value: string | null): JsonObject | undefined {
  if (!value) return undefined;
  try {
    return decodeBase64Json(value);
  } catch (err) {
    if (err instanceof DecodeError) return undefined;
    throw err;
  }
}

/**
 * PAYMENT-REQUIRED header first, on any status. Failing that, a 402 body is
 * accepted only as a v1 PaymentRequired: v2 servers signal through the header.
 */
export function decodePaymentRequired(
  response: ResponseSignals,
  body: string,
): PaymentRequiredEnvelope | undefined {
  const fromHeader = decodeHeader(response.headers.get(PAYMENT_REQUIRED_HEADER));
  if (fromHeader) return fromHeader;

  if (response.status !== 402 || body.length === 0) return undefined;

  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!isObject(decoded)) return undefined;
  if (detectX402Version(decoded) !== 1) return undefined;
  if (decoded["accepts"] === undefined || decoded["accepts"] === null) return undefined;
  return decoded;
}

export function decodePaymentResponse(response: Pick<ResponseSignals, "headers">): SettlementEnvelope | undefined {
  return (
    decodeHeader(response.headers.get(PAYMENT_RESPONSE_HEADER)) ??
    decodeHeader(response.headers.get(X_PAYMENT_RESPONSE_HEADER))
  );
}

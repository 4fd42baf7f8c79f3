// x402 <-> MCP bridge types and protocol constants

import type { DiscoveryResource, PaymentPayloadV1, PaymentPayloadV2 } from "./schemas.js";

export type {
  DiscoveryResource,
  PaymentRequirement,
  PaymentPayloadV1,
  PaymentPayloadV2,
} from "./schemas.js";

export type JsonObject = Record<string, unknown>;

// --- Transport headers ---

export const X_PAYMENT_HEADER = "X-PAYMENT";
export const PAYMENT_SIGNATURE_HEADER = "PAYMENT-SIGNATURE";
export const PAYMENT_REQUIRED_HEADER = "PAYMENT-REQUIRED";
export const PAYMENT_RESPONSE_HEADER = "PAYMENT-RESPONSE";
export const X_PAYMENT_RESPONSE_HEADER = "X-PAYMENT-RESPONSE";

export type PaymentHeaderName = typeof X_PAYMENT_HEADER | typeof PAYMENT_SIGNATURE_HEADER;

// --- MCP _meta keys and tool names ---

export const PAYMENT_META_KEY = "x402/payment";
export const PAYMENT_REQUIRED_META_KEY = "x402/payment-required";
export const PAYMENT_RESPONSE_META_KEY = "x402/payment-response";
export const CALL_WITH_META_KEY = "x402/call-with";
export const USAGE_META_KEY = "x402/usage";

export const SEARCH_TOOL_NAME = "search_resources";
export const PROXY_TOOL_NAME = "proxy_tool_call";

/** HTTP shape of the underlying endpoint, from outputSchema.input or metadata.input */
export interface InputDescriptor {
  type?: string;
  method?: string;
  queryParams?: JsonObject;
  headers?: JsonObject;
  hasBody: boolean;
}

export type JsonSchema = {
  type?: string;
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
};

/** Agent-facing descriptor synthesized from a discovery resource */
export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  _meta: JsonObject;
};

/** One entry of the pricing hint attached to a tool descriptor */
export type PricingAccept = {
  scheme?: string;
  network?: string;
  amount?: string;
  asset?: string;
  payTo?: string;
  maxTimeoutSeconds?: number;
  extra?: JsonObject;
};

export type PaymentRequiredEnvelope = JsonObject;
export type SettlementEnvelope = JsonObject;

/** Caller-supplied payment proof, one variant per protocol generation */
export type PaymentCredential =
  | { protocol: "v1"; version: number; payment: PaymentPayloadV1 }
  | { protocol: "v2"; version: number; payment: PaymentPayloadV2 };

export interface PaymentHeader {
  name: PaymentHeaderName;
  value: string;
  version: number;
}

export type PaginationState = {
  limit?: number;
  offset?: number;
  total: number;
};

export type SearchResourcesOutput = {
  pagination: PaginationState;
  x402Version: number;
  tools: ToolDescriptor[];
};

/** Discovery list response, as served by bazaar-style discovery endpoints */
export type DiscoveryListResponse = {
  x402Version: number;
  items: DiscoveryResource[];
  pagination: PaginationState;
};

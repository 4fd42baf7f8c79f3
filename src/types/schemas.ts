// Zod schemas for boundary validation: catalog fixture, payment metadata, query params

import { z } from "zod";

const PaymentRequirementSchema = z
  .object({
    scheme: z.string().optional(),
    network: z.string().optional(),
    asset: z.string().optional(),
    payTo: z.string().optional(),
    maxAmountRequired: z.string().optional(), // smallest unit, decimal string
    maxTimeoutSeconds: z.number().int().optional(),
    mimeType: z.string().optional(),
    description: z.string().optional(),
    resource: z.string().optional(),
    extra: z.record(z.unknown()).optional(),
    outputSchema: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const DiscoveryResourceSchema = z.object({
  resource: z.string().min(1),
  type: z.string(),
  x402Version: z.number().int(),
  lastUpdated: z.union([z.string(), z.number()]).optional(),
  accepts: z.array(PaymentRequirementSchema).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export const CatalogFixtureSchema = z.object({
  items: z.array(DiscoveryResourceSchema),
});

const ResourceInfoSchema = z
  .object({
    url: z.string().optional(),
    description: z.string().optional(),
    mimeType: z.string().optional(),
  })
  .passthrough();

/** v2 envelope: resource + accepted travel with the signed payload */
export const PaymentPayloadV2Schema = z
  .object({
    x402Version: z.number().int().positive().optional(),
    resource: ResourceInfoSchema,
    accepted: z.record(z.unknown()),
    payload: z.unknown(),
    extensions: z.record(z.unknown()).optional(),
  })
  .passthrough();

/** v1 legacy shape: scheme/network sit beside the payload */
export const PaymentPayloadV1Schema = z
  .object({
    x402Version: z.number().int().positive().optional(),
    scheme: z.string().optional(),
    network: z.string().optional(),
    payload: z.unknown(),
  })
  .passthrough();

// ?limit= with no value counts as absent, not as 0
const queryInt = z.preprocess((value) => (value === "" ? undefined : value), z.coerce.number().int().optional());

export const DiscoveryQuerySchema = z.object({
  query: z.string().optional(),
  limit: queryInt,
  offset: queryInt,
});

export type PaymentRequirement = z.infer<typeof PaymentRequirementSchema>;
export type DiscoveryResource = z.infer<typeof DiscoveryResourceSchema>;
export type CatalogFixture = z.infer<typeof CatalogFixtureSchema>;
export type PaymentPayloadV1 = z.infer<typeof PaymentPayloadV1Schema>;
export type PaymentPayloadV2 = z.infer<typeof PaymentPayloadV2Schema>;
export type DiscoveryQuery = z.infer<typeof DiscoveryQuerySchema>;

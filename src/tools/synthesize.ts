// Discovery resource -> MCP tool descriptor

import type {
  DiscoveryResource,
  InputDescriptor,
  JsonObject,
  JsonSchema,
  PaymentRequirement,
  PricingAccept,
  ToolDescriptor,
} from "../types/x402.js";
import { CALL_WITH_META_KEY, PAYMENT_REQUIRED_META_KEY, PROXY_TOOL_NAME } from "../types/x402.js";
import { isObject } from "../types/guards.js";
import { toolNameFromResource } from "./naming.js";

const CALL_HINT = "Use proxy_tool_call with payment to execute.";

export function isHttpResource(resource: DiscoveryResource): boolean {
  return resource.type.toLowerCase() === "http";
}

/** Read an outputSchema.input / metadata.input object into a descriptor */
export function readInputDescriptor(raw: unknown): InputDescriptor | undefined {
  if (!isObject(raw)) return undefined;
  return {
    type: typeof raw["type"] === "string" ? raw["type"] : undefined,
    method: typeof raw["method"] === "string" ? raw["method"] : undefined,
    queryParams: isObject(raw["queryParams"]) ? raw["queryParams"] : undefined,
    headers: isObject(raw["headers"]) ? raw["headers"] : undefined,
    hasBody: "body" in raw,
  };
}

/**
 * The first requirement carrying a description or an input descriptor
 * supplies both.
 */
export function firstAcceptsMetadata(resource: DiscoveryResource): {
  description?: string;
  input?: InputDescriptor;
} {
  for (const requirement of resource.accepts ?? []) {
    const description = requirement.description ?? "";
    const input = readInputDescriptor(requirement.outputSchema?.["input"]);
    if (description !== "" || input) {
      return { description: description === "" ? undefined : description, input };
    }
  }
  return {};
}

function metadataInput(resource: DiscoveryResource): InputDescriptor | undefined {
  return readInputDescriptor(resource.metadata?.["input"]);
}

function methodFromInput(input: InputDescriptor | undefined): string | undefined {
  if (!input?.method) return undefined;
  return input.method.toUpperCase();
}

/** Accepts input first, metadata.input as fallback */
export function resolveInputDescriptor(resource: DiscoveryResource): InputDescriptor | undefined {
  return firstAcceptsMetadata(resource).input ?? metadataInput(resource);
}

/** Upper-cased HTTP method, or undefined when neither descriptor names one */
export function resolveMethod(resource: DiscoveryResource): string | undefined {
  return methodFromInput(firstAcceptsMetadata(resource).input) ?? methodFromInput(metadataInput(resource));
}

export function toolNameFor(resource: DiscoveryResource): string {
  return toolNameFromResource(resource.resource, resolveMethod(resource));
}

function stringProperties(entries: JsonObject): Record<string, JsonSchema> {
  const props: Record<string, JsonSchema> = {};
  for (const [key, value] of Object.entries(entries)) {
    const prop: JsonSchema = { type: "string" };
    if (value !== null && value !== undefined) {
      prop.description = typeof value === "string" ? value : JSON.stringify(value);
    }
    props[key] = prop;
  }
  return props;
}

export function buildInputSchema(
  resource: DiscoveryResource,
  input: InputDescriptor | undefined,
  method: string | undefined,
): JsonSchema {
  const parametersProps: Record<string, JsonSchema> = {};
  const schema: JsonSchema = {
    type: "object",
    properties: {
      parameters: { type: "object", properties: parametersProps },
    },
  };

  if (method) {
    schema.description = `HTTP ${method} to ${resource.resource}`;
  }

  if (input?.queryParams && Object.keys(input.queryParams).length > 0) {
    parametersProps["query"] = {
      type: "object",
      additionalProperties: false,
      description: "Query parameters to include on the request.",
      properties: stringProperties(input.queryParams),
    };
  }

  if (input?.headers && Object.keys(input.headers).length > 0) {
    parametersProps["headers"] = {
      type: "object",
      additionalProperties: false,
      description: "Additional headers to include on the request.",
      properties: stringProperties(input.headers),
    };
  }

  if (input?.hasBody) {
    parametersProps["body"] = { description: "JSON body to include on the request." };
  }

  if (Object.keys(parametersProps).length > 0) {
    schema.required = ["parameters"];
  }

  return schema;
}

function toPricingAccept(requirement: PaymentRequirement): PricingAccept {
  return {
    scheme: requirement.scheme,
    network: requirement.network,
    amount: requirement.maxAmountRequired,
    asset: requirement.asset,
    payTo: requirement.payTo,
    maxTimeoutSeconds: requirement.maxTimeoutSeconds,
    extra: requirement.extra,
  };
}

/** Pricing hint for agents, shaped like a v2 PaymentRequired */
export function buildPricingMeta(
  resource: DiscoveryResource,
  description: string,
  toolName: string,
): JsonObject | undefined {
  const accepts = resource.accepts ?? [];
  if (accepts.length === 0) return undefined;

  const resourceMeta: JsonObject = {
    url: `mcp://tool/${toolName}`,
    description,
  };
  const mimeType = accepts.find((requirement) => requirement.mimeType)?.mimeType;
  if (mimeType) {
    resourceMeta["mimeType"] = mimeType;
  }

  return {
    [PAYMENT_REQUIRED_META_KEY]: {
      x402Version: resource.x402Version,
      resource: resourceMeta,
      accepts: accepts.map(toPricingAccept),
    },
  };
}

function describe(resource: DiscoveryResource, acceptsDescription: string | undefined): string {
  const metaDescription = resource.metadata?.["description"];
  let description = `Proxy call to ${resource.resource}`;
  if (acceptsDescription) {
    description = acceptsDescription;
  } else if (typeof metaDescription === "string" && metaDescription !== "") {
    description = metaDescription;
  }
  return `${description.trim()} ${CALL_HINT}`;
}

/** Returns undefined for resources that are not plain HTTP endpoints */
export function resourceToTool(resource: DiscoveryResource): ToolDescriptor | undefined {
  if (!isHttpResource(resource)) return undefined;

  const input = resolveInputDescriptor(resource);
  const method = resolveMethod(resource);
  const description = describe(resource, firstAcceptsMetadata(resource).description);
  const name = toolNameFromResource(resource.resource, method);

  return {
    name,
    description,
    inputSchema: buildInputSchema(resource, input, method),
    _meta: {
      ...buildPricingMeta(resource, description, name),
      [CALL_WITH_META_KEY]: { tool: PROXY_TOOL_NAME },
    },
  };
}

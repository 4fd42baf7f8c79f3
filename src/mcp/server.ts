// MCP front-end: search_resources + proxy_tool_call over the loaded catalog

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { selectPage } from "../catalog/filter.js";
import { resourceToTool } from "../tools/synthesize.js";
import type { ProxyInvoker } from "../proxy/invoker.js";
import type { DiscoveryResource, SearchResourcesOutput, ToolDescriptor } from "../types/x402.js";
import {
  PAYMENT_META_KEY,
  PROXY_TOOL_NAME,
  SEARCH_TOOL_NAME,
  USAGE_META_KEY,
} from "../types/x402.js";
import { BridgeError } from "../errors.js";

export const SERVER_INFO = { name: "x402-discovery-bridge", version: "0.1.0" } as const;

const SEARCH_DESCRIPTION =
  "Discover additional x402 tools you can use. Use searchQuery to filter by text. " +
  "After discovery, execute a returned tool via proxy_tool_call with a payment attached in meta x402/payment.";

const PROXY_DESCRIPTION =
  "Executes a discovered x402 tool. Provide toolName and parameters. " +
  "Use search_resources to discover available tools.";

const searchInputShape = {
  searchQuery: z.string().optional().describe("Case-insensitive text matched against resource URLs"),
  limit: z.number().int().optional().describe("Maximum number of tools to return"),
  offset: z.number().int().optional().describe("Number of matching tools to skip"),
};

const searchOutputShape = {
  pagination: z.object({
    limit: z.number().optional(),
    offset: z.number().optional(),
    total: z.number(),
  }),
  x402Version: z.number(),
  tools: z.array(
    z
      .object({
        name: z.string(),
        description: z.string(),
        inputSchema: z.record(z.unknown()),
        _meta: z.record(z.unknown()),
      })
      .passthrough(),
  ),
};

// toolName is checked by the invoker so a missing name comes back as an error result
const proxyInputShape = {
  toolName: z.string().optional().describe("Name of a tool returned by search_resources (required)"),
  parameters: z
    .record(z.unknown())
    .optional()
    .describe("Request parameters: query, headers and body as described by the tool's input schema"),
};

export interface DiscoveryServerDeps {
  resources: readonly DiscoveryResource[];
  invoker: ProxyInvoker;
  pathFilter: string;
}

export function searchResources(
  resources: readonly DiscoveryResource[],
  pathFilter: string,
  args: { searchQuery?: string; limit?: number; offset?: number },
): SearchResourcesOutput {
  const page = selectPage(resources, pathFilter, {
    query: args.searchQuery,
    limit: args.limit,
    offset: args.offset,
  });

  const tools: ToolDescriptor[] = [];
  for (const resource of page.items) {
    const tool = resourceToTool(resource);
    if (tool) tools.push(tool);
  }

  return { pagination: page.pagination, x402Version: page.x402Version, tools };
}

export function createDiscoveryServer(deps: DiscoveryServerDeps): McpServer {
  const server = new McpServer(SERVER_INFO, { capabilities: { tools: {} } });

  server.registerTool(
    SEARCH_TOOL_NAME,
    {
      title: "Search x402 Tools",
      description: SEARCH_DESCRIPTION,
      inputSchema: searchInputShape,
      outputSchema: searchOutputShape,
      _meta: { [USAGE_META_KEY]: { step: "discover", next: PROXY_TOOL_NAME } },
    },
    (args): CallToolResult => {
      const output = searchResources(deps.resources, deps.pathFilter, args);
      return {
        content: [{ type: "text", text: JSON.stringify(output) }],
        structuredContent: output,
      };
    },
  );

  server.registerTool(
    PROXY_TOOL_NAME,
    {
      title: "Execute x402 Tool",
      description: PROXY_DESCRIPTION,
      inputSchema: proxyInputShape,
      _meta: { [USAGE_META_KEY]: { step: "execute", via: PROXY_TOOL_NAME } },
    },
    async (args, extra): Promise<CallToolResult> => {
      try {
        return await deps.invoker.invoke({
          toolName: args.toolName,
          parameters: args.parameters,
          payment: extra._meta?.[PAYMENT_META_KEY],
          signal: extra.signal,
        });
      } catch (err) {
        if (err instanceof BridgeError) {
          console.error(`${PROXY_TOOL_NAME} ${args.toolName ?? ""} failed [${err.code}]: ${err.message}`);
        }
        throw err;
      }
    },
  );

  return server;
}

// HTTP host: service info, discovery listing, and the MCP endpoint

import { Hono } from "hono";
import { logger } from "hono/logger";
import type { HttpBindings } from "@hono/node-server";
import { RESPONSE_ALREADY_SENT } from "@hono/node-server/utils/response";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { selectPage } from "./catalog/filter.js";
import { createDiscoveryServer, SERVER_INFO } from "./mcp/server.js";
import type { ProxyInvoker } from "./proxy/invoker.js";
import { DiscoveryQuerySchema } from "./types/schemas.js";
import type { DiscoveryListResponse, DiscoveryResource } from "./types/x402.js";
import type { AppConfig } from "./config.js";

export interface AppDeps {
  resources: readonly DiscoveryResource[];
  invoker: ProxyInvoker;
  config: Pick<AppConfig, "discoveryPathFilter">;
}

export function createApp(deps: AppDeps): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();
  const pathFilter = deps.config.discoveryPathFilter;

  app.use("*", logger());

  app.get("/", (c) => {
    return c.json({
      name: SERVER_INFO.name,
      description: "MCP bridge to x402 payment-protected HTTP resources",
      version: SERVER_INFO.version,
    });
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  // GET /discovery/resources: raw catalog items, filtered and paged like search_resources
  app.get("/discovery/resources", (c) => {
    const parsed = DiscoveryQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: `invalid_request: ${parsed.error.message}` }, 400);
    }

    const page = selectPage(deps.resources, pathFilter, parsed.data);
    const body: DiscoveryListResponse = {
      x402Version: page.x402Version,
      items: page.items,
      pagination: page.pagination,
    };
    return c.json(body);
  });

  // ALL /discovery/mcp: stateless Streamable HTTP, one server per request
  app.all("/discovery/mcp", async (c) => {
    const { incoming, outgoing } = c.env;

    let body: unknown;
    if (c.req.method === "POST") {
      try {
        body = await c.req.json();
      } catch {
        return c.json({ jsonrpc: "2.0", error: { code: -32700, message: "Parse error" }, id: null }, 400);
      }
    }

    const server = createDiscoveryServer({ resources: deps.resources, invoker: deps.invoker, pathFilter });
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    outgoing.on("close", () => {
      transport.close().catch((err: unknown) => console.error("MCP transport close failed:", err));
      server.close().catch((err: unknown) => console.error("MCP server close failed:", err));
    });

    await server.connect(transport);
    await transport.handleRequest(incoming, outgoing, body);
    return RESPONSE_ALREADY_SENT;
  });

  return app;
}

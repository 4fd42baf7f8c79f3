import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { Hono } from "hono";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { createDiscoveryServer, type DiscoveryServerDeps } from "../../src/mcp/server.js";
import { ProxyInvoker } from "../../src/proxy/invoker.js";
import type { DiscoveryResource } from "../../src/types/x402.js";

function b64(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf-8").toString("base64");
}

const paymentRequired = {
  x402Version: 2,
  error: "payment required",
  resource: { url: "https://upstream.test/weather", description: "Current weather" },
  accepts: [{ scheme: "exact", network: "eip155:84532", amount: "10000", payTo: "0xBBB" }],
};

const settlement = { success: true, transaction: "0xtx", network: "eip155:84532" };

const v2Payment = {
  x402Version: 2,
  resource: { url: "https://upstream.test/weather" },
  accepted: paymentRequired.accepts[0],
  payload: { signature: "0xsig" },
};

const catalog: DiscoveryResource[] = [
  {
    resource: "https://upstream.test/weather",
    type: "http",
    x402Version: 2,
    accepts: [
      {
        scheme: "exact",
        network: "eip155:84532",
        maxAmountRequired: "10000",
        asset: "0xAAA",
        payTo: "0xBBB",
        maxTimeoutSeconds: 60,
        description: "Current weather",
        outputSchema: { input: { type: "http", method: "GET", queryParams: { city: "City name" } } },
      },
    ],
  },
  { resource: "https://upstream.test/stocks", type: "http", x402Version: 1 },
  { resource: "https://upstream.test/weather/mcp", type: "mcp", x402Version: 2 },
];

const WEATHER_TOOL = "x402_get_https___upstream_test_weather_4df06998";

// Paid upstream served in process
const seenPaymentHeaders: Array<string | undefined> = [];
const upstream = new Hono();
upstream.get("/weather", (c) => {
  const payment = c.req.header("PAYMENT-SIGNATURE");
  seenPaymentHeaders.push(payment);
  if (!payment) {
    return c.json({}, 402, { "PAYMENT-REQUIRED": b64(paymentRequired) });
  }
  return c.json({ city: c.req.query("city"), temperature: 71 }, 200, { "PAYMENT-RESPONSE": b64(settlement) });
});

function textOf(result: CallToolResult): string {
  const block = result.content[0];
  return block?.type === "text" ? block.text : "";
}

describe("discovery MCP server", () => {
  let client: Client;
  let fetchUpstream: Mock<typeof fetch>;

  async function connect(deps: DiscoveryServerDeps): Promise<Client> {
    const server = createDiscoveryServer(deps);
    const c = new Client({ name: "test-client", version: "0.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), c.connect(clientTransport)]);
    return c;
  }

  async function call(name: string, args: Record<string, unknown>, meta?: Record<string, unknown>) {
    return CallToolResultSchema.parse(await client.callTool({ name, arguments: args, _meta: meta }));
  }

  beforeEach(async () => {
    seenPaymentHeaders.length = 0;
    fetchUpstream = vi.fn<typeof fetch>(async (input, init) =>
      upstream.request(input instanceof Request ? input : String(input), init),
    );
    const invoker = new ProxyInvoker({ resources: catalog, fetch: fetchUpstream });
    client = await connect({ resources: catalog, invoker, pathFilter: "/weather" });
  });

  afterEach(async () => {
    await client.close();
  });

  it("lists both tools with titles and usage metadata", async () => {
    const { tools } = await client.listTools();
    const search = tools.find((tool) => tool.name === "search_resources");
    const proxy = tools.find((tool) => tool.name === "proxy_tool_call");

    expect(tools).toHaveLength(2);
    expect(search?.title).toBe("Search x402 Tools");
    expect(search?._meta).toEqual({ "x402/usage": { step: "discover", next: "proxy_tool_call" } });
    expect(search?.outputSchema).toBeDefined();
    expect(proxy?.title).toBe("Execute x402 Tool");
    expect(proxy?._meta).toEqual({ "x402/usage": { step: "execute", via: "proxy_tool_call" } });
  });

  it("search_resources returns synthesized tools for the configured domain", async () => {
    const result = await call("search_resources", { searchQuery: "WEATHER" });

    expect(result.isError).toBeFalsy();
    expect(result.structuredContent).toMatchObject({
      pagination: { total: 2 },
      x402Version: 2,
      tools: [{ name: WEATHER_TOOL, description: "Current weather Use proxy_tool_call with payment to execute." }],
    });
    expect(JSON.parse(textOf(result))).toEqual(result.structuredContent);
  });

  it("search_resources pages and echoes limit and offset", async () => {
    const result = await call("search_resources", { limit: 1, offset: 1 });
    expect(result.structuredContent).toEqual({
      pagination: { limit: 1, offset: 1, total: 2 },
      x402Version: 2,
      tools: [],
    });
  });

  it("proxy_tool_call without payment returns the payment-required envelope", async () => {
    const result = await call("proxy_tool_call", { toolName: WEATHER_TOOL, parameters: { query: { city: "SF" } } });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toEqual(paymentRequired);
    expect(seenPaymentHeaders).toEqual([undefined]);
  });

  it("proxy_tool_call with payment metadata pays and returns the settlement", async () => {
    const result = await call(
      "proxy_tool_call",
      { toolName: WEATHER_TOOL, parameters: { query: { city: "SF" } } },
      { "x402/payment": v2Payment },
    );

    expect(result.isError).toBe(false);
    expect(result._meta).toMatchObject({ "x402/payment-response": settlement });

    const envelope: unknown = JSON.parse(textOf(result));
    expect(envelope).toMatchObject({ status: 200, body: '{"city":"SF","temperature":71}' });

    const sent = seenPaymentHeaders[0];
    expect(JSON.parse(Buffer.from(sent ?? "", "base64").toString("utf-8"))).toEqual(v2Payment);
  });

  it("proxy_tool_call reports invalid payment metadata", async () => {
    const result = await call("proxy_tool_call", { toolName: WEATHER_TOOL }, { "x402/payment": "not-a-payment" });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Error: invalid x402 payment metadata: x402/payment metadata must be an object");
    expect(fetchUpstream).not.toHaveBeenCalled();
  });

  it("proxy_tool_call requires toolName", async () => {
    const result = await call("proxy_tool_call", {});
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Error: 'toolName' parameter is required.");
  });

  it("proxy_tool_call reports unknown tools without a network call", async () => {
    const result = await call("proxy_tool_call", { toolName: "x402_unknown_00000000" });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('tool "x402_unknown_00000000" not found');
    expect(fetchUpstream).not.toHaveBeenCalled();
  });
});

describe("discovery MCP server over a one-item catalog", () => {
  it("names the tool from the URL and carries the pricing hint", async () => {
    const resources: DiscoveryResource[] = [
      {
        resource: "http://x/weather",
        type: "http",
        x402Version: 1,
        accepts: [
          {
            scheme: "exact",
            network: "base-sepolia",
            maxAmountRequired: "10000",
            asset: "0xAAA",
            payTo: "0xBBB",
            maxTimeoutSeconds: 300,
            description: "Get weather",
          },
        ],
      },
    ];
    const server = createDiscoveryServer({
      resources,
      invoker: new ProxyInvoker({ resources, fetch: vi.fn<typeof fetch>() }),
      pathFilter: "/weather",
    });
    const client = new Client({ name: "test-client", version: "0.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: "search_resources", arguments: { searchQuery: "weather" } }),
    );

    expect(result.structuredContent).toMatchObject({
      pagination: { total: 1 },
      x402Version: 1,
      tools: [
        {
          name: "x402_http___x_weather_b2f4bbaa",
          _meta: {
            "x402/payment-required": {
              x402Version: 1,
              resource: { url: "mcp://tool/x402_http___x_weather_b2f4bbaa" },
              accepts: [{ amount: "10000", asset: "0xAAA", payTo: "0xBBB" }],
            },
            "x402/call-with": { tool: "proxy_tool_call" },
          },
        },
      ],
    });

    await client.close();
  });
});

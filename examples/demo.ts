// Bridge demo: discover a paid weather tool over MCP and call it through the proxy
//
// Usage: npm run demo
// Set X402_PAYMENT to a JSON payment payload to retry the call with payment attached.

import { spawn, type ChildProcess } from "node:child_process";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { CallToolResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import {
  PAYMENT_META_KEY,
  PAYMENT_RESPONSE_META_KEY,
  PROXY_TOOL_NAME,
  SEARCH_TOOL_NAME,
} from "../src/types/x402.js";
import { isObject } from "../src/types/guards.js";

const BRIDGE_PORT = 3402;
const RESOURCE_PORT = 3401;
const BRIDGE_URL = `http://localhost:${BRIDGE_PORT}`;
const RESOURCE_URL = `http://localhost:${RESOURCE_PORT}`;

// ── Helpers ──

function log(msg: string) {
  console.log(msg);
}

function section(step: string) {
  console.log(`\n${step}`);
}

async function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

async function waitForServer(url: string, label: string, timeoutMs = 30000): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    try {
      const res = await fetch(url);
      if (res.ok) return;
    } catch {
      // not ready yet
    }
    await sleep(500);
  }
  throw new Error(`${label} did not start within ${timeoutMs / 1000}s`);
}

function spawnServer(label: string, args: string[], env?: Record<string, string>): ChildProcess {
  const child = spawn("npx", ["tsx", ...args], {
    cwd: process.cwd(),
    env: { ...process.env, ...env },
    stdio: ["ignore", "pipe", "pipe"],
  });

  // Forward stderr so we can see startup errors
  child.stderr?.on("data", (data: Buffer) => {
    const msg = data.toString().trim();
    if (msg) console.error(`  [${label}] ${msg}`);
  });

  return child;
}

function cleanup(processes: ChildProcess[]) {
  for (const p of processes) {
    if (p.exitCode === null) p.kill("SIGTERM");
  }
}

function firstText(result: CallToolResult): string {
  const block = result.content.find((item) => item.type === "text");
  return block?.type === "text" ? block.text : "";
}

function readPayment(): unknown {
  const raw = process.env["X402_PAYMENT"];
  if (!raw) return undefined;
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

// ── Main ──

async function main() {
  const processes: ChildProcess[] = [];
  const client = new Client({ name: "x402-bridge-demo", version: "0.1.0" });

  process.on("SIGINT", () => { cleanup(processes); process.exit(1); });
  process.on("SIGTERM", () => { cleanup(processes); process.exit(1); });

  try {
    log("--- x402 discovery bridge demo ---");

    // ── Start servers ──
    section(`Starting resource server on :${RESOURCE_PORT}...`);
    processes.push(spawnServer("resource-server", ["examples/resource-server.ts"], {
      PORT: String(RESOURCE_PORT),
    }));
    await waitForServer(`${RESOURCE_URL}/health`, "Resource server");
    log("  ready");

    section(`Starting bridge on :${BRIDGE_PORT}...`);
    processes.push(spawnServer("bridge", ["src/index.ts"], {
      PORT: String(BRIDGE_PORT),
    }));
    await waitForServer(`${BRIDGE_URL}/health`, "Bridge");
    log("  ready");

    await client.connect(new StreamableHTTPClientTransport(new URL(`${BRIDGE_URL}/discovery/mcp`)));

    // ── Step 1: Discover ──
    section(`[1/3] ${SEARCH_TOOL_NAME} { searchQuery: "localhost" }`);
    const search = CallToolResultSchema.parse(
      await client.callTool({ name: SEARCH_TOOL_NAME, arguments: { searchQuery: "localhost" } }),
    );
    const tools = search.structuredContent?.["tools"];
    const first: unknown = Array.isArray(tools) ? tools[0] : undefined;
    if (!isObject(first) || typeof first["name"] !== "string") {
      throw new Error("search_resources returned no tools");
    }
    const toolName = first["name"];
    log(`  <- ${toolName}`);
    log(`     ${String(first["description"])}`);

    // ── Step 2: Call without payment ──
    section(`[2/3] ${PROXY_TOOL_NAME} without payment`);
    const unpaid = CallToolResultSchema.parse(
      await client.callTool({
        name: PROXY_TOOL_NAME,
        arguments: { toolName, parameters: { query: { city: "Lisbon" } } },
      }),
    );
    log(`  <- isError=${String(unpaid.isError)}`);
    log(`  Payment required: ${firstText(unpaid)}`);

    // ── Step 3: Retry with payment ──
    section(`[3/3] ${PROXY_TOOL_NAME} with ${PAYMENT_META_KEY}`);
    const payment = readPayment();
    if (payment === undefined) {
      log("  X402_PAYMENT not set, skipping the paid call");
    } else {
      const paid = CallToolResultSchema.parse(
        await client.callTool({
          name: PROXY_TOOL_NAME,
          arguments: { toolName, parameters: { query: { city: "Lisbon" } } },
          _meta: { [PAYMENT_META_KEY]: payment },
        }),
      );
      log(firstText(paid));
      const settlement = paid._meta?.[PAYMENT_RESPONSE_META_KEY];
      if (settlement !== undefined) {
        log(`  Settlement: ${JSON.stringify(settlement)}`);
      }
    }

    console.log("\nDone.");
  } finally {
    await client.close();
    cleanup(processes);
  }
}

main().catch((err: unknown) => {
  console.error("\nDemo failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});

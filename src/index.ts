import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { CatalogLoader, fileCatalogSource } from "./catalog/loader.js";
import { loadConfig } from "./config.js";
import { BridgeError } from "./errors.js";
import { ProxyInvoker } from "./proxy/invoker.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const catalog = new CatalogLoader(fileCatalogSource(config.catalogPath));
  const resources = await catalog.load();
  console.log(`Loaded ${resources.length} discovery resources from ${config.catalogPath}`);

  const invoker = new ProxyInvoker({ resources });
  const app = createApp({ resources, invoker, config });

  const server = serve({ fetch: app.fetch, port: config.port }, () => {
    console.log(`x402 discovery bridge listening on port ${config.port}`);
    console.log(`MCP endpoint: http://localhost:${config.port}/discovery/mcp`);
  });

  const shutdown = () => {
    console.log("Shutting down...");
    server.close(() => process.exit(0));
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof BridgeError) {
    console.error(`Failed to start [${err.code}]: ${err.message}`);
  } else {
    console.error("Failed to start:", err);
  }
  process.exit(1);
});

// Process configuration from environment variables

import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3402),
  CATALOG_PATH: z.string().min(1).default("fixtures/x402-endpoints.json"),
  // Only resources whose URL contains this fragment are offered through search.
  // Empty string disables the filter.
  DISCOVERY_PATH_FILTER: z.string().default("/weather"),
});

export interface AppConfig {
  port: number;
  catalogPath: string;
  discoveryPathFilter: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse({
    PORT: env["PORT"],
    CATALOG_PATH: env["CATALOG_PATH"],
    DISCOVERY_PATH_FILTER: env["DISCOVERY_PATH_FILTER"],
  });

  if (!parsed.success) {
    throw new ConfigError(`invalid configuration: ${parsed.error.message}`, {
      issues: parsed.error.issues,
    });
  }

  return {
    port: parsed.data.PORT,
    catalogPath: resolve(process.cwd(), parsed.data.CATALOG_PATH),
    discoveryPathFilter: parsed.data.DISCOVERY_PATH_FILTER,
  };
}

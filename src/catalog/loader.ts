// Catalog loader: reads the discovery fixture once per process

import { readFile } from "node:fs/promises";
import { CatalogFixtureSchema } from "../types/schemas.js";
import type { DiscoveryResource } from "../types/x402.js";
import { LoadError } from "../errors.js";

/** Supplies the raw fixture text */
export type CatalogSource = () => Promise<string>;

export function fileCatalogSource(path: string): CatalogSource {
  return async () => {
    try {
      return await readFile(path, "utf-8");
    } catch (err) {
      throw new LoadError(`read fixtures: ${err instanceof Error ? err.message : String(err)}`, { path }, { cause: err });
    }
  };
}

/**
 * Loads and caches the catalog.
 *
 * The first call starts the read; every later or concurrent call awaits the
 * same promise, so the fixture is parsed exactly once and a failure is
 * reported identically to every caller.
 */
export class CatalogLoader {
  private pending: Promise<readonly DiscoveryResource[]> | undefined;

  constructor(private readonly source: CatalogSource) {}

  load(): Promise<readonly DiscoveryResource[]> {
    this.pending ??= this.read();
    return this.pending;
  }

  private async read(): Promise<readonly DiscoveryResource[]> {
    const text = await this.source();

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (err) {
      throw new LoadError(`parse fixtures: ${err instanceof Error ? err.message : String(err)}`, undefined, { cause: err });
    }

    const parsed = CatalogFixtureSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new LoadError(`parse fixtures: ${parsed.error.message}`, { issues: parsed.error.issues });
    }

    return Object.freeze(parsed.data.items);
  }
}

import path from "node:path";
import { loadMarketData, log } from "@flipcase/engine";
import type { MarketTable } from "@flipcase/engine";

export type MarketLoader = (filePath: string) => Promise<MarketTable>;

/**
 * Loaded market tables keyed by absolute path. A failed load is evicted so the
 * next request retries it.
 */
export class MarketDataCache {
  private readonly entries = new Map<string, Promise<MarketTable>>();
  private readonly loader: MarketLoader;

  constructor(loader: MarketLoader = loadMarketData) {
    this.loader = loader;
  }

  get(filePath: string): Promise<MarketTable> {
    const key = path.resolve(filePath);
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.loader(key).catch((error: unknown) => {
      this.entries.delete(key);
      log.error("Market data load failed", { path: key, error: String(error) });
      throw error;
    });
    this.entries.set(key, pending);
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

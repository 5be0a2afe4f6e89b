import { DEFAULT_ABSORPTION_MONTHS } from "../../config/defaults.js";
import { LocalityNotFoundError } from "../../core/errors.js";
import type { MarketBucket, MarketRecord, MarketTable, ResolvedEstimate, Typology } from "../../types/market.js";

interface TypologyProxy {
  bucket: Exclude<MarketBucket, "house">;
  label: string;
}

/**
 * Reference data is sparse, so smaller and larger typologies reuse the adjacent bucket.
 */
export const TYPOLOGY_PROXIES: Readonly<Record<Typology, TypologyProxy>> = Object.freeze({
  T0: { bucket: "t1", label: "T1 (or smaller) proxy" },
  T1: { bucket: "t1", label: "T1" },
  T2: { bucket: "t2", label: "T2" },
  T3: { bucket: "t3", label: "T3" },
  "T4+": { bucket: "t3", label: "T3 proxy for T4+" },
});

export const OVERALL_FALLBACK_LABEL = "Overall (fallback)";
export const DEFAULT_ABSORPTION_LABEL = "Default (no data)";

function normalizeLocality(locality: string): string {
  return locality.trim().toLocaleLowerCase("pt-PT");
}

/**
 * Case-insensitive locality lookup; the first matching row wins.
 */
export function findMarketRecord(table: MarketTable, locality: string): MarketRecord {
  const key = normalizeLocality(locality);
  const record = table.find((candidate) => normalizeLocality(candidate.locality) === key);
  if (!record) {
    throw new LocalityNotFoundError(locality);
  }
  return record;
}

export function resolveSalePrice(table: MarketTable, locality: string, typology: Typology): ResolvedEstimate {
  const record = findMarketRecord(table, locality);
  const proxy = TYPOLOGY_PROXIES[typology];

  const value = record.pricePerArea[proxy.bucket];
  if (value !== undefined) {
    return { value, source: proxy.label };
  }
  return { value: record.pricePerArea.overall, source: OVERALL_FALLBACK_LABEL };
}

export function resolveAbsorption(table: MarketTable, locality: string, typology: Typology): ResolvedEstimate {
  const record = findMarketRecord(table, locality);
  const proxy = TYPOLOGY_PROXIES[typology];

  const value = record.absorptionMonths[proxy.bucket];
  if (value !== undefined) {
    return { value, source: proxy.label };
  }
  if (record.absorptionMonths.overall !== undefined) {
    return { value: record.absorptionMonths.overall, source: OVERALL_FALLBACK_LABEL };
  }
  return { value: DEFAULT_ABSORPTION_MONTHS, source: DEFAULT_ABSORPTION_LABEL };
}

export function listLocalities(table: MarketTable): string[] {
  const unique = new Map<string, string>();
  for (const record of table) {
    const key = normalizeLocality(record.locality);
    if (!unique.has(key)) {
      unique.set(key, record.locality);
    }
  }
  return Array.from(unique.values()).sort((a, b) => a.localeCompare(b, "pt-PT"));
}

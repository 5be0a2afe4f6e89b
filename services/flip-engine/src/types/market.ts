export const TYPOLOGIES = ["T0", "T1", "T2", "T3", "T4+"] as const;
export type Typology = (typeof TYPOLOGIES)[number];

// Reference buckets published per locality
export type MarketBucket = "t1" | "t2" | "t3" | "house";

export interface PricePerArea {
  overall: number;
  t1?: number;
  t2?: number;
  t3?: number;
  house?: number;
}

export interface AbsorptionMonths {
  overall?: number;
  t1?: number;
  t2?: number;
  t3?: number;
  house?: number;
}

export interface MarketRecord {
  readonly locality: string;
  readonly region: string;
  readonly pricePerArea: Readonly<PricePerArea>;
  readonly absorptionMonths: Readonly<AbsorptionMonths>;
  /** 1-based row number in the source sheet */
  readonly sourceRow: number;
}

export type MarketTable = readonly MarketRecord[];

export interface ResolvedEstimate {
  value: number;
  source: string;
}

export function isTypology(value: unknown): value is Typology {
  return typeof value === "string" && (TYPOLOGIES as readonly string[]).includes(value);
}

import type { Typology } from "./market.js";

export const RENOVATION_TIERS = ["low", "medium", "high"] as const;
export type RenovationTier = (typeof RENOVATION_TIERS)[number];

export interface FlipRates {
  /** Transfer tax, stamp duty and purchase fees, as a share of the purchase price */
  acquisitionRate: number;
  /** Brokerage and VAT on the sale, as a share of the prudent sale value */
  saleRate: number;
  /** Financing/carrying cost, as a share of purchase price plus renovation */
  holdingRate: number;
  renovationContingencyRate: number;
  /** Haircut on the estimated sale value, usually negative */
  salePrudenceRate: number;
  targetNetMargin: number;
}

export interface AlertThresholds {
  /** Renovation share of total investment above which an alert is raised */
  renovationShare: number;
  absorptionMonths: number;
}

export interface ScenarioInputs {
  purchasePrice: number;
  area: number;
  typology: Typology;
  renovationTier: RenovationTier;
  rates: FlipRates;
}

// Wire contract, see contracts/flip_evaluation_v0.schema.json
export interface FlipEvaluationRequestV0 {
  locality: string;
  typology: Typology;
  area_m2: number;
  asking_price: number;
  renovation_tier: RenovationTier;
  rates?: {
    target_net_margin?: number;
    sale_prudence_rate?: number;
    renovation_contingency_rate?: number;
    acquisition_rate?: number;
    sale_rate?: number;
    holding_rate?: number;
  };
  alerts?: {
    renovation_share?: number;
    absorption_months?: number;
  };
  analysis_date?: string;
}

export function isRenovationTier(value: unknown): value is RenovationTier {
  return typeof value === "string" && (RENOVATION_TIERS as readonly string[]).includes(value);
}

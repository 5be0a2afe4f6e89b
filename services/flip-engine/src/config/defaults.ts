import type { AlertThresholds, FlipRates, RenovationTier } from "../types/inputs.js";

export const DEFAULT_RATES: Readonly<FlipRates> = Object.freeze({
  acquisitionRate: 0.08,
  saleRate: 0.0615,
  holdingRate: 0.015,
  renovationContingencyRate: 0.1,
  salePrudenceRate: -0.05,
  targetNetMargin: 0.1,
});

export const DEFAULT_ALERT_THRESHOLDS: Readonly<AlertThresholds> = Object.freeze({
  renovationShare: 0.35,
  absorptionMonths: 8,
});

// EUR per m2, before contingency
export const RENOVATION_COST_PER_AREA: Readonly<Record<RenovationTier, number>> = Object.freeze({
  low: 300,
  medium: 600,
  high: 900,
});

export const DEFAULT_RENOVATION_TIER: RenovationTier = "medium";

export const DEFAULT_ABSORPTION_MONTHS = 6;

export const CURRENCY = "EUR";

import { DEFAULT_RENOVATION_TIER, RENOVATION_COST_PER_AREA } from "../../config/defaults.js";
import { ratioOrNaN } from "../../core/math-utils.js";
import { isRenovationTier } from "../../types/inputs.js";
import type { FlipRates } from "../../types/inputs.js";

export interface BusinessCase {
  readonly purchasePrice: number;
  readonly area: number;
  readonly pricePerArea: number;
  readonly grossSale: number;
  readonly prudentSale: number;
  readonly renovationBase: number;
  readonly renovationTotal: number;
  readonly acquisitionCost: number;
  readonly holdingCost: number;
  readonly totalInvestment: number;
  readonly saleFee: number;
  readonly netProfit: number;
  /** NaN when the prudent sale is not positive */
  readonly netMargin: number;
  /** NaN when the total investment is not positive */
  readonly roi: number;
  readonly breakevenSale: number;
}

export interface BusinessCaseInputs {
  purchasePrice: number;
  area: number;
  pricePerArea: number;
  /** Unknown tiers are costed as medium */
  renovationTier: string;
  rates: Pick<
    FlipRates,
    "acquisitionRate" | "saleRate" | "holdingRate" | "renovationContingencyRate" | "salePrudenceRate"
  >;
}

const MIN_SALE_NET_SHARE = 1e-9;

export function renovationCostPerArea(tier: string): number {
  return isRenovationTier(tier) ? RENOVATION_COST_PER_AREA[tier] : RENOVATION_COST_PER_AREA[DEFAULT_RENOVATION_TIER];
}

/**
 * Cost and revenue waterfall for buying at `purchasePrice` and selling at the
 * resolved per-area price. Pure: identical inputs give identical records.
 */
export function computeBusinessCase(inputs: BusinessCaseInputs): BusinessCase {
  const { purchasePrice, area, pricePerArea, renovationTier, rates } = inputs;

  // Sale
  const grossSale = pricePerArea * area;
  const prudentSale = grossSale * (1 + rates.salePrudenceRate);

  // Renovation
  const renovationBase = renovationCostPerArea(renovationTier) * area;
  const renovationTotal = renovationBase * (1 + rates.renovationContingencyRate);

  // Costs
  const acquisitionCost = purchasePrice * rates.acquisitionRate;
  const holdingCost = (purchasePrice + renovationTotal) * rates.holdingRate;
  const totalInvestment = purchasePrice + acquisitionCost + renovationTotal + holdingCost;
  const saleFee = prudentSale * rates.saleRate;

  const netProfit = prudentSale - (totalInvestment + saleFee);

  return Object.freeze({
    purchasePrice,
    area,
    pricePerArea,
    grossSale,
    prudentSale,
    renovationBase,
    renovationTotal,
    acquisitionCost,
    holdingCost,
    totalInvestment,
    saleFee,
    netProfit,
    netMargin: ratioOrNaN(netProfit, prudentSale),
    roi: ratioOrNaN(netProfit, totalInvestment),
    breakevenSale: totalInvestment / Math.max(1 - rates.saleRate, MIN_SALE_NET_SHARE),
  });
}

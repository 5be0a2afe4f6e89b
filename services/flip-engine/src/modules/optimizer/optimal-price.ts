import type { FlipRates } from "../../types/inputs.js";

export interface OptimalPriceInputs
  extends Pick<FlipRates, "acquisitionRate" | "holdingRate" | "saleRate" | "targetNetMargin"> {
  prudentSale: number;
  renovationTotal: number;
}

/**
 * Highest purchase price P whose business case still reaches the target net margin.
 *
 *   netProfit = V - [P + P*a + W + (P + W)*h] - V*s  >=  m*V
 *   =>  P*(1 + a + h)  <=  V*(1 - s - m) - W*(1 + h)
 *
 * Returns 0 when no non-negative price reaches the target, or when the
 * rates make the left-hand coefficient non-positive.
 */
export function solveOptimalPrice(inputs: OptimalPriceInputs): number {
  const { prudentSale, renovationTotal, acquisitionRate, holdingRate, saleRate, targetNetMargin } = inputs;

  const denominator = 1 + acquisitionRate + holdingRate;
  if (!(denominator > 0)) {
    return 0;
  }

  const headroom = prudentSale * (1 - saleRate - targetNetMargin) - renovationTotal * (1 + holdingRate);
  return Math.max(0, headroom / denominator);
}

import { DEFAULT_ABSORPTION_MONTHS } from "../../config/defaults.js";
import { isPositiveFinite, rateOrZero, ratioOrNaN } from "../../core/math-utils.js";
import type { BusinessCase } from "../business-case/business-case.js";

export type StressScenarioName = "Base" | "SalePriceDown5" | "RenovationUp10" | "DelayPlus3Months";

export interface StressScenario {
  readonly name: StressScenarioName;
  readonly label: string;
  readonly profit: number;
  /** NaN when the stressed sale value is not positive */
  readonly netMargin: number;
}

interface StressShock {
  name: StressScenarioName;
  label: string;
  saleFactor: number;
  renovationFactor: number;
  delayMonths: number;
}

// Display order is fixed
export const STRESS_SHOCKS: readonly StressShock[] = Object.freeze([
  { name: "Base", label: "Base", saleFactor: 1, renovationFactor: 1, delayMonths: 0 },
  { name: "SalePriceDown5", label: "Sale -5%", saleFactor: 0.95, renovationFactor: 1, delayMonths: 0 },
  { name: "RenovationUp10", label: "Renovation +10%", saleFactor: 1, renovationFactor: 1.1, delayMonths: 0 },
  { name: "DelayPlus3Months", label: "Delay +3 months", saleFactor: 1, renovationFactor: 1, delayMonths: 3 },
]);

/**
 * Re-run the business case under adverse shocks. Rates are re-derived from the
 * case itself; the purchase price is never shocked.
 */
export function stressTest(businessCase: BusinessCase, absorptionMonths: number): StressScenario[] {
  const { purchasePrice, prudentSale, renovationTotal } = businessCase;

  const saleRate = rateOrZero(businessCase.saleFee, prudentSale);
  const acquisitionRate = rateOrZero(businessCase.acquisitionCost, purchasePrice);
  const holdingRate = rateOrZero(businessCase.holdingCost, purchasePrice + renovationTotal);

  const months = isPositiveFinite(absorptionMonths) ? absorptionMonths : DEFAULT_ABSORPTION_MONTHS;

  const recompute = (saleValue: number, renovationValue: number, holdingTimeScale: number) => {
    const acquisition = purchasePrice * acquisitionRate;
    const holding = (purchasePrice + renovationValue) * holdingRate * holdingTimeScale;
    const investment = purchasePrice + acquisition + renovationValue + holding;
    const fee = saleValue * saleRate;
    const profit = saleValue - (investment + fee);
    return { profit, netMargin: ratioOrNaN(profit, saleValue) };
  };

  return STRESS_SHOCKS.map((shock) => {
    const holdingTimeScale = (months + shock.delayMonths) / months;
    const outcome = recompute(
      prudentSale * shock.saleFactor,
      renovationTotal * shock.renovationFactor,
      holdingTimeScale,
    );
    return Object.freeze({ name: shock.name, label: shock.label, ...outcome });
  });
}

import type { AlertThresholds } from "../../types/inputs.js";
import type { BusinessCase } from "../business-case/business-case.js";

export type FlipVerdict = "attractive" | "marginal" | "not_recommended";

export type FlipAlertCode = "margin_below_target" | "renovation_share_high" | "slow_absorption";

export interface FlipAlert {
  code: FlipAlertCode;
  message: string;
}

export const VERDICT_LABELS: Readonly<Record<FlipVerdict, string>> = Object.freeze({
  attractive: "Attractive",
  marginal: "Marginal",
  not_recommended: "Not recommended",
});

// NaN margins fail both comparisons and land in not_recommended
export function classifyMargin(netMargin: number, targetNetMargin: number): FlipVerdict {
  if (netMargin >= targetNetMargin) {
    return "attractive";
  }
  if (netMargin >= 0) {
    return "marginal";
  }
  return "not_recommended";
}

export function renovationShare(businessCase: BusinessCase): number {
  return businessCase.renovationTotal / Math.max(businessCase.totalInvestment, 1);
}

export function collectAlerts(
  askedCase: BusinessCase,
  absorptionMonths: number,
  targetNetMargin: number,
  thresholds: AlertThresholds,
): FlipAlert[] {
  const alerts: FlipAlert[] = [];

  if (!(askedCase.netMargin >= targetNetMargin)) {
    alerts.push({
      code: "margin_below_target",
      message: "Net margin at the asking price is below the target margin.",
    });
  }

  if (renovationShare(askedCase) > thresholds.renovationShare) {
    alerts.push({
      code: "renovation_share_high",
      message: `Renovation is more than ${(thresholds.renovationShare * 100).toFixed(0)}% of total investment (overrun risk).`,
    });
  }

  if (absorptionMonths > thresholds.absorptionMonths) {
    alerts.push({
      code: "slow_absorption",
      message: `Expected absorption exceeds ${thresholds.absorptionMonths} months (liquidity and holding risk).`,
    });
  }

  return alerts;
}

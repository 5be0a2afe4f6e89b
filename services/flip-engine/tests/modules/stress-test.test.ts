import { describe, expect, it } from "vitest";

import { computeBusinessCase } from "../../src/modules/business-case/business-case.js";
import { stressTest } from "../../src/modules/stress/stress-test.js";

const rates = {
  acquisitionRate: 0.08,
  saleRate: 0.0615,
  holdingRate: 0.015,
  renovationContingencyRate: 0.1,
  salePrudenceRate: -0.05,
};

const askedCase = computeBusinessCase({
  purchasePrice: 200_000,
  area: 60,
  pricePerArea: 2000,
  renovationTier: "medium",
  rates,
});

describe("stressTest", () => {
  it("returns the four scenarios in fixed order", () => {
    const scenarios = stressTest(askedCase, 6);

    expect(scenarios.map((s) => s.name)).toEqual(["Base", "SalePriceDown5", "RenovationUp10", "DelayPlus3Months"]);
    expect(scenarios.map((s) => s.label)).toEqual(["Base", "Sale -5%", "Renovation +10%", "Delay +3 months"]);
  });

  it("reproduces the business case in the base scenario", () => {
    const [base] = stressTest(askedCase, 6);

    expect(base.profit).toBeCloseTo(askedCase.netProfit, 6);
    expect(base.netMargin).toBeCloseTo(askedCase.netMargin, 10);
  });

  it("applies each shock with rates re-derived from the case", () => {
    const [, saleDown, renovationUp, delay] = stressTest(askedCase, 6);

    // sale 108300, fee 6660.45
    expect(saleDown.profit).toBeCloseTo(-157_554.45, 6);
    expect(saleDown.netMargin).toBeCloseTo(-157_554.45 / 108_300, 10);
    // renovation 43560, holding 3653.4
    expect(renovationUp.profit).toBeCloseTo(-156_224.4, 6);
    // holding scaled by (6 + 3) / 6
    expect(delay.profit).toBeCloseTo(-154_002, 6);
  });

  it("scales the delay by the absorption period", () => {
    const delay = stressTest(askedCase, 3)[3];

    // holding 3594 * 2
    expect(delay.profit).toBeCloseTo(-155_799, 6);
  });

  it("defaults absorption to 6 months for the delay when it is not positive", () => {
    const expected = stressTest(askedCase, 6)[3].profit;

    expect(stressTest(askedCase, 0)[3].profit).toBeCloseTo(expected, 6);
    expect(stressTest(askedCase, -2)[3].profit).toBeCloseTo(expected, 6);
    expect(stressTest(askedCase, Number.NaN)[3].profit).toBeCloseTo(expected, 6);
  });

  it("never perturbs the purchase price and survives a zero purchase price", () => {
    const freeCase = computeBusinessCase({
      purchasePrice: 0,
      area: 60,
      pricePerArea: 2000,
      renovationTier: "medium",
      rates,
    });

    const [base, , , delay] = stressTest(freeCase, 6);

    // 114000 - (39600 + 594) - 7011
    expect(base.profit).toBeCloseTo(66_795, 6);
    // holding 594 * 1.5
    expect(delay.profit).toBeCloseTo(66_498, 6);
  });

  it("reports NaN margins when the sale value is zero", () => {
    const noSale = computeBusinessCase({
      purchasePrice: 100_000,
      area: 60,
      pricePerArea: 0,
      renovationTier: "low",
      rates,
    });

    const scenarios = stressTest(noSale, 6);

    expect(scenarios).toHaveLength(4);
    for (const scenario of scenarios) {
      expect(scenario.netMargin).toBeNaN();
      expect(Number.isFinite(scenario.profit)).toBe(true);
    }
  });
});

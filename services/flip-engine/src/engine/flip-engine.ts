import type { DateTime } from "luxon";
import { DEFAULT_ALERT_THRESHOLDS, DEFAULT_RATES } from "../config/defaults.js";
import { parseDate, projectSaleDate, today, toIsoDate } from "../core/date-utils.js";
import { log } from "../core/logger.js";
import { collectAlerts, classifyMargin } from "../modules/alerts/alerts.js";
import type { FlipAlert, FlipVerdict } from "../modules/alerts/alerts.js";
import { computeBusinessCase } from "../modules/business-case/business-case.js";
import type { BusinessCase } from "../modules/business-case/business-case.js";
import { solveOptimalPrice } from "../modules/optimizer/optimal-price.js";
import {
  DEFAULT_ABSORPTION_LABEL,
  OVERALL_FALLBACK_LABEL,
  findMarketRecord,
  resolveAbsorption,
  resolveSalePrice,
} from "../modules/pricing/price-resolver.js";
import { stressTest } from "../modules/stress/stress-test.js";
import type { StressScenario } from "../modules/stress/stress-test.js";
import type {
  AlertThresholds,
  FlipEvaluationRequestV0,
  FlipRates,
  RenovationTier,
  ScenarioInputs,
} from "../types/inputs.js";
import type { MarketTable, ResolvedEstimate, Typology } from "../types/market.js";
import { isFlipEvaluationRequest, validateRequest } from "../validate/validate.js";

export interface FlipEngineOptions {
  defaultRates?: Partial<FlipRates>;
  alertThresholds?: Partial<AlertThresholds>;
}

export interface FlipScenarioInputs extends ScenarioInputs {
  locality: string;
  alertThresholds?: AlertThresholds;
  analysisDate?: DateTime;
}

export interface ScenarioOutcome {
  businessCase: BusinessCase;
  stress: StressScenario[];
  verdict: FlipVerdict;
}

export interface FlipEvaluation {
  inputs: {
    locality: string;
    typology: Typology;
    area: number;
    askingPrice: number;
    renovationTier: RenovationTier;
    rates: FlipRates;
    alertThresholds: AlertThresholds;
  };
  market: {
    locality: string;
    region: string;
    salePricePerArea: ResolvedEstimate;
    absorptionMonths: ResolvedEstimate;
  };
  asked: ScenarioOutcome;
  optimal: ScenarioOutcome;
  optimalPurchasePrice: number;
  alerts: FlipAlert[];
  analysisDate: string;
  expectedSaleDate: string;
}

export interface FlipEngineResult {
  success: boolean;
  evaluation?: FlipEvaluation;
  errors?: string[];
  warnings: string[];
}

export class FlipEngine {
  private readonly table: MarketTable;
  private readonly defaultRates: FlipRates;
  private readonly alertThresholds: AlertThresholds;

  constructor(table: MarketTable, options: FlipEngineOptions = {}) {
    this.table = table;
    this.defaultRates = { ...DEFAULT_RATES, ...options.defaultRates };
    this.alertThresholds = { ...DEFAULT_ALERT_THRESHOLDS, ...options.alertThresholds };
  }

  get localityCount(): number {
    return this.table.length;
  }

  validate(request: unknown): { valid: boolean; errors: string[] } {
    return validateRequest(request);
  }

  /**
   * Validate a wire request and evaluate it. Contract violations come back as
   * errors; an unknown locality throws LocalityNotFoundError.
   */
  run(request: unknown): FlipEngineResult {
    if (!isFlipEvaluationRequest(request)) {
      return { success: false, errors: this.validate(request).errors, warnings: [] };
    }

    const warnings: string[] = [];
    const evaluation = this.evaluate(this.toScenarioInputs(request), warnings);
    return { success: true, evaluation, warnings };
  }

  /**
   * Resolve market figures, price the asked and optimal scenarios and stress both.
   */
  evaluate(inputs: FlipScenarioInputs, warnings: string[] = []): FlipEvaluation {
    const { locality, typology, area, purchasePrice, renovationTier, rates } = inputs;
    const alertThresholds = inputs.alertThresholds ?? this.alertThresholds;

    const record = findMarketRecord(this.table, locality);
    const salePrice = resolveSalePrice(this.table, locality, typology);
    const absorption = resolveAbsorption(this.table, locality, typology);

    if (salePrice.source === OVERALL_FALLBACK_LABEL) {
      warnings.push(`No ${typology} sale price for ${record.locality}; using the locality overall price per m2.`);
    }
    if (absorption.source === DEFAULT_ABSORPTION_LABEL) {
      warnings.push(`No absorption data for ${record.locality}; assuming ${absorption.value} months.`);
    }

    const askedCase = computeBusinessCase({
      purchasePrice,
      area,
      pricePerArea: salePrice.value,
      renovationTier,
      rates,
    });

    const optimalPurchasePrice = solveOptimalPrice({
      prudentSale: askedCase.prudentSale,
      renovationTotal: askedCase.renovationTotal,
      acquisitionRate: rates.acquisitionRate,
      holdingRate: rates.holdingRate,
      saleRate: rates.saleRate,
      targetNetMargin: rates.targetNetMargin,
    });
    if (optimalPurchasePrice === 0) {
      warnings.push("No purchase price reaches the target net margin; optimal price reported as 0.");
    }

    const optimalCase = computeBusinessCase({
      purchasePrice: optimalPurchasePrice,
      area,
      pricePerArea: salePrice.value,
      renovationTier,
      rates,
    });

    const analysisDate = inputs.analysisDate ?? today();

    log.debug("Flip evaluated", {
      locality: record.locality,
      typology,
      askingPrice: purchasePrice,
      optimalPurchasePrice,
    });

    return {
      inputs: {
        locality,
        typology,
        area,
        askingPrice: purchasePrice,
        renovationTier,
        rates,
        alertThresholds,
      },
      market: {
        locality: record.locality,
        region: record.region,
        salePricePerArea: salePrice,
        absorptionMonths: absorption,
      },
      asked: this.outcome(askedCase, absorption.value, rates.targetNetMargin),
      optimal: this.outcome(optimalCase, absorption.value, rates.targetNetMargin),
      optimalPurchasePrice,
      alerts: collectAlerts(askedCase, absorption.value, rates.targetNetMargin, alertThresholds),
      analysisDate: toIsoDate(analysisDate),
      expectedSaleDate: toIsoDate(projectSaleDate(analysisDate, absorption.value)),
    };
  }

  private outcome(businessCase: BusinessCase, absorptionMonths: number, targetNetMargin: number): ScenarioOutcome {
    return {
      businessCase,
      stress: stressTest(businessCase, absorptionMonths),
      verdict: classifyMargin(businessCase.netMargin, targetNetMargin),
    };
  }

  private toScenarioInputs(request: FlipEvaluationRequestV0): FlipScenarioInputs {
    const rates: NonNullable<FlipEvaluationRequestV0["rates"]> = request.rates ?? {};
    const alerts: NonNullable<FlipEvaluationRequestV0["alerts"]> = request.alerts ?? {};

    return {
      locality: request.locality,
      typology: request.typology,
      area: request.area_m2,
      purchasePrice: request.asking_price,
      renovationTier: request.renovation_tier,
      rates: {
        acquisitionRate: rates.acquisition_rate ?? this.defaultRates.acquisitionRate,
        saleRate: rates.sale_rate ?? this.defaultRates.saleRate,
        holdingRate: rates.holding_rate ?? this.defaultRates.holdingRate,
        renovationContingencyRate: rates.renovation_contingency_rate ?? this.defaultRates.renovationContingencyRate,
        salePrudenceRate: rates.sale_prudence_rate ?? this.defaultRates.salePrudenceRate,
        targetNetMargin: rates.target_net_margin ?? this.defaultRates.targetNetMargin,
      },
      alertThresholds: {
        renovationShare: alerts.renovation_share ?? this.alertThresholds.renovationShare,
        absorptionMonths: alerts.absorption_months ?? this.alertThresholds.absorptionMonths,
      },
      analysisDate: request.analysis_date ? parseDate(request.analysis_date) : undefined,
    };
  }
}

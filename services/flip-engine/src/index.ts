// Core primitives
export { DataFormatError, FlipEngineError, LocalityNotFoundError } from "./core/errors.js";
export { log, redactSensitive } from "./core/logger.js";
export type { LogLevel } from "./core/logger.js";
export { parseDate, addMonths, projectSaleDate, toIsoDate } from "./core/date-utils.js";
export { ratioOrNaN, rateOrZero, relativeDifference } from "./core/math-utils.js";

// Configuration
export {
  CURRENCY,
  DEFAULT_ABSORPTION_MONTHS,
  DEFAULT_ALERT_THRESHOLDS,
  DEFAULT_RATES,
  RENOVATION_COST_PER_AREA,
} from "./config/defaults.js";

// Types (all type-only exports)
export type {
  AbsorptionMonths,
  MarketBucket,
  MarketRecord,
  MarketTable,
  PricePerArea,
  ResolvedEstimate,
  Typology,
} from "./types/market.js";
export type {
  AlertThresholds,
  FlipEvaluationRequestV0,
  FlipRates,
  RenovationTier,
  ScenarioInputs,
} from "./types/inputs.js";
export { TYPOLOGIES, isTypology } from "./types/market.js";
export { RENOVATION_TIERS, isRenovationTier } from "./types/inputs.js";

// Market data
export { loadMarketData, buildMarketTable, coerceNumber, MARKET_COLUMNS, MIN_MARKET_COLUMNS } from "./data/market-loader.js";
export type { RawCell } from "./data/market-loader.js";

// Modules
export {
  findMarketRecord,
  listLocalities,
  resolveAbsorption,
  resolveSalePrice,
  TYPOLOGY_PROXIES,
  OVERALL_FALLBACK_LABEL,
  DEFAULT_ABSORPTION_LABEL,
} from "./modules/pricing/price-resolver.js";
export { computeBusinessCase, renovationCostPerArea } from "./modules/business-case/business-case.js";
export type { BusinessCase, BusinessCaseInputs } from "./modules/business-case/business-case.js";
export { solveOptimalPrice } from "./modules/optimizer/optimal-price.js";
export type { OptimalPriceInputs } from "./modules/optimizer/optimal-price.js";
export { stressTest, STRESS_SHOCKS } from "./modules/stress/stress-test.js";
export type { StressScenario, StressScenarioName } from "./modules/stress/stress-test.js";
export { classifyMargin, collectAlerts, renovationShare, VERDICT_LABELS } from "./modules/alerts/alerts.js";
export type { FlipAlert, FlipAlertCode, FlipVerdict } from "./modules/alerts/alerts.js";

// Validation
export { validateRequest, isFlipEvaluationRequest } from "./validate/validate.js";
export type { ValidationResult } from "./validate/validate.js";

// Engine
export { FlipEngine } from "./engine/flip-engine.js";
export type {
  FlipEngineOptions,
  FlipEngineResult,
  FlipEvaluation,
  FlipScenarioInputs,
  ScenarioOutcome,
} from "./engine/flip-engine.js";

// Formatters
export { createEvaluationReport, formatCurrency, formatPercent } from "./formatters/evaluation-report.js";

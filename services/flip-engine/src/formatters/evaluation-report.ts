/**
 * Evaluation Report Formatter
 *
 * Renders a flip evaluation as a plain-text side-by-side comparison of the
 * asking-price and optimal-price scenarios, followed by the stress tests.
 */

import { CURRENCY } from "../config/defaults.js";
import type { FlipEngineResult, FlipEvaluation } from "../engine/flip-engine.js";
import { VERDICT_LABELS } from "../modules/alerts/alerts.js";
import type { BusinessCase } from "../modules/business-case/business-case.js";

interface ComparisonRow {
  label: string;
  field: keyof BusinessCase;
  format: "currency" | "percent";
}

const COMPARISON_ROWS: readonly ComparisonRow[] = [
  { label: "Purchase price", field: "purchasePrice", format: "currency" },
  { label: "Acquisition costs", field: "acquisitionCost", format: "currency" },
  { label: "Renovation (incl. contingency)", field: "renovationTotal", format: "currency" },
  { label: "Holding/financing", field: "holdingCost", format: "currency" },
  { label: "Total investment", field: "totalInvestment", format: "currency" },
  { label: "Prudent sale", field: "prudentSale", format: "currency" },
  { label: "Sale fee", field: "saleFee", format: "currency" },
  { label: "Net profit", field: "netProfit", format: "currency" },
  { label: "Net margin", field: "netMargin", format: "percent" },
  { label: "ROI", field: "roi", format: "percent" },
  { label: "Break-even sale", field: "breakevenSale", format: "currency" },
];

const LABEL_WIDTH = 34;
const COLUMN_WIDTH = 16;
const RULE_WIDTH = LABEL_WIDTH + COLUMN_WIDTH * 2;

/**
 * Formats a number as a whole-euro amount; non-finite values render as "-"
 */
export function formatCurrency(value: number): string {
  if (!Number.isFinite(value)) return "-";
  const formatted = Math.abs(value).toLocaleString("en-US", {
    style: "currency",
    currency: CURRENCY,
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  });
  return value < 0 ? `-${formatted}` : formatted;
}

/**
 * Formats a ratio as a percentage with one decimal; NaN renders as "-"
 */
export function formatPercent(value: number): string {
  if (!Number.isFinite(value)) return "-";
  return `${(value * 100).toFixed(1)}%`;
}

function formatRow(label: string, values: string[]): string {
  return label.padEnd(LABEL_WIDTH) + values.map((v) => v.padStart(COLUMN_WIDTH)).join("");
}

function formatComparison(evaluation: FlipEvaluation): string[] {
  const lines = [formatRow("", ["Asking price", "Optimal price"]), "-".repeat(RULE_WIDTH)];
  for (const row of COMPARISON_ROWS) {
    const format = row.format === "currency" ? formatCurrency : formatPercent;
    lines.push(
      formatRow(row.label, [
        format(evaluation.asked.businessCase[row.field]),
        format(evaluation.optimal.businessCase[row.field]),
      ]),
    );
  }
  return lines;
}

function formatStress(evaluation: FlipEvaluation): string[] {
  const lines = [formatRow("", ["Asking profit", "Optimal profit"]), "-".repeat(RULE_WIDTH)];
  evaluation.asked.stress.forEach((scenario, index) => {
    const optimal = evaluation.optimal.stress[index];
    lines.push(
      formatRow(scenario.label, [
        `${formatCurrency(scenario.profit)} (${formatPercent(scenario.netMargin)})`,
        `${formatCurrency(optimal.profit)} (${formatPercent(optimal.netMargin)})`,
      ]),
    );
  });
  return lines;
}

/**
 * Create a summary report from flip engine results
 */
export function createEvaluationReport(result: FlipEngineResult): string {
  if (!result.success || !result.evaluation) {
    return `Flip Evaluation Failed:\n${result.errors?.join("\n") ?? "Unknown error"}`;
  }

  const evaluation = result.evaluation;
  const { inputs, market } = evaluation;

  const lines: string[] = [
    "=".repeat(RULE_WIDTH),
    `FLIP EVALUATION: ${market.locality} ${inputs.typology}, ${inputs.area} m2`,
    "=".repeat(RULE_WIDTH),
    "",
    "MARKET",
    `  Region: ${market.region || "-"}`,
    `  Sale price per m2: ${formatCurrency(market.salePricePerArea.value)} (${market.salePricePerArea.source})`,
    `  Absorption: ${market.absorptionMonths.value.toFixed(1)} months (${market.absorptionMonths.source})`,
    `  Analysis date: ${evaluation.analysisDate}, expected sale by ${evaluation.expectedSaleDate}`,
    "",
    "VERDICT",
    `  Asking price: ${VERDICT_LABELS[evaluation.asked.verdict]}`,
    `  Optimal price: ${VERDICT_LABELS[evaluation.optimal.verdict]}`,
    `  Target net margin: ${formatPercent(inputs.rates.targetNetMargin)}`,
    "",
    "BUSINESS CASE",
    ...formatComparison(evaluation),
    "",
    "STRESS TEST",
    ...formatStress(evaluation),
  ];

  if (evaluation.alerts.length > 0) {
    lines.push("");
    lines.push("ALERTS");
    for (const alert of evaluation.alerts) {
      lines.push(`  ! ${alert.message}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push("WARNINGS");
    for (const warning of result.warnings) {
      lines.push(`  - ${warning}`);
    }
  }

  lines.push("");
  lines.push("=".repeat(RULE_WIDTH));

  return lines.join("\n");
}

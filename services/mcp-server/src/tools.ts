import { z } from "zod";
import {
  FlipEngine,
  FlipEngineError,
  RENOVATION_TIERS,
  TYPOLOGIES,
  createEvaluationReport,
  listLocalities,
  log,
} from "@flipcase/engine";
import type { FlipEvaluation } from "@flipcase/engine";
import type { MarketDataCache } from "./market-cache.js";

// Tool input schemas (Zod raw shapes for the MCP SDK); ranges are checked by the request contract
export const listLocalitiesInputShape = {
  search: z.string().optional().describe("Case-insensitive substring filter"),
};

export const evaluateFlipInputShape = {
  locality: z.string().min(1).describe("Municipality (concelho) as listed by flip.list_localities"),
  typology: z.enum(TYPOLOGIES),
  area_m2: z.number().describe("Gross private area in m2 (10-500)"),
  asking_price: z.number().describe("Asking price in EUR"),
  renovation_tier: z.enum(RENOVATION_TIERS),
  rates: z
    .record(z.number())
    .optional()
    .describe(
      "Optional overrides: target_net_margin, sale_prudence_rate, renovation_contingency_rate, acquisition_rate, sale_rate, holding_rate",
    ),
  alerts: z.record(z.number()).optional().describe("Optional alert thresholds: renovation_share, absorption_months"),
  analysis_date: z.string().optional().describe("ISO date the evaluation is made on (defaults to today)"),
};

const listLocalitiesArgsSchema = z.object(listLocalitiesInputShape);
const evaluateFlipArgsSchema = z.object(evaluateFlipInputShape);

export type ListLocalitiesArgs = z.infer<typeof listLocalitiesArgsSchema>;
export type EvaluateFlipArgs = z.infer<typeof evaluateFlipArgsSchema>;

export type ToolResult =
  | { status: "ok"; localities: string[]; total: number }
  | { status: "complete"; evaluation: FlipEvaluation; warnings: string[]; report: string }
  | { status: "invalid"; errors: string[] }
  | { status: "failed"; error: string };

export interface ToolContext {
  cache: MarketDataCache;
  dataPath: string;
}

export async function handleListLocalities(ctx: ToolContext, args: ListLocalitiesArgs): Promise<ToolResult> {
  return withEngineErrors("flip.list_localities", async () => {
    const table = await ctx.cache.get(ctx.dataPath);
    const all = listLocalities(table);
    const needle = args.search?.trim().toLocaleLowerCase("pt-PT");
    const localities = needle ? all.filter((name) => name.toLocaleLowerCase("pt-PT").includes(needle)) : all;
    return { status: "ok", localities, total: all.length };
  });
}

export async function handleEvaluateFlip(ctx: ToolContext, args: EvaluateFlipArgs): Promise<ToolResult> {
  return withEngineErrors("flip.evaluate", async () => {
    const table = await ctx.cache.get(ctx.dataPath);
    const engine = new FlipEngine(table);
    const result = engine.run(args);

    if (!result.success || !result.evaluation) {
      log.info("Flip evaluation rejected", { errors: result.errors });
      return { status: "invalid", errors: result.errors ?? [] };
    }

    log.info("Flip evaluated", {
      locality: result.evaluation.market.locality,
      typology: args.typology,
      askedVerdict: result.evaluation.asked.verdict,
    });

    return {
      status: "complete",
      evaluation: result.evaluation,
      warnings: result.warnings,
      report: createEvaluationReport(result),
    };
  });
}

// Engine errors (bad sheet, unknown locality) become failed tool results; anything else propagates
async function withEngineErrors(tool: string, run: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof FlipEngineError) {
      log.warn("Tool failed", { tool, error: error.message });
      return { status: "failed", error: error.message };
    }
    throw error;
  }
}

export function buildToolResponse(result: ToolResult) {
  // Keep the model-facing summary small; the plain-text report carries the detail
  const structuredContent: Record<string, unknown> =
    result.status === "complete"
      ? {
          status: result.status,
          locality: result.evaluation.market.locality,
          asked_verdict: result.evaluation.asked.verdict,
          optimal_verdict: result.evaluation.optimal.verdict,
          optimal_purchase_price: Math.round(result.evaluation.optimalPurchasePrice),
          asked_net_margin: result.evaluation.asked.businessCase.netMargin,
          alerts: result.evaluation.alerts.map((alert) => alert.code),
          warnings: result.warnings,
        }
      : { ...result };

  const text = result.status === "complete" ? result.report : JSON.stringify(result);

  return {
    content: [{ type: "text" as const, text }],
    structuredContent,
    isError: result.status === "failed" || result.status === "invalid",
  };
}

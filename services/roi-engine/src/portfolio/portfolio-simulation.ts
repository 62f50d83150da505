import { irr, npv } from "../core/math-utils.js";
import { SimulationError } from "../engine/errors.js";
import { RoiEngine } from "../engine/roi-engine.js";
import type { ExitStrategyName, PropertyFinancialsInput } from "../types/inputs.js";
import type { SimulationReport } from "../types/results.js";

export interface PortfolioEntry {
  id: string;
  name: string;
  propertyType?: string;
  property: PropertyFinancialsInput;
}

export interface PortfolioSimulationParams {
  years?: number;
  discount_rate?: number;
  rent_growth?: number;
  expense_growth?: number;
  appreciation?: number;
  vacancy_rate?: number;
  strategy?: ExitStrategyName;
  start_date?: string;
}

export interface ResolvedPortfolioParams {
  years: number;
  discount_rate: number;
  rent_growth: number;
  expense_growth: number;
  appreciation: number;
  vacancy_rate: number;
  strategy: ExitStrategyName;
  start_date?: string;
}

export const PORTFOLIO_DEFAULTS = {
  years: 10,
  discount_rate: 0.08,
  rent_growth: 0.03,
  expense_growth: 0.025,
  appreciation: 0.04,
  vacancy_rate: 0.05,
  strategy: "hold",
} as const;

// Benchmarks for the risk-adjusted return
export const RISK_FREE_RATE = 0.03;
export const ASSUMED_VOLATILITY = 0.15;

export interface PortfolioPropertyResult {
  id: string;
  name: string;
  propertyType: string | null;
  purchasePrice: number;
  totalInvestment: number;
  irr: number | null;
  npv: number;
  roi: number;
  totalCashFlow: number;
  averageAnnualCashFlow: number;
  finalValue: number;
  finalEquity: number;
  capRate: number;
  cashOnCash: number;
}

export interface PortfolioYear {
  year: number;
  netCashFlow: number;
  cumulativeCashFlow: number;
  propertyValue: number;
  equity: number;
}

export interface PortfolioMetrics {
  propertyCount: number;
  totalInvestment: number;
  totalPurchasePrice: number;
  projectedValue: number;
  projectedEquity: number;
  totalCashFlow: number;
  averageAnnualCashFlow: number;
  roi: number;
  irr: number | null;
  npv: number;
  diversificationScore: number;
  concentration: number;
  riskAdjustedReturn: number | null;
}

export interface PortfolioCharts {
  propertyComparison: { name: string; irr: number | null; npv: number; cashFlow: number }[];
  allocation: { name: string; value: number; share: number }[];
  riskMetrics: { diversificationScore: number; concentration: number; riskAdjustedReturn: number | null };
}

export interface PortfolioSimulationResult {
  params: ResolvedPortfolioParams;
  metrics: PortfolioMetrics;
  properties: PortfolioPropertyResult[];
  yearly: PortfolioYear[];
  cashFlows: number[];
  charts: PortfolioCharts;
  errors: { id: string; name: string; message: string }[];
  warnings: string[];
}

/**
 * Herfindahl index of value weights, rescaled so an evenly split portfolio is 0
 * and a single-asset portfolio is 1.
 */
export function normalizedConcentration(values: readonly number[]): number {
  const n = values.length;
  const total = values.reduce((sum, v) => sum + v, 0);
  if (n <= 1 || total <= 0) {
    return 1;
  }
  const hhi = values.reduce((sum, v) => sum + (v / total) ** 2, 0);
  return Math.max(0, (hhi - 1 / n) / (1 - 1 / n));
}

export function diversificationScore(values: readonly number[]): number {
  if (values.length <= 1) {
    return 0;
  }
  return Math.min(1, values.length / 10) * (1 - normalizedConcentration(values));
}

export async function runPortfolioSimulation(
  entries: readonly PortfolioEntry[],
  params: PortfolioSimulationParams = {},
  engine: RoiEngine = new RoiEngine(),
): Promise<PortfolioSimulationResult> {
  if (entries.length === 0) {
    throw new SimulationError("Portfolio has no properties to simulate");
  }

  const resolved: ResolvedPortfolioParams = {
    years: params.years ?? PORTFOLIO_DEFAULTS.years,
    discount_rate: params.discount_rate ?? PORTFOLIO_DEFAULTS.discount_rate,
    rent_growth: params.rent_growth ?? PORTFOLIO_DEFAULTS.rent_growth,
    expense_growth: params.expense_growth ?? PORTFOLIO_DEFAULTS.expense_growth,
    appreciation: params.appreciation ?? PORTFOLIO_DEFAULTS.appreciation,
    vacancy_rate: params.vacancy_rate ?? PORTFOLIO_DEFAULTS.vacancy_rate,
    strategy: params.strategy ?? PORTFOLIO_DEFAULTS.strategy,
    ...(params.start_date ? { start_date: params.start_date } : {}),
  };

  const simulated: { entry: PortfolioEntry; report: SimulationReport }[] = [];
  const errors: PortfolioSimulationResult["errors"] = [];
  const warnings: string[] = [];

  for (const entry of entries) {
    const result = await engine.run({ property: entry.property, params: resolved });
    if (!result.success || !result.report) {
      errors.push({ id: entry.id, name: entry.name, message: (result.errors ?? ["Simulation failed"]).join("; ") });
      continue;
    }
    simulated.push({ entry, report: result.report });
    for (const warning of result.warnings) {
      warnings.push(`${entry.name}: ${warning}`);
    }
  }

  if (simulated.length === 0) {
    throw new SimulationError(
      "No property in the portfolio could be simulated",
      errors.map((e) => `${e.name}: ${e.message}`),
    );
  }

  const years = resolved.years;
  const cashFlows = new Array<number>(years + 1).fill(0);
  const yearly: PortfolioYear[] = Array.from({ length: years }, (_, i) => ({
    year: i + 1,
    netCashFlow: 0,
    cumulativeCashFlow: 0,
    propertyValue: 0,
    equity: 0,
  }));

  const properties: PortfolioPropertyResult[] = simulated.map(({ entry, report }) => {
    report.cashFlows.forEach((flow, t) => {
      cashFlows[t] += flow;
    });
    report.yearlyResults.forEach((row, i) => {
      const target = yearly[i];
      target.netCashFlow += row.netCashFlow;
      target.propertyValue += row.propertyValue;
      target.equity += row.equity;
    });

    const s = report.summary;
    return {
      id: entry.id,
      name: entry.name,
      propertyType: entry.propertyType ?? null,
      purchasePrice: entry.property.purchase_price,
      totalInvestment: s.totalInvestment,
      irr: s.irr,
      npv: s.npv,
      roi: s.roi,
      totalCashFlow: s.totalCashFlow,
      averageAnnualCashFlow: s.totalCashFlow / report.years,
      finalValue: s.finalPropertyValue,
      finalEquity: s.finalEquity,
      capRate: s.capRate,
      cashOnCash: s.averageCashOnCash,
    };
  });

  let running = 0;
  for (const row of yearly) {
    running += row.netCashFlow;
    row.cumulativeCashFlow = running;
  }

  const totalInvestment = properties.reduce((sum, p) => sum + p.totalInvestment, 0);
  const totalPurchasePrice = properties.reduce((sum, p) => sum + p.purchasePrice, 0);
  const totalCashFlow = properties.reduce((sum, p) => sum + p.totalCashFlow, 0);
  const exitProceeds = simulated.reduce((sum, { report }) => sum + report.summary.exit.netProceeds, 0);
  const totalReturn = totalCashFlow + exitProceeds - totalInvestment;

  let portfolioIrr: number | null = null;
  try {
    portfolioIrr = irr(cashFlows);
  } catch (e) {
    warnings.push(`Portfolio IRR could not be computed: ${e instanceof Error ? e.message : String(e)}`);
  }

  const prices = properties.map((p) => p.purchasePrice);
  const concentration = normalizedConcentration(prices);
  const score = diversificationScore(prices);
  const riskAdjustedReturn = portfolioIrr === null ? null : (portfolioIrr - RISK_FREE_RATE) / ASSUMED_VOLATILITY;
  const finalYear = yearly[yearly.length - 1];

  const metrics: PortfolioMetrics = {
    propertyCount: properties.length,
    totalInvestment,
    totalPurchasePrice,
    projectedValue: finalYear ? finalYear.propertyValue : 0,
    projectedEquity: finalYear ? finalYear.equity : 0,
    totalCashFlow,
    averageAnnualCashFlow: totalCashFlow / years,
    roi: totalInvestment > 0 ? totalReturn / totalInvestment : 0,
    irr: portfolioIrr,
    npv: npv(resolved.discount_rate, cashFlows),
    diversificationScore: score,
    concentration,
    riskAdjustedReturn,
  };

  return {
    params: resolved,
    metrics,
    properties,
    yearly,
    cashFlows,
    charts: {
      propertyComparison: properties.map((p) => ({
        name: p.name,
        irr: p.irr,
        npv: p.npv,
        cashFlow: p.averageAnnualCashFlow,
      })),
      allocation: properties.map((p) => ({
        name: p.name,
        value: p.purchasePrice,
        share: totalPurchasePrice > 0 ? p.purchasePrice / totalPurchasePrice : 0,
      })),
      riskMetrics: { diversificationScore: score, concentration, riskAdjustedReturn },
    },
    errors,
    warnings,
  };
}

import { irr, npv } from "../../core/math-utils.js";
import { getExitStrategy, EXIT_STRATEGIES } from "../../strategies/exit-strategies.js";
import type { SimulationContext } from "../../types/context.js";
import { checkNumber, isRecord } from "../../types/guards.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";
import type { SimulationSummary } from "../../types/results.js";

export interface ReturnsModuleOutputs {
  strategyLabel: string;
  summary: SimulationSummary;
  cashFlows: number[];
}

type ReturnsModuleResult = ModuleResult<ReturnsModuleOutputs>;

export class ReturnsModule implements Module<ReturnsModuleOutputs> {
  readonly name = "returns";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = ["financing", "operating", "projection"];

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];
    if (!isRecord(inputs)) {
      errors.push({ path: "params", message: "params must be an object" });
      return { valid: false, errors };
    }

    const strategy = inputs.strategy;
    if (strategy !== undefined && (typeof strategy !== "string" || !getExitStrategy(strategy))) {
      errors.push({
        path: "params.strategy",
        message: `strategy must be one of: ${Array.from(EXIT_STRATEGIES.keys()).join(", ")}`,
      });
    }
    checkNumber(errors, inputs, "discount_rate", { exclusiveMin: -1 }, "params");
    checkNumber(errors, inputs, "selling_cost_rate", { min: 0, max: 1 }, "params");

    return { valid: errors.length === 0, errors };
  }

  compute(context: SimulationContext): ReturnsModuleResult {
    const financing = context.outputs.financing;
    const operating = context.outputs.operating;
    const projection = context.outputs.projection;
    if (!financing || !operating || !projection) {
      return {
        success: false,
        errors: ["ProjectionModule must be computed before ReturnsModule"],
      };
    }

    const { assumptions } = context;
    const strategy = getExitStrategy(assumptions.strategy);
    if (!strategy) {
      return { success: false, errors: [`Unknown exit strategy: ${assumptions.strategy}`] };
    }

    const yearly = projection.yearlyResults;
    const finalYear = yearly[yearly.length - 1];
    if (!finalYear) {
      return { success: false, errors: ["Projection produced no yearly results"] };
    }

    const totalInvestment = projection.totalCashInvested;
    const exit = strategy.exitProceeds(finalYear, assumptions);
    const totalCashFlow = yearly.reduce((sum, row) => sum + row.netCashFlow, 0);
    const totalReturn = totalCashFlow + exit.netProceeds - totalInvestment;
    const roi = totalInvestment > 0 ? totalReturn / totalInvestment : 0;

    // Year 0 outlay, yearly cash flow, exit proceeds on top of the final year
    const cashFlows = [-totalInvestment, ...yearly.map((row) => row.netCashFlow)];
    cashFlows[cashFlows.length - 1] += exit.netProceeds;

    let internalRate: number | null = null;
    try {
      internalRate = irr(cashFlows);
    } catch (e) {
      context.warnings.push(`IRR could not be computed: ${e instanceof Error ? e.message : String(e)}`);
    }

    const paybackRow = yearly.find((row) => row.cumulativeCashFlow >= totalInvestment);
    const firstYear = yearly[0];
    const purchasePrice = context.inputs.property.purchase_price;

    const summary: SimulationSummary = {
      totalInvestment,
      totalCashFlow,
      finalPropertyValue: finalYear.propertyValue,
      finalEquity: finalYear.equity,
      exit,
      totalReturn,
      roi,
      averageAnnualReturn: roi / yearly.length,
      irr: internalRate,
      npv: npv(assumptions.discountRate, cashFlows),
      discountRate: assumptions.discountRate,
      equityMultiple: totalInvestment > 0 ? (totalCashFlow + exit.netProceeds) / totalInvestment : null,
      averageCashOnCash: yearly.reduce((sum, row) => sum + row.cashOnCashReturn, 0) / yearly.length,
      capRate: purchasePrice > 0 ? operating.noiYear1 / purchasePrice : 0,
      monthlyMortgagePayment: financing.monthlyPayment,
      firstYearMonthlyCashFlow: firstYear.netCashFlow / 12,
      paybackYear: paybackRow ? paybackRow.year : null,
    };

    if (internalRate !== null && internalRate < 0) {
      context.warnings.push("IRR is negative - investment may not be profitable");
    }
    if (firstYear.netCashFlow < 0) {
      context.warnings.push("First-year cash flow is negative");
    }
    if (totalReturn < 0) {
      context.warnings.push("Total return is negative - investment loses money over the horizon");
    }

    const outputs: ReturnsModuleOutputs = { strategyLabel: strategy.label, summary, cashFlows };
    context.outputs.returns = outputs;
    return { success: true, outputs };
  }
}

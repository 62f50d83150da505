import { DateTime } from "luxon";
import { Timeline } from "../core/timeline.js";
import { FinancingModule } from "../modules/financing/financing-module.js";
import { OperatingModule } from "../modules/operating/operating-module.js";
import { ProjectionModule } from "../modules/projection/projection-module.js";
import { ReturnsModule } from "../modules/returns/returns-module.js";
import type { SimulationContext } from "../types/context.js";
import { resolveAssumptions } from "../types/inputs.js";
import type { PropertyFinancialsInput, SimulationInputs, SimulationParamsInput } from "../types/inputs.js";
import type { Module, ValidationError } from "../types/module.js";
import type { SimulationReport } from "../types/results.js";
import { validateSimulationRequest } from "../validate/validate.js";
import { SimulationError } from "./errors.js";

export interface RoiEngineResult {
  success: boolean;
  report?: SimulationReport;
  errors?: string[];
  warnings: string[];
}

export interface RoiEngineValidation {
  valid: boolean;
  errors: ValidationError[];
}

export interface RoiEngineOptions {
  now?: () => DateTime;
}

export class RoiEngine {
  private readonly modules: Module[];
  private readonly now: () => DateTime;

  constructor(options: RoiEngineOptions = {}) {
    // Execution order
    this.modules = [
      new FinancingModule(),
      new OperatingModule(),
      new ProjectionModule(),
      new ReturnsModule(),
    ];
    this.now = options.now ?? (() => DateTime.utc());
  }

  /**
   * Validate the request against the contract, then each module's inputs
   */
  validateAll(inputs: SimulationInputs): RoiEngineValidation {
    const schema = validateSimulationRequest(inputs);
    if (!schema.valid) {
      return {
        valid: false,
        errors: schema.errors.map((message) => ({ path: "request", message })),
      };
    }

    const allErrors: ValidationError[] = [];
    for (const module of this.modules) {
      const validation = module.validate(this.getModuleInputs(inputs, module.name));
      if (!validation.valid) {
        allErrors.push(...validation.errors);
      }
    }

    return {
      valid: allErrors.length === 0,
      errors: allErrors,
    };
  }

  async run(inputs: SimulationInputs): Promise<RoiEngineResult> {
    const validation = this.validateAll(inputs);
    if (!validation.valid) {
      return {
        success: false,
        errors: validation.errors.map((e) => `${e.path}: ${e.message}`),
        warnings: [],
      };
    }

    const startDate = inputs.params.start_date ?? this.now().startOf("month").toISODate() ?? "";
    let timeline: Timeline;
    try {
      timeline = new Timeline({ startDate, years: inputs.params.years });
    } catch (e) {
      return {
        success: false,
        errors: [`Failed to create timeline: ${e instanceof Error ? e.message : String(e)}`],
        warnings: [],
      };
    }

    const context: SimulationContext = {
      timeline,
      inputs,
      assumptions: resolveAssumptions(inputs),
      outputs: {},
      warnings: [],
    };

    for (const module of this.modules) {
      try {
        const result = module.compute(context);
        if (!result.success) {
          return {
            success: false,
            errors: result.errors ?? [`Module ${module.name} failed`],
            warnings: context.warnings,
          };
        }
      } catch (e) {
        return {
          success: false,
          errors: [`Module ${module.name} threw: ${e instanceof Error ? e.message : String(e)}`],
          warnings: context.warnings,
        };
      }
    }

    const projection = context.outputs.projection;
    const returns = context.outputs.returns;
    if (!projection || !returns) {
      return { success: false, errors: ["Simulation produced no results"], warnings: context.warnings };
    }

    return {
      success: true,
      report: {
        strategy: context.assumptions.strategy,
        strategyLabel: returns.strategyLabel,
        years: timeline.years,
        startDate: timeline.startDate.toISODate() ?? startDate,
        summary: returns.summary,
        yearlyResults: projection.yearlyResults,
        cashFlows: returns.cashFlows,
        generatedAt: this.now().toISO() ?? "",
      },
      warnings: context.warnings,
    };
  }

  private getModuleInputs(inputs: SimulationInputs, moduleName: string): unknown {
    switch (moduleName) {
      case "financing":
      case "operating":
      case "projection":
        return inputs.property;
      case "returns":
        return inputs.params;
      default:
        return undefined;
    }
  }
}

/**
 * Run one property through the engine, throwing when the inputs are rejected
 */
export async function runPropertySimulation(
  property: PropertyFinancialsInput,
  params: SimulationParamsInput,
  engine: RoiEngine = new RoiEngine(),
): Promise<SimulationReport> {
  const result = await engine.run({ property, params });
  if (!result.success || !result.report) {
    throw new SimulationError("Simulation failed", result.errors ?? []);
  }
  return result.report;
}

/**
 * Create a text summary from engine results
 */
export function createSummaryReport(result: RoiEngineResult, title = "PROPERTY"): string {
  if (!result.success || !result.report) {
    return `Simulation Failed:\n${result.errors?.join("\n") ?? "Unknown error"}`;
  }

  const report = result.report;
  const s = report.summary;
  const money = (value: number) =>
    `${value < 0 ? "-" : ""}$${Math.abs(Math.round(value)).toLocaleString("en-US")}`;
  const pct = (value: number | null) => (value === null ? "n/a" : `${(value * 100).toFixed(2)}%`);

  const lines: string[] = [
    "=".repeat(60),
    `SIMULATION SUMMARY: ${title}`,
    "=".repeat(60),
    "",
    "STRATEGY",
    `  ${report.strategyLabel} over ${report.years} years from ${report.startDate}`,
    "",
    "INVESTMENT",
    `  Total Cash Invested: ${money(s.totalInvestment)}`,
    `  Monthly Mortgage: ${money(s.monthlyMortgagePayment)}`,
    `  Cap Rate (Year 1): ${pct(s.capRate)}`,
    "",
    "CASH FLOW",
    `  Year 1 Monthly: ${money(s.firstYearMonthlyCashFlow)}`,
    `  Total: ${money(s.totalCashFlow)}`,
    `  Avg Cash-on-Cash: ${pct(s.averageCashOnCash)}`,
    "",
    "EXIT",
    `  Property Value: ${money(s.finalPropertyValue)}`,
    `  Net Proceeds: ${money(s.exit.netProceeds)}`,
    "",
    "RETURNS",
    `  Total Return: ${money(s.totalReturn)}`,
    `  ROI: ${pct(s.roi)}`,
    `  IRR: ${pct(s.irr)}`,
    `  NPV @ ${pct(s.discountRate)}: ${money(s.npv)}`,
  ];

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push("WARNINGS");
    for (const warning of result.warnings) {
      lines.push(`  ! ${warning}`);
    }
  }

  lines.push("");
  lines.push("=".repeat(60));

  return lines.join("\n");
}

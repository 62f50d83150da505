import { growthFactor } from "../../core/math-utils.js";
import type { SimulationContext } from "../../types/context.js";
import { checkNumber, isRecord } from "../../types/guards.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";
import type { YearlyResult } from "../../types/results.js";

export interface ProjectionModuleOutputs {
  yearlyResults: YearlyResult[];
  totalCashInvested: number;
}

type ProjectionModuleResult = ModuleResult<ProjectionModuleOutputs>;

export class ProjectionModule implements Module<ProjectionModuleOutputs> {
  readonly name = "projection";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = ["financing", "operating"];

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];
    if (!isRecord(inputs)) {
      errors.push({ path: "property", message: "property must be an object" });
      return { valid: false, errors };
    }
    checkNumber(errors, inputs, "property_appreciation", { exclusiveMin: -1 }, "property");
    return { valid: errors.length === 0, errors };
  }

  compute(context: SimulationContext): ProjectionModuleResult {
    const financing = context.outputs.financing;
    const operating = context.outputs.operating;
    if (!financing || !operating) {
      return {
        success: false,
        errors: ["FinancingModule and OperatingModule must be computed before ProjectionModule"],
      };
    }

    const { property } = context.inputs;
    const { timeline, assumptions } = context;
    const totalCashInvested = property.down_payment + assumptions.closingCosts;
    const balance = financing.schedule.balance;

    const yearlyResults: YearlyResult[] = [];
    let cumulativeCashFlow = 0;

    for (let year = 1; year <= timeline.years; year += 1) {
      const index = year - 1;
      const firstMonth = timeline.firstMonthOf(year);
      const beginningBalance = firstMonth === 0 ? financing.loanAmount : balance.get(firstMonth - 1);
      const endingBalance = balance.get(firstMonth + 11);

      const noi = operating.netOperatingIncome[index] ?? 0;
      const debtService = financing.annualDebtService[index] ?? 0;
      const netCashFlow = noi - debtService;
      cumulativeCashFlow += netCashFlow;

      const propertyValue = property.purchase_price * growthFactor(assumptions.appreciation, year);

      yearlyResults.push({
        year,
        periodStart: timeline.yearStart(year).toISODate() ?? "",
        periodEnd: timeline.yearEnd(year).toISODate() ?? "",
        beginningBalance,
        monthlyRent: operating.monthlyRent[index] ?? 0,
        grossRentalIncome: operating.grossRentalIncome[index] ?? 0,
        vacancyLoss: operating.vacancyLoss[index] ?? 0,
        totalRentalIncome: operating.effectiveIncome[index] ?? 0,
        operatingExpenses: operating.operatingExpenses[index] ?? 0,
        netOperatingIncome: noi,
        mortgagePayment: debtService,
        principalPayment: financing.annualPrincipal[index] ?? 0,
        interestPayment: financing.annualInterest[index] ?? 0,
        netCashFlow,
        cumulativeCashFlow,
        propertyValue,
        equity: propertyValue - endingBalance,
        debtBalance: endingBalance,
        cashOnCashReturn: totalCashInvested > 0 ? netCashFlow / totalCashInvested : 0,
        capRate: propertyValue > 0 ? noi / propertyValue : 0,
      });
    }

    const outputs: ProjectionModuleOutputs = { yearlyResults, totalCashInvested };
    context.outputs.projection = outputs;
    return { success: true, outputs };
  }
}

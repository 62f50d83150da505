import { growthFactor } from "../../core/math-utils.js";
import type { SimulationContext } from "../../types/context.js";
import { checkNumber, isRecord } from "../../types/guards.js";
import { EXPENSE_FIELDS, totalMonthlyExpenses } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export interface OperatingModuleOutputs {
  monthlyRent: number[];
  grossRentalIncome: number[];
  vacancyLoss: number[];
  effectiveIncome: number[];
  monthlyExpenses: number[];
  operatingExpenses: number[];
  netOperatingIncome: number[];
  noiYear1: number;
}

type OperatingModuleResult = ModuleResult<OperatingModuleOutputs>;

export class OperatingModule implements Module<OperatingModuleOutputs> {
  readonly name = "operating";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = [];

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];
    if (!isRecord(inputs)) {
      errors.push({ path: "property", message: "property must be an object" });
      return { valid: false, errors };
    }

    checkNumber(errors, inputs, "monthly_rent", { required: true, min: 0 }, "property");
    checkNumber(errors, inputs, "vacancy_rate", { min: 0, max: 1 }, "property");
    checkNumber(errors, inputs, "annual_rent_increase", { exclusiveMin: -1 }, "property");
    checkNumber(errors, inputs, "annual_expense_increase", { exclusiveMin: -1 }, "property");
    for (const field of EXPENSE_FIELDS) {
      checkNumber(errors, inputs, field, { min: 0 }, "property");
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: SimulationContext): OperatingModuleResult {
    const { property } = context.inputs;
    const { rentGrowth, expenseGrowth, vacancyRate } = context.assumptions;
    const years = context.timeline.years;
    const baseExpenses = totalMonthlyExpenses(property);

    const monthlyRent: number[] = [];
    const grossRentalIncome: number[] = [];
    const vacancyLoss: number[] = [];
    const effectiveIncome: number[] = [];
    const monthlyExpenses: number[] = [];
    const operatingExpenses: number[] = [];
    const netOperatingIncome: number[] = [];

    for (let year = 1; year <= years; year += 1) {
      const rent = property.monthly_rent * growthFactor(rentGrowth, year - 1);
      const gross = rent * 12;
      const vacancy = gross * vacancyRate;
      const expenses = baseExpenses * growthFactor(expenseGrowth, year - 1);

      monthlyRent.push(rent);
      grossRentalIncome.push(gross);
      vacancyLoss.push(vacancy);
      effectiveIncome.push(gross - vacancy);
      monthlyExpenses.push(expenses);
      operatingExpenses.push(expenses * 12);
      netOperatingIncome.push(gross - vacancy - expenses * 12);
    }

    if (baseExpenses === 0) {
      context.warnings.push("No operating expenses provided - NOI may be overstated");
    }

    const outputs: OperatingModuleOutputs = {
      monthlyRent,
      grossRentalIncome,
      vacancyLoss,
      effectiveIncome,
      monthlyExpenses,
      operatingExpenses,
      netOperatingIncome,
      noiYear1: netOperatingIncome[0] ?? 0,
    };

    context.outputs.operating = outputs;
    return { success: true, outputs };
  }
}

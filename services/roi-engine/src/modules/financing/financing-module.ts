import { amortize, AmortizationSchedule } from "../../core/amortization.js";
import { mortgagePayment } from "../../core/math-utils.js";
import { MAX_ANALYSIS_YEARS } from "../../core/timeline.js";
import type { SimulationContext } from "../../types/context.js";
import { checkNumber, isRecord } from "../../types/guards.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export interface FinancingModuleOutputs {
  loanAmount: number;
  annualRate: number;
  termYears: number;
  monthlyPayment: number;
  schedule: AmortizationSchedule;
  annualInterest: number[];
  annualPrincipal: number[];
  annualDebtService: number[];
}

type FinancingModuleResult = ModuleResult<FinancingModuleOutputs>;

export class FinancingModule implements Module<FinancingModuleOutputs> {
  readonly name = "financing";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = [];

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];
    if (!isRecord(inputs)) {
      errors.push({ path: "property", message: "property must be an object" });
      return { valid: false, errors };
    }

    const price = checkNumber(errors, inputs, "purchase_price", { required: true, exclusiveMin: 0 }, "property");
    const down = checkNumber(errors, inputs, "down_payment", { required: true, min: 0 }, "property");
    checkNumber(errors, inputs, "loan_amount", { required: true, min: 0 }, "property");
    checkNumber(errors, inputs, "interest_rate", { required: true, min: 0, max: 1 }, "property");
    checkNumber(
      errors,
      inputs,
      "loan_term_years",
      { required: true, integer: true, min: 1, max: MAX_ANALYSIS_YEARS },
      "property",
    );
    checkNumber(errors, inputs, "closing_costs", { min: 0 }, "property");

    if (price !== undefined && down !== undefined && down > price) {
      errors.push({ path: "property.down_payment", message: "down_payment cannot exceed purchase_price" });
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: SimulationContext): FinancingModuleResult {
    const property = context.inputs.property;
    const timeline = context.timeline;

    const loanAmount = property.loan_amount;
    const monthlyPayment = mortgagePayment(loanAmount, property.interest_rate, property.loan_term_years);

    let schedule: AmortizationSchedule;
    try {
      schedule = amortize({
        principal: loanAmount,
        monthlyRate: property.interest_rate / 12,
        payment: monthlyPayment,
        months: timeline.totalMonths,
      });
    } catch (e) {
      return {
        success: false,
        errors: [`Amortization failed: ${e instanceof Error ? e.message : String(e)}`],
      };
    }

    if (Math.abs(loanAmount - (property.purchase_price - property.down_payment)) > 0.01) {
      context.warnings.push("Loan amount does not equal purchase price minus down payment");
    }

    const outputs: FinancingModuleOutputs = {
      loanAmount,
      annualRate: property.interest_rate,
      termYears: property.loan_term_years,
      monthlyPayment,
      schedule,
      annualInterest: schedule.interest.annualize(),
      annualPrincipal: schedule.principal.annualize(),
      annualDebtService: schedule.payment.annualize(),
    };

    context.outputs.financing = outputs;
    return { success: true, outputs };
  }
}

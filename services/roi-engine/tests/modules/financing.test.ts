import { describe, it, expect } from "vitest";
import { FinancingModule } from "../../src/modules/financing/financing-module";
import { Timeline } from "../../src/core/timeline";
import { SimulationContext } from "../../src/types/context";
import { PropertyFinancialsInput, SimulationInputs, resolveAssumptions } from "../../src/types/inputs";

const baseProperty: PropertyFinancialsInput = {
  purchase_price: 200000,
  down_payment: 40000,
  loan_amount: 160000,
  interest_rate: 0.06,
  loan_term_years: 30,
  closing_costs: 5000,
  monthly_rent: 1800,
  property_taxes: 200,
  insurance: 100,
  maintenance_reserve: 100,
};

function createTestContext(inputs: SimulationInputs): SimulationContext {
  return {
    timeline: new Timeline({ startDate: inputs.params.start_date ?? "2026-01-01", years: inputs.params.years }),
    inputs,
    assumptions: resolveAssumptions(inputs),
    outputs: {},
    warnings: [],
  };
}

describe("FinancingModule", () => {
  const module = new FinancingModule();

  describe("validation", () => {
    it("validates valid inputs", () => {
      const result = module.validate(baseProperty);
      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it("rejects a non-object", () => {
      const result = module.validate(null);
      expect(result.valid).toBe(false);
      expect(result.errors[0]).toEqual({ path: "property", message: "property must be an object" });
    });

    it("rejects a non-positive purchase price", () => {
      const result = module.validate({ ...baseProperty, purchase_price: 0 });
      expect(result.valid).toBe(false);
      expect(result.errors).toContainEqual({
        path: "property.purchase_price",
        message: "purchase_price must be greater than 0",
      });
    });

    it("rejects an interest rate above 1", () => {
      const result = module.validate({ ...baseProperty, interest_rate: 6 });
      expect(result.errors).toContainEqual({
        path: "property.interest_rate",
        message: "interest_rate must be less than or equal to 1",
      });
    });

    it("rejects a fractional loan term", () => {
      const result = module.validate({ ...baseProperty, loan_term_years: 29.5 });
      expect(result.errors).toContainEqual({
        path: "property.loan_term_years",
        message: "loan_term_years must be an integer",
      });
    });

    it("rejects a down payment above the price", () => {
      const result = module.validate({ ...baseProperty, down_payment: 250000 });
      expect(result.errors).toContainEqual({
        path: "property.down_payment",
        message: "down_payment cannot exceed purchase_price",
      });
    });

    it("reports missing required fields", () => {
      const { loan_amount: _omitted, ...rest } = baseProperty;
      const result = module.validate(rest);
      expect(result.errors).toContainEqual({ path: "property.loan_amount", message: "loan_amount is required" });
    });
  });

  describe("compute", () => {
    it("computes the payment and yearly debt service", () => {
      const context = createTestContext({ property: baseProperty, params: { years: 5 } });
      const result = module.compute(context);

      expect(result.success).toBe(true);
      const outputs = result.outputs;
      expect(outputs?.monthlyPayment).toBe(959.28);
      expect(outputs?.annualDebtService[0]).toBeCloseTo(11511.36, 6);
      expect(outputs?.annualInterest[0]).toBeCloseTo(9546.551625244501, 6);
      expect(outputs?.annualPrincipal[0]).toBeCloseTo(1964.8083747554974, 6);
      expect(outputs?.annualDebtService).toHaveLength(5);
      expect(context.outputs.financing).toBe(outputs);
      expect(context.warnings).toHaveLength(0);
    });

    it("stops debt service after the loan is paid off", () => {
      const property = { ...baseProperty, loan_term_years: 2 };
      const context = createTestContext({ property, params: { years: 4 } });
      const result = module.compute(context);

      expect(result.outputs?.annualDebtService[2]).toBe(0);
      expect(result.outputs?.annualDebtService[3]).toBe(0);
      expect(result.outputs?.schedule.payoffMonth).toBe(23);
    });

    it("produces no debt service for an all-cash purchase", () => {
      const property = { ...baseProperty, down_payment: 200000, loan_amount: 0 };
      const context = createTestContext({ property, params: { years: 3 } });
      const result = module.compute(context);

      expect(result.outputs?.monthlyPayment).toBe(0);
      expect(result.outputs?.annualDebtService).toEqual([0, 0, 0]);
    });

    it("warns when the loan does not match price minus down payment", () => {
      const property = { ...baseProperty, loan_amount: 150000 };
      const context = createTestContext({ property, params: { years: 1 } });
      module.compute(context);

      expect(context.warnings).toContain("Loan amount does not equal purchase price minus down payment");
    });
  });
});

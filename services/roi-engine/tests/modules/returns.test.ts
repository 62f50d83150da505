import { describe, it, expect } from "vitest";
import { FinancingModule } from "../../src/modules/financing/financing-module";
import { OperatingModule } from "../../src/modules/operating/operating-module";
import { ProjectionModule } from "../../src/modules/projection/projection-module";
import { ReturnsModule } from "../../src/modules/returns/returns-module";
import { Timeline } from "../../src/core/timeline";
import { SimulationContext } from "../../src/types/context";
import {
  PropertyFinancialsInput,
  SimulationInputs,
  SimulationParamsInput,
  resolveAssumptions,
} from "../../src/types/inputs";

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

function runThrough(property: PropertyFinancialsInput, params: SimulationParamsInput): SimulationContext {
  const inputs: SimulationInputs = { property, params };
  const context: SimulationContext = {
    timeline: new Timeline({ startDate: "2026-01-01", years: params.years }),
    inputs,
    assumptions: resolveAssumptions(inputs),
    outputs: {},
    warnings: [],
  };
  new FinancingModule().compute(context);
  new OperatingModule().compute(context);
  new ProjectionModule().compute(context);
  return context;
}

describe("ReturnsModule", () => {
  const module = new ReturnsModule();

  describe("validation", () => {
    it("accepts the known strategies", () => {
      expect(module.validate({ years: 5, strategy: "hold" }).valid).toBe(true);
      expect(module.validate({ years: 5, strategy: "sell" }).valid).toBe(true);
    });

    it("rejects an unknown strategy", () => {
      const result = module.validate({ years: 5, strategy: "refinance" });
      expect(result.errors).toContainEqual({
        path: "params.strategy",
        message: "strategy must be one of: hold, sell",
      });
    });

    it("rejects a selling cost rate above 1", () => {
      expect(module.validate({ years: 5, selling_cost_rate: 2 }).valid).toBe(false);
    });
  });

  describe("compute", () => {
    it("summarizes a hold over five years", () => {
      const context = runThrough(baseProperty, { years: 5 });
      const result = module.compute(context);

      expect(result.success).toBe(true);
      const summary = result.outputs?.summary;
      expect(result.outputs?.strategyLabel).toBe("Buy and Hold");
      expect(summary?.totalInvestment).toBe(45000);
      expect(summary?.totalCashFlow).toBeCloseTo(26407.2740532, 4);
      expect(summary?.exit.sellingCosts).toBe(0);
      expect(summary?.exit.netProceeds).toBeCloseTo(82967.78531961111, 6);
      expect(summary?.totalReturn).toBeCloseTo(64375.05937281111, 4);
      expect(summary?.roi).toBeCloseTo(1.430556874951358, 8);
      expect(summary?.averageAnnualReturn).toBeCloseTo(1.430556874951358 / 5, 8);
      expect(summary?.irr).toBeCloseTo(0.2213437173361329, 6);
      expect(summary?.npv).toBeCloseTo(32220.065567527778, 3);
      expect(summary?.equityMultiple).toBeCloseTo(2.430556874951358, 8);
      expect(summary?.averageCashOnCash).toBeCloseTo(0.11736566245866667, 8);
      expect(summary?.capRate).toBeCloseTo(0.0786, 10);
      expect(summary?.monthlyMortgagePayment).toBe(959.28);
      expect(summary?.firstYearMonthlyCashFlow).toBeCloseTo(350.72, 6);
      expect(summary?.paybackYear).toBeNull();
    });

    it("puts the investment at year 0 and exit proceeds in the final year", () => {
      const context = runThrough(baseProperty, { years: 5 });
      const flows = module.compute(context).outputs?.cashFlows ?? [];

      expect(flows).toHaveLength(6);
      expect(flows[0]).toBe(-45000);
      expect(flows[1]).toBeCloseTo(4208.64, 6);
      expect(flows[5]).toBeCloseTo(89356.19173281112, 4);
    });

    it("deducts selling costs for a sale", () => {
      const context = runThrough(baseProperty, { years: 5, strategy: "sell" });
      const summary = module.compute(context).outputs?.summary;

      expect(summary?.exit.sellingCosts).toBeCloseTo(231854.81486 * 0.06, 3);
      expect(summary?.exit.netProceeds).toBeCloseTo(69056.4964280111, 4);
      expect(summary?.irr).toBeCloseTo(0.1869771883350554, 6);
      expect(summary?.npv).toBeCloseTo(22752.27609882251, 3);
    });

    it("warns when first-year cash flow is negative", () => {
      const property = { ...baseProperty, monthly_rent: 1200 };
      const context = runThrough(property, { years: 5 });
      module.compute(context);

      expect(context.warnings).toContain("First-year cash flow is negative");
    });

    it("returns a null IRR with a warning when no rate solves", () => {
      // Every flow is an outflow once exit proceeds are wiped out by the loan
      const property: PropertyFinancialsInput = {
        ...baseProperty,
        monthly_rent: 0,
        property_taxes: 0,
        insurance: 0,
        maintenance_reserve: 0,
      };
      const context = runThrough(property, { years: 1, appreciation: -0.9 });
      const summary = module.compute(context).outputs?.summary;

      expect(summary?.irr).toBeNull();
      expect(context.warnings).toContain(
        "IRR could not be computed: cashflows must include at least one positive and one negative value",
      );
      expect(context.warnings).toContain("Total return is negative - investment loses money over the horizon");
    });

    it("requires the projection", () => {
      const inputs: SimulationInputs = { property: baseProperty, params: { years: 1 } };
      const context: SimulationContext = {
        timeline: new Timeline({ startDate: "2026-01-01", years: 1 }),
        inputs,
        assumptions: resolveAssumptions(inputs),
        outputs: {},
        warnings: [],
      };
      const result = module.compute(context);
      expect(result.success).toBe(false);
      expect(result.errors).toEqual(["ProjectionModule must be computed before ReturnsModule"]);
    });
  });
});

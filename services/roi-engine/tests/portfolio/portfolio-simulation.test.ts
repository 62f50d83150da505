import { describe, expect, it } from "vitest";

import { SimulationError } from "../../src/engine/errors";
import {
  diversificationScore,
  normalizedConcentration,
  PortfolioEntry,
  runPortfolioSimulation,
} from "../../src/portfolio/portfolio-simulation";

const entries: PortfolioEntry[] = [
  {
    id: "p-1",
    name: "Maple Street",
    propertyType: "single_family",
    property: {
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
    },
  },
  {
    id: "p-2",
    name: "Cedar Court",
    property: {
      purchase_price: 100000,
      down_payment: 25000,
      loan_amount: 75000,
      interest_rate: 0.05,
      loan_term_years: 30,
      closing_costs: 2000,
      monthly_rent: 1100,
      property_taxes: 150,
      insurance: 75,
      property_management: 75,
    },
  },
];

describe("normalizedConcentration", () => {
  it("is 0 for an even split and 1 for a single asset", () => {
    expect(normalizedConcentration([100, 100, 100, 100])).toBeCloseTo(0, 12);
    expect(normalizedConcentration([100])).toBe(1);
    expect(normalizedConcentration([])).toBe(1);
  });

  it("rescales the Herfindahl index", () => {
    expect(normalizedConcentration([200000, 100000])).toBeCloseTo(1 / 9, 12);
  });
});

describe("diversificationScore", () => {
  it("is 0 for fewer than two properties", () => {
    expect(diversificationScore([500000])).toBe(0);
  });

  it("grows with count and evenness", () => {
    expect(diversificationScore([200000, 100000])).toBeCloseTo(0.2 * (8 / 9), 12);
    expect(diversificationScore(Array.from({ length: 12 }, () => 1))).toBeCloseTo(1, 12);
  });
});

describe("runPortfolioSimulation", () => {
  it("aggregates property cash flows into one vector", async () => {
    const result = await runPortfolioSimulation(entries, { years: 3, start_date: "2026-01-01" });

    expect(result.params.years).toBe(3);
    expect(result.params.expense_growth).toBe(0.025);
    expect(result.params.appreciation).toBe(0.04);
    expect(result.errors).toEqual([]);

    expect(result.cashFlows).toHaveLength(4);
    expect(result.cashFlows[0]).toBe(-72000);
    expect(result.cashFlows[1]).toBeCloseTo(8317.2, 6);
    expect(result.cashFlows[2]).toBeCloseTo(9099, 6);
    expect(result.cashFlows[3]).toBeCloseTo(122122.40939584021, 4);

    expect(result.yearly[0]?.propertyValue).toBeCloseTo(312000, 6);
    expect(result.yearly[1]?.cumulativeCashFlow).toBeCloseTo(17416.2, 6);
    expect(result.yearly[2]?.equity).toBeCloseTo(112217.10539584022, 4);
  });

  it("computes portfolio metrics", async () => {
    const { metrics } = await runPortfolioSimulation(entries, { years: 3, start_date: "2026-01-01" });

    expect(metrics.propertyCount).toBe(2);
    expect(metrics.totalInvestment).toBe(72000);
    expect(metrics.totalPurchasePrice).toBe(300000);
    expect(metrics.projectedValue).toBeCloseTo(337459.2, 6);
    expect(metrics.totalCashFlow).toBeCloseTo(27321.504, 6);
    expect(metrics.averageAnnualCashFlow).toBeCloseTo(27321.504 / 3, 6);
    expect(metrics.roi).toBeCloseTo(0.9380362416088918, 8);
    expect(metrics.irr).toBeCloseTo(0.26877098227450136, 6);
    expect(metrics.npv).toBeCloseTo(40446.74296651948, 3);
    expect(metrics.concentration).toBeCloseTo(1 / 9, 12);
    expect(metrics.diversificationScore).toBeCloseTo(0.2 * (8 / 9), 12);
    expect(metrics.riskAdjustedReturn).toBeCloseTo(1.5918065484966757, 5);
  });

  it("builds chart data", async () => {
    const { charts } = await runPortfolioSimulation(entries, { years: 3, start_date: "2026-01-01" });

    expect(charts.allocation).toEqual([
      { name: "Maple Street", value: 200000, share: 200000 / 300000 },
      { name: "Cedar Court", value: 100000, share: 100000 / 300000 },
    ]);
    expect(charts.propertyComparison.map((p) => p.name)).toEqual(["Maple Street", "Cedar Court"]);
  });

  it("keeps going when one property fails", async () => {
    const broken: PortfolioEntry = {
      id: "p-3",
      name: "Broken",
      property: { ...entries[1].property, down_payment: 150000 },
    };
    const result = await runPortfolioSimulation([entries[0], broken], { years: 3, start_date: "2026-01-01" });

    expect(result.properties.map((p) => p.id)).toEqual(["p-1"]);
    expect(result.errors).toEqual([
      { id: "p-3", name: "Broken", message: "property.down_payment: down_payment cannot exceed purchase_price" },
    ]);
    expect(result.metrics.concentration).toBe(1);
    expect(result.metrics.diversificationScore).toBe(0);
  });

  it("rejects an empty portfolio", async () => {
    await expect(runPortfolioSimulation([])).rejects.toThrow("Portfolio has no properties to simulate");
  });

  it("throws when no property can be simulated", async () => {
    const broken: PortfolioEntry = { ...entries[1], property: { ...entries[1].property, purchase_price: 0 } };

    await expect(runPortfolioSimulation([broken], { years: 3 })).rejects.toBeInstanceOf(SimulationError);
  });
});

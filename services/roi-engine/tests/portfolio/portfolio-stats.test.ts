import { describe, expect, it } from "vitest";

import { calculatePortfolioStats } from "../../src/portfolio/portfolio-stats";
import { PropertyFinancialsInput } from "../../src/types/inputs";

const first: PropertyFinancialsInput = {
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

const second: PropertyFinancialsInput = {
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
};

describe("calculatePortfolioStats", () => {
  it("returns zeros for an empty portfolio", () => {
    const stats = calculatePortfolioStats([]);
    expect(stats.totalProperties).toBe(0);
    expect(stats.annualCashFlow).toBe(0);
    expect(stats.averageCapRate).toBe(0);
  });

  it("sums and averages across properties", () => {
    const stats = calculatePortfolioStats([first, second]);

    expect(stats.totalProperties).toBe(2);
    expect(stats.totalPurchasePrice).toBe(300000);
    expect(stats.totalCashInvested).toBe(72000);
    expect(stats.totalEquity).toBe(65000);
    expect(stats.totalMonthlyRent).toBe(2900);
    expect(stats.totalMonthlyExpenses).toBe(700);
    expect(stats.totalMonthlyMortgage).toBeCloseTo(1361.9, 8);
    expect(stats.monthlyCashFlow).toBeCloseTo(693.1, 8);
    expect(stats.annualCashFlow).toBeCloseTo(8317.2, 8);
    expect(stats.averageCapRate).toBeCloseTo((0.0786 + 0.0894) / 2, 10);
    expect(stats.averageCashOnCash).toBeCloseTo((4208.64 / 45000 + 4108.56 / 27000) / 2, 10);
  });

  it("values equity at the current value when known", () => {
    const stats = calculatePortfolioStats([{ ...first, current_value: 250000 }]);
    expect(stats.totalEquity).toBe(90000);
  });
});

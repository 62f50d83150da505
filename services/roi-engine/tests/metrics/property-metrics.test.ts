import { describe, expect, it } from "vitest";

import {
  calculateAnnualRoi,
  calculateCapRate,
  calculatePropertyMetrics,
  interestOverMonths,
  validateFinancialData,
} from "../../src/metrics/property-metrics";
import { PropertyFinancialsInput } from "../../src/types/inputs";

const property: PropertyFinancialsInput = {
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

describe("property metrics", () => {
  it("computes cap rate from NOI and value", () => {
    expect(calculateCapRate(15720, 200000)).toBeCloseTo(0.0786, 12);
    expect(calculateCapRate(15720, 0)).toBe(0);
  });

  it("computes annual ROI against the investment", () => {
    expect(calculateAnnualRoi(20000, 15000, 50000)).toBeCloseTo(0.1, 12);
    expect(calculateAnnualRoi(20000, 15000, 0)).toBe(0);
  });

  it("computes point-in-time metrics", () => {
    const metrics = calculatePropertyMetrics(property);

    expect(metrics.totalMonthlyExpenses).toBe(400);
    expect(metrics.monthlyMortgagePayment).toBe(959.28);
    expect(metrics.effectiveMonthlyRent).toBeCloseTo(1710, 10);
    expect(metrics.monthlyNoi).toBeCloseTo(1310, 10);
    expect(metrics.monthlyCashFlow).toBeCloseTo(350.72, 8);
    expect(metrics.annualCashFlow).toBeCloseTo(4208.64, 8);
    expect(metrics.totalCashInvested).toBe(45000);
    expect(metrics.cashOnCashReturn).toBeCloseTo(4208.64 / 45000, 10);
    expect(metrics.capRate).toBeCloseTo(0.0786, 10);
    expect(metrics.annualRoi).toBeCloseTo(0.1371877416612333, 8);
    expect(metrics.grossRentMultiplier).toBeCloseTo(9.25925925925926, 10);
    expect(metrics.meetsOnePercentRule).toBe(false);
  });

  it("treats a cash purchase as having no debt", () => {
    const metrics = calculatePropertyMetrics({ ...property, down_payment: 200000, loan_amount: 0, closing_costs: 0 });

    expect(metrics.monthlyMortgagePayment).toBe(0);
    expect(metrics.annualRoi).toBeCloseTo(metrics.capRate, 12);
  });

  it("has no gross rent multiplier without rent", () => {
    expect(calculatePropertyMetrics({ ...property, monthly_rent: 0 }).grossRentMultiplier).toBeNull();
  });

  it("handles a payment that only covers interest", () => {
    const metrics = calculatePropertyMetrics({
      ...property,
      purchase_price: 500000,
      down_payment: 100000,
      loan_amount: 400000,
      interest_rate: 0.3,
      loan_term_years: 50,
    });

    expect(metrics.monthlyMortgagePayment).toBe(10000);
    expect(metrics.annualRoi).toBeCloseTo((1710 * 12 - 400 * 12 - 120000) / 105000, 6);
  });

  it("adds unpaid interest to the balance", () => {
    expect(interestOverMonths(1000, 0.1, 50, 2)).toBeCloseTo(205, 8);
    expect(interestOverMonths(1000, 0.1, 2000, 3)).toBeCloseTo(100, 8);
    expect(interestOverMonths(0, 0.1, 0, 12)).toBe(0);
  });

  it("passes a consistent property", () => {
    expect(validateFinancialData(property, { yearBuilt: 1998, currentYear: 2026 })).toEqual([]);
  });

  it("reports each financing inconsistency", () => {
    const errors = validateFinancialData(
      { ...property, down_payment: 250000, interest_rate: 1.5 },
      { yearBuilt: 2040, currentYear: 2026 },
    );

    expect(errors).toEqual([
      "Down payment cannot exceed purchase price",
      "Loan amount should equal purchase price minus down payment",
      "Interest rate must be between 0 and 1",
      "Year built must be between 1800 and 2031",
    ]);
  });

  it("tolerates a loan off by under a cent", () => {
    expect(validateFinancialData({ ...property, loan_amount: 160000.005 }, { currentYear: 2026 })).toEqual([]);
  });
});

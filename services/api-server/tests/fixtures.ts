import type { SimulationReport, YearlyResult } from "@propyield/roi-engine";
import type { PropertyRecord } from "../src/repositories/types.js";

export const yearOne: YearlyResult = {
  year: 1,
  periodStart: "2026-01-01",
  periodEnd: "2026-12-31",
  beginningBalance: 243000,
  monthlyRent: 2000,
  grossRentalIncome: 24000,
  vacancyLoss: 1200,
  totalRentalIncome: 22800,
  operatingExpenses: 6000,
  netOperatingIncome: 16800,
  mortgagePayment: 12000.4,
  principalPayment: 3000.2,
  interestPayment: 9000.2,
  netCashFlow: 4799.6,
  cumulativeCashFlow: 4799.6,
  propertyValue: 309000,
  equity: 69000,
  debtBalance: 240000,
  cashOnCashReturn: 0.0753,
  capRate: 0.0543689,
};

export function makeReport(): SimulationReport {
  return {
    strategy: "hold",
    strategyLabel: "Buy and Hold",
    years: 1,
    startDate: "2026-01-01",
    summary: {
      totalInvestment: 63000,
      totalCashFlow: 4799.6,
      finalPropertyValue: 309000,
      finalEquity: 69000,
      exit: { grossValue: 309000, sellingCosts: 0, loanPayoff: 240000, netProceeds: 69000 },
      totalReturn: 10799.6,
      roi: 0.1714,
      averageAnnualReturn: 0.1714,
      irr: 0.1714,
      npv: 4240.37,
      discountRate: 0.08,
      equityMultiple: 1.1714,
      averageCashOnCash: 0.0753,
      capRate: 0.0543689,
      monthlyMortgagePayment: 1000.03,
      firstYearMonthlyCashFlow: 399.97,
      paybackYear: null,
    },
    yearlyResults: [yearOne],
    cashFlows: [-63000, 73799.6],
    generatedAt: "2026-10-19T12:00:00.000Z",
  };
}

export function makeProperty(overrides: Partial<PropertyRecord> = {}): PropertyRecord {
  return {
    id: "prop-1",
    owner_id: "user-1",
    name: "Maple Duplex",
    description: null,
    status: "active",
    address: "18 Maple St",
    city: "Columbus",
    state: "OH",
    zip_code: "43004",
    country: "US",
    property_type: "multi_family",
    bedrooms: 4,
    bathrooms: 2,
    square_feet: 1800,
    lot_size: null,
    year_built: 1995,
    security_deposit: 2000,
    purchased_date: null,
    purchase_price: 300000,
    down_payment: 60000,
    loan_amount: 240000,
    interest_rate: 0.06,
    loan_term_years: 30,
    closing_costs: 3000,
    monthly_rent: 2000,
    vacancy_rate: 0.05,
    property_taxes: 300,
    insurance: 100,
    maintenance_reserve: 100,
    created_at: "2026-10-01T00:00:00.000Z",
    updated_at: "2026-10-01T00:00:00.000Z",
    ...overrides,
  };
}

import type { ExitStrategyName } from "./inputs.js";

export interface YearlyResult {
  year: number;
  periodStart: string;
  periodEnd: string;
  beginningBalance: number;
  monthlyRent: number;
  grossRentalIncome: number;
  vacancyLoss: number;
  totalRentalIncome: number;
  operatingExpenses: number;
  netOperatingIncome: number;
  mortgagePayment: number;
  principalPayment: number;
  interestPayment: number;
  netCashFlow: number;
  cumulativeCashFlow: number;
  propertyValue: number;
  equity: number;
  debtBalance: number;
  cashOnCashReturn: number;
  capRate: number;
}

export interface ExitProceeds {
  grossValue: number;
  sellingCosts: number;
  loanPayoff: number;
  netProceeds: number;
}

export interface SimulationSummary {
  totalInvestment: number;
  totalCashFlow: number;
  finalPropertyValue: number;
  finalEquity: number;
  exit: ExitProceeds;
  totalReturn: number;
  roi: number;
  averageAnnualReturn: number;
  irr: number | null;
  npv: number;
  discountRate: number;
  equityMultiple: number | null;
  averageCashOnCash: number;
  capRate: number;
  monthlyMortgagePayment: number;
  firstYearMonthlyCashFlow: number;
  paybackYear: number | null;
}

export interface SimulationReport {
  strategy: ExitStrategyName;
  strategyLabel: string;
  years: number;
  startDate: string;
  summary: SimulationSummary;
  yearlyResults: YearlyResult[];
  cashFlows: number[];
  generatedAt: string;
}

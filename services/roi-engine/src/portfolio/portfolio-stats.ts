import { calculatePropertyMetrics } from "../metrics/property-metrics.js";
import type { PropertyFinancialsInput } from "../types/inputs.js";

export interface PortfolioStats {
  totalProperties: number;
  totalPurchasePrice: number;
  totalCashInvested: number;
  totalEquity: number;
  totalMonthlyRent: number;
  totalMonthlyExpenses: number;
  totalMonthlyMortgage: number;
  monthlyCashFlow: number;
  annualCashFlow: number;
  averageCapRate: number;
  averageCashOnCash: number;
}

export function calculatePortfolioStats(properties: readonly PropertyFinancialsInput[]): PortfolioStats {
  const stats: PortfolioStats = {
    totalProperties: properties.length,
    totalPurchasePrice: 0,
    totalCashInvested: 0,
    totalEquity: 0,
    totalMonthlyRent: 0,
    totalMonthlyExpenses: 0,
    totalMonthlyMortgage: 0,
    monthlyCashFlow: 0,
    annualCashFlow: 0,
    averageCapRate: 0,
    averageCashOnCash: 0,
  };
  if (properties.length === 0) {
    return stats;
  }

  let capRateTotal = 0;
  let cashOnCashTotal = 0;

  for (const property of properties) {
    const metrics = calculatePropertyMetrics(property);
    const value = property.current_value ?? property.purchase_price;

    stats.totalPurchasePrice += property.purchase_price;
    stats.totalCashInvested += metrics.totalCashInvested;
    stats.totalEquity += value - property.loan_amount;
    stats.totalMonthlyRent += property.monthly_rent;
    stats.totalMonthlyExpenses += metrics.totalMonthlyExpenses;
    stats.totalMonthlyMortgage += metrics.monthlyMortgagePayment;
    stats.monthlyCashFlow += metrics.monthlyCashFlow;
    capRateTotal += metrics.capRate;
    cashOnCashTotal += metrics.cashOnCashReturn;
  }

  stats.annualCashFlow = stats.monthlyCashFlow * 12;
  stats.averageCapRate = capRateTotal / properties.length;
  stats.averageCashOnCash = cashOnCashTotal / properties.length;
  return stats;
}

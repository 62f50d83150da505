import { mortgagePayment } from "../core/math-utils.js";
import { PROPERTY_DEFAULTS, totalMonthlyExpenses } from "../types/inputs.js";
import type { PropertyFinancialsInput } from "../types/inputs.js";

export interface PropertyMetrics {
  totalMonthlyExpenses: number;
  monthlyMortgagePayment: number;
  effectiveMonthlyRent: number;
  monthlyNoi: number;
  monthlyCashFlow: number;
  annualCashFlow: number;
  totalCashInvested: number;
  cashOnCashReturn: number;
  capRate: number;
  annualRoi: number;
  grossRentMultiplier: number | null;
  meetsOnePercentRule: boolean;
}

export interface FinancialCheckOptions {
  yearBuilt?: number | null;
  currentYear: number;
}

export function calculateCapRate(netOperatingIncome: number, propertyValue: number): number {
  return propertyValue > 0 ? netOperatingIncome / propertyValue : 0;
}

export function calculateAnnualRoi(
  annualIncome: number,
  annualExpenses: number,
  initialInvestment: number,
): number {
  return initialInvestment > 0 ? (annualIncome - annualExpenses) / initialInvestment : 0;
}

/**
 * Interest accrued over the first `months` payments. Unlike `amortize` this
 * tolerates a payment that does not cover interest: the shortfall is added to
 * the balance.
 */
export function interestOverMonths(principal: number, monthlyRate: number, payment: number, months: number): number {
  let balance = principal;
  let total = 0;
  for (let m = 0; m < months && balance > 0; m += 1) {
    const interest = balance * monthlyRate;
    total += interest;
    balance = Math.max(0, balance + interest - payment);
  }
  return total;
}

/**
 * Point-in-time metrics for a property as purchased (no growth applied).
 */
export function calculatePropertyMetrics(property: PropertyFinancialsInput): PropertyMetrics {
  const expenses = totalMonthlyExpenses(property);
  const payment = mortgagePayment(property.loan_amount, property.interest_rate, property.loan_term_years);
  const vacancy = property.vacancy_rate ?? PROPERTY_DEFAULTS.vacancy_rate;
  const effectiveMonthlyRent = property.monthly_rent * (1 - vacancy);
  const monthlyNoi = effectiveMonthlyRent - expenses;
  const monthlyCashFlow = monthlyNoi - payment;
  const annualCashFlow = monthlyCashFlow * 12;
  const totalCashInvested = property.down_payment + (property.closing_costs ?? PROPERTY_DEFAULTS.closing_costs);
  const annualRent = property.monthly_rent * 12;
  // Principal paid down counts toward return; only interest is an expense
  const firstYearInterest = interestOverMonths(property.loan_amount, property.interest_rate / 12, payment, 12);

  return {
    totalMonthlyExpenses: expenses,
    monthlyMortgagePayment: payment,
    effectiveMonthlyRent,
    monthlyNoi,
    monthlyCashFlow,
    annualCashFlow,
    totalCashInvested,
    cashOnCashReturn: totalCashInvested > 0 ? annualCashFlow / totalCashInvested : 0,
    capRate: calculateCapRate(monthlyNoi * 12, property.purchase_price),
    annualRoi: calculateAnnualRoi(effectiveMonthlyRent * 12, expenses * 12 + firstYearInterest, totalCashInvested),
    grossRentMultiplier: annualRent > 0 ? property.purchase_price / annualRent : null,
    meetsOnePercentRule: property.monthly_rent >= property.purchase_price * 0.01,
  };
}

/**
 * Cross-field checks on a property's financing. Returns human-readable problems.
 */
export function validateFinancialData(
  property: PropertyFinancialsInput,
  options: FinancialCheckOptions,
): string[] {
  const errors: string[] = [];

  if (property.down_payment > property.purchase_price) {
    errors.push("Down payment cannot exceed purchase price");
  }

  const expectedLoan = property.purchase_price - property.down_payment;
  if (Math.abs(property.loan_amount - expectedLoan) > 0.01) {
    errors.push("Loan amount should equal purchase price minus down payment");
  }

  if (property.interest_rate < 0 || property.interest_rate > 1) {
    errors.push("Interest rate must be between 0 and 1");
  }

  const maxYear = options.currentYear + 5;
  if (options.yearBuilt !== undefined && options.yearBuilt !== null) {
    if (options.yearBuilt < 1800 || options.yearBuilt > maxYear) {
      errors.push(`Year built must be between 1800 and ${maxYear}`);
    }
  }

  return errors;
}

import { Series } from "./series.js";

export interface AmortizationConfig {
  principal: number;
  monthlyRate: number;
  payment: number;
  months: number;
}

export interface AmortizationSchedule {
  interest: Series;
  principal: Series;
  payment: Series;
  balance: Series; // ending balance of each month
  payoffMonth: number | null; // 0-based month in which the balance reaches zero
}

export function amortize(config: AmortizationConfig): AmortizationSchedule {
  const { principal, monthlyRate, payment, months } = config;
  if (!Number.isInteger(months) || months < 0) {
    throw new RangeError("months must be a non-negative integer");
  }
  if (!Number.isFinite(principal) || principal < 0) {
    throw new RangeError("principal must be a non-negative number");
  }
  if (!Number.isFinite(monthlyRate) || monthlyRate < 0) {
    throw new RangeError("monthlyRate must be a non-negative number");
  }

  const interest = new Array<number>(months).fill(0);
  const principalPaid = new Array<number>(months).fill(0);
  const balances = new Array<number>(months).fill(0);

  if (principal > 0 && payment <= principal * monthlyRate) {
    throw new RangeError("payment does not cover the first month's interest");
  }

  let balance = principal;
  let payoffMonth: number | null = null;

  for (let m = 0; m < months; m += 1) {
    if (balance <= 0) {
      break;
    }

    const monthInterest = balance * monthlyRate;
    const monthPrincipal = Math.min(payment - monthInterest, balance);

    interest[m] = monthInterest;
    principalPaid[m] = monthPrincipal;
    balance -= monthPrincipal;
    if (balance < 0.005) {
      balance = 0;
      payoffMonth = m;
    }
    balances[m] = balance;
  }

  const interestSeries = new Series(interest);
  const principalSeries = new Series(principalPaid);

  return {
    interest: interestSeries,
    principal: principalSeries,
    payment: interestSeries.add(principalSeries),
    balance: new Series(balances),
    payoffMonth,
  };
}

const IRR_TOLERANCE = 1e-10;
const LOWEST_RATE = -0.999999999999;
const NEWTON_STEPS = 50;
const BISECTION_STEPS = 200;
const BRACKET_WIDENINGS = 60;

interface Discounted {
  value: number; // present value at the rate
  slope: number; // d(value)/d(rate)
}

function requireFinite(value: number, name: string): void {
  if (!Number.isFinite(value)) {
    throw new TypeError(`${name} must be a finite number`);
  }
}

function requireRate(rate: number, name: string): void {
  requireFinite(rate, name);
  if (rate <= -1) {
    throw new RangeError(`${name} must be greater than -1`);
  }
}

function checkCashflows(cashflows: readonly number[]): void {
  cashflows.forEach((amount, period) => requireFinite(amount, `cashflows[${period}]`));
}

// Period 0 is undiscounted
function discount(cashflows: readonly number[], rate: number): Discounted {
  const base = 1 + rate;
  let factor = 1;
  let value = 0;
  let slope = 0;
  cashflows.forEach((amount, period) => {
    value += amount * factor;
    slope -= (period * amount * factor) / base;
    factor /= base;
  });
  return { value, slope };
}

function newtonRate(cashflows: readonly number[], guess: number): number | null {
  let rate = guess;
  for (let step = 0; step < NEWTON_STEPS; step += 1) {
    const { value, slope } = discount(cashflows, rate);
    if (Math.abs(value) < IRR_TOLERANCE) {
      return rate;
    }
    if (!Number.isFinite(slope) || slope === 0) {
      return null;
    }
    const next = rate - value / slope;
    if (!Number.isFinite(next) || next <= -1) {
      return null;
    }
    if (Math.abs(next - rate) < IRR_TOLERANCE) {
      return next;
    }
    rate = next;
  }
  return null;
}

function bisectRate(cashflows: readonly number[], guess: number): number {
  const valueAt = (rate: number) => discount(cashflows, rate).value;

  let low = LOWEST_RATE;
  let high = Math.max(guess, 0.1);
  const lowSign = Math.sign(valueAt(low));
  if (Number.isNaN(lowSign)) {
    throw new Error("IRR could not be bracketed");
  }

  for (let widened = 0; Math.sign(valueAt(high)) === lowSign; widened += 1) {
    if (widened === BRACKET_WIDENINGS) {
      throw new Error("IRR could not be bracketed");
    }
    high = high < 1 ? 1 : high * 2;
  }

  for (let step = 0; step < BISECTION_STEPS; step += 1) {
    const mid = (low + high) / 2;
    const value = valueAt(mid);
    if (Math.abs(value) < IRR_TOLERANCE) {
      return mid;
    }
    if (Math.sign(value) === lowSign) {
      low = mid;
    } else {
      high = mid;
    }
  }
  return (low + high) / 2;
}

/**
 * Level payment per period for a loan of `pv`, with the spreadsheet sign
 * convention: money received is positive, so a loan's payment is negative.
 * `type` 1 pays at the start of each period.
 */
export function pmt(rate: number, nper: number, pv: number, fv = 0, type: 0 | 1 = 0): number {
  requireFinite(pv, "pv");
  requireFinite(fv, "fv");
  if (!Number.isInteger(nper) || nper <= 0) {
    throw new RangeError("nper must be a positive integer");
  }
  requireRate(rate, "rate");

  if (rate === 0) {
    return -(pv + fv) / nper;
  }
  const compound = Math.pow(1 + rate, nper);
  const annuityFactor = ((compound - 1) / rate) * (1 + rate * type);
  return -(pv * compound + fv) / annuityFactor;
}

/**
 * Rate at which the cash flows' present value is zero. Starts with Newton's
 * method from `guess` and falls back to bisection when that diverges.
 */
export function irr(cashflows: readonly number[], guess = 0.1): number {
  if (cashflows.length < 2) {
    throw new TypeError("cashflows must be an array with at least 2 entries");
  }
  checkCashflows(cashflows);
  requireFinite(guess, "guess");
  if (!cashflows.some((amount) => amount > 0) || !cashflows.some((amount) => amount < 0)) {
    throw new Error("cashflows must include at least one positive and one negative value");
  }

  return newtonRate(cashflows, guess) ?? bisectRate(cashflows, guess);
}

export function npv(rate: number, cashflows: readonly number[]): number {
  requireRate(rate, "rate");
  checkCashflows(cashflows);
  return discount(cashflows, rate).value;
}

// Half away from zero
export function roundCurrency(value: number): number {
  requireFinite(value, "value");
  const cents = Math.round(Math.abs(value) * 100 + Number.EPSILON);
  return (Math.sign(value) * cents) / 100 || 0;
}

/**
 * Fixed-rate monthly mortgage payment, rounded to the cent.
 * The monthly rate is the nominal annual rate divided by 12.
 */
export function mortgagePayment(principal: number, annualRate: number, termYears: number): number {
  requireFinite(principal, "principal");
  requireFinite(annualRate, "annualRate");
  if (!Number.isInteger(termYears) || termYears <= 0) {
    throw new RangeError("termYears must be a positive integer");
  }
  if (principal <= 0) {
    return 0;
  }

  const months = termYears * 12;
  const monthlyRate = annualRate / 12;
  if (monthlyRate === 0) {
    return roundCurrency(principal / months);
  }
  return roundCurrency(-pmt(monthlyRate, months, principal));
}

// (1 + rate)^periods
export function growthFactor(rate: number, periods: number): number {
  requireRate(rate, "rate");
  return Math.pow(1 + rate, periods);
}

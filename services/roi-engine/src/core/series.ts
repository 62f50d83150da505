const MONTHS_PER_YEAR = 12;

/**
 * Frozen month-by-month values of a loan schedule. Yearly figures come from
 * {@link Series.annualize}; a trailing partial year is summed as-is.
 */
export class Series {
  readonly values: readonly number[];

  constructor(values: readonly number[]) {
    values.forEach((value, month) => {
      if (!Number.isFinite(value)) {
        throw new TypeError(`values[${month}] must be a finite number`);
      }
    });
    this.values = Object.freeze([...values]);
  }

  static of(values: readonly number[]): Series {
    return new Series(values);
  }

  get length(): number {
    return this.values.length;
  }

  get(month: number): number {
    const value = Number.isInteger(month) ? this.values[month] : undefined;
    if (value === undefined) {
      throw new RangeError(`month ${month} is outside 0..${Math.max(0, this.length - 1)}`);
    }
    return value;
  }

  add(other: Series): Series {
    if (other.length !== this.length) {
      throw new Error(`Series length mismatch: ${this.length} vs ${other.length}`);
    }
    return new Series(this.values.map((value, month) => value + other.get(month)));
  }

  sum(): number {
    return this.values.reduce((total, value) => total + value, 0);
  }

  annualize(): number[] {
    const totals: number[] = [];
    this.values.forEach((value, month) => {
      const year = Math.floor(month / MONTHS_PER_YEAR);
      totals[year] = (totals[year] ?? 0) + value;
    });
    return totals;
  }

  toArray(): number[] {
    return [...this.values];
  }
}

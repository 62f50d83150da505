import { DateTime } from "luxon";

export const MAX_ANALYSIS_YEARS = 50;

export interface TimelineConfig {
  startDate: string; // ISO date string (e.g., '2026-01-01')
  years: number; // Analysis horizon in whole years
}

export class Timeline {
  readonly startDate: DateTime;
  readonly years: number;
  readonly endDate: DateTime;

  constructor(config: TimelineConfig) {
    if (!Number.isInteger(config.years) || config.years <= 0 || config.years > MAX_ANALYSIS_YEARS) {
      throw new Error(`years must be an integer between 1 and ${MAX_ANALYSIS_YEARS}`);
    }

    const startDate = DateTime.fromISO(config.startDate, { zone: "utc" }).startOf("month");
    if (!startDate.isValid) {
      throw new Error(`Invalid startDate: ${config.startDate}`);
    }

    this.startDate = startDate;
    this.years = config.years;
    this.endDate = this.startDate.plus({ years: this.years });
  }

  get totalMonths(): number {
    return this.years * 12;
  }

  // First month index (0-based) of a 1-based analysis year
  firstMonthOf(year: number): number {
    this.assertYear(year);
    return (year - 1) * 12;
  }

  yearStart(year: number): DateTime {
    this.assertYear(year);
    return this.startDate.plus({ years: year - 1 });
  }

  yearEnd(year: number): DateTime {
    this.assertYear(year);
    return this.startDate.plus({ years: year }).minus({ days: 1 });
  }

  yearEndingLabels(): string[] {
    return Array.from({ length: this.years }, (_, i) => {
      const end = this.yearEnd(i + 1).setLocale("en-US");
      return `${end.toFormat("LLL")} '${end.toFormat("yy")}`;
    });
  }

  private assertYear(year: number): void {
    if (!Number.isInteger(year) || year < 1 || year > this.years) {
      throw new RangeError(`year must be between 1 and ${this.years}`);
    }
  }
}

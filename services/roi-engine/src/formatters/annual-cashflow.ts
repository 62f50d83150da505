/**
 * Annual Cash Flow Formatter
 *
 * Lays a simulation report out as a year-by-year proforma table.
 */

import { Timeline } from "../core/timeline.js";
import type { SimulationReport, YearlyResult } from "../types/results.js";

export interface AnnualCashFlowRow {
  label: string;
  values: (string | number | null)[];
  isHeader?: boolean;
  isSubtotal?: boolean;
  isTotal?: boolean;
  format?: "currency" | "percent" | "text";
  indent?: number;
}

export interface AnnualCashFlowTable {
  years: number[];
  yearLabels: string[];
  yearEnding: string[];
  rows: AnnualCashFlowRow[];
}

/**
 * Formats a number as whole-dollar currency
 */
export function formatCurrency(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  const formatted = Math.abs(value).toLocaleString("en-US", {
    style: "currency",
    currency: "USD",
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  });
  return value < 0 ? `-${formatted}` : formatted;
}

/**
 * Formats a decimal ratio as a percentage string
 */
export function formatPercent(value: number | null | undefined, digits = 1): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "-";
  return `${(value * 100).toFixed(digits)}%`;
}

function blankRow(count: number): AnnualCashFlowRow {
  return { label: "", values: Array.from({ length: count }, () => null) };
}

function headerRow(label: string, count: number): AnnualCashFlowRow {
  return { label, values: Array.from({ length: count }, () => null), isHeader: true };
}

export function generateAnnualCashFlow(report: SimulationReport): AnnualCashFlowTable {
  const timeline = new Timeline({ startDate: report.startDate, years: report.years });
  const rowsByYear = report.yearlyResults;
  const count = rowsByYear.length;

  const years = rowsByYear.map((row) => row.year);
  const yearLabels = years.map((y) => `Year ${y}`);
  const yearEnding = timeline.yearEndingLabels();

  const pick = (fn: (row: YearlyResult) => number) => rowsByYear.map(fn);

  const rows: AnnualCashFlowRow[] = [
    { label: "Year Ending", values: yearEnding, format: "text" },
    blankRow(count),

    headerRow("Income", count),
    { label: "Gross Potential Rent", values: pick((r) => r.grossRentalIncome), format: "currency", indent: 1 },
    { label: "Vacancy", values: pick((r) => -r.vacancyLoss), format: "currency", indent: 1 },
    {
      label: "Effective Gross Income",
      values: pick((r) => r.totalRentalIncome),
      format: "currency",
      isSubtotal: true,
    },
    blankRow(count),

    headerRow("Expense", count),
    { label: "Operating Expenses", values: pick((r) => r.operatingExpenses), format: "currency", indent: 1 },
    {
      label: "Opex Ratio",
      values: pick((r) => (r.totalRentalIncome > 0 ? r.operatingExpenses / r.totalRentalIncome : 0)),
      format: "percent",
      indent: 1,
    },
    { label: "Net Operating Income", values: pick((r) => r.netOperatingIncome), format: "currency", isTotal: true },
    blankRow(count),

    headerRow("Debt Service", count),
    { label: "Interest", values: pick((r) => r.interestPayment), format: "currency", indent: 1 },
    { label: "Principal", values: pick((r) => r.principalPayment), format: "currency", indent: 1 },
    { label: "Total Debt Service", values: pick((r) => r.mortgagePayment), format: "currency", isSubtotal: true },
    blankRow(count),

    headerRow("Cash Flow", count),
    { label: "Net Cash Flow", values: pick((r) => r.netCashFlow), format: "currency", isTotal: true },
    { label: "Cumulative Cash Flow", values: pick((r) => r.cumulativeCashFlow), format: "currency" },
    { label: "Cash-on-Cash", values: pick((r) => r.cashOnCashReturn), format: "percent" },
    blankRow(count),

    headerRow("Value & Equity", count),
    { label: "Property Value", values: pick((r) => r.propertyValue), format: "currency", indent: 1 },
    { label: "Loan Balance", values: pick((r) => r.debtBalance), format: "currency", indent: 1 },
    { label: "Equity", values: pick((r) => r.equity), format: "currency", isSubtotal: true },
  ];

  return { years, yearLabels, yearEnding, rows };
}

/**
 * Converts the annual cash flow table to a formatted string for display
 */
export function formatAnnualCashFlowAsText(table: AnnualCashFlowTable): string {
  const colWidth = 15;
  const labelWidth = 30;
  const width = labelWidth + table.yearLabels.length * colWidth;

  let output = "".padEnd(labelWidth) + table.yearLabels.map((l) => l.padStart(colWidth)).join("") + "\n";
  output += "=".repeat(width) + "\n";

  for (const row of table.rows) {
    if (row.label === "") {
      output += "\n";
      continue;
    }

    const label = "  ".repeat(row.indent ?? 0) + row.label;

    if (row.isHeader) {
      output += `${label.toUpperCase()}\n`;
      output += "-".repeat(width) + "\n";
      continue;
    }

    const formattedValues = row.values.map((v) => {
      if (v === null) return "-";
      if (typeof v === "string") return v;
      if (row.format === "currency") return formatCurrency(v);
      if (row.format === "percent") return formatPercent(v);
      return String(v);
    });

    output += label.padEnd(labelWidth) + formattedValues.map((v) => v.padStart(colWidth)).join("") + "\n";
    if (row.isTotal) {
      output += "=".repeat(width) + "\n";
    } else if (row.isSubtotal) {
      output += "-".repeat(width) + "\n";
    }
  }

  return output;
}

function toKey(label: string): string {
  return label.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
}

/**
 * Converts the annual cash flow table to a JSON-friendly format for API responses
 */
export function formatAnnualCashFlowAsJson(table: AnnualCashFlowTable): Record<string, unknown> {
  const sections: Record<string, Record<string, Record<string, string | number | null>>> = {};
  let currentSection = "summary";

  for (const row of table.rows) {
    if (row.isHeader && row.label) {
      currentSection = toKey(row.label);
      sections[currentSection] = {};
      continue;
    }
    if (!row.label) {
      continue;
    }

    const values: Record<string, string | number | null> = {};
    table.yearLabels.forEach((yearLabel, i) => {
      values[yearLabel] = row.values[i] ?? null;
    });

    const section = sections[currentSection] ?? {};
    section[toKey(row.label)] = values;
    sections[currentSection] = section;
  }

  return {
    years: table.years,
    year_labels: table.yearLabels,
    year_ending: table.yearEnding,
    sections,
  };
}

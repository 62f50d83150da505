import { roundCurrency } from "@propyield/roi-engine";
import type { SimulationReport } from "@propyield/roi-engine";

export function escapeCSV(value: unknown): string {
  const str = String(value ?? "");
  if (str.includes(",") || str.includes('"') || str.includes("\n") || str.includes("\r")) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function toCsv(columns: readonly string[], rows: readonly Record<string, unknown>[]): string {
  const lines = [columns.map(escapeCSV).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCSV(row[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

const money = (value: number) => roundCurrency(value);
const ratio = (value: number) => Number(value.toFixed(6));

export const SIMULATION_CSV_COLUMNS = [
  "year",
  "period_start",
  "period_end",
  "monthly_rent",
  "gross_rental_income",
  "vacancy_loss",
  "effective_income",
  "operating_expenses",
  "net_operating_income",
  "debt_service",
  "interest",
  "principal",
  "net_cash_flow",
  "cumulative_cash_flow",
  "property_value",
  "loan_balance",
  "equity",
  "cash_on_cash",
  "cap_rate",
] as const;

// One row per analysis year
export function simulationToCsv(report: SimulationReport): string {
  const rows = report.yearlyResults.map((r) => ({
    year: r.year,
    period_start: r.periodStart,
    period_end: r.periodEnd,
    monthly_rent: money(r.monthlyRent),
    gross_rental_income: money(r.grossRentalIncome),
    vacancy_loss: money(r.vacancyLoss),
    effective_income: money(r.totalRentalIncome),
    operating_expenses: money(r.operatingExpenses),
    net_operating_income: money(r.netOperatingIncome),
    debt_service: money(r.mortgagePayment),
    interest: money(r.interestPayment),
    principal: money(r.principalPayment),
    net_cash_flow: money(r.netCashFlow),
    cumulative_cash_flow: money(r.cumulativeCashFlow),
    property_value: money(r.propertyValue),
    loan_balance: money(r.debtBalance),
    equity: money(r.equity),
    cash_on_cash: ratio(r.cashOnCashReturn),
    cap_rate: ratio(r.capRate),
  }));
  return toCsv(SIMULATION_CSV_COLUMNS, rows);
}

export interface PortfolioCsvRow {
  id: string;
  name: string;
  property_type: string;
  status: string;
  purchase_price: number;
  current_value: number;
  monthly_rent: number;
  monthly_expenses: number;
  monthly_mortgage: number;
  monthly_cash_flow: number;
  cap_rate: number;
  cash_on_cash: number;
  annual_roi: number;
}

export const PORTFOLIO_CSV_COLUMNS: readonly (keyof PortfolioCsvRow)[] = [
  "id",
  "name",
  "property_type",
  "status",
  "purchase_price",
  "current_value",
  "monthly_rent",
  "monthly_expenses",
  "monthly_mortgage",
  "monthly_cash_flow",
  "cap_rate",
  "cash_on_cash",
  "annual_roi",
];

export function portfolioToCsv(rows: readonly PortfolioCsvRow[]): string {
  return toCsv(
    PORTFOLIO_CSV_COLUMNS,
    rows.map((row) => ({
      ...row,
      purchase_price: money(row.purchase_price),
      current_value: money(row.current_value),
      monthly_rent: money(row.monthly_rent),
      monthly_expenses: money(row.monthly_expenses),
      monthly_mortgage: money(row.monthly_mortgage),
      monthly_cash_flow: money(row.monthly_cash_flow),
      cap_rate: ratio(row.cap_rate),
      cash_on_cash: ratio(row.cash_on_cash),
      annual_roi: ratio(row.annual_roi),
    })),
  );
}

/**
 * Rows may carry different fields; the header is the sorted union and
 * missing cells are left blank.
 */
export function comparisonToCsv(rows: readonly Record<string, unknown>[]): string {
  const fields = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      fields.add(key);
    }
  }
  return toCsv(Array.from(fields).sort(), rows);
}

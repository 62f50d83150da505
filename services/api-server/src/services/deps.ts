import type { DateTime } from "luxon";
import type { PropertyFinancialsInput, RoiEngine } from "@propyield/roi-engine";
import { EXPENSE_FIELDS } from "@propyield/roi-engine";
import type { PerformanceWatcher } from "../alerts/performance-watcher.js";
import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { PropertyRepository, SimulationRepository } from "../repositories/types.js";

export interface ServiceDeps {
  config: AppConfig;
  logger: Logger;
  properties: PropertyRepository;
  simulations: SimulationRepository;
  watcher: PerformanceWatcher;
  engine: RoiEngine;
  now: () => DateTime;
}

export function timestamp(deps: Pick<ServiceDeps, "now">): string {
  return deps.now().toUTC().toISO() ?? "";
}

/**
 * Strips a stored property down to the fields the engine accepts.
 */
export function toFinancials(record: PropertyFinancialsInput): PropertyFinancialsInput {
  const financials: PropertyFinancialsInput = {
    purchase_price: record.purchase_price,
    down_payment: record.down_payment,
    loan_amount: record.loan_amount,
    interest_rate: record.interest_rate,
    loan_term_years: record.loan_term_years,
    closing_costs: record.closing_costs,
    monthly_rent: record.monthly_rent,
    vacancy_rate: record.vacancy_rate,
    annual_rent_increase: record.annual_rent_increase,
    annual_expense_increase: record.annual_expense_increase,
    property_appreciation: record.property_appreciation,
  };
  if (record.current_value !== undefined) {
    financials.current_value = record.current_value;
  }
  for (const field of EXPENSE_FIELDS) {
    financials[field] = record[field] ?? 0;
  }
  return financials;
}

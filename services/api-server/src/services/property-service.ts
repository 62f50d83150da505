import {
  EXPENSE_FIELDS,
  PROPERTY_DEFAULTS,
  calculatePropertyMetrics,
  validateFinancialData,
} from "@propyield/roi-engine";
import type { MonthlyExpensesInput, PropertyMetrics } from "@propyield/roi-engine";
import { BadRequestError, NotFoundError } from "../errors.js";
import type { NewPropertyRecord, PropertyFilters, PropertyRecord } from "../repositories/types.js";
import type { PropertyCreateInput, PropertyUpdateInput } from "../schemas.js";
import { timestamp, toFinancials } from "./deps.js";
import type { ServiceDeps } from "./deps.js";

export const CREATE_DEFAULTS = {
  down_payment_percent: 0.2,
  interest_rate: 0.045,
  loan_term_years: 30,
  country: "US",
} as const;

export interface PropertyView extends PropertyRecord {
  metrics: PropertyMetrics;
}

export function withMetrics(record: PropertyRecord): PropertyView {
  return { ...record, metrics: calculatePropertyMetrics(toFinancials(record)) };
}

export class PropertyService {
  constructor(private readonly deps: Pick<ServiceDeps, "properties" | "simulations" | "logger" | "now">) {}

  async create(ownerId: string, input: PropertyCreateInput): Promise<PropertyView> {
    const price = input.purchase_price;
    const downPayment = input.down_payment ?? price * CREATE_DEFAULTS.down_payment_percent;

    const expenses: MonthlyExpensesInput = {};
    for (const field of EXPENSE_FIELDS) {
      expenses[field] = input[field] ?? 0;
    }

    const record: NewPropertyRecord = {
      owner_id: ownerId,
      name: input.name,
      description: input.description ?? null,
      status: input.status ?? "active",
      address: input.address,
      city: input.city ?? null,
      state: input.state ?? null,
      zip_code: input.zip_code ?? null,
      country: input.country ?? CREATE_DEFAULTS.country,
      property_type: input.property_type ?? "single_family",
      bedrooms: input.bedrooms ?? null,
      bathrooms: input.bathrooms ?? null,
      square_feet: input.square_feet ?? null,
      lot_size: input.lot_size ?? null,
      year_built: input.year_built ?? null,
      security_deposit: input.security_deposit ?? null,
      purchased_date: input.purchased_date ?? null,
      purchase_price: price,
      down_payment: downPayment,
      loan_amount: input.loan_amount ?? price - downPayment,
      interest_rate: input.interest_rate ?? CREATE_DEFAULTS.interest_rate,
      loan_term_years: input.loan_term_years ?? CREATE_DEFAULTS.loan_term_years,
      closing_costs: input.closing_costs ?? PROPERTY_DEFAULTS.closing_costs,
      monthly_rent: input.monthly_rent,
      vacancy_rate: input.vacancy_rate ?? PROPERTY_DEFAULTS.vacancy_rate,
      annual_rent_increase: input.annual_rent_increase ?? PROPERTY_DEFAULTS.annual_rent_increase,
      annual_expense_increase: input.annual_expense_increase ?? PROPERTY_DEFAULTS.annual_expense_increase,
      property_appreciation: input.property_appreciation ?? PROPERTY_DEFAULTS.property_appreciation,
      ...expenses,
    };
    if (input.current_value !== undefined && input.current_value !== null) {
      record.current_value = input.current_value;
    }

    this.checkFinancials(record);
    const metrics = calculatePropertyMetrics(toFinancials(record));
    const created = await this.deps.properties.create(record, timestamp(this.deps));
    this.deps.logger.info("Property created", { property_id: created.id, owner_id: ownerId });
    return { ...created, metrics };
  }

  async list(ownerId: string, filters: PropertyFilters = {}): Promise<PropertyView[]> {
    const records = await this.deps.properties.listByOwner(ownerId, filters);
    return records.map(withMetrics);
  }

  /**
   * Loads a property owned by the caller. Someone else's property is reported as missing.
   */
  async getRecord(ownerId: string, id: string): Promise<PropertyRecord> {
    const record = await this.deps.properties.findById(id);
    if (!record || record.owner_id !== ownerId) {
      throw new NotFoundError("Property not found");
    }
    return record;
  }

  async get(ownerId: string, id: string): Promise<PropertyView> {
    return withMetrics(await this.getRecord(ownerId, id));
  }

  async update(ownerId: string, id: string, input: PropertyUpdateInput): Promise<PropertyView> {
    const existing = await this.getRecord(ownerId, id);
    const { current_value: currentValue, ...fields } = input;

    // A null current value clears it, so metrics fall back to the purchase price
    const changes: Partial<NewPropertyRecord> = {
      ...fields,
      ...(currentValue === undefined ? {} : { current_value: currentValue ?? undefined }),
    };
    const merged = { ...existing, ...changes };
    this.checkFinancials(merged);
    const metrics = calculatePropertyMetrics(toFinancials(merged));

    const updated = await this.deps.properties.update(id, changes, timestamp(this.deps));
    if (!updated) {
      throw new NotFoundError("Property not found");
    }
    this.deps.logger.info("Property updated", { property_id: id, fields: Object.keys(input) });
    return { ...updated, metrics };
  }

  async delete(ownerId: string, id: string): Promise<void> {
    await this.getRecord(ownerId, id);
    await this.deps.properties.delete(id);
    const removed = await this.deps.simulations.deleteByProperty(id);
    this.deps.logger.info("Property deleted", { property_id: id, simulations_removed: removed });
  }

  private checkFinancials(record: NewPropertyRecord): void {
    const errors = validateFinancialData(toFinancials(record), {
      yearBuilt: record.year_built,
      currentYear: this.deps.now().year,
    });
    if (errors.length > 0) {
      throw new BadRequestError("Invalid financial data", errors);
    }
  }
}

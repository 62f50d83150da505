import type { PropertyFinancialsInput } from "@propyield/roi-engine";
import { TemplateValidationError, UnknownPropertyTypeError } from "./errors.js";
import type { PropertyTemplate, TemplateRules } from "./registry.js";
import { TEMPLATE_REGISTRY } from "./registry.js";

export type TemplateInput = Record<string, unknown>;

export interface PreparedSimulationData {
  templateId: string;
  address: string;
  purchase_price: number;
  monthly_rent: number;
  annual_rent: number | null;
  lease_term: number | null;
  num_units: number;
  down_payment: number | null;
  down_payment_percent: number;
  interest_rate: number;
  loan_term: number;
  property_tax_rate: number;
  insurance_annual: number;
  maintenance_rate: number;
  vacancy_rate: number;
  property_mgmt_rate: number;
  closing_costs: number;
  rehab_costs: number;
  utilities_monthly: number;
  cap_ex_reserve: number;
  tenant_improvements: number;
  rules: TemplateRules;
}

const POSITIVE_FIELDS = ["purchase_price", "monthly_rent", "down_payment"] as const;
const RATE_FIELDS = ["interest_rate", "vacancy_rate", "maintenance_rate", "down_payment_percent"] as const;
const NON_NEGATIVE_FIELDS = [
  "annual_rent",
  "lease_term",
  "property_tax_rate",
  "insurance_annual",
  "property_mgmt_rate",
  "closing_costs",
  "rehab_costs",
  "utilities_monthly",
  "cap_ex_reserve",
  "tenant_improvements",
] as const;

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === "";
}

function numberOrNull(data: TemplateInput, field: string): number | null {
  const value = data[field];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function resolveTemplate(templateId: string): PropertyTemplate {
  const template = TEMPLATE_REGISTRY.get(templateId);
  if (!template) {
    throw new UnknownPropertyTypeError(templateId, Array.from(TEMPLATE_REGISTRY.keys()));
  }
  return template;
}

function validateInput(template: PropertyTemplate, data: TemplateInput): string[] {
  const errors: string[] = [];

  for (const field of template.requiredFields) {
    if (isMissing(data[field])) {
      errors.push(`Missing required field: ${field}`);
    }
  }

  const checkNumeric = (field: string, test: (value: number) => boolean, message: string) => {
    const value = data[field];
    if (isMissing(value)) return;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      errors.push(`${field} must be a number`);
      return;
    }
    if (!test(value)) {
      errors.push(`${field} ${message}`);
    }
  };

  for (const field of POSITIVE_FIELDS) {
    checkNumeric(field, (v) => v > 0, "must be positive");
  }
  for (const field of RATE_FIELDS) {
    checkNumeric(field, (v) => v >= 0 && v <= 1, "must be between 0 and 1");
  }
  for (const field of NON_NEGATIVE_FIELDS) {
    checkNumeric(field, (v) => v >= 0, "must not be negative");
  }
  checkNumeric("loan_term", (v) => Number.isInteger(v) && v >= 1 && v <= 50, "must be an integer between 1 and 50");

  if (!isMissing(data.address) && typeof data.address !== "string") {
    errors.push("address must be a string");
  }
  if (!isMissing(data.triple_net_lease) && typeof data.triple_net_lease !== "boolean") {
    errors.push("triple_net_lease must be a boolean");
  }

  if (template.rules.scale_expenses_by_units) {
    checkNumeric("num_units", (v) => Number.isInteger(v) && v >= 2 && v <= 4, "must be an integer between 2 and 4");
  }

  return errors;
}

/**
 * Validates raw template input and fills every optional field from the
 * template's defaults. Throws UnknownPropertyTypeError or TemplateValidationError.
 */
export function prepareSimulationData(templateId: string, data: TemplateInput): PreparedSimulationData {
  const template = resolveTemplate(templateId);
  const errors = validateInput(template, data);
  if (errors.length > 0) {
    throw new TemplateValidationError(errors);
  }

  const defaults = template.defaults;
  const pick = (field: string, fallback: number) => numberOrNull(data, field) ?? fallback;

  const annualRent = numberOrNull(data, "annual_rent");
  const monthlyRent =
    numberOrNull(data, "monthly_rent") ??
    (template.rules.lease_based_income && annualRent !== null ? annualRent / 12 : null);
  if (monthlyRent === null) {
    throw new TemplateValidationError(["Missing required field: monthly_rent"]);
  }

  return {
    templateId: template.templateId,
    address: typeof data.address === "string" ? data.address : "",
    purchase_price: pick("purchase_price", 0),
    monthly_rent: monthlyRent,
    annual_rent: annualRent,
    lease_term: numberOrNull(data, "lease_term"),
    num_units: pick("num_units", 1),
    down_payment: numberOrNull(data, "down_payment"),
    down_payment_percent: pick("down_payment_percent", defaults.down_payment_percent),
    interest_rate: pick("interest_rate", defaults.interest_rate),
    loan_term: pick("loan_term", defaults.loan_term),
    property_tax_rate: pick("property_tax_rate", defaults.property_tax_rate),
    insurance_annual: pick("insurance_annual", defaults.insurance_annual),
    maintenance_rate: pick("maintenance_rate", defaults.maintenance_rate),
    vacancy_rate: pick("vacancy_rate", defaults.vacancy_rate),
    property_mgmt_rate: pick("property_mgmt_rate", defaults.property_mgmt_rate),
    closing_costs: pick("closing_costs", defaults.closing_costs),
    rehab_costs: pick("rehab_costs", defaults.rehab_costs ?? 0),
    utilities_monthly: pick("utilities_monthly", defaults.utilities_monthly ?? 0),
    cap_ex_reserve: pick("cap_ex_reserve", defaults.cap_ex_reserve ?? 0),
    tenant_improvements: pick("tenant_improvements", defaults.tenant_improvements ?? 0),
    rules:
      template.rules.lease_based_income && typeof data.triple_net_lease === "boolean"
        ? { ...template.rules, triple_net_lease: data.triple_net_lease }
        : template.rules,
  };
}

/**
 * Maps prepared template data onto the engine's property financials.
 */
export function buildSimulationProperty(prepared: PreparedSimulationData): PropertyFinancialsInput {
  const price = prepared.purchase_price;
  const downPayment = prepared.down_payment ?? price * prepared.down_payment_percent;
  const unitFactor = prepared.rules.scale_expenses_by_units ? prepared.num_units : 1;
  // Under a triple-net lease the tenant pays taxes, insurance and maintenance
  const landlordShare = prepared.rules.triple_net_lease ? 0 : 1;

  return {
    purchase_price: price,
    down_payment: downPayment,
    loan_amount: Math.max(0, price - downPayment),
    interest_rate: prepared.interest_rate,
    loan_term_years: prepared.loan_term,
    closing_costs: prepared.closing_costs + prepared.rehab_costs + prepared.tenant_improvements,
    monthly_rent: prepared.monthly_rent,
    vacancy_rate: prepared.vacancy_rate,
    annual_rent_increase: prepared.rules.rent_increase_rate,
    annual_expense_increase: prepared.rules.expense_increase_rate,
    property_appreciation: prepared.rules.appreciation_rate,
    property_taxes: (landlordShare * price * prepared.property_tax_rate) / 12,
    insurance: (landlordShare * prepared.insurance_annual) / 12,
    maintenance_reserve: (landlordShare * price * prepared.maintenance_rate) / 12,
    property_management: prepared.monthly_rent * prepared.property_mgmt_rate,
    utilities: prepared.utilities_monthly * unitFactor,
    other_expenses: (price * prepared.cap_ex_reserve) / 12,
  };
}

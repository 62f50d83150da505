// Wire-format inputs (snake_case, rates as decimals)

export type PropertyType =
  | "single_family"
  | "multi_family"
  | "condo"
  | "townhouse"
  | "commercial"
  | "land";

export type PropertyStatus = "active" | "under_contract" | "sold" | "archived";

export const PROPERTY_TYPES: readonly PropertyType[] = [
  "single_family",
  "multi_family",
  "condo",
  "townhouse",
  "commercial",
  "land",
];

export const PROPERTY_STATUSES: readonly PropertyStatus[] = [
  "active",
  "under_contract",
  "sold",
  "archived",
];

export interface MonthlyExpensesInput {
  property_taxes?: number;
  insurance?: number;
  hoa_fees?: number;
  property_management?: number;
  maintenance_reserve?: number;
  utilities?: number;
  advertising?: number;
  legal_accounting?: number;
  other_expenses?: number;
}

export type ExpenseField = keyof MonthlyExpensesInput;

export const EXPENSE_FIELDS: readonly ExpenseField[] = [
  "property_taxes",
  "insurance",
  "hoa_fees",
  "property_management",
  "maintenance_reserve",
  "utilities",
  "advertising",
  "legal_accounting",
  "other_expenses",
];

export interface PropertyFinancialsInput extends MonthlyExpensesInput {
  purchase_price: number;
  down_payment: number;
  loan_amount: number;
  interest_rate: number;
  loan_term_years: number;
  closing_costs?: number;
  monthly_rent: number;
  vacancy_rate?: number;
  annual_rent_increase?: number;
  annual_expense_increase?: number;
  property_appreciation?: number;
  current_value?: number;
}

export type ExitStrategyName = "hold" | "sell";

export interface SimulationParamsInput {
  years: number;
  strategy?: ExitStrategyName;
  discount_rate?: number;
  selling_cost_rate?: number;
  start_date?: string;
  rent_growth?: number;
  expense_growth?: number;
  appreciation?: number;
  vacancy_rate?: number;
}

export interface SimulationInputs {
  property: PropertyFinancialsInput;
  params: SimulationParamsInput;
}

export const PROPERTY_DEFAULTS = {
  closing_costs: 0,
  vacancy_rate: 0.05,
  annual_rent_increase: 0.03,
  annual_expense_increase: 0.02,
  property_appreciation: 0.03,
} as const;

export const SIMULATION_DEFAULTS = {
  strategy: "hold",
  discount_rate: 0.08,
  selling_cost_rate: 0.06,
} as const;

/** Growth and exit assumptions after defaults and overrides are applied. */
export interface ResolvedAssumptions {
  strategy: ExitStrategyName;
  discountRate: number;
  sellingCostRate: number;
  rentGrowth: number;
  expenseGrowth: number;
  appreciation: number;
  vacancyRate: number;
  closingCosts: number;
}

export function totalMonthlyExpenses(property: MonthlyExpensesInput): number {
  let total = 0;
  for (const field of EXPENSE_FIELDS) {
    total += property[field] ?? 0;
  }
  return total;
}

export function resolveAssumptions(inputs: SimulationInputs): ResolvedAssumptions {
  const { property, params } = inputs;
  return {
    strategy: params.strategy ?? SIMULATION_DEFAULTS.strategy,
    discountRate: params.discount_rate ?? SIMULATION_DEFAULTS.discount_rate,
    sellingCostRate: params.selling_cost_rate ?? SIMULATION_DEFAULTS.selling_cost_rate,
    rentGrowth: params.rent_growth ?? property.annual_rent_increase ?? PROPERTY_DEFAULTS.annual_rent_increase,
    expenseGrowth:
      params.expense_growth ?? property.annual_expense_increase ?? PROPERTY_DEFAULTS.annual_expense_increase,
    appreciation: params.appreciation ?? property.property_appreciation ?? PROPERTY_DEFAULTS.property_appreciation,
    vacancyRate: params.vacancy_rate ?? property.vacancy_rate ?? PROPERTY_DEFAULTS.vacancy_rate,
    closingCosts: property.closing_costs ?? PROPERTY_DEFAULTS.closing_costs,
  };
}

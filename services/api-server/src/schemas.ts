import { DateTime } from "luxon";
import { z } from "zod";
import { PROPERTY_STATUSES, PROPERTY_TYPES } from "@propyield/roi-engine";
import type { PropertyStatus, PropertyType } from "@propyield/roi-engine";

const money = z.number().finite().min(0);
const rate = z.number().finite().min(0).max(1);
const growth = z.number().finite().gt(-1);
const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "must be an ISO date (YYYY-MM-DD)")
  .refine((value) => DateTime.fromISO(value).isValid, "must be a calendar date");

const propertyTypeSchema = z.custom<PropertyType>(
  (value) => typeof value === "string" && PROPERTY_TYPES.some((t) => t === value),
  { message: `must be one of: ${PROPERTY_TYPES.join(", ")}` },
);

const propertyStatusSchema = z.custom<PropertyStatus>(
  (value) => typeof value === "string" && PROPERTY_STATUSES.some((s) => s === value),
  { message: `must be one of: ${PROPERTY_STATUSES.join(", ")}` },
);

const expenseFields = {
  property_taxes: money.optional(),
  insurance: money.optional(),
  hoa_fees: money.optional(),
  property_management: money.optional(),
  maintenance_reserve: money.optional(),
  utilities: money.optional(),
  advertising: money.optional(),
  legal_accounting: money.optional(),
  other_expenses: money.optional(),
};

export const propertyCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().max(2000).nullish(),
  status: propertyStatusSchema.optional(),
  address: z.string().trim().min(1).max(300),
  city: z.string().max(100).nullish(),
  state: z.string().max(50).nullish(),
  zip_code: z.string().max(20).nullish(),
  country: z.string().max(60).optional(),
  property_type: propertyTypeSchema.optional(),
  bedrooms: z.number().int().min(0).nullish(),
  bathrooms: z.number().min(0).nullish(),
  square_feet: z.number().int().min(0).nullish(),
  lot_size: z.number().min(0).nullish(),
  year_built: z.number().int().nullish(),
  security_deposit: money.nullish(),
  purchased_date: isoDate.nullish(),

  purchase_price: z.number().finite().positive(),
  down_payment: money.optional(),
  loan_amount: money.optional(),
  interest_rate: rate.optional(),
  loan_term_years: z.number().int().min(1).max(50).optional(),
  closing_costs: money.optional(),
  monthly_rent: money,
  vacancy_rate: rate.optional(),
  annual_rent_increase: growth.optional(),
  annual_expense_increase: growth.optional(),
  property_appreciation: growth.optional(),
  current_value: money.nullish(),
  ...expenseFields,
});

export type PropertyCreateInput = z.infer<typeof propertyCreateSchema>;

export const propertyUpdateSchema = propertyCreateSchema.partial();
export type PropertyUpdateInput = z.infer<typeof propertyUpdateSchema>;

export const propertyListQuerySchema = z.object({
  status: propertyStatusSchema.optional(),
  property_type: propertyTypeSchema.optional(),
});

export const simulationParamsSchema = z.object({
  years: z.number().int().min(1).max(50).optional(),
  strategy: z.enum(["hold", "sell"]).optional(),
  discount_rate: growth.optional(),
  selling_cost_rate: rate.optional(),
  start_date: isoDate.optional(),
  rent_growth: growth.optional(),
  expense_growth: growth.optional(),
  appreciation: growth.optional(),
  vacancy_rate: rate.optional(),
});

export type SimulationParamsBody = z.infer<typeof simulationParamsSchema>;

export const portfolioSimulateSchema = z.object({
  property_ids: z.array(z.string().min(1)).min(1).optional(),
  params: simulationParamsSchema.omit({ selling_cost_rate: true }).default({}),
});

export const COMPARISON_METRICS = ["irr", "npv", "cash_flow", "cap_rate", "cash_on_cash"] as const;
export type ComparisonMetric = (typeof COMPARISON_METRICS)[number];

export const compareSchema = z.object({
  property_ids: z.array(z.string().min(1)).min(2).max(10),
  metrics: z.array(z.enum(COMPARISON_METRICS)).min(1).default(["irr", "npv", "cash_flow", "cap_rate"]),
});

export type CompareInput = z.infer<typeof compareSchema>;

export const exportQuerySchema = z.object({
  format: z.enum(["csv", "pdf"]).default("csv"),
});

export const alertsQuerySchema = z.object({
  property_id: z.string().min(1).optional(),
});

export const templateListQuerySchema = z.object({
  property_type: z.string().min(1).optional(),
});

export const templateAnalyzeSchema = z.object({
  data: z.record(z.unknown()),
  params: simulationParamsSchema.default({}),
});

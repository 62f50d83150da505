import type { PropertyType } from "@propyield/roi-engine";

// Rates are decimals; *_rate fields on price are annual
export interface TemplateDefaults {
  down_payment_percent: number;
  interest_rate: number;
  loan_term: number;
  property_tax_rate: number;
  insurance_annual: number;
  maintenance_rate: number;
  vacancy_rate: number;
  property_mgmt_rate: number;
  closing_costs: number;
  rehab_costs?: number;
  utilities_monthly?: number;
  cap_ex_reserve?: number;
  tenant_improvements?: number;
}

export interface TemplateRules {
  appreciation_rate: number;
  rent_increase_rate: number;
  expense_increase_rate: number;
  depreciation_years: number;
  scale_expenses_by_units?: boolean;
  lease_based_income?: boolean;
  triple_net_lease?: boolean;
}

export interface PropertyTemplate {
  templateId: string;
  label: string;
  description: string;
  propertyTypes: readonly PropertyType[];
  requiredFields: readonly string[];
  defaults: TemplateDefaults;
  rules: TemplateRules;
  version: string;
}

export const TEMPLATE_REGISTRY: Map<string, PropertyTemplate> = new Map<string, PropertyTemplate>([
  [
    "single_family_rental",
    {
      templateId: "single_family_rental",
      label: "Single-Family Rental",
      description: "Single-family rental property with standard residential investment assumptions",
      propertyTypes: ["single_family", "condo", "townhouse"],
      requiredFields: ["purchase_price", "monthly_rent", "address"],
      defaults: {
        down_payment_percent: 0.2,
        interest_rate: 0.04,
        loan_term: 30,
        property_tax_rate: 0.012,
        insurance_annual: 1200,
        maintenance_rate: 0.01,
        vacancy_rate: 0.05,
        property_mgmt_rate: 0,
        closing_costs: 3000,
        rehab_costs: 0,
      },
      rules: {
        appreciation_rate: 0.03,
        rent_increase_rate: 0.02,
        expense_increase_rate: 0.025,
        depreciation_years: 27.5,
      },
      version: "0.1.0",
    },
  ],
  [
    "multifamily",
    {
      templateId: "multifamily",
      label: "Multifamily (2-4 units)",
      description: "Multifamily property (2-4 units) with higher down payment and management requirements",
      propertyTypes: ["multi_family"],
      requiredFields: ["purchase_price", "monthly_rent", "address", "num_units"],
      defaults: {
        down_payment_percent: 0.25,
        interest_rate: 0.045,
        loan_term: 30,
        property_tax_rate: 0.015,
        insurance_annual: 2000,
        maintenance_rate: 0.015,
        vacancy_rate: 0.07,
        property_mgmt_rate: 0.08,
        closing_costs: 5000,
        rehab_costs: 0,
        utilities_monthly: 200,
      },
      rules: {
        appreciation_rate: 0.035,
        rent_increase_rate: 0.025,
        expense_increase_rate: 0.03,
        depreciation_years: 27.5,
        scale_expenses_by_units: true,
      },
      version: "0.1.0",
    },
  ],
  [
    "commercial",
    {
      templateId: "commercial",
      label: "Commercial",
      description: "Commercial property with longer lease terms and professional management",
      propertyTypes: ["commercial"],
      requiredFields: ["purchase_price", "annual_rent", "address", "lease_term"],
      defaults: {
        down_payment_percent: 0.3,
        interest_rate: 0.05,
        loan_term: 20,
        property_tax_rate: 0.02,
        insurance_annual: 3000,
        maintenance_rate: 0.02,
        vacancy_rate: 0.1,
        property_mgmt_rate: 0.05,
        closing_costs: 8000,
        cap_ex_reserve: 0.005,
        tenant_improvements: 5000,
      },
      rules: {
        appreciation_rate: 0.025,
        rent_increase_rate: 0.03,
        expense_increase_rate: 0.03,
        depreciation_years: 39,
        lease_based_income: true,
        triple_net_lease: false,
      },
      version: "0.1.0",
    },
  ],
]);

export function getTemplate(templateId: string): PropertyTemplate | undefined {
  return TEMPLATE_REGISTRY.get(templateId);
}

export function listTemplates(): PropertyTemplate[] {
  return Array.from(TEMPLATE_REGISTRY.values());
}

// Replaces an existing entry with the same id
export function registerTemplate(template: PropertyTemplate): void {
  TEMPLATE_REGISTRY.set(template.templateId, template);
}

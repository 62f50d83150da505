import type { PropertyType } from "@propyield/roi-engine";
import type { PropertyTemplate } from "./registry.js";
import { getTemplate } from "./registry.js";

export const PROPERTY_TYPE_TEMPLATES: Readonly<Record<PropertyType, string | null>> = {
  single_family: "single_family_rental",
  condo: "single_family_rental",
  townhouse: "single_family_rental",
  multi_family: "multifamily",
  commercial: "commercial",
  land: null,
};

function isPropertyType(value: string): value is PropertyType {
  return Object.prototype.hasOwnProperty.call(PROPERTY_TYPE_TEMPLATES, value);
}

export function routeByPropertyType(
  propertyType: string,
): { templateId: string | null; template: PropertyTemplate | null } {
  if (!isPropertyType(propertyType)) {
    return { templateId: null, template: null };
  }

  const templateId = PROPERTY_TYPE_TEMPLATES[propertyType];
  if (templateId === null) {
    return { templateId: null, template: null };
  }
  return { templateId, template: getTemplate(templateId) ?? null };
}

export function selectTemplate(property: { property_type?: string | null }): PropertyTemplate | null {
  return routeByPropertyType(property.property_type ?? "").template;
}

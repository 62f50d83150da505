import type { ValidationError } from "./module.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface NumberRule {
  required?: boolean;
  integer?: boolean;
  min?: number;
  max?: number;
  exclusiveMin?: number;
}

/**
 * Checks one numeric field of a record and appends a ValidationError on failure.
 * Returns the value when it is a usable number.
 */
export function checkNumber(
  errors: ValidationError[],
  record: Record<string, unknown>,
  field: string,
  rule: NumberRule,
  prefix: string,
): number | undefined {
  const path = `${prefix}.${field}`;
  const value = record[field];

  if (value === undefined || value === null) {
    if (rule.required) {
      errors.push({ path, message: `${field} is required` });
    }
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    errors.push({ path, message: `${field} must be a finite number` });
    return undefined;
  }
  if (rule.integer && !Number.isInteger(value)) {
    errors.push({ path, message: `${field} must be an integer` });
    return undefined;
  }
  if (rule.min !== undefined && value < rule.min) {
    errors.push({ path, message: `${field} must be greater than or equal to ${rule.min}` });
    return undefined;
  }
  if (rule.exclusiveMin !== undefined && value <= rule.exclusiveMin) {
    errors.push({ path, message: `${field} must be greater than ${rule.exclusiveMin}` });
    return undefined;
  }
  if (rule.max !== undefined && value > rule.max) {
    errors.push({ path, message: `${field} must be less than or equal to ${rule.max}` });
    return undefined;
  }
  return value;
}

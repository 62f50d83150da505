import type { SimulationContext } from "./context.js";

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ModuleResult<T> {
  success: boolean;
  outputs?: T;
  errors?: string[];
}

export interface Module<T = unknown> {
  name: string;
  version: string;
  dependencies: readonly string[];
  validate(inputs: unknown): ValidationResult;
  compute(context: SimulationContext): ModuleResult<T>;
}

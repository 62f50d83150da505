import Ajv2020 from "ajv/dist/2020.js";
import type { Schema, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

export interface SchemaValidationResult {
  valid: boolean;
  errors: string[];
}

export const SIMULATION_REQUEST_SCHEMA = "simulation_request_v1.schema.json";

let validator: ValidateFunction | null = null;

export function contractsDir(): string {
  const rootDir = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..");
  return process.env.CONTRACTS_DIR ?? join(rootDir, "contracts");
}

function getValidator(): ValidateFunction {
  if (validator) {
    return validator;
  }

  const schemaPath = join(contractsDir(), SIMULATION_REQUEST_SCHEMA);
  const schema: Schema = JSON.parse(readFileSync(schemaPath, "utf8"));

  const ajv = new Ajv2020({ strict: true, allErrors: true });
  addFormats(ajv);

  validator = ajv.compile(schema);
  return validator;
}

export function validateSimulationRequest(request: unknown): SchemaValidationResult {
  try {
    const validate = getValidator();
    if (validate(request)) {
      return { valid: true, errors: [] };
    }

    const errors = (validate.errors ?? []).map((error) => {
      const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
      const message = error.message ?? "invalid";
      return `${path}: ${message}`;
    });

    return { valid: false, errors };
  } catch (error) {
    return {
      valid: false,
      errors: [error instanceof Error ? error.message : "Validation failed"],
    };
  }
}

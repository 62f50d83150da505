import { describe, expect, it } from "vitest";
import { existsSync } from "fs";
import { join } from "path";

import { contractsDir, SIMULATION_REQUEST_SCHEMA, validateSimulationRequest } from "../../src/validate/validate";

const request = {
  property: {
    purchase_price: 200000,
    down_payment: 40000,
    loan_amount: 160000,
    interest_rate: 0.06,
    loan_term_years: 30,
    monthly_rent: 1800,
  },
  params: { years: 10, strategy: "sell", start_date: "2026-01-01" },
};

describe("validateSimulationRequest", () => {
  it("finds the contract on disk", () => {
    expect(existsSync(join(contractsDir(), SIMULATION_REQUEST_SCHEMA))).toBe(true);
  });

  it("accepts a valid request", () => {
    expect(validateSimulationRequest(request)).toEqual({ valid: true, errors: [] });
  });

  it("reports every missing section", () => {
    const result = validateSimulationRequest({});

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "/: must have required property 'property'",
      "/: must have required property 'params'",
    ]);
  });

  it("rejects unknown parameters", () => {
    const result = validateSimulationRequest({ ...request, params: { ...request.params, leverage: 2 } });
    expect(result.errors).toEqual(["/params: must NOT have additional properties"]);
  });

  it("rejects a fractional horizon", () => {
    const result = validateSimulationRequest({ ...request, params: { years: 2.5 } });
    expect(result.errors).toEqual(["/params/years: must be integer"]);
  });

  it("rejects a negative rent", () => {
    const result = validateSimulationRequest({ ...request, property: { ...request.property, monthly_rent: -1 } });
    expect(result.errors).toEqual(["/property/monthly_rent: must be >= 0"]);
  });
});

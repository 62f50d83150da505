import { DateTime } from "luxon";
import { createApp } from "../../src/app.js";
import type { ApiResponse, AppDependencies } from "../../src/app.js";
import { loadConfig } from "../../src/config.js";
import { createLogger } from "../../src/logger.js";
import { InMemoryPropertyRepository, InMemorySimulationRepository } from "../../src/repositories/memory.js";

export const NOW = DateTime.fromISO("2026-10-19T12:00:00Z", { zone: "utc" });

export interface CallOptions {
  body?: unknown;
  query?: Record<string, string>;
  user?: string | null;
}

export function setupApp(overrides: Partial<AppDependencies> = {}) {
  let propertySeq = 0;
  let simulationSeq = 0;
  const config = loadConfig({});
  const app = createApp({
    config,
    logger: createLogger("silent"),
    now: () => NOW,
    properties: new InMemoryPropertyRepository(() => `prop-${++propertySeq}`),
    simulations: new InMemorySimulationRepository(() => `sim-${++simulationSeq}`),
    ...overrides,
  });

  const call = (method: string, path: string, options: CallOptions = {}): Promise<ApiResponse> =>
    app.handle({
      method,
      path: `${config.apiPrefix}${path}`,
      query: options.query,
      headers: options.user === null ? {} : { "x-user-id": options.user ?? "user-1" },
      body: options.body,
    });

  return { app, call, config };
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value) || Buffer.isBuffer(value)) {
    throw new Error(`Expected an object, got ${String(value)}`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function asRecords(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    throw new Error(`Expected an array, got ${String(value)}`);
  }
  return value.map(asRecord);
}

export function bodyOf(response: ApiResponse): Record<string, unknown> {
  return asRecord(response.body);
}

export const rentalInput = {
  name: "Maple Street Rental",
  address: "18 Maple St",
  city: "Columbus",
  state: "OH",
  purchase_price: 200000,
  monthly_rent: 2000,
  interest_rate: 0,
  property_taxes: 200,
  insurance: 100,
};

export const condoInput = {
  name: "Harbor Condo",
  address: "7 Harbor Way",
  property_type: "condo",
  purchase_price: 150000,
  monthly_rent: 1400,
  property_taxes: 150,
  hoa_fees: 250,
};

export async function createProperty(
  call: ReturnType<typeof setupApp>["call"],
  body: Record<string, unknown> = rentalInput,
  user = "user-1",
): Promise<string> {
  const response = await call("POST", "/properties", { body, user });
  if (response.status !== 201) {
    throw new Error(`Property creation failed with ${response.status}: ${JSON.stringify(response.body)}`);
  }
  return String(bodyOf(response).id);
}

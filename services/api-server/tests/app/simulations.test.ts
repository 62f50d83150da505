import { describe, expect, it } from "vitest";
import { asRecord, asRecords, bodyOf, createProperty, rentalInput, setupApp } from "./helpers.js";

// Rent barely covers a quarter of the mortgage on this one
const underwaterInput = {
  name: "Underwater Bungalow",
  address: "3 Low Rd",
  purchase_price: 200000,
  monthly_rent: 500,
};

describe("POST /properties/:id/simulate", () => {
  it("stores a completed simulation with summary fields and report", async () => {
    const { call } = setupApp();
    const id = await createProperty(call);

    const response = await call("POST", `/properties/${id}/simulate`, { body: { strategy: "sell" } });
    const body = bodyOf(response);

    expect(response.status).toBe(201);
    expect(body).toMatchObject({
      id: "sim-1",
      owner_id: "user-1",
      property_id: id,
      kind: "property",
      status: "completed",
      error_message: null,
      completed_at: "2026-10-19T12:00:00.000Z",
      params: { strategy: "sell", years: 10, discount_rate: 0.08 },
      total_investment: 40000,
    });
    expect(typeof body.irr).toBe("number");
    expect(typeof body.npv).toBe("number");

    const report = asRecord(body.report);
    expect(report.years).toBe(10);
    expect(report.strategyLabel).toBe("Buy and Sell");
    expect(report.startDate).toBe("2026-10-01");
    expect(asRecords(report.yearlyResults)).toHaveLength(10);
    expect(body.alerts).toEqual([]);
  });

  it("raises performance alerts for a weak property", async () => {
    const { call } = setupApp();
    const id = await createProperty(call, underwaterInput);

    const body = bodyOf(await call("POST", `/properties/${id}/simulate`, { body: {} }));
    const alerts = asRecords(body.alerts);

    expect(alerts.map((a) => a.alert_type)).toEqual(expect.arrayContaining(["low_cap_rate", "negative_cash_flow"]));
    expect(alerts.every((a) => a.property_id === id && a.owner_id === "user-1")).toBe(true);
  });

  it("rejects invalid parameters before running", async () => {
    const { call } = setupApp();
    const id = await createProperty(call);

    const zeroYears = await call("POST", `/properties/${id}/simulate`, { body: { years: 0 } });
    expect(zeroYears.status).toBe(400);

    const refinance = await call("POST", `/properties/${id}/simulate`, { body: { strategy: "refinance" } });
    expect(refinance.status).toBe(400);
    expect(bodyOf(refinance).error).toBe("Validation failed");

    const impossibleDate = await call("POST", `/properties/${id}/simulate`, {
      body: { years: 5, start_date: "2025-02-30" },
    });
    expect(impossibleDate.status).toBe(400);
    expect(impossibleDate.body).toEqual({
      error: "Validation failed",
      details: ["start_date: must be a calendar date"],
    });

    const listed = bodyOf(await call("GET", `/properties/${id}/simulations`));
    expect(listed.simulations).toEqual([]);
  });

  it("records a failed simulation and answers 422", async () => {
    const { call } = setupApp();
    // A one-cent loan at 100% rounds to a zero payment
    const id = await createProperty(call, {
      name: "Penny Loan",
      address: "1 Cent Ave",
      purchase_price: 100,
      down_payment: 99.99,
      interest_rate: 1,
      monthly_rent: 10,
    });

    const response = await call("POST", `/properties/${id}/simulate`, { body: { years: 2 } });
    expect(response.status).toBe(422);
    expect(response.body).toEqual({
      error: "Simulation failed",
      details: ["Amortization failed: payment does not cover the first month's interest"],
    });

    const [failed] = asRecords(bodyOf(await call("GET", `/properties/${id}/simulations`)).simulations);
    expect(failed).toMatchObject({
      status: "failed",
      error_message: "Amortization failed: payment does not cover the first month's interest",
      report: null,
    });
  });

  it("returns 404 for another owner's property", async () => {
    const { call } = setupApp();
    const id = await createProperty(call);

    const response = await call("POST", `/properties/${id}/simulate`, { body: {}, user: "user-2" });
    expect(response.status).toBe(404);
  });
});

describe("simulation lookups", () => {
  it("lists a property's simulations newest first and fetches one by id", async () => {
    const { call } = setupApp();
    const id = await createProperty(call, rentalInput);
    await call("POST", `/properties/${id}/simulate`, { body: { years: 3 } });
    await call("POST", `/properties/${id}/simulate`, { body: { years: 5 } });

    const listed = asRecords(bodyOf(await call("GET", `/properties/${id}/simulations`)).simulations);
    expect(listed.map((s) => s.id)).toEqual(["sim-2", "sim-1"]);

    const fetched = bodyOf(await call("GET", "/simulations/sim-1"));
    expect(asRecord(fetched.params).years).toBe(3);

    expect((await call("GET", "/simulations/sim-1", { user: "user-2" })).status).toBe(404);
    expect((await call("GET", "/simulations/missing")).status).toBe(404);
  });
});

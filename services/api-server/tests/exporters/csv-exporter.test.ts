import { describe, expect, it } from "vitest";
import {
  SIMULATION_CSV_COLUMNS,
  comparisonToCsv,
  escapeCSV,
  portfolioToCsv,
  simulationToCsv,
  toCsv,
} from "../../src/exporters/csv-exporter.js";
import { makeReport } from "../fixtures.js";

describe("escapeCSV", () => {
  it("quotes values with commas, quotes or newlines", () => {
    expect(escapeCSV('12 Elm St, Unit "B"')).toBe('"12 Elm St, Unit ""B"""');
    expect(escapeCSV("line\nbreak")).toBe('"line\nbreak"');
  });

  it("leaves plain values alone and blanks null", () => {
    expect(escapeCSV("Maple")).toBe("Maple");
    expect(escapeCSV(42)).toBe("42");
    expect(escapeCSV(null)).toBe("");
    expect(escapeCSV(undefined)).toBe("");
  });
});

describe("toCsv", () => {
  it("writes a header, one line per row and a trailing newline", () => {
    expect(toCsv(["a", "b"], [{ a: 1, b: "x,y" }, { a: null }])).toBe('a,b\n1,"x,y"\n,\n');
  });
});

describe("simulationToCsv", () => {
  it("writes one rounded row per year", () => {
    const lines = simulationToCsv(makeReport()).split("\n");

    expect(lines[0]).toBe(SIMULATION_CSV_COLUMNS.join(","));
    expect(lines[1]).toBe(
      "1,2026-01-01,2026-12-31,2000,24000,1200,22800,6000,16800,12000.4,9000.2,3000.2," +
        "4799.6,4799.6,309000,240000,69000,0.0753,0.054369",
    );
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
  });
});

describe("portfolioToCsv", () => {
  it("rounds money to cents and ratios to six places", () => {
    const csv = portfolioToCsv([
      {
        id: "p1",
        name: "Oak, Unit 2",
        property_type: "condo",
        status: "active",
        purchase_price: 180000,
        current_value: 185000,
        monthly_rent: 1500,
        monthly_expenses: 410.556,
        monthly_mortgage: 863.0123,
        monthly_cash_flow: 123.456,
        cap_rate: 0.0612345678,
        cash_on_cash: 0.04,
        annual_roi: 0.0755,
      },
    ]);

    expect(csv.split("\n")[1]).toBe(
      'p1,"Oak, Unit 2",condo,active,180000,185000,1500,410.56,863.01,123.46,0.061235,0.04,0.0755',
    );
  });
});

describe("comparisonToCsv", () => {
  it("uses the sorted union of fields and leaves missing cells blank", () => {
    const csv = comparisonToCsv([
      { property_name: "Alpha", metric_irr: 0.1 },
      { property_name: "Beta", metric_npv: 5000 },
    ]);

    expect(csv).toBe("metric_irr,metric_npv,property_name\n0.1,,Alpha\n,5000,Beta\n");
  });
});

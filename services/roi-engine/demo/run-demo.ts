/**
 * ROI Engine Demo Script
 *
 * Run with: npx tsx demo/run-demo.ts
 */

import { RoiEngine, createSummaryReport, formatAnnualCashFlowAsText, generateAnnualCashFlow } from "../src";
import { SimulationInputs } from "../src/types/inputs";

const mapleStreetInputs: SimulationInputs = {
  property: {
    purchase_price: 320000,
    down_payment: 64000,
    loan_amount: 256000,
    interest_rate: 0.0675,
    loan_term_years: 30,
    closing_costs: 7500,
    monthly_rent: 2650,
    vacancy_rate: 0.06,
    annual_rent_increase: 0.03,
    annual_expense_increase: 0.025,
    property_appreciation: 0.035,
    property_taxes: 310,
    insurance: 120,
    property_management: 212,
    maintenance_reserve: 150,
  },
  params: {
    years: 10,
    strategy: "sell",
    discount_rate: 0.08,
    selling_cost_rate: 0.06,
    start_date: "2026-01-01",
  },
};

async function main() {
  console.log("ROI Engine Demo");
  console.log("===============\n");

  const engine = new RoiEngine();

  console.log("Running property simulation...\n");
  const result = await engine.run(mapleStreetInputs);

  if (!result.success || !result.report) {
    console.error("Simulation failed:");
    result.errors?.forEach((e) => console.error(`  - ${e}`));
    process.exit(1);
  }

  console.log(createSummaryReport(result, "Maple Street Duplex"));

  console.log("\nANNUAL CASHFLOW");
  console.log(formatAnnualCashFlowAsText(generateAnnualCashFlow(result.report)));
}

main().catch(console.error);

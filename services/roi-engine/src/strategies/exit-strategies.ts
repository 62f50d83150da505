import type { ExitStrategyName, ResolvedAssumptions } from "../types/inputs.js";
import type { ExitProceeds, YearlyResult } from "../types/results.js";

export interface ExitStrategy {
  readonly name: ExitStrategyName;
  readonly label: string;
  exitProceeds(finalYear: YearlyResult, assumptions: ResolvedAssumptions): ExitProceeds;
}

// Equity is counted at market value; nothing is sold.
export const holdStrategy: ExitStrategy = {
  name: "hold",
  label: "Buy and Hold",
  exitProceeds(finalYear) {
    return {
      grossValue: finalYear.propertyValue,
      sellingCosts: 0,
      loanPayoff: finalYear.debtBalance,
      netProceeds: finalYear.propertyValue - finalYear.debtBalance,
    };
  },
};

export const sellStrategy: ExitStrategy = {
  name: "sell",
  label: "Buy and Sell",
  exitProceeds(finalYear, assumptions) {
    const sellingCosts = finalYear.propertyValue * assumptions.sellingCostRate;
    return {
      grossValue: finalYear.propertyValue,
      sellingCosts,
      loanPayoff: finalYear.debtBalance,
      netProceeds: finalYear.propertyValue - sellingCosts - finalYear.debtBalance,
    };
  },
};

export const EXIT_STRATEGIES: ReadonlyMap<string, ExitStrategy> = new Map<string, ExitStrategy>([
  [holdStrategy.name, holdStrategy],
  [sellStrategy.name, sellStrategy],
]);

export function getExitStrategy(name: string): ExitStrategy | undefined {
  return EXIT_STRATEGIES.get(name);
}

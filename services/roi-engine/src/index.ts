// Core primitives
export { Timeline, MAX_ANALYSIS_YEARS } from "./core/timeline.js";
export type { TimelineConfig } from "./core/timeline.js";
export { Series } from "./core/series.js";
export { amortize } from "./core/amortization.js";
export type { AmortizationConfig, AmortizationSchedule } from "./core/amortization.js";
export { pmt, irr, npv, mortgagePayment, roundCurrency, growthFactor } from "./core/math-utils.js";

// Types
export {
  PROPERTY_TYPES,
  PROPERTY_STATUSES,
  EXPENSE_FIELDS,
  PROPERTY_DEFAULTS,
  SIMULATION_DEFAULTS,
  totalMonthlyExpenses,
  resolveAssumptions,
} from "./types/inputs.js";
export type {
  PropertyType,
  PropertyStatus,
  MonthlyExpensesInput,
  ExpenseField,
  PropertyFinancialsInput,
  ExitStrategyName,
  SimulationParamsInput,
  SimulationInputs,
  ResolvedAssumptions,
} from "./types/inputs.js";
export type { YearlyResult, ExitProceeds, SimulationSummary, SimulationReport } from "./types/results.js";
export type { SimulationContext, SimulationOutputs } from "./types/context.js";
export type { ValidationResult, ValidationError, ModuleResult, Module } from "./types/module.js";

// Modules
export { FinancingModule } from "./modules/financing/financing-module.js";
export type { FinancingModuleOutputs } from "./modules/financing/financing-module.js";
export { OperatingModule } from "./modules/operating/operating-module.js";
export type { OperatingModuleOutputs } from "./modules/operating/operating-module.js";
export { ProjectionModule } from "./modules/projection/projection-module.js";
export type { ProjectionModuleOutputs } from "./modules/projection/projection-module.js";
export { ReturnsModule } from "./modules/returns/returns-module.js";
export type { ReturnsModuleOutputs } from "./modules/returns/returns-module.js";
export { holdStrategy, sellStrategy, getExitStrategy, EXIT_STRATEGIES } from "./strategies/exit-strategies.js";
export type { ExitStrategy } from "./strategies/exit-strategies.js";

// Engine
export { RoiEngine, runPropertySimulation, createSummaryReport } from "./engine/roi-engine.js";
export type { RoiEngineResult, RoiEngineValidation, RoiEngineOptions } from "./engine/roi-engine.js";
export { SimulationError } from "./engine/errors.js";
export { validateSimulationRequest } from "./validate/validate.js";
export type { SchemaValidationResult } from "./validate/validate.js";

// Property and portfolio metrics
export {
  calculatePropertyMetrics,
  calculateCapRate,
  calculateAnnualRoi,
  validateFinancialData,
} from "./metrics/property-metrics.js";
export type { PropertyMetrics, FinancialCheckOptions } from "./metrics/property-metrics.js";
export { calculatePortfolioStats } from "./portfolio/portfolio-stats.js";
export type { PortfolioStats } from "./portfolio/portfolio-stats.js";
export {
  runPortfolioSimulation,
  diversificationScore,
  normalizedConcentration,
  PORTFOLIO_DEFAULTS,
  RISK_FREE_RATE,
  ASSUMED_VOLATILITY,
} from "./portfolio/portfolio-simulation.js";
export type {
  PortfolioEntry,
  PortfolioSimulationParams,
  ResolvedPortfolioParams,
  PortfolioSimulationResult,
  PortfolioPropertyResult,
  PortfolioMetrics,
  PortfolioYear,
  PortfolioCharts,
} from "./portfolio/portfolio-simulation.js";

// Formatters
export {
  generateAnnualCashFlow,
  formatAnnualCashFlowAsText,
  formatAnnualCashFlowAsJson,
  formatCurrency,
  formatPercent,
} from "./formatters/annual-cashflow.js";
export type { AnnualCashFlowRow, AnnualCashFlowTable } from "./formatters/annual-cashflow.js";

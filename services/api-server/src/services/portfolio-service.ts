import {
  SimulationError,
  calculatePortfolioStats,
  runPortfolioSimulation,
  runPropertySimulation,
} from "@propyield/roi-engine";
import type { PortfolioEntry, PortfolioStats, SimulationSummary } from "@propyield/roi-engine";
import { BadRequestError, NotFoundError, UnprocessableError } from "../errors.js";
import { errorMessage } from "../logger.js";
import type { PropertyRecord, SimulationRecord } from "../repositories/types.js";
import type { CompareInput, ComparisonMetric, SimulationParamsBody } from "../schemas.js";
import { timestamp, toFinancials } from "./deps.js";
import type { ServiceDeps } from "./deps.js";
import type { PropertyService } from "./property-service.js";

export const RECENT_SIMULATIONS_LIMIT = 10;
export const COMPARISON_YEARS = 10;

export interface PortfolioSummary {
  stats: PortfolioStats;
  byType: Record<string, number>;
  byStatus: Record<string, number>;
}

export interface PortfolioSimulateInput {
  property_ids?: string[];
  params: Omit<SimulationParamsBody, "selling_cost_rate">;
}

export interface ComparisonEntry {
  id: string;
  name: string;
  property_type: string;
  metrics: Partial<Record<ComparisonMetric, number | null>>;
}

export interface ComparisonResult {
  years: number;
  metrics: ComparisonMetric[];
  properties: ComparisonEntry[];
  best: Partial<Record<ComparisonMetric, string>>;
}

const METRIC_READERS: Record<ComparisonMetric, (s: SimulationSummary) => number | null> = {
  irr: (s) => s.irr,
  npv: (s) => s.npv,
  cash_flow: (s) => s.totalCashFlow,
  cap_rate: (s) => s.capRate,
  cash_on_cash: (s) => s.averageCashOnCash,
};

function countBy(records: readonly PropertyRecord[], key: (r: PropertyRecord) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    const k = key(record);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export class PortfolioService {
  constructor(
    private readonly deps: ServiceDeps,
    private readonly properties: PropertyService,
  ) {}

  async stats(ownerId: string): Promise<PortfolioStats> {
    const records = await this.deps.properties.listByOwner(ownerId);
    return calculatePortfolioStats(records.map(toFinancials));
  }

  async summary(ownerId: string): Promise<PortfolioSummary> {
    const records = await this.deps.properties.listByOwner(ownerId);
    return {
      stats: calculatePortfolioStats(records.map(toFinancials)),
      byType: countBy(records, (r) => r.property_type),
      byStatus: countBy(records, (r) => r.status),
    };
  }

  async simulate(ownerId: string, input: PortfolioSimulateInput): Promise<SimulationRecord> {
    const records = input.property_ids
      ? await Promise.all(input.property_ids.map((id) => this.properties.getRecord(ownerId, id)))
      : await this.deps.properties.listByOwner(ownerId);
    if (records.length === 0) {
      throw new BadRequestError("Portfolio has no properties to simulate");
    }

    const params = {
      ...input.params,
      years: input.params.years ?? this.deps.config.defaultAnalysisYears,
      discount_rate: input.params.discount_rate ?? this.deps.config.defaultDiscountRate,
    };
    const { simulations, engine, logger } = this.deps;
    const draft = await simulations.create(
      {
        owner_id: ownerId,
        property_id: null,
        kind: "portfolio",
        params: { ...params, property_ids: records.map((r) => r.id) },
      },
      timestamp(this.deps),
    );
    await simulations.update(draft.id, { status: "running" });

    const entries: PortfolioEntry[] = records.map((r) => ({
      id: r.id,
      name: r.name,
      propertyType: r.property_type,
      property: toFinancials(r),
    }));

    try {
      const result = await runPortfolioSimulation(entries, params, engine);
      const m = result.metrics;
      const completed = await simulations.update(draft.id, {
        status: "completed",
        total_investment: m.totalInvestment,
        total_cash_flow: m.totalCashFlow,
        final_property_value: m.projectedValue,
        total_return: m.roi * m.totalInvestment,
        roi: m.roi,
        irr: m.irr,
        npv: m.npv,
        portfolio: result,
        warnings: [...result.warnings, ...result.errors.map((e) => `${e.name}: ${e.message}`)],
        completed_at: timestamp(this.deps),
      });
      if (!completed) {
        throw new NotFoundError("Simulation not found");
      }
      logger.info("Portfolio simulation completed", {
        simulation_id: draft.id,
        properties: m.propertyCount,
        failed: result.errors.length,
      });
      return completed;
    } catch (error) {
      await simulations.update(draft.id, {
        status: "failed",
        error_message: errorMessage(error),
        completed_at: timestamp(this.deps),
      });
      if (error instanceof SimulationError) {
        throw new UnprocessableError(error.message, error.errors);
      }
      throw error;
    }
  }

  async recentSimulations(ownerId: string): Promise<SimulationRecord[]> {
    return this.deps.simulations.listByOwner(ownerId, "portfolio", RECENT_SIMULATIONS_LIMIT);
  }

  /**
   * Simulates each property over the same hold period and reports the
   * requested metrics side by side, with the best performer per metric.
   */
  async compare(ownerId: string, input: CompareInput): Promise<ComparisonResult> {
    const records = await Promise.all(input.property_ids.map((id) => this.properties.getRecord(ownerId, id)));
    const params = {
      years: COMPARISON_YEARS,
      strategy: "hold" as const,
      discount_rate: this.deps.config.defaultDiscountRate,
    };

    const properties: ComparisonEntry[] = [];
    for (const record of records) {
      let summary: SimulationSummary;
      try {
        summary = (await runPropertySimulation(toFinancials(record), params, this.deps.engine)).summary;
      } catch (error) {
        if (error instanceof SimulationError) {
          throw new UnprocessableError(`Simulation failed for ${record.name}`, error.errors);
        }
        throw error;
      }

      const metrics: ComparisonEntry["metrics"] = {};
      for (const metric of input.metrics) {
        metrics[metric] = METRIC_READERS[metric](summary);
      }
      properties.push({ id: record.id, name: record.name, property_type: record.property_type, metrics });
    }

    const best: ComparisonResult["best"] = {};
    for (const metric of input.metrics) {
      let top: { id: string; value: number } | null = null;
      for (const entry of properties) {
        const value = entry.metrics[metric];
        if (value !== null && value !== undefined && (top === null || value > top.value)) {
          top = { id: entry.id, value };
        }
      }
      if (top) {
        best[metric] = top.id;
      }
    }

    return { years: COMPARISON_YEARS, metrics: input.metrics, properties, best };
  }
}

import type { RoiEngineResult, SimulationParamsInput } from "@propyield/roi-engine";
import type { PropertyAlert } from "../alerts/performance-watcher.js";
import { NotFoundError, UnprocessableError } from "../errors.js";
import { errorMessage } from "../logger.js";
import type { SimulationRecord } from "../repositories/types.js";
import type { SimulationParamsBody } from "../schemas.js";
import { timestamp, toFinancials } from "./deps.js";
import type { ServiceDeps } from "./deps.js";
import type { PropertyService } from "./property-service.js";

export interface PropertySimulationOutcome {
  simulation: SimulationRecord;
  alerts: PropertyAlert[];
}

export class SimulationService {
  constructor(
    private readonly deps: ServiceDeps,
    private readonly properties: PropertyService,
  ) {}

  resolveParams(body: SimulationParamsBody): SimulationParamsInput {
    return {
      ...body,
      years: body.years ?? this.deps.config.defaultAnalysisYears,
      discount_rate: body.discount_rate ?? this.deps.config.defaultDiscountRate,
    };
  }

  async simulateProperty(
    ownerId: string,
    propertyId: string,
    body: SimulationParamsBody,
  ): Promise<PropertySimulationOutcome> {
    const property = await this.properties.getRecord(ownerId, propertyId);
    const params = this.resolveParams(body);
    const { simulations, engine, logger, watcher } = this.deps;

    const draft = await simulations.create(
      { owner_id: ownerId, property_id: propertyId, kind: "property", params: { ...params } },
      timestamp(this.deps),
    );
    await simulations.update(draft.id, { status: "running" });

    let result: RoiEngineResult;
    try {
      result = await engine.run({ property: toFinancials(property), params });
    } catch (error) {
      await this.fail(draft.id, errorMessage(error));
      throw error;
    }

    if (!result.success || !result.report) {
      const errors = result.errors ?? [];
      await this.fail(draft.id, errors.join("; ") || "Simulation failed");
      logger.warn("Simulation failed", { simulation_id: draft.id, property_id: propertyId, errors });
      throw new UnprocessableError("Simulation failed", errors);
    }

    const s = result.report.summary;
    const completed = await simulations.update(draft.id, {
      status: "completed",
      total_investment: s.totalInvestment,
      total_cash_flow: s.totalCashFlow,
      final_property_value: s.finalPropertyValue,
      total_return: s.totalReturn,
      roi: s.roi,
      irr: s.irr,
      npv: s.npv,
      report: result.report,
      warnings: result.warnings,
      completed_at: timestamp(this.deps),
    });
    if (!completed) {
      throw new NotFoundError("Simulation not found");
    }

    logger.info("Simulation completed", { simulation_id: draft.id, property_id: propertyId, irr: s.irr });
    const alerts = await watcher.checkPerformance({ ownerId, propertyId, summary: s });
    return { simulation: completed, alerts };
  }

  async listForProperty(ownerId: string, propertyId: string): Promise<SimulationRecord[]> {
    await this.properties.getRecord(ownerId, propertyId);
    return this.deps.simulations.listByProperty(propertyId);
  }

  async get(ownerId: string, id: string): Promise<SimulationRecord> {
    const record = await this.deps.simulations.findById(id);
    if (!record || record.owner_id !== ownerId) {
      throw new NotFoundError("Simulation not found");
    }
    return record;
  }

  private async fail(id: string, message: string): Promise<void> {
    await this.deps.simulations.update(id, {
      status: "failed",
      error_message: message,
      completed_at: timestamp(this.deps),
    });
  }
}

import {
  buildSimulationProperty,
  listTemplates,
  prepareSimulationData,
  routeByPropertyType,
} from "@propyield/property-templates";
import type { PreparedSimulationData, PropertyTemplate } from "@propyield/property-templates";
import type { PropertyFinancialsInput, SimulationReport } from "@propyield/roi-engine";
import { runPropertySimulation } from "@propyield/roi-engine";
import type { SimulationParamsBody } from "../schemas.js";
import type { ServiceDeps } from "./deps.js";

export interface TemplateAnalysis {
  templateId: string;
  prepared: PreparedSimulationData;
  property: PropertyFinancialsInput;
  report: SimulationReport;
}

export class TemplatesService {
  constructor(private readonly deps: Pick<ServiceDeps, "config" | "engine" | "logger">) {}

  /**
   * All templates, or the one a property type routes to.
   */
  list(propertyType?: string): PropertyTemplate[] {
    if (propertyType === undefined) {
      return listTemplates();
    }
    const { template } = routeByPropertyType(propertyType);
    return template ? [template] : [];
  }

  async analyze(
    templateId: string,
    data: Record<string, unknown>,
    params: SimulationParamsBody,
  ): Promise<TemplateAnalysis> {
    const prepared = prepareSimulationData(templateId, data);
    const property = buildSimulationProperty(prepared);
    const report = await runPropertySimulation(
      property,
      {
        ...params,
        years: params.years ?? this.deps.config.defaultAnalysisYears,
        discount_rate: params.discount_rate ?? this.deps.config.defaultDiscountRate,
      },
      this.deps.engine,
    );
    this.deps.logger.info("Template analysis completed", { template_id: templateId, irr: report.summary.irr });
    return { templateId: prepared.templateId, prepared, property, report };
  }
}

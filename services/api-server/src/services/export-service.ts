import { comparisonToCsv, portfolioToCsv, simulationToCsv } from "../exporters/csv-exporter.js";
import type { PortfolioCsvRow } from "../exporters/csv-exporter.js";
import { renderPortfolioPdf, renderSimulationPdf } from "../exporters/pdf-exporter.js";
import { BadRequestError } from "../errors.js";
import type { CompareInput } from "../schemas.js";
import type { ServiceDeps } from "./deps.js";
import type { PortfolioService } from "./portfolio-service.js";
import type { PropertyService } from "./property-service.js";
import type { SimulationService } from "./simulation-service.js";

export type ExportFormat = "csv" | "pdf";
export type ExportKind = "simulation" | "portfolio" | "comparison";

export interface ExportFile {
  filename: string;
  contentType: string;
  body: string | Buffer;
}

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: "text/csv; charset=utf-8",
  pdf: "application/pdf",
};

export class ExportService {
  constructor(
    private readonly deps: Pick<ServiceDeps, "properties" | "now" | "logger">,
    private readonly services: {
      properties: PropertyService;
      simulations: SimulationService;
      portfolio: PortfolioService;
    },
  ) {}

  filename(kind: ExportKind, format: ExportFormat): string {
    return `${kind}_${this.deps.now().toFormat("yyyyMMdd_HHmmss")}.${format}`;
  }

  async exportSimulation(ownerId: string, simulationId: string, format: ExportFormat): Promise<ExportFile> {
    const simulation = await this.services.simulations.get(ownerId, simulationId);
    const report = simulation.report;
    if (simulation.status !== "completed" || !report) {
      throw new BadRequestError("Only completed property simulations can be exported");
    }

    const property = simulation.property_id ? await this.deps.properties.findById(simulation.property_id) : null;
    const body =
      format === "csv"
        ? simulationToCsv(report)
        : await renderSimulationPdf({ property, report, generatedAt: this.generatedAt() });
    return this.file("simulation", format, body);
  }

  async exportPortfolio(ownerId: string, format: ExportFormat): Promise<ExportFile> {
    const properties = await this.services.properties.list(ownerId);

    if (format === "csv") {
      const rows: PortfolioCsvRow[] = properties.map((p) => ({
        id: p.id,
        name: p.name,
        property_type: p.property_type,
        status: p.status,
        purchase_price: p.purchase_price,
        current_value: p.current_value ?? p.purchase_price,
        monthly_rent: p.monthly_rent,
        monthly_expenses: p.metrics.totalMonthlyExpenses,
        monthly_mortgage: p.metrics.monthlyMortgagePayment,
        monthly_cash_flow: p.metrics.monthlyCashFlow,
        cap_rate: p.metrics.capRate,
        cash_on_cash: p.metrics.cashOnCashReturn,
        annual_roi: p.metrics.annualRoi,
      }));
      return this.file("portfolio", format, portfolioToCsv(rows));
    }

    const stats = await this.services.portfolio.stats(ownerId);
    const body = await renderPortfolioPdf({
      stats,
      properties: properties.map((p) => ({
        name: p.name,
        property_type: p.property_type,
        purchase_price: p.purchase_price,
        monthly_cash_flow: p.metrics.monthlyCashFlow,
        cap_rate: p.metrics.capRate,
      })),
      generatedAt: this.generatedAt(),
    });
    return this.file("portfolio", format, body);
  }

  async exportComparison(ownerId: string, input: CompareInput): Promise<ExportFile> {
    const comparison = await this.services.portfolio.compare(ownerId, input);
    const rows = comparison.properties.map((entry) => {
      const row: Record<string, unknown> = {
        property_id: entry.id,
        property_name: entry.name,
        property_type: entry.property_type,
      };
      for (const [metric, value] of Object.entries(entry.metrics)) {
        row[`metric_${metric}`] = value;
      }
      return row;
    });
    return this.file("comparison", "csv", comparisonToCsv(rows));
  }

  private generatedAt(): string {
    return this.deps.now().toUTC().toFormat("yyyy-MM-dd HH:mm 'UTC'");
  }

  private file(kind: ExportKind, format: ExportFormat, body: string | Buffer): ExportFile {
    const filename = this.filename(kind, format);
    this.deps.logger.info("Export generated", { kind, format, filename });
    return { filename, contentType: CONTENT_TYPES[format], body };
  }
}

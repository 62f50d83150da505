import PDFDocument from "pdfkit";
import { formatCurrency, formatPercent } from "@propyield/roi-engine";
import type { PortfolioStats, SimulationReport } from "@propyield/roi-engine";
import type { PropertyRecord } from "../repositories/types.js";

export interface SimulationPdfInput {
  property: PropertyRecord | null;
  report: SimulationReport;
  generatedAt: string;
}

export interface PortfolioPdfProperty {
  name: string;
  property_type: string;
  purchase_price: number;
  monthly_cash_flow: number;
  cap_rate: number;
}

export interface PortfolioPdfInput {
  stats: PortfolioStats;
  properties: PortfolioPdfProperty[];
  generatedAt: string;
}

const TITLE_COLOR = "#2E86AB";

function titleCase(value: string): string {
  return value
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function collect(doc: PDFKit.PDFDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);
  });
}

// Each section also gets a bookmark in the document outline
function heading(doc: PDFKit.PDFDocument, text: string): void {
  doc.outline.addItem(text);
  doc.moveDown(1);
  doc.fontSize(14).font("Helvetica-Bold").fillColor("#000000").text(text);
  doc.moveDown(0.3);
  doc.fontSize(10).font("Helvetica");
}

function field(doc: PDFKit.PDFDocument, label: string, value: string): void {
  doc.font("Helvetica-Bold").text(`${label}: `, { continued: true, indent: 20 });
  doc.font("Helvetica").text(value);
}

function title(doc: PDFKit.PDFDocument, text: string, generatedAt: string): void {
  doc.fontSize(24).font("Helvetica-Bold").fillColor(TITLE_COLOR).text(text, { align: "center" });
  doc.moveDown(0.5);
  doc.fontSize(10).font("Helvetica").fillColor("#666666").text(`Generated ${generatedAt}`, { align: "center" });
  doc.fillColor("#000000");
}

export function renderSimulationPdf(input: SimulationPdfInput): Promise<Buffer> {
  const doc = new PDFDocument({ size: "LETTER", margin: 50, info: { Title: "Property Investment Report" } });
  const done = collect(doc);
  const { property, report } = input;
  const s = report.summary;

  title(doc, "Property Investment Report", input.generatedAt);

  heading(doc, "Property Information");
  if (property) {
    field(doc, "Name", property.name);
    field(doc, "Address", [property.address, property.city, property.state].filter(Boolean).join(", "));
    field(doc, "Property Type", titleCase(property.property_type));
    field(doc, "Purchase Price", formatCurrency(property.purchase_price));
    field(doc, "Monthly Rent", formatCurrency(property.monthly_rent));
    field(doc, "Down Payment", formatCurrency(property.down_payment));
  } else {
    doc.text("Property record is no longer available.", { indent: 20 });
  }

  heading(doc, "Investment Analysis");
  field(doc, "Strategy", `${report.strategyLabel} over ${report.years} years from ${report.startDate}`);
  field(doc, "Total Cash Invested", formatCurrency(s.totalInvestment));
  field(doc, "IRR", formatPercent(s.irr, 2));
  field(doc, "NPV", `${formatCurrency(s.npv)} at ${formatPercent(s.discountRate, 2)}`);
  field(doc, "ROI", formatPercent(s.roi, 2));
  field(doc, "Equity Multiple", s.equityMultiple === null ? "-" : `${s.equityMultiple.toFixed(2)}x`);
  field(doc, "Cap Rate (Year 1)", formatPercent(s.capRate, 2));
  field(doc, "Average Cash-on-Cash", formatPercent(s.averageCashOnCash, 2));

  heading(doc, "Financial Breakdown");
  field(doc, "Monthly Mortgage", formatCurrency(s.monthlyMortgagePayment));
  field(doc, "Year 1 Monthly Cash Flow", formatCurrency(s.firstYearMonthlyCashFlow));
  field(doc, "Total Cash Flow", formatCurrency(s.totalCashFlow));
  field(doc, "Final Property Value", formatCurrency(s.finalPropertyValue));
  field(doc, "Selling Costs", formatCurrency(s.exit.sellingCosts));
  field(doc, "Loan Payoff", formatCurrency(s.exit.loanPayoff));
  field(doc, "Net Exit Proceeds", formatCurrency(s.exit.netProceeds));
  field(doc, "Total Return", formatCurrency(s.totalReturn));

  doc.addPage();
  heading(doc, "Yearly Projection");
  doc.font("Courier").fontSize(9);
  doc.text(
    ["Year", "NOI", "Debt Service", "Cash Flow", "Value", "Equity"].map((h, i) => (i === 0 ? h.padEnd(6) : h.padStart(14))).join(""),
  );
  for (const row of report.yearlyResults) {
    doc.text(
      [
        String(row.year).padEnd(6),
        formatCurrency(row.netOperatingIncome).padStart(14),
        formatCurrency(row.mortgagePayment).padStart(14),
        formatCurrency(row.netCashFlow).padStart(14),
        formatCurrency(row.propertyValue).padStart(14),
        formatCurrency(row.equity).padStart(14),
      ].join(""),
    );
  }

  doc.end();
  return done;
}

export function renderPortfolioPdf(input: PortfolioPdfInput): Promise<Buffer> {
  const doc = new PDFDocument({ size: "LETTER", margin: 50, info: { Title: "Real Estate Portfolio Report" } });
  const done = collect(doc);
  const { stats } = input;

  title(doc, "Real Estate Portfolio Report", input.generatedAt);

  heading(doc, "Portfolio Summary");
  field(doc, "Properties", String(stats.totalProperties));
  field(doc, "Total Purchase Price", formatCurrency(stats.totalPurchasePrice));
  field(doc, "Total Cash Invested", formatCurrency(stats.totalCashInvested));
  field(doc, "Total Equity", formatCurrency(stats.totalEquity));
  field(doc, "Monthly Cash Flow", formatCurrency(stats.monthlyCashFlow));
  field(doc, "Annual Cash Flow", formatCurrency(stats.annualCashFlow));
  field(doc, "Average Cap Rate", formatPercent(stats.averageCapRate, 2));
  field(doc, "Average Cash-on-Cash", formatPercent(stats.averageCashOnCash, 2));

  heading(doc, "Properties");
  if (input.properties.length === 0) {
    doc.text("No properties in this portfolio.", { indent: 20 });
  }
  for (const property of input.properties) {
    doc.font("Helvetica-Bold").text(property.name, { indent: 20 });
    doc
      .font("Helvetica")
      .text(
        `${titleCase(property.property_type)} | ${formatCurrency(property.purchase_price)} | ` +
          `${formatCurrency(property.monthly_cash_flow)}/mo | cap ${formatPercent(property.cap_rate, 2)}`,
        { indent: 30 },
      );
  }

  doc.end();
  return done;
}

import { randomUUID } from "node:crypto";
import { DateTime } from "luxon";
import type { SimulationSummary } from "@propyield/roi-engine";
import { errorMessage, type Logger } from "../logger.js";

export type AlertType = "low_roi" | "low_cap_rate" | "negative_cash_flow";
export type AlertSeverity = "info" | "warning" | "critical";

export interface PropertyAlert {
  id: string;
  owner_id: string;
  property_id: string;
  alert_type: AlertType;
  message: string;
  threshold: number;
  actual_value: number;
  severity: AlertSeverity;
  timestamp: string;
  acknowledged: boolean;
}

export interface AlertObserver {
  readonly name: string;
  notify(alert: PropertyAlert): void | Promise<void>;
}

export interface PerformanceThresholds {
  minRoi: number;
  minCapRate: number;
}

export interface PerformanceWatcherOptions {
  thresholds: PerformanceThresholds;
  logger: Logger;
  now?: () => DateTime;
  generateId?: () => string;
}

export interface PerformanceCheck {
  ownerId: string;
  propertyId: string;
  summary: Pick<SimulationSummary, "averageAnnualReturn" | "capRate" | "firstYearMonthlyCashFlow">;
}

const pct = (value: number) => `${(value * 100).toFixed(2)}%`;
const usd = (value: number) => `${value < 0 ? "-" : ""}$${Math.abs(value).toFixed(2)}`;

/**
 * Writes every alert to the application log.
 */
export class LogAlertObserver implements AlertObserver {
  readonly name = "log";

  constructor(private readonly logger: Logger) {}

  notify(alert: PropertyAlert): void {
    const meta = {
      alert_id: alert.id,
      property_id: alert.property_id,
      alert_type: alert.alert_type,
      severity: alert.severity,
    };
    if (alert.severity === "critical") {
      this.logger.error(`Performance alert: ${alert.message}`, meta);
    } else {
      this.logger.warn(`Performance alert: ${alert.message}`, meta);
    }
  }
}

/**
 * Checks completed simulations against return thresholds and fans alerts
 * out to the attached observers. Observer failures are logged, never thrown.
 */
export class PerformanceWatcher {
  private readonly observers: AlertObserver[] = [];
  private alerts: PropertyAlert[] = [];
  private readonly thresholds: PerformanceThresholds;
  private readonly logger: Logger;
  private readonly now: () => DateTime;
  private readonly generateId: () => string;

  constructor(options: PerformanceWatcherOptions) {
    this.thresholds = options.thresholds;
    this.logger = options.logger;
    this.now = options.now ?? (() => DateTime.utc());
    this.generateId = options.generateId ?? randomUUID;
  }

  addObserver(observer: AlertObserver): void {
    if (!this.observers.includes(observer)) {
      this.observers.push(observer);
    }
  }

  removeObserver(observer: AlertObserver): void {
    const index = this.observers.indexOf(observer);
    if (index >= 0) {
      this.observers.splice(index, 1);
    }
  }

  async checkPerformance(check: PerformanceCheck): Promise<PropertyAlert[]> {
    const { averageAnnualReturn: roi, capRate, firstYearMonthlyCashFlow: cashFlow } = check.summary;
    const { minRoi, minCapRate } = this.thresholds;
    const raised: PropertyAlert[] = [];

    if (roi < minRoi) {
      raised.push(
        this.createAlert(check, {
          alert_type: "low_roi",
          message: `Property ROI (${pct(roi)}) is below threshold (${pct(minRoi)})`,
          threshold: minRoi,
          actual_value: roi,
          severity: roi > minRoi * 0.8 ? "warning" : "critical",
        }),
      );
    }

    if (capRate < minCapRate) {
      raised.push(
        this.createAlert(check, {
          alert_type: "low_cap_rate",
          message: `Property cap rate (${pct(capRate)}) is below threshold (${pct(minCapRate)})`,
          threshold: minCapRate,
          actual_value: capRate,
          severity: "warning",
        }),
      );
    }

    if (cashFlow < 0) {
      raised.push(
        this.createAlert(check, {
          alert_type: "negative_cash_flow",
          message: `Property has negative cash flow: ${usd(cashFlow)}/month`,
          threshold: 0,
          actual_value: cashFlow,
          severity: "critical",
        }),
      );
    }

    for (const alert of raised) {
      await this.notifyObservers(alert);
    }
    return raised;
  }

  getActiveAlerts(ownerId: string, propertyId?: string): PropertyAlert[] {
    return this.alerts
      .filter((a) => a.owner_id === ownerId && !a.acknowledged)
      .filter((a) => propertyId === undefined || a.property_id === propertyId)
      .map((a) => ({ ...a }));
  }

  acknowledge(ownerId: string, alertId: string): PropertyAlert | null {
    const alert = this.alerts.find((a) => a.id === alertId && a.owner_id === ownerId);
    if (!alert) return null;
    alert.acknowledged = true;
    return { ...alert };
  }

  clearAcknowledged(ownerId: string): number {
    const before = this.alerts.length;
    this.alerts = this.alerts.filter((a) => a.owner_id !== ownerId || !a.acknowledged);
    return before - this.alerts.length;
  }

  private createAlert(
    check: PerformanceCheck,
    fields: Pick<PropertyAlert, "alert_type" | "message" | "threshold" | "actual_value" | "severity">,
  ): PropertyAlert {
    return {
      id: this.generateId(),
      owner_id: check.ownerId,
      property_id: check.propertyId,
      ...fields,
      timestamp: this.now().toISO() ?? "",
      acknowledged: false,
    };
  }

  private async notifyObservers(alert: PropertyAlert): Promise<void> {
    this.alerts.push(alert);

    for (const observer of this.observers) {
      try {
        await observer.notify({ ...alert });
      } catch (error) {
        this.logger.error(`Error notifying observer ${observer.name}`, {
          alert_id: alert.id,
          error: errorMessage(error),
        });
      }
    }
  }
}

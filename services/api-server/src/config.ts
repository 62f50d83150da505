import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  API_PREFIX: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*$/, "must start with / and contain only path characters")
    .default("/api/v1"),
  CORS_ORIGIN: z.string().min(1).default("*"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  MIN_ROI_THRESHOLD: z.coerce.number().default(0.08),
  MIN_CAP_RATE_THRESHOLD: z.coerce.number().default(0.06),
  DEFAULT_DISCOUNT_RATE: z.coerce.number().gt(-1).default(0.08),
  DEFAULT_ANALYSIS_YEARS: z.coerce.number().int().min(1).max(50).default(10),
  MAX_BODY_BYTES: z.coerce.number().int().positive().default(1_048_576),
});

export interface AppConfig {
  port: number;
  apiPrefix: string;
  corsOrigin: string;
  logLevel: LogLevel;
  minRoiThreshold: number;
  minCapRateThreshold: number;
  defaultDiscountRate: number;
  defaultAnalysisYears: number;
  maxBodyBytes: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Reads configuration from the environment. Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    // No trailing slash so routes can be appended
    apiPrefix: e.API_PREFIX.replace(/\/+$/, ""),
    corsOrigin: e.CORS_ORIGIN,
    logLevel: e.LOG_LEVEL,
    minRoiThreshold: e.MIN_ROI_THRESHOLD,
    minCapRateThreshold: e.MIN_CAP_RATE_THRESHOLD,
    defaultDiscountRate: e.DEFAULT_DISCOUNT_RATE,
    defaultAnalysisYears: e.DEFAULT_ANALYSIS_YEARS,
    maxBodyBytes: e.MAX_BODY_BYTES,
  };
}

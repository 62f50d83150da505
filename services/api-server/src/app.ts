import { DateTime } from "luxon";
import { ZodError } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import { RoiEngine, SimulationError } from "@propyield/roi-engine";
import { TemplateError, TemplateValidationError, UnknownPropertyTypeError } from "@propyield/property-templates";
import { LogAlertObserver, PerformanceWatcher } from "./alerts/performance-watcher.js";
import type { AppConfig } from "./config.js";
import { HttpError, NotFoundError, UnauthorizedError } from "./errors.js";
import { errorMessage } from "./logger.js";
import type { Logger } from "./logger.js";
import { InMemoryPropertyRepository, InMemorySimulationRepository } from "./repositories/memory.js";
import type { PropertyRepository, SimulationRepository } from "./repositories/types.js";
import {
  alertsQuerySchema,
  compareSchema,
  exportQuerySchema,
  portfolioSimulateSchema,
  propertyCreateSchema,
  propertyListQuerySchema,
  propertyUpdateSchema,
  simulationParamsSchema,
  templateAnalyzeSchema,
  templateListQuerySchema,
} from "./schemas.js";
import type { ServiceDeps } from "./services/deps.js";
import { ExportService } from "./services/export-service.js";
import type { ExportFile } from "./services/export-service.js";
import { PortfolioService } from "./services/portfolio-service.js";
import { PropertyService } from "./services/property-service.js";
import { SimulationService } from "./services/simulation-service.js";
import { TemplatesService } from "./services/templates-service.js";

export interface ApiRequest {
  method: string;
  path: string;
  query?: Record<string, string>;
  headers?: Record<string, string | undefined>;
  body?: unknown;
}

export type ResponseBody = Record<string, unknown> | unknown[] | string | Buffer | undefined;

export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  body: ResponseBody;
}

export type ResolveUser = (request: ApiRequest) => string | null;

export interface AppDependencies {
  config: AppConfig;
  logger: Logger;
  properties?: PropertyRepository;
  simulations?: SimulationRepository;
  watcher?: PerformanceWatcher;
  engine?: RoiEngine;
  now?: () => DateTime;
  resolveUser?: ResolveUser;
}

export interface App {
  handle(request: ApiRequest): Promise<ApiResponse>;
  /** Turns an error raised outside the router (body parsing) into a response. */
  fail(error: unknown): ApiResponse;
  readonly deps: ServiceDeps;
}

interface RouteContext {
  ownerId: string;
  params: Record<string, string>;
  query: Record<string, string>;
  body: unknown;
}

type RouteResult = { status?: number; body: ResponseBody } | ExportFile;
type RouteHandler = (ctx: RouteContext) => Promise<RouteResult> | RouteResult;

interface Route {
  method: string;
  segments: string[];
  handler: RouteHandler;
}

export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "X-XSS-Protection": "1; mode=block",
  "Referrer-Policy": "strict-origin-when-cross-origin",
};

export const USER_HEADER = "x-user-id";

export const headerUser: ResolveUser = (request) => {
  const value = request.headers?.[USER_HEADER]?.trim();
  return value ? value : null;
};

function parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  return schema.parse(value ?? {});
}

function matchRoute(route: Route, method: string, segments: string[]): Record<string, string> | null {
  if (route.method !== method || route.segments.length !== segments.length) {
    return null;
  }
  const params: Record<string, string> = {};
  for (let i = 0; i < segments.length; i++) {
    const pattern = route.segments[i];
    const actual = segments[i];
    if (pattern.startsWith(":")) {
      const decoded = decodeSegment(actual);
      if (decoded === null) {
        return null;
      }
      params[pattern.slice(1)] = decoded;
    } else if (pattern !== actual) {
      return null;
    }
  }
  return params;
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }
    throw error;
  }
}

function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

function isExportFile(result: RouteResult): result is ExportFile {
  return "filename" in result;
}

export function createApp(options: AppDependencies): App {
  const { config, logger } = options;
  const watcher =
    options.watcher ??
    new PerformanceWatcher({
      thresholds: { minRoi: config.minRoiThreshold, minCapRate: config.minCapRateThreshold },
      logger,
    });
  if (!options.watcher) {
    watcher.addObserver(new LogAlertObserver(logger));
  }
  const now = options.now ?? (() => DateTime.utc());

  const deps: ServiceDeps = {
    config,
    logger,
    properties: options.properties ?? new InMemoryPropertyRepository(),
    simulations: options.simulations ?? new InMemorySimulationRepository(),
    watcher,
    engine: options.engine ?? new RoiEngine({ now }),
    now,
  };
  const resolveUser = options.resolveUser ?? headerUser;

  const properties = new PropertyService(deps);
  const simulations = new SimulationService(deps, properties);
  const portfolio = new PortfolioService(deps, properties);
  const exporter = new ExportService(deps, { properties, simulations, portfolio });
  const templates = new TemplatesService(deps);

  const routes: Route[] = [];
  const route = (method: string, path: string, handler: RouteHandler) => {
    routes.push({ method, segments: splitPath(path), handler });
  };

  // Properties
  route("GET", "/properties", async ({ ownerId, query }) => ({
    body: { properties: await properties.list(ownerId, parse(propertyListQuerySchema, query)) },
  }));
  route("POST", "/properties", async ({ ownerId, body }) => ({
    status: 201,
    body: { ...(await properties.create(ownerId, parse(propertyCreateSchema, body))) },
  }));
  route("GET", "/properties/:id", async ({ ownerId, params }) => ({
    body: { ...(await properties.get(ownerId, params.id)) },
  }));
  route("PUT", "/properties/:id", async ({ ownerId, params, body }) => ({
    body: { ...(await properties.update(ownerId, params.id, parse(propertyUpdateSchema, body))) },
  }));
  route("DELETE", "/properties/:id", async ({ ownerId, params }) => {
    await properties.delete(ownerId, params.id);
    return { status: 204, body: undefined };
  });

  // Simulations
  route("POST", "/properties/:id/simulate", async ({ ownerId, params, body }) => {
    const outcome = await simulations.simulateProperty(ownerId, params.id, parse(simulationParamsSchema, body));
    return { status: 201, body: { ...outcome.simulation, alerts: outcome.alerts } };
  });
  route("GET", "/properties/:id/simulations", async ({ ownerId, params }) => ({
    body: { simulations: await simulations.listForProperty(ownerId, params.id) },
  }));
  route("GET", "/simulations/:id", async ({ ownerId, params }) => ({
    body: { ...(await simulations.get(ownerId, params.id)) },
  }));
  route("GET", "/simulations/:id/export", async ({ ownerId, params, query }) =>
    exporter.exportSimulation(ownerId, params.id, parse(exportQuerySchema, query).format),
  );

  // Portfolio
  route("GET", "/portfolio/stats", async ({ ownerId }) => ({ body: { ...(await portfolio.stats(ownerId)) } }));
  route("GET", "/portfolio/summary", async ({ ownerId }) => ({ body: { ...(await portfolio.summary(ownerId)) } }));
  route("POST", "/portfolio/simulate", async ({ ownerId, body }) => ({
    status: 201,
    body: { ...(await portfolio.simulate(ownerId, parse(portfolioSimulateSchema, body))) },
  }));
  route("GET", "/portfolio/simulations", async ({ ownerId }) => ({
    body: { simulations: await portfolio.recentSimulations(ownerId) },
  }));
  route("POST", "/portfolio/compare", async ({ ownerId, body }) => ({
    body: { ...(await portfolio.compare(ownerId, parse(compareSchema, body))) },
  }));
  route("GET", "/portfolio/export", async ({ ownerId, query }) =>
    exporter.exportPortfolio(ownerId, parse(exportQuerySchema, query).format),
  );
  route("POST", "/portfolio/compare/export", async ({ ownerId, body }) =>
    exporter.exportComparison(ownerId, parse(compareSchema, body)),
  );

  // Alerts
  route("GET", "/alerts", ({ ownerId, query }) => ({
    body: { alerts: watcher.getActiveAlerts(ownerId, parse(alertsQuerySchema, query).property_id) },
  }));
  route("DELETE", "/alerts/acknowledged", ({ ownerId }) => ({
    body: { cleared: watcher.clearAcknowledged(ownerId) },
  }));
  route("POST", "/alerts/:id/acknowledge", ({ ownerId, params }) => {
    const alert = watcher.acknowledge(ownerId, params.id);
    if (!alert) {
      throw new NotFoundError("Alert not found");
    }
    return { body: { ...alert } };
  });

  // Templates
  route("GET", "/templates", ({ query }) => ({
    body: { templates: templates.list(parse(templateListQuerySchema, query).property_type) },
  }));
  route("POST", "/templates/:id/analyze", async ({ params, body }) => {
    const input = parse(templateAnalyzeSchema, body);
    return { body: { ...(await templates.analyze(params.id, input.data, input.params)) } };
  });

  const baseHeaders = (): Record<string, string> => ({
    "Access-Control-Allow-Origin": config.corsOrigin,
    ...SECURITY_HEADERS,
  });

  const json = (status: number, body: ResponseBody): ApiResponse => ({
    status,
    headers: { ...baseHeaders(), ...(body === undefined ? {} : { "Content-Type": "application/json" }) },
    body,
  });

  const fail = (error: unknown): ApiResponse => {
    if (error instanceof HttpError) {
      return json(error.status, { error: error.message, ...(error.details ? { details: error.details } : {}) });
    }
    if (error instanceof ZodError) {
      return json(400, {
        error: "Validation failed",
        details: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
      });
    }
    if (error instanceof UnknownPropertyTypeError) {
      return json(404, { error: error.message });
    }
    if (error instanceof TemplateValidationError) {
      return json(400, { error: "Template validation failed", details: error.errors });
    }
    if (error instanceof TemplateError) {
      return json(400, { error: error.message });
    }
    if (error instanceof SimulationError) {
      return json(422, { error: "Simulation failed", details: error.errors });
    }

    logger.error("Unhandled error", {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return json(500, { error: "Internal server error" });
  };

  const handle = async (request: ApiRequest): Promise<ApiResponse> => {
    const method = request.method.toUpperCase();
    const path = request.path;

    if (method === "OPTIONS") {
      return {
        status: 204,
        headers: {
          ...baseHeaders(),
          "Access-Control-Allow-Methods": "GET, POST, PUT, DELETE, OPTIONS",
          "Access-Control-Allow-Headers": `content-type, ${USER_HEADER}`,
          "Access-Control-Max-Age": "600",
        },
        body: undefined,
      };
    }

    if (method === "GET" && path === "/health") {
      return json(200, { ok: true });
    }

    const prefix = config.apiPrefix;
    if (path !== prefix && !path.startsWith(`${prefix}/`)) {
      return json(404, { error: "Not Found" });
    }
    const segments = splitPath(path.slice(prefix.length));

    let matched: { route: Route; params: Record<string, string> } | null = null;
    for (const candidate of routes) {
      const params = matchRoute(candidate, method, segments);
      if (params) {
        matched = { route: candidate, params };
        break;
      }
    }
    if (!matched) {
      return json(404, { error: "Not Found" });
    }

    const startedAt = Date.now();
    try {
      const ownerId = resolveUser(request);
      if (!ownerId) {
        throw new UnauthorizedError();
      }
      const result = await matched.route.handler({
        ownerId,
        params: matched.params,
        query: request.query ?? {},
        body: request.body,
      });
      logger.debug("Request handled", { method, path, duration_ms: Date.now() - startedAt });

      if (isExportFile(result)) {
        return {
          status: 200,
          headers: {
            ...baseHeaders(),
            "Content-Type": result.contentType,
            "Content-Disposition": `attachment; filename="${result.filename}"`,
          },
          body: result.body,
        };
      }
      return json(result.status ?? 200, result.body);
    } catch (error) {
      const response = fail(error);
      if (response.status < 500) {
        logger.debug("Request rejected", { method, path, status: response.status });
      }
      return response;
    }
  };

  return { handle, fail, deps };
}

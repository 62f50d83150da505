import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      apiPrefix: "/api/v1",
      corsOrigin: "*",
      logLevel: "info",
      minRoiThreshold: 0.08,
      minCapRateThreshold: 0.06,
      defaultDiscountRate: 0.08,
      defaultAnalysisYears: 10,
      maxBodyBytes: 1048576,
    });
  });

  it("coerces numbers and strips a trailing slash from the prefix", () => {
    const config = loadConfig({
      PORT: "3000",
      API_PREFIX: "/api/v2/",
      LOG_LEVEL: "debug",
      MIN_ROI_THRESHOLD: "0.1",
      DEFAULT_ANALYSIS_YEARS: "15",
    });

    expect(config.port).toBe(3000);
    expect(config.apiPrefix).toBe("/api/v2");
    expect(config.logLevel).toBe("debug");
    expect(config.minRoiThreshold).toBe(0.1);
    expect(config.defaultAnalysisYears).toBe(15);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ PORT: "  ", CORS_ORIGIN: "" });
    expect(config.port).toBe(8000);
    expect(config.corsOrigin).toBe("*");
  });

  it("fails fast on an invalid environment", () => {
    try {
      loadConfig({ PORT: "not-a-port", LOG_LEVEL: "verbose" });
      expect.fail("expected a config error");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (!(e instanceof ConfigError)) return;
      expect(e.issues).toHaveLength(2);
      expect(e.issues[0]).toMatch(/^PORT: /);
      expect(e.issues[1]).toMatch(/^LOG_LEVEL: /);
      expect(e.message).toMatch(/^Invalid environment: PORT: /);
    }
  });

  it("rejects an analysis horizon outside 1..50 years", () => {
    expect(() => loadConfig({ DEFAULT_ANALYSIS_YEARS: "60" })).toThrow(ConfigError);
  });
});

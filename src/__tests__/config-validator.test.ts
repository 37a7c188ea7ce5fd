import { describe, it, expect } from "vitest";
import { validateConfig } from "../config-validator.js";
import type { AppConfig } from "../config.js";

function makeConfig(overrides: { aggregator?: Partial<AppConfig["aggregator"]>; logging?: Partial<AppConfig["logging"]> } = {}): AppConfig {
  return {
    aggregator: {
      refreshCadenceMs: 1000,
      burstThreshold: 5,
      latencyWindowSize: 50,
      latencyFloorMs: -1000,
      latencyCeilingMs: 2000,
      ...overrides.aggregator,
    },
    logging: { level: "info", keepDays: 30, ...overrides.logging },
  };
}

describe("validateConfig", () => {
  it("should pass validation for the defaults", () => {
    const result = validateConfig(makeConfig());
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("should return error for a cadence that is not a positive integer", () => {
    expect(validateConfig(makeConfig({ aggregator: { refreshCadenceMs: 0 } })).errors).toEqual([
      "aggregator.refreshCadenceMs must be a positive integer, got 0",
    ]);
    expect(validateConfig(makeConfig({ aggregator: { refreshCadenceMs: Number.NaN } })).errors).toEqual([
      "aggregator.refreshCadenceMs must be a positive integer, got NaN",
    ]);
  });

  it("should warn for a very short or very long cadence", () => {
    expect(validateConfig(makeConfig({ aggregator: { refreshCadenceMs: 20 } })).warnings).toEqual([
      "aggregator.refreshCadenceMs is 20ms: renders may outpace the terminal",
    ]);
    expect(validateConfig(makeConfig({ aggregator: { refreshCadenceMs: 30000 } })).warnings).toEqual([
      "aggregator.refreshCadenceMs is 30000ms: a quiet market will look frozen",
    ]);
  });

  it("should return error for a burst threshold below one", () => {
    const result = validateConfig(makeConfig({ aggregator: { burstThreshold: 0 } }));
    expect(result.errors).toEqual(["aggregator.burstThreshold must be a positive integer, got 0"]);
  });

  it("should validate the latency window size", () => {
    expect(validateConfig(makeConfig({ aggregator: { latencyWindowSize: -5 } })).errors).toEqual([
      "aggregator.latencyWindowSize must be a positive integer, got -5",
    ]);
    expect(validateConfig(makeConfig({ aggregator: { latencyWindowSize: 20000 } })).warnings).toEqual([
      "aggregator.latencyWindowSize is 20000: statistics will react slowly",
    ]);
  });

  it("should return error when the latency floor is not below the ceiling", () => {
    const result = validateConfig(makeConfig({ aggregator: { latencyFloorMs: 500, latencyCeilingMs: 500 } }));
    expect(result.errors).toEqual([
      "aggregator.latencyFloorMs (500) must be below aggregator.latencyCeilingMs (500)",
    ]);
  });

  it("should return error for a fractional latency bound", () => {
    const result = validateConfig(makeConfig({ aggregator: { latencyCeilingMs: 1500.5 } }));
    expect(result.errors).toEqual(["aggregator.latencyCeilingMs must be an integer, got 1500.5"]);
  });

  it("should return error for an unknown log level", () => {
    const result = validateConfig(makeConfig({ logging: { level: "verbose" } }));
    expect(result.errors).toEqual([
      'logging.level must be one of fatal, error, warn, info, debug, trace, silent, got "verbose"',
    ]);
  });

  it("should return error for a non-positive log retention", () => {
    const result = validateConfig(makeConfig({ logging: { keepDays: 0 } }));
    expect(result.errors).toEqual(["logging.keepDays must be a positive integer, got 0"]);
  });

  it("should collect every error at once", () => {
    const result = validateConfig(
      makeConfig({ aggregator: { refreshCadenceMs: -1, burstThreshold: 0 }, logging: { keepDays: -1 } }),
    );
    expect(result.errors).toHaveLength(3);
  });
});

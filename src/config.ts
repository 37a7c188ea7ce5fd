import dotenv from "dotenv";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  return parseInt(process.env[name] ?? String(fallback), 10);
}

// Every option can be overridden per context; these are only the process defaults.
export const config = {
  aggregator: {
    /** Maximum time between two renders, in milliseconds */
    refreshCadenceMs: intFromEnv("QUOTE_REFRESH_CADENCE_MS", 1000),
    /** Accepted events that force a render before the cadence timer fires */
    burstThreshold: intFromEnv("QUOTE_BURST_THRESHOLD", 5),
    /** Number of latency samples kept in the rolling window */
    latencyWindowSize: intFromEnv("QUOTE_LATENCY_WINDOW", 50),
    /** Samples below this are treated as parsing artifacts, not clock skew */
    latencyFloorMs: intFromEnv("QUOTE_LATENCY_FLOOR_MS", -1000),
    /** Samples above this are implausible and kept out of the statistics */
    latencyCeilingMs: intFromEnv("QUOTE_LATENCY_CEILING_MS", 2000),
  },
  logging: {
    level: process.env.LOG_LEVEL ?? "info",
    keepDays: intFromEnv("LOG_KEEP_DAYS", 30),
  },
};

export type AppConfig = typeof config;
export type AggregatorOptions = AppConfig["aggregator"];

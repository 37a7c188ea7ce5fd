import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/**
 * Validates configuration values.
 *
 * Checks:
 * - refreshCadenceMs, burstThreshold and latencyWindowSize are positive integers
 * - latency floor and ceiling are integers with floor < ceiling
 * - log level is one pino knows
 * - cadence outside 50ms–10s and windows above 10 000 samples (warnings)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const agg = cfg.aggregator;

  if (!isPositiveInteger(agg.refreshCadenceMs)) {
    errors.push(`aggregator.refreshCadenceMs must be a positive integer, got ${agg.refreshCadenceMs}`);
  } else if (agg.refreshCadenceMs < 50) {
    warnings.push(`aggregator.refreshCadenceMs is ${agg.refreshCadenceMs}ms: renders may outpace the terminal`);
  } else if (agg.refreshCadenceMs > 10_000) {
    warnings.push(`aggregator.refreshCadenceMs is ${agg.refreshCadenceMs}ms: a quiet market will look frozen`);
  }

  if (!isPositiveInteger(agg.burstThreshold)) {
    errors.push(`aggregator.burstThreshold must be a positive integer, got ${agg.burstThreshold}`);
  }

  if (!isPositiveInteger(agg.latencyWindowSize)) {
    errors.push(`aggregator.latencyWindowSize must be a positive integer, got ${agg.latencyWindowSize}`);
  } else if (agg.latencyWindowSize > 10_000) {
    warnings.push(`aggregator.latencyWindowSize is ${agg.latencyWindowSize}: statistics will react slowly`);
  }

  if (!Number.isInteger(agg.latencyFloorMs)) {
    errors.push(`aggregator.latencyFloorMs must be an integer, got ${agg.latencyFloorMs}`);
  }
  if (!Number.isInteger(agg.latencyCeilingMs)) {
    errors.push(`aggregator.latencyCeilingMs must be an integer, got ${agg.latencyCeilingMs}`);
  }
  if (
    Number.isInteger(agg.latencyFloorMs) &&
    Number.isInteger(agg.latencyCeilingMs) &&
    agg.latencyFloorMs >= agg.latencyCeilingMs
  ) {
    errors.push(
      `aggregator.latencyFloorMs (${agg.latencyFloorMs}) must be below aggregator.latencyCeilingMs (${agg.latencyCeilingMs})`,
    );
  }

  if (!LOG_LEVELS.includes(cfg.logging.level)) {
    errors.push(`logging.level must be one of ${LOG_LEVELS.join(", ")}, got "${cfg.logging.level}"`);
  }

  if (!isPositiveInteger(cfg.logging.keepDays)) {
    errors.push(`logging.keepDays must be a positive integer, got ${cfg.logging.keepDays}`);
  }

  return { errors, warnings };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

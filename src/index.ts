export { config, type AppConfig, type AggregatorOptions } from "./config.js";
export { validateConfig, type ValidationResult } from "./config-validator.js";
export { logger, pruneOldLogs } from "./logging.js";

export type {
  BookLevel,
  ChangeDirection,
  DropReason,
  IngestResult,
  Instant,
  InstrumentState,
  LatencySample,
  LatencyStats,
  RenderSnapshot,
  Renderer,
  UpdateEvent,
} from "./aggregator/types.js";
export {
  normalizeTimestamp,
  parseIsoDateTime,
  computeLatencyMs,
  type InvalidTimestamp,
  type NormalizedTimestamp,
  type TimestampEncoding,
} from "./aggregator/timestamp.js";
export { classifyChange, changeArrow } from "./aggregator/change-classifier.js";
export { LatencyWindow, summarize } from "./aggregator/latency-window.js";
export { InstrumentStateStore, normalizeSymbol, type StateFields } from "./aggregator/state-store.js";
export { EventIngest, type IngestCounters, type IngestOptions } from "./aggregator/ingest.js";
export {
  RenderScheduler,
  buildRenderSnapshot,
  type RenderSchedulerOptions,
  type RenderSchedulerStats,
  type SchedulerState,
} from "./aggregator/render-scheduler.js";
export {
  AggregatorContext,
  createAggregatorContext,
  resolveAggregatorOptions,
  type AggregatorContextParams,
} from "./aggregator/context.js";
export {
  summarizeSession,
  gradeLatency,
  activityLevel,
  activityByRate,
  type SessionSummary,
  type LatencyGrade,
  type ActivityLevel,
} from "./aggregator/session-summary.js";

export {
  adaptFeedMessage,
  extendFieldMap,
  DEFAULT_FIELD_MAP,
  type FieldMap,
  type AdaptResult,
} from "./feed/field-map.js";
export type { QuoteTransport, MessageHandler } from "./feed/transport.js";
export { QuoteMonitor, type QuoteMonitorParams, type QuoteMonitorCounters } from "./monitor.js";
export { formatQuoteTable, createConsoleRenderer, formatClockTime } from "./render/quote-table.js";
export { runQuoteMonitor, type RunQuoteMonitorParams } from "./run.js";

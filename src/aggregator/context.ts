import { config, type AggregatorOptions } from "../config.js";
import { EventIngest, type IngestCounters } from "./ingest.js";
import { LatencyWindow } from "./latency-window.js";
import { RenderScheduler, type RenderSchedulerStats } from "./render-scheduler.js";
import { summarizeSession, type SessionSummary } from "./session-summary.js";
import { InstrumentStateStore } from "./state-store.js";
import type { Instant, IngestResult, RenderSnapshot, Renderer, UpdateEvent } from "./types.js";

export interface AggregatorContextParams {
  renderer: Renderer;
  /** Anything left out falls back to the process config */
  options?: Partial<AggregatorOptions>;
  recentLatencySamples?: number;
  now?: () => Instant;
}

export function resolveAggregatorOptions(overrides: Partial<AggregatorOptions> = {}): AggregatorOptions {
  return { ...config.aggregator, ...overrides };
}

/**
 * One monitoring session's worth of state: store, latency window, ingest and
 * render scheduler, wired together. Callers own the instance; several can run
 * side by side in one process.
 */
export class AggregatorContext {
  readonly options: AggregatorOptions;
  readonly store = new InstrumentStateStore();
  readonly latency: LatencyWindow;
  readonly ingest: EventIngest;
  readonly scheduler: RenderScheduler;

  constructor(params: AggregatorContextParams) {
    this.options = resolveAggregatorOptions(params.options);
    this.latency = new LatencyWindow(this.options.latencyWindowSize);
    this.scheduler = new RenderScheduler({ store: this.store, latency: this.latency }, params.renderer, {
      refreshCadenceMs: this.options.refreshCadenceMs,
      burstThreshold: this.options.burstThreshold,
      recentLatencySamples: params.recentLatencySamples,
      now: params.now,
    });
    this.ingest = new EventIngest(this.store, this.latency, {
      latencyFloorMs: this.options.latencyFloorMs,
      latencyCeilingMs: this.options.latencyCeilingMs,
      onAccepted: () => this.scheduler.notifyEvent(),
    });
  }

  onEvent(event: UpdateEvent): IngestResult {
    return this.ingest.onEvent(event);
  }

  start(): void {
    this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
  }

  /** Clears instruments and latency samples; the scheduler keeps running. */
  reset(): void {
    this.store.reset();
    this.latency.clear();
    this.scheduler.resetEventCount();
  }

  snapshot(): RenderSnapshot {
    return this.scheduler.peek();
  }

  counters(): { ingest: IngestCounters; render: RenderSchedulerStats } {
    return { ingest: this.ingest.counters(), render: this.scheduler.stats() };
  }

  summary(startedAt: Instant, endedAt: Instant): SessionSummary {
    return summarizeSession(this.snapshot(), startedAt, endedAt);
  }
}

export function createAggregatorContext(params: AggregatorContextParams): AggregatorContext {
  return new AggregatorContext(params);
}

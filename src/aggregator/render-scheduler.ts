import { logRender as log } from "../logging.js";
import type { InstrumentStateStore } from "./state-store.js";
import type { LatencyWindow } from "./latency-window.js";
import type { Instant, RenderSnapshot, Renderer } from "./types.js";

/**
 * Render scheduler: bounds how often the display is redrawn, independent of
 * how fast updates arrive.
 *
 *   idle ──start()──▶ armed ──timer | burst──▶ rendering ──▶ armed
 *     ▲                                                       │
 *     └────────────────────────stop()─────────────────────────┘
 *
 * A render happens on whichever comes first: the cadence timer, or
 * `burstThreshold` accepted events since the previous render. The first caps
 * staleness of a quiet market, the second caps how much a fast market can pile
 * up between frames. The timer restarts after every render.
 *
 * Handoff to the renderer is a single slot, latest-wins: while an async
 * renderer is busy, a newer snapshot replaces the waiting one instead of
 * queueing behind it.
 */

export type SchedulerState = "idle" | "armed" | "rendering";
export type RenderTrigger = "timer" | "burst" | "manual";

export interface RenderSchedulerOptions {
  refreshCadenceMs: number;
  burstThreshold: number;
  /** Size of the "recent" latency figure in each snapshot */
  recentLatencySamples?: number;
  now?: () => Instant;
}

export interface RenderSchedulerStats {
  state: SchedulerState;
  eventsSinceRender: number;
  renders: number;
  timerRenders: number;
  burstRenders: number;
  manualRenders: number;
  /** Snapshots replaced in the handoff slot before the renderer took them */
  superseded: number;
  rendererFailures: number;
}

export interface SnapshotSource {
  store: InstrumentStateStore;
  latency: LatencyWindow;
}

export const DEFAULT_RECENT_LATENCY_SAMPLES = 10;

export function buildRenderSnapshot(
  source: SnapshotSource,
  asOf: Instant,
  sequence: number,
  recentSamples: number = DEFAULT_RECENT_LATENCY_SAMPLES,
): RenderSnapshot {
  return Object.freeze({
    instruments: source.store.snapshot(),
    latencyStats: Object.freeze(source.latency.stats()),
    recentLatencyStats: Object.freeze(source.latency.recentStats(recentSamples)),
    totalUpdates: source.store.totalUpdates,
    asOf,
    sequence,
  });
}

export class RenderScheduler {
  private state: SchedulerState = "idle";
  private timer: ReturnType<typeof setTimeout> | null = null;
  private eventsSinceRender = 0;
  private sequence = 0;
  private inFlight = false;
  private pending: RenderSnapshot | null = null;
  private readonly counts = {
    renders: 0,
    timerRenders: 0,
    burstRenders: 0,
    manualRenders: 0,
    superseded: 0,
    rendererFailures: 0,
  };
  private readonly refreshCadenceMs: number;
  private readonly burstThreshold: number;
  private readonly recentSamples: number;
  private readonly now: () => Instant;

  constructor(
    private readonly source: SnapshotSource,
    private readonly renderer: Renderer,
    options: RenderSchedulerOptions,
  ) {
    if (!Number.isInteger(options.refreshCadenceMs) || options.refreshCadenceMs < 1) {
      throw new RangeError(`refreshCadenceMs must be a positive integer, got ${options.refreshCadenceMs}`);
    }
    if (!Number.isInteger(options.burstThreshold) || options.burstThreshold < 1) {
      throw new RangeError(`burstThreshold must be a positive integer, got ${options.burstThreshold}`);
    }
    this.refreshCadenceMs = options.refreshCadenceMs;
    this.burstThreshold = options.burstThreshold;
    this.recentSamples = options.recentLatencySamples ?? DEFAULT_RECENT_LATENCY_SAMPLES;
    this.now = options.now ?? (() => Date.now());
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  start(): void {
    if (this.state !== "idle") return;
    this.state = "armed";
    this.eventsSinceRender = 0;
    this.armTimer();
    log.debug({ refreshCadenceMs: this.refreshCadenceMs, burstThreshold: this.burstThreshold }, "Render scheduler armed");
  }

  /** Safe from any state, any number of times. A snapshot waiting in the slot is discarded. */
  stop(): void {
    this.clearTimer();
    this.pending = null;
    this.eventsSinceRender = 0;
    if (this.state === "idle") return;
    this.state = "idle";
    log.debug({ renders: this.counts.renders }, "Render scheduler stopped");
  }

  /** Count one accepted event; renders at once when the burst threshold is reached. */
  notifyEvent(): void {
    if (this.state !== "armed") return;
    this.eventsSinceRender++;
    if (this.eventsSinceRender >= this.burstThreshold) {
      this.render("burst");
    }
  }

  /** Forget events counted toward the next burst (used when state is reset). */
  resetEventCount(): void {
    this.eventsSinceRender = 0;
  }

  /** Render immediately; ignored unless armed. */
  renderNow(): void {
    this.render("manual");
  }

  /** A snapshot of the current state without rendering it. */
  peek(): RenderSnapshot {
    return buildRenderSnapshot(this.source, this.now(), ++this.sequence, this.recentSamples);
  }

  stats(): RenderSchedulerStats {
    return { state: this.state, eventsSinceRender: this.eventsSinceRender, ...this.counts };
  }

  private render(trigger: RenderTrigger): void {
    if (this.state !== "armed") return;
    this.state = "rendering";
    this.clearTimer();

    const snapshot = this.peek();
    this.eventsSinceRender = 0;
    this.counts.renders++;
    if (trigger === "timer") this.counts.timerRenders++;
    else if (trigger === "burst") this.counts.burstRenders++;
    else this.counts.manualRenders++;

    this.handoff(snapshot);

    // stop() may have been called by the renderer itself
    if (this.state === "rendering") {
      this.state = "armed";
      this.armTimer();
    }
  }

  private handoff(snapshot: RenderSnapshot): void {
    if (this.inFlight) {
      if (this.pending) this.counts.superseded++;
      this.pending = snapshot;
      return;
    }
    this.deliver(snapshot);
  }

  private deliver(snapshot: RenderSnapshot): void {
    let result: void | Promise<void>;
    try {
      result = this.renderer(snapshot);
    } catch (err) {
      this.recordFailure(err, snapshot);
      return;
    }

    if (result instanceof Promise) {
      this.inFlight = true;
      void result
        .catch((err: unknown) => this.recordFailure(err, snapshot))
        .finally(() => this.onRendererSettled());
    }
  }

  private onRendererSettled(): void {
    this.inFlight = false;
    const next = this.pending;
    this.pending = null;
    if (next && this.state !== "idle") this.deliver(next);
  }

  private recordFailure(err: unknown, snapshot: RenderSnapshot): void {
    this.counts.rendererFailures++;
    log.error({ err, sequence: snapshot.sequence }, "Renderer failed");
  }

  private armTimer(): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.render("timer");
    }, this.refreshCadenceMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

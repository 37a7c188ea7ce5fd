import { logIngest as log } from "../logging.js";
import { computeLatencyMs, normalizeTimestamp } from "./timestamp.js";
import { normalizeSymbol, type ExchangeTiming, type InstrumentStateStore } from "./state-store.js";
import type { LatencyWindow } from "./latency-window.js";
import type { BookLevel, DropReason, IngestResult, InstrumentState, UpdateEvent } from "./types.js";

export interface IngestOptions {
  /** Latencies below this are not sampled (clock-skew tolerance) */
  latencyFloorMs: number;
  /** Latencies above this are not sampled */
  latencyCeilingMs: number;
  /** Called after every accepted event, once the state is stored */
  onAccepted?: (state: InstrumentState) => void;
}

export interface IngestCounters {
  accepted: number;
  dropped: Record<DropReason, number>;
  invalidTimestamps: number;
  rejectedSamples: number;
}

function emptyCounters(): IngestCounters {
  return {
    accepted: 0,
    dropped: { "empty-symbol": 0, "no-book-data": 0, "invalid-price": 0 },
    invalidTimestamps: 0,
    rejectedSamples: 0,
  };
}

function hasValidPrice(level: BookLevel | undefined): boolean {
  return level === undefined || Number.isFinite(level.price);
}

/**
 * Entry point for normalized updates. Validates, times and applies each event;
 * never blocks and never throws for bad input.
 */
export class EventIngest {
  private counts = emptyCounters();

  constructor(
    private readonly store: InstrumentStateStore,
    private readonly latency: LatencyWindow,
    private readonly options: IngestOptions,
  ) {}

  onEvent(event: UpdateEvent): IngestResult {
    const symbol = normalizeSymbol(event.symbol);

    let reason: DropReason | null = null;
    if (symbol.length === 0) reason = "empty-symbol";
    else if (!event.bid && !event.ask) reason = "no-book-data";
    else if (!hasValidPrice(event.bid) || !hasValidPrice(event.ask)) reason = "invalid-price";

    if (reason) {
      this.counts.dropped[reason]++;
      log.debug({ symbol: event.symbol, reason }, "Dropped update");
      return { status: "dropped", reason };
    }

    let exchange: ExchangeTiming | undefined;
    const ts = normalizeTimestamp(event.rawTimestamp);
    if (ts.ok) {
      exchange = { instant: ts.instant, latencyMs: computeLatencyMs(event.receiveInstant, ts.instant) };
    } else {
      this.counts.invalidTimestamps++;
      if (ts.error.reason !== "missing") {
        log.debug({ symbol, raw: ts.error.raw, reason: ts.error.reason }, "Unusable exchange timestamp");
      }
    }

    const state = this.store.apply(symbol, {
      bid: event.bid,
      ask: event.ask,
      receiveInstant: event.receiveInstant,
      exchange,
    });
    this.counts.accepted++;

    let sampled = false;
    if (exchange) {
      const { latencyMs } = exchange;
      if (latencyMs >= this.options.latencyFloorMs && latencyMs <= this.options.latencyCeilingMs) {
        this.latency.push({ valueMs: latencyMs, capturedAt: event.receiveInstant });
        sampled = true;
      } else {
        this.counts.rejectedSamples++;
        log.debug({ symbol, latencyMs }, "Latency outside sane bounds, not sampled");
      }
    }

    this.options.onAccepted?.(state);
    return { status: "accepted", state, latencyMs: exchange ? exchange.latencyMs : null, sampled };
  }

  counters(): IngestCounters {
    return { ...this.counts, dropped: { ...this.counts.dropped } };
  }

  resetCounters(): void {
    this.counts = emptyCounters();
  }
}

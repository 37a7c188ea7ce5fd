import { logFeed, logMonitor as log } from "./logging.js";
import { AggregatorContext, type AggregatorContextParams } from "./aggregator/context.js";
import { normalizeSymbol } from "./aggregator/state-store.js";
import type { SessionSummary } from "./aggregator/session-summary.js";
import type { Instant } from "./aggregator/types.js";
import { adaptFeedMessage, type AdaptFailure, type FieldMap } from "./feed/field-map.js";
import type { QuoteTransport } from "./feed/transport.js";

export interface QuoteMonitorParams extends AggregatorContextParams {
  transport: QuoteTransport;
  fieldMap?: FieldMap;
}

export interface QuoteMonitorCounters {
  messages: number;
  rejected: Record<AdaptFailure, number>;
  subscribeFailures: number;
  unsubscribeFailures: number;
}

interface Subscription {
  id: string;
  symbol: string;
}

/**
 * Session lifecycle around an AggregatorContext: subscribes symbols on a
 * transport, adapts each message, and tears everything down on stop().
 */
export class QuoteMonitor {
  readonly context: AggregatorContext;
  private readonly transport: QuoteTransport;
  private readonly fieldMap: FieldMap | undefined;
  private readonly now: () => Instant;
  private subscriptions: Subscription[] = [];
  private running = false;
  /** Bumped by every start() and stop(); work begun under an older value is abandoned. */
  private session = 0;
  private startedAt: Instant | null = null;
  private readonly counts: QuoteMonitorCounters = {
    messages: 0,
    rejected: { "not-an-object": 0, "malformed-book": 0 },
    subscribeFailures: 0,
    unsubscribeFailures: 0,
  };

  constructor(params: QuoteMonitorParams) {
    this.context = new AggregatorContext(params);
    this.transport = params.transport;
    this.fieldMap = params.fieldMap;
    this.now = params.now ?? (() => Date.now());
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Subscribes every symbol (blank and duplicate entries skipped); resolves to those that succeeded. */
  async start(symbols: string[]): Promise<string[]> {
    if (this.running) return this.subscriptions.map((s) => s.symbol);
    this.running = true;
    const session = ++this.session;
    this.startedAt = this.now();

    const unique = Array.from(new Set(symbols.map(normalizeSymbol).filter((s) => s.length > 0)));
    for (const symbol of unique) {
      if (session !== this.session) return [];
      try {
        const id = await this.transport.subscribe(symbol, (message) => this.handleMessage(session, symbol, message));
        // stop(), possibly followed by another start(), ran while this subscription was pending
        if (session !== this.session) {
          await this.release({ id, symbol });
          return [];
        }
        this.subscriptions.push({ id, symbol });
        logFeed.info({ symbol, subscriptionId: id }, "Subscribed");
      } catch (err) {
        this.counts.subscribeFailures++;
        logFeed.error({ err, symbol }, "Subscription failed");
      }
    }

    if (session !== this.session) return [];
    this.context.start();
    log.info({ symbols: this.subscriptions.length, requested: unique.length }, "Quote monitor started");
    return this.subscriptions.map((s) => s.symbol);
  }

  /** The transport reported the feed gone: drop everything it told us. */
  feedLost(): void {
    log.warn({ instruments: this.context.store.size }, "Feed lost, clearing quote state");
    this.context.reset();
  }

  /** Stops rendering and unsubscribes; resolves to the session summary. */
  async stop(): Promise<SessionSummary> {
    const endedAt = this.now();
    const startedAt = this.startedAt ?? endedAt;
    const summary = this.context.summary(startedAt, endedAt);

    if (!this.running) return summary;
    this.running = false;
    this.session++;
    this.context.stop();

    const subscriptions = this.subscriptions;
    this.subscriptions = [];
    await Promise.all(subscriptions.map((s) => this.release(s)));

    log.info(
      {
        uptimeSeconds: summary.uptimeSeconds,
        totalUpdates: summary.totalUpdates,
        meanLatencyMs: summary.latency.meanMs,
        latencyGrade: summary.latencyGrade,
      },
      "Quote monitor stopped",
    );
    return summary;
  }

  counters(): QuoteMonitorCounters {
    return { ...this.counts, rejected: { ...this.counts.rejected } };
  }

  private handleMessage(session: number, symbol: string, message: unknown): void {
    if (!this.running || session !== this.session) return;
    this.counts.messages++;
    const adapted = adaptFeedMessage(message, {
      receiveInstant: this.now(),
      symbolHint: symbol,
      fieldMap: this.fieldMap,
    });
    if (!adapted.ok) {
      this.counts.rejected[adapted.reason]++;
      logFeed.debug({ symbol, reason: adapted.reason }, "Unreadable feed message");
      return;
    }
    this.context.onEvent(adapted.event);
  }

  private async release(subscription: Subscription): Promise<void> {
    try {
      await this.transport.unsubscribe(subscription.id);
    } catch (err) {
      this.counts.unsubscribeFailures++;
      logFeed.warn({ err, symbol: subscription.symbol }, "Unsubscribe failed");
    }
  }
}

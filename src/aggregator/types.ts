// ── Shared aggregator types ─────────────────────────────────────────────
//
// Instants are epoch milliseconds throughout.

export type Instant = number;

export interface BookLevel {
  price: number;
  volume: number | null;
}

/** Canonical update envelope produced at the transport boundary. */
export interface UpdateEvent {
  symbol: string;
  bid?: BookLevel;
  ask?: BookLevel;
  rawTimestamp?: number | string;
  /** Captured locally when the message arrived, never taken from the payload */
  receiveInstant: Instant;
}

export type ChangeDirection = "up" | "down" | "unchanged" | "first_observation";

export interface InstrumentState {
  readonly symbol: string;
  readonly bid: Readonly<BookLevel> | null;
  readonly ask: Readonly<BookLevel> | null;
  /** ask − bid when both sides are known */
  readonly spread: number | null;
  /** true when the book is crossed (spread < 0) */
  readonly crossed: boolean;
  readonly previousBid: Readonly<BookLevel> | null;
  readonly previousAsk: Readonly<BookLevel> | null;
  readonly bidChange: ChangeDirection | null;
  readonly askChange: ChangeDirection | null;
  readonly lastExchangeInstant: Instant | null;
  readonly lastReceiveInstant: Instant;
  readonly lastLatencyMs: number | null;
  readonly updateCount: number;
}

export interface LatencySample {
  valueMs: number;
  capturedAt: Instant;
}

export interface LatencyStats {
  count: number;
  meanMs: number | null;
  minMs: number | null;
  maxMs: number | null;
}

export interface RenderSnapshot {
  readonly instruments: ReadonlyMap<string, InstrumentState>;
  readonly latencyStats: Readonly<LatencyStats>;
  /** Same statistics over the most recent samples only */
  readonly recentLatencyStats: Readonly<LatencyStats>;
  readonly totalUpdates: number;
  readonly asOf: Instant;
  /** Increments by one per snapshot built by a scheduler */
  readonly sequence: number;
}

export type Renderer = (snapshot: RenderSnapshot) => void | Promise<void>;

export type DropReason = "empty-symbol" | "no-book-data" | "invalid-price";

export type IngestResult =
  | {
      status: "accepted";
      state: InstrumentState;
      /** null when the timestamp could not be normalized */
      latencyMs: number | null;
      /** whether the latency made it into the rolling window */
      sampled: boolean;
    }
  | { status: "dropped"; reason: DropReason };

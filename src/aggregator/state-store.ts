import { classifyChange } from "./change-classifier.js";
import type { BookLevel, ChangeDirection, Instant, InstrumentState } from "./types.js";

export interface ExchangeTiming {
  instant: Instant;
  latencyMs: number;
}

export interface StateFields {
  bid?: BookLevel;
  ask?: BookLevel;
  receiveInstant: Instant;
  /** Omitted when the update had no usable exchange time; the previous timing is kept. */
  exchange?: ExchangeTiming;
}

interface SideState {
  current: Readonly<BookLevel> | null;
  previous: Readonly<BookLevel> | null;
  change: ChangeDirection | null;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

function freezeLevel(level: BookLevel): Readonly<BookLevel> {
  return Object.freeze({ price: level.price, volume: level.volume });
}

// A side missing from the update keeps its value, its previous value and its last direction.
function nextSide(
  update: BookLevel | undefined,
  current: Readonly<BookLevel> | null,
  previous: Readonly<BookLevel> | null,
  change: ChangeDirection | null,
): SideState {
  if (!update) return { current, previous, change };
  return {
    current: freezeLevel(update),
    previous: current,
    change: classifyChange(update.price, current?.price),
  };
}

/**
 * Per-symbol top-of-book state.
 *
 * Each stored InstrumentState is frozen and replaced wholesale on apply(), so
 * a reader holding a state (or a snapshot map) can never see it half-updated.
 */
export class InstrumentStateStore {
  private readonly states = new Map<string, InstrumentState>();
  private updates = 0;

  get size(): number {
    return this.states.size;
  }

  /** Accepted updates across all symbols since the last reset. */
  get totalUpdates(): number {
    return this.updates;
  }

  apply(symbol: string, fields: StateFields): InstrumentState {
    const key = normalizeSymbol(symbol);
    const prev = this.states.get(key);

    const bid = nextSide(fields.bid, prev?.bid ?? null, prev?.previousBid ?? null, prev?.bidChange ?? null);
    const ask = nextSide(fields.ask, prev?.ask ?? null, prev?.previousAsk ?? null, prev?.askChange ?? null);

    const updateCount = (prev?.updateCount ?? 0) + 1;
    const spread = bid.current && ask.current ? ask.current.price - bid.current.price : null;

    const next: InstrumentState = Object.freeze({
      symbol: key,
      bid: bid.current,
      ask: ask.current,
      spread,
      crossed: spread !== null && spread < 0,
      previousBid: bid.previous,
      previousAsk: ask.previous,
      bidChange: bid.change,
      askChange: ask.change,
      lastExchangeInstant: fields.exchange ? fields.exchange.instant : (prev?.lastExchangeInstant ?? null),
      lastReceiveInstant: fields.receiveInstant,
      lastLatencyMs: fields.exchange ? fields.exchange.latencyMs : (prev?.lastLatencyMs ?? null),
      updateCount,
    });

    this.states.set(key, next);
    this.updates++;
    return next;
  }

  get(symbol: string): InstrumentState | null {
    return this.states.get(normalizeSymbol(symbol)) ?? null;
  }

  symbols(): string[] {
    return Array.from(this.states.keys()).sort();
  }

  /** Independent map of the current (frozen) states, sorted by symbol. */
  snapshot(): ReadonlyMap<string, InstrumentState> {
    const out = new Map<string, InstrumentState>();
    for (const symbol of this.symbols()) {
      const state = this.states.get(symbol);
      if (state) out.set(symbol, state);
    }
    return out;
  }

  reset(): void {
    this.states.clear();
    this.updates = 0;
  }
}

import { z } from "zod";
import type { BookLevel, Instant, UpdateEvent } from "../aggregator/types.js";

// ── Field map ────────────────────────────────────────────────────────────
//
// Providers name the same thing differently (bid / bestBid / b, price / p,
// timestamp / ms_timestamp / T). The map lists, per canonical field, the
// aliases to try in order; the first one present wins. Envelope keys name
// nested objects (e.g. `data`) that are searched before the top level.

export interface FieldMap {
  envelope: readonly string[];
  symbol: readonly string[];
  /** Best-first arrays of levels */
  bids: readonly string[];
  asks: readonly string[];
  /** Scalar top-of-book fields, used when no level array is present */
  bidPrice: readonly string[];
  askPrice: readonly string[];
  bidVolume: readonly string[];
  askVolume: readonly string[];
  timestamp: readonly string[];
  /** Keys inside a level object */
  levelPrice: readonly string[];
  levelVolume: readonly string[];
}

export const DEFAULT_FIELD_MAP: FieldMap = {
  envelope: ["data"],
  symbol: ["symbol", "code", "ticker", "instrument", "s"],
  bids: ["bids", "b"],
  asks: ["asks", "a"],
  bidPrice: ["bid", "bestBid", "best_bid", "bidPrice", "bid_price", "b"],
  askPrice: ["ask", "bestAsk", "best_ask", "askPrice", "ask_price", "a"],
  bidVolume: ["bidSize", "bid_size", "bidVolume", "bid_volume", "B"],
  askVolume: ["askSize", "ask_size", "askVolume", "ask_volume", "A"],
  timestamp: ["ms_timestamp", "timestamp", "time", "exchange_time", "server_time", "orderbook_time", "ts", "T", "E"],
  levelPrice: ["price", "p"],
  levelVolume: ["volume", "size", "qty", "quantity", "v"],
};

const FIELD_MAP_KEYS: ReadonlyArray<keyof FieldMap> = [
  "envelope",
  "symbol",
  "bids",
  "asks",
  "bidPrice",
  "askPrice",
  "bidVolume",
  "askVolume",
  "timestamp",
  "levelPrice",
  "levelVolume",
];

/** Overlay aliases onto the default map; listed aliases are tried before the defaults. */
export function extendFieldMap(overrides: Partial<FieldMap>): FieldMap {
  const merged: FieldMap = { ...DEFAULT_FIELD_MAP };
  for (const key of FIELD_MAP_KEYS) {
    const extra = overrides[key];
    if (extra) merged[key] = [...extra, ...DEFAULT_FIELD_MAP[key].filter((alias) => !extra.includes(alias))];
  }
  return merged;
}

// ── Schemas ──────────────────────────────────────────────────────────────

const ObjectSchema = z.record(z.unknown());

/** Finite number, or a numeric string as many JSON feeds send prices */
const NumericSchema = z.union([
  z.number().finite(),
  z.string().trim().min(1).pipe(z.coerce.number().finite()),
]);

/** [price, volume, ...] as sent by depth streams */
const LevelTupleSchema = z.tuple([NumericSchema, NumericSchema]).rest(z.unknown());

const TimestampSchema = z.union([z.number(), z.string()]);

// ── Adapter ──────────────────────────────────────────────────────────────

export type AdaptFailure = "not-an-object" | "malformed-book";

export type AdaptResult = { ok: true; event: UpdateEvent } | { ok: false; reason: AdaptFailure };

export interface AdaptOptions {
  receiveInstant: Instant;
  /** Symbol of the subscription the message arrived on; used when the payload names none */
  symbolHint?: string;
  fieldMap?: FieldMap;
}

type Source = Record<string, unknown>;

function probe(sources: Source[], aliases: readonly string[], accept: (value: unknown) => boolean = isPresent): unknown {
  for (const source of sources) {
    for (const alias of aliases) {
      const value = source[alias];
      if (accept(value)) return value;
    }
  }
  return undefined;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function parseLevel(raw: unknown, map: FieldMap): BookLevel | null {
  const tuple = LevelTupleSchema.safeParse(raw);
  if (tuple.success) return { price: tuple.data[0], volume: tuple.data[1] };

  const obj = ObjectSchema.safeParse(raw);
  if (!obj.success) return null;
  const price = NumericSchema.safeParse(probe([obj.data], map.levelPrice));
  if (!price.success) return null;

  const rawVolume = probe([obj.data], map.levelVolume);
  if (rawVolume === undefined) return { price: price.data, volume: null };
  const volume = NumericSchema.safeParse(rawVolume);
  return volume.success ? { price: price.data, volume: volume.data } : null;
}

type SideResult = { ok: true; level: BookLevel | undefined } | { ok: false };

function readSide(
  sources: Source[],
  map: FieldMap,
  arrayAliases: readonly string[],
  priceAliases: readonly string[],
  volumeAliases: readonly string[],
): SideResult {
  const levels = probe(sources, arrayAliases, Array.isArray);
  if (Array.isArray(levels)) {
    if (levels.length === 0) return { ok: true, level: undefined };
    const level = parseLevel(levels[0], map);
    return level ? { ok: true, level } : { ok: false };
  }

  const rawPrice = probe(sources, priceAliases, (v) => isPresent(v) && !Array.isArray(v));
  if (rawPrice === undefined) return { ok: true, level: undefined };
  const price = NumericSchema.safeParse(rawPrice);
  if (!price.success) return { ok: false };

  const rawVolume = probe(sources, volumeAliases);
  if (rawVolume === undefined) return { ok: true, level: { price: price.data, volume: null } };
  const volume = NumericSchema.safeParse(rawVolume);
  return volume.success ? { ok: true, level: { price: price.data, volume: volume.data } } : { ok: false };
}

/**
 * Turns one raw provider message into the canonical UpdateEvent. Only the
 * best level of each side is read. Validation of symbol and book content
 * beyond shape is left to EventIngest.
 */
export function adaptFeedMessage(raw: unknown, options: AdaptOptions): AdaptResult {
  const map = options.fieldMap ?? DEFAULT_FIELD_MAP;
  const root = ObjectSchema.safeParse(raw);
  if (!root.success) return { ok: false, reason: "not-an-object" };

  const sources: Source[] = [];
  for (const key of map.envelope) {
    const nested = ObjectSchema.safeParse(root.data[key]);
    if (nested.success) sources.push(nested.data);
  }
  sources.push(root.data);

  const bid = readSide(sources, map, map.bids, map.bidPrice, map.bidVolume);
  const ask = readSide(sources, map, map.asks, map.askPrice, map.askVolume);
  if (!bid.ok || !ask.ok) return { ok: false, reason: "malformed-book" };

  const rawSymbol = probe(sources, map.symbol, (v) => typeof v === "string" && v.trim().length > 0);
  const symbol = typeof rawSymbol === "string" ? rawSymbol : (options.symbolHint ?? "");

  const timestamp = TimestampSchema.safeParse(probe(sources, map.timestamp));

  const event: UpdateEvent = { symbol, receiveInstant: options.receiveInstant };
  if (bid.level) event.bid = bid.level;
  if (ask.level) event.ask = ask.level;
  if (timestamp.success) event.rawTimestamp = timestamp.data;
  return { ok: true, event };
}

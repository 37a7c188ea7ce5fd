import type { Instant } from "./types.js";

/**
 * Exchange timestamp normalization.
 *
 * Feeds report the exchange time as epoch milliseconds, epoch seconds or
 * ISO-8601 text, often without saying which. Numbers are told apart by
 * magnitude:
 *   > 1e12          → epoch milliseconds
 *   > 1e9, ≤ 1e12   → epoch seconds
 * Text must be an ISO-8601 date-time. Without an offset it is read as local
 * wall-clock time.
 */

const EPOCH_MS_THRESHOLD = 1e12;
const EPOCH_S_THRESHOLD = 1e9;

export type TimestampEncoding = "epoch-ms" | "epoch-s" | "iso-8601";

export type InvalidTimestampReason =
  | "missing"
  | "non-finite"
  | "out-of-range"
  | "unparseable"
  | "unsupported-type";

export interface InvalidTimestamp {
  kind: "InvalidTimestamp";
  reason: InvalidTimestampReason;
  raw: unknown;
}

export type NormalizedTimestamp =
  | { ok: true; instant: Instant; encoding: TimestampEncoding }
  | { ok: false; error: InvalidTimestamp };

// date, T or space, hh:mm, optional :ss and fraction, optional Z / ±hh / ±hhmm / ±hh:mm
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

function invalid(reason: InvalidTimestampReason, raw: unknown): NormalizedTimestamp {
  return { ok: false, error: { kind: "InvalidTimestamp", reason, raw } };
}

export function normalizeTimestamp(raw: unknown): NormalizedTimestamp {
  if (raw === undefined || raw === null) return invalid("missing", raw);

  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) return invalid("non-finite", raw);
    if (raw > EPOCH_MS_THRESHOLD) return { ok: true, instant: raw, encoding: "epoch-ms" };
    if (raw > EPOCH_S_THRESHOLD) return { ok: true, instant: raw * 1000, encoding: "epoch-s" };
    return invalid("out-of-range", raw);
  }

  if (typeof raw === "string") {
    const instant = parseIsoDateTime(raw.trim());
    return instant === null ? invalid("unparseable", raw) : { ok: true, instant, encoding: "iso-8601" };
  }

  return invalid("unsupported-type", raw);
}

/** Parses an ISO-8601 date-time to epoch ms, or null when the text is not one. */
export function parseIsoDateTime(text: string): Instant | null {
  const match = ISO_DATE_TIME.exec(text);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = s === undefined ? 0 : Number(s);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  // Sub-millisecond digits are kept as a fractional millisecond
  const fractionMs = frac === undefined ? 0 : Number(`0.${frac}`) * 1000;

  if (offset === undefined) {
    return new Date(year, month - 1, day, hour, minute, second).getTime() + fractionMs;
  }

  const offsetMinutes = parseOffsetMinutes(offset);
  if (offsetMinutes === null) return null;
  return Date.UTC(year, month - 1, day, hour, minute, second) + fractionMs - offsetMinutes * 60_000;
}

function parseOffsetMinutes(offset: string): number | null {
  if (offset === "Z" || offset === "z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Exchange-to-local latency. Negative when the local clock is behind the
 * exchange clock; never clamped so skew stays visible.
 */
export function computeLatencyMs(receiveInstant: Instant, exchangeInstant: Instant): number {
  return receiveInstant - exchangeInstant;
}

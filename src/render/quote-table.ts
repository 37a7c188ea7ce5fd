/**
 * Quote table renderer
 *
 * Formats a RenderSnapshot as a fixed-width terminal table: one row per
 * instrument (sorted by symbol), with change arrows, spread, latency, update
 * count and exchange time, followed by a latency footer.
 */

import { changeArrow } from "../aggregator/change-classifier.js";
import { activityLevel, gradeLatency } from "../aggregator/session-summary.js";
import type { Instant, InstrumentState, RenderSnapshot, Renderer } from "../aggregator/types.js";
import {
  colorize,
  getActivityColorName,
  getChangeColorName,
  getLatencyColorName,
  getSpreadColorName,
} from "../shared/colors.js";

export interface QuoteTableOptions {
  /** ANSI colors (default false) */
  color?: boolean;
  /** Digits after the decimal point for prices and spread (default 2) */
  priceDecimals?: number;
  /** Clock used for times (default local) */
  clock?: "local" | "utc";
}

export const TABLE_WIDTH = 80;

const CLEAR_SCREEN = "\x1b[2J\x1b[H";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** HH:MM:SS.mmm */
export function formatClockTime(instant: Instant, clock: "local" | "utc" = "local"): string {
  const d = new Date(instant);
  const utc = clock === "utc";
  const h = utc ? d.getUTCHours() : d.getHours();
  const m = utc ? d.getUTCMinutes() : d.getMinutes();
  const s = utc ? d.getUTCSeconds() : d.getSeconds();
  const ms = utc ? d.getUTCMilliseconds() : d.getMilliseconds();
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}.${String(ms).padStart(3, "0")}`;
}

function formatLatency(ms: number | null): string {
  return ms === null ? "N/A" : `${Math.round(ms)}ms`;
}

function formatRow(state: InstrumentState, opts: Required<QuoteTableOptions>): string {
  const { color, priceDecimals, clock } = opts;

  const bid = state.bid ? state.bid.price.toFixed(priceDecimals) : "-";
  const ask = state.ask ? state.ask.price.toFixed(priceDecimals) : "-";
  const spread = state.spread === null ? "-" : `${state.spread.toFixed(priceDecimals)}${state.crossed ? " X" : ""}`;
  const latency = formatLatency(state.lastLatencyMs);
  const time = state.lastExchangeInstant === null ? "N/A" : formatClockTime(state.lastExchangeInstant, clock);

  const cells = [
    state.symbol.padEnd(10),
    colorize(`${changeArrow(state.bidChange)}${bid.padEnd(11)}`, getChangeColorName(state.bidChange), color),
    colorize(`${changeArrow(state.askChange)}${ask.padEnd(11)}`, getChangeColorName(state.askChange), color),
    colorize(spread.padEnd(9), getSpreadColorName(state.spread, state.crossed), color),
    colorize(latency.padEnd(10), getLatencyColorName(gradeLatency(state.lastLatencyMs)), color),
    colorize(String(state.updateCount).padEnd(8), getActivityColorName(activityLevel(state.updateCount)), color),
    time,
  ];
  return cells.join(" ");
}

export function formatQuoteTable(snapshot: RenderSnapshot, options: QuoteTableOptions = {}): string[] {
  const opts: Required<QuoteTableOptions> = {
    color: options.color ?? false,
    priceDecimals: options.priceDecimals ?? 2,
    clock: options.clock ?? "local",
  };

  const lines: string[] = [];
  lines.push("=".repeat(TABLE_WIDTH));
  lines.push(
    [
      "Symbol".padEnd(10),
      "Bid".padEnd(12),
      "Ask".padEnd(12),
      "Spread".padEnd(9),
      "Latency".padEnd(10),
      "Updates".padEnd(8),
      "Exchange time",
    ].join(" "),
  );
  lines.push("-".repeat(TABLE_WIDTH));

  if (snapshot.instruments.size === 0) {
    lines.push("Waiting for quotes...");
  }
  for (const state of snapshot.instruments.values()) {
    lines.push(formatRow(state, opts));
  }

  lines.push("-".repeat(TABLE_WIDTH));

  const recent = snapshot.recentLatencyStats;
  const all = snapshot.latencyStats;
  if (recent.meanMs !== null && recent.minMs !== null && recent.maxMs !== null) {
    lines.push(
      `Latency (last ${recent.count}): mean ${Math.round(recent.meanMs)}ms | ` +
        `range ${Math.round(recent.minMs)}-${Math.round(recent.maxMs)}ms | window ${all.count}`,
    );
  } else {
    lines.push("Latency: no samples");
  }
  lines.push(`Updated ${formatClockTime(snapshot.asOf, opts.clock)} | ${snapshot.totalUpdates} updates`);
  lines.push("=".repeat(TABLE_WIDTH));
  return lines;
}

/** Redraws the whole screen with the latest table on every render. */
export function createConsoleRenderer(
  write: (chunk: string) => void = (chunk) => {
    process.stdout.write(chunk);
  },
  options: QuoteTableOptions = { color: true },
): Renderer {
  return (snapshot) => {
    write(`${CLEAR_SCREEN}${formatQuoteTable(snapshot, options).join("\n")}\n`);
  };
}

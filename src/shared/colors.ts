/**
 * Shared color utilities for the quote table.
 * Returns semantic color names, mapped to ANSI codes for the terminal.
 */

import type { ChangeDirection } from "../aggregator/types.js";
import type { ActivityLevel, LatencyGrade } from "../aggregator/session-summary.js";

export type ColorName = 'emerald' | 'green' | 'yellow' | 'orange' | 'red' | 'neutral' | 'muted';

/** Map a latency grade to a semantic color */
export function getLatencyColorName(grade: LatencyGrade): ColorName {
  switch (grade) {
    case 'fast':
      return 'emerald';
    case 'normal':
      return 'yellow';
    case 'slow':
      return 'red';
    default:
      return 'muted';
  }
}

/** Map a price move to a semantic color */
export function getChangeColorName(direction: ChangeDirection | null): ColorName {
  if (direction === 'up') return 'green';
  if (direction === 'down') return 'red';
  if (direction === 'unchanged') return 'neutral';
  return 'muted';
}

/** Crossed books stand out; a missing spread is dimmed */
export function getSpreadColorName(spread: number | null, crossed: boolean): ColorName {
  if (spread == null) return 'muted';
  return crossed ? 'orange' : 'neutral';
}

export function getActivityColorName(level: ActivityLevel): ColorName {
  if (level === 'hot') return 'red';
  if (level === 'active') return 'orange';
  if (level === 'moderate') return 'yellow';
  return 'muted';
}

export const ANSI_CODES: Record<ColorName, string> = {
  emerald: "\x1b[92m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  orange: "\x1b[38;5;208m",
  red: "\x1b[31m",
  neutral: "\x1b[37m",
  muted: "\x1b[90m",
};

export const ANSI_RESET = "\x1b[0m";

export function colorize(text: string, color: ColorName, enabled: boolean = true): string {
  return enabled ? `${ANSI_CODES[color]}${text}${ANSI_RESET}` : text;
}

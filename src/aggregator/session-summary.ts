import type { Instant, LatencyStats, RenderSnapshot } from "./types.js";

export type LatencyGrade = "fast" | "normal" | "slow" | "unknown";
export type ActivityLevel = "hot" | "active" | "moderate" | "quiet";

/** < 100ms fast, < 200ms normal, anything else slow. */
export function gradeLatency(latencyMs: number | null): LatencyGrade {
  if (latencyMs === null) return "unknown";
  if (latencyMs < 100) return "fast";
  if (latencyMs < 200) return "normal";
  return "slow";
}

/** Live-table grade by update count. */
export function activityLevel(updateCount: number): ActivityLevel {
  if (updateCount > 50) return "hot";
  if (updateCount > 20) return "active";
  if (updateCount > 5) return "moderate";
  return "quiet";
}

/** Session-report grade: updates per second, > 2 hot, > 1 active, > 0.5 moderate. */
export function activityByRate(updatesPerSecond: number): ActivityLevel {
  if (updatesPerSecond > 2) return "hot";
  if (updatesPerSecond > 1) return "active";
  if (updatesPerSecond > 0.5) return "moderate";
  return "quiet";
}

export interface InstrumentSummary {
  symbol: string;
  updates: number;
  updatesPerSecond: number;
  lastLatencyMs: number | null;
  activity: ActivityLevel;
}

export interface SessionSummary {
  startedAt: Instant;
  endedAt: Instant;
  uptimeSeconds: number;
  totalUpdates: number;
  updatesPerSecond: number;
  latency: LatencyStats;
  latencyGrade: LatencyGrade;
  instruments: InstrumentSummary[];
}

function perSecond(count: number, seconds: number): number {
  return seconds > 0 ? count / seconds : 0;
}

/** End-of-session statistics, rates taken over the whole session. */
export function summarizeSession(snapshot: RenderSnapshot, startedAt: Instant, endedAt: Instant): SessionSummary {
  const uptimeSeconds = Math.max(0, endedAt - startedAt) / 1000;

  const instruments: InstrumentSummary[] = [];
  for (const state of snapshot.instruments.values()) {
    const updatesPerSecond = perSecond(state.updateCount, uptimeSeconds);
    instruments.push({
      symbol: state.symbol,
      updates: state.updateCount,
      updatesPerSecond,
      lastLatencyMs: state.lastLatencyMs,
      activity: activityByRate(updatesPerSecond),
    });
  }
  instruments.sort((a, b) => a.symbol.localeCompare(b.symbol));

  return {
    startedAt,
    endedAt,
    uptimeSeconds,
    totalUpdates: snapshot.totalUpdates,
    updatesPerSecond: perSecond(snapshot.totalUpdates, uptimeSeconds),
    latency: { ...snapshot.latencyStats },
    latencyGrade: gradeLatency(snapshot.latencyStats.meanMs),
    instruments,
  };
}

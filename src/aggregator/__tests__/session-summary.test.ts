import { describe, it, expect } from "vitest";
import { activityByRate, activityLevel, gradeLatency, summarizeSession } from "../session-summary.js";
import { InstrumentStateStore } from "../state-store.js";
import { LatencyWindow } from "../latency-window.js";
import { buildRenderSnapshot } from "../render-scheduler.js";

describe("gradeLatency", () => {
  it("grades by fixed thresholds", () => {
    expect(gradeLatency(null)).toBe("unknown");
    expect(gradeLatency(-40)).toBe("fast");
    expect(gradeLatency(99.9)).toBe("fast");
    expect(gradeLatency(100)).toBe("normal");
    expect(gradeLatency(199)).toBe("normal");
    expect(gradeLatency(200)).toBe("slow");
  });
});

describe("activityLevel", () => {
  it("buckets update counts", () => {
    expect(activityLevel(0)).toBe("quiet");
    expect(activityLevel(5)).toBe("quiet");
    expect(activityLevel(6)).toBe("moderate");
    expect(activityLevel(21)).toBe("active");
    expect(activityLevel(51)).toBe("hot");
  });
});

describe("activityByRate", () => {
  it("buckets updates per second", () => {
    expect(activityByRate(0)).toBe("quiet");
    expect(activityByRate(0.5)).toBe("quiet");
    expect(activityByRate(0.51)).toBe("moderate");
    expect(activityByRate(1)).toBe("moderate");
    expect(activityByRate(1.5)).toBe("active");
    expect(activityByRate(2)).toBe("active");
    expect(activityByRate(2.01)).toBe("hot");
  });
});

describe("summarizeSession", () => {
  it("computes rates over the session and sorts instruments", () => {
    const store = new InstrumentStateStore();
    const latency = new LatencyWindow(10);
    for (let i = 0; i < 8; i++) store.apply("SI", { bid: { price: 100 + i, volume: null }, receiveInstant: i });
    store.apply("BR", {
      bid: { price: 80, volume: null },
      receiveInstant: 10,
      exchange: { instant: 0, latencyMs: 40 },
    });
    latency.push({ valueMs: 40, capturedAt: 10 });
    latency.push({ valueMs: 60, capturedAt: 11 });

    const summary = summarizeSession(buildRenderSnapshot({ store, latency }, 4000, 1), 0, 4000);

    expect(summary).toEqual({
      startedAt: 0,
      endedAt: 4000,
      uptimeSeconds: 4,
      totalUpdates: 9,
      updatesPerSecond: 2.25,
      latency: { count: 2, meanMs: 50, minMs: 40, maxMs: 60 },
      latencyGrade: "fast",
      instruments: [
        { symbol: "BR", updates: 1, updatesPerSecond: 0.25, lastLatencyMs: 40, activity: "quiet" },
        { symbol: "SI", updates: 8, updatesPerSecond: 2, lastLatencyMs: null, activity: "active" },
      ],
    });
  });

  it("grades instrument activity by rate, not by count", () => {
    const store = new InstrumentStateStore();
    for (let i = 0; i < 10; i++) store.apply("SI", { bid: { price: 100 + i, volume: null }, receiveInstant: i });
    const snapshot = buildRenderSnapshot({ store, latency: new LatencyWindow(5) }, 2000, 1);

    const [si] = summarizeSession(snapshot, 0, 2000).instruments;

    expect(si.updatesPerSecond).toBe(5);
    expect(si.activity).toBe("hot");
    expect(activityLevel(si.updates)).toBe("moderate");
  });

  it("reports zero rates for an empty or zero-length session", () => {
    const snapshot = buildRenderSnapshot({ store: new InstrumentStateStore(), latency: new LatencyWindow(5) }, 0, 1);
    const summary = summarizeSession(snapshot, 1000, 1000);

    expect(summary.uptimeSeconds).toBe(0);
    expect(summary.updatesPerSecond).toBe(0);
    expect(summary.latencyGrade).toBe("unknown");
    expect(summary.instruments).toEqual([]);
  });
});

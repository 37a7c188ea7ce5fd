import { describe, it, expect } from "vitest";
import { LatencyWindow, summarize } from "../latency-window.js";

function fill(window: LatencyWindow, values: number[]): void {
  values.forEach((valueMs, i) => window.push({ valueMs, capturedAt: 1000 + i }));
}

describe("LatencyWindow", () => {
  it("keeps only the most recent samples once capacity is exceeded", () => {
    const window = new LatencyWindow(3);
    fill(window, [10, 20, 30, 40]);

    expect(window.values()).toEqual([20, 30, 40]);
    expect(window.stats()).toEqual({ count: 3, meanMs: 30, minMs: 20, maxMs: 40 });
  });

  it("keeps capture instants with their values, oldest first", () => {
    const window = new LatencyWindow(2);
    fill(window, [5, 6, 7]);
    expect(window.samples()).toEqual([
      { valueMs: 6, capturedAt: 1001 },
      { valueMs: 7, capturedAt: 1002 },
    ]);
  });

  it("never grows beyond its capacity", () => {
    const window = new LatencyWindow(50);
    fill(window, Array.from({ length: 1000 }, (_, i) => i));
    expect(window.size).toBe(50);
    expect(window.values()[0]).toBe(950);
    expect(window.stats()).toEqual({ count: 50, meanMs: 974.5, minMs: 950, maxMs: 999 });
  });

  it("reports empty statistics with null figures", () => {
    expect(new LatencyWindow(5).stats()).toEqual({ count: 0, meanMs: null, minMs: null, maxMs: null });
  });

  it("summarizes only the newest samples for recentStats", () => {
    const window = new LatencyWindow(10);
    fill(window, [100, 200, 30, 40]);
    expect(window.recentStats(2)).toEqual({ count: 2, meanMs: 35, minMs: 30, maxMs: 40 });
    expect(window.recentStats(10)).toEqual({ count: 4, meanMs: 92.5, minMs: 30, maxMs: 200 });
    expect(window.recentStats(0).count).toBe(0);
  });

  it("includes negative samples in the statistics", () => {
    const window = new LatencyWindow(3);
    fill(window, [-50, 150]);
    expect(window.stats()).toEqual({ count: 2, meanMs: 50, minMs: -50, maxMs: 150 });
  });

  it("empties on clear and accepts samples again", () => {
    const window = new LatencyWindow(2);
    fill(window, [1, 2, 3]);
    window.clear();
    expect(window.size).toBe(0);
    fill(window, [9]);
    expect(window.values()).toEqual([9]);
  });

  it("rejects a non-positive or fractional capacity", () => {
    expect(() => new LatencyWindow(0)).toThrow(RangeError);
    expect(() => new LatencyWindow(2.5)).toThrow(RangeError);
  });
});

describe("summarize", () => {
  it("computes count, mean, min and max", () => {
    expect(summarize([3, 1, 2])).toEqual({ count: 3, meanMs: 2, minMs: 1, maxMs: 3 });
  });
});

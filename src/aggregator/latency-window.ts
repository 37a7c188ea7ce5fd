import type { LatencySample, LatencyStats } from "./types.js";

export const EMPTY_LATENCY_STATS: Readonly<LatencyStats> = Object.freeze({
  count: 0,
  meanMs: null,
  minMs: null,
  maxMs: null,
});

/**
 * Rolling window of the most recent latency samples.
 *
 * Backed by a fixed-size ring buffer: once full, each push overwrites the
 * oldest sample, so memory stays O(capacity) however long the session runs.
 */
export class LatencyWindow {
  readonly capacity: number;
  private readonly buffer: Array<LatencySample | undefined>;
  private head = 0; // index of the oldest sample
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Latency window capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<LatencySample | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  push(sample: LatencySample): void {
    if (this.count < this.capacity) {
      this.buffer[(this.head + this.count) % this.capacity] = sample;
      this.count++;
      return;
    }
    // Full: evict the oldest, the new sample takes its slot
    this.buffer[this.head] = sample;
    this.head = (this.head + 1) % this.capacity;
  }

  /** Samples oldest-first. */
  samples(): LatencySample[] {
    const out: LatencySample[] = [];
    for (let i = 0; i < this.count; i++) {
      const sample = this.buffer[(this.head + i) % this.capacity];
      if (sample) out.push({ ...sample });
    }
    return out;
  }

  values(): number[] {
    return this.samples().map((s) => s.valueMs);
  }

  stats(): LatencyStats {
    return summarize(this.values());
  }

  /** Statistics over the newest `n` samples only. */
  recentStats(n: number): LatencyStats {
    if (n <= 0) return { ...EMPTY_LATENCY_STATS };
    const values = this.values();
    return summarize(values.slice(Math.max(0, values.length - n)));
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}

export function summarize(values: number[]): LatencyStats {
  if (values.length === 0) return { ...EMPTY_LATENCY_STATS };
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { count: values.length, meanMs: sum / values.length, minMs: min, maxMs: max };
}

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { QuoteMonitor } from "../monitor.js";
import { FakeTransport } from "../../test/fake-transport.js";
import type { RenderSnapshot } from "../aggregator/types.js";

const T0 = 1690000000000;

const book = (bid: number, ask: number, ts: number) => ({
  data: { bids: [{ price: bid, volume: 1 }], asks: [{ price: ask, volume: 1 }], ms_timestamp: ts },
});

describe("QuoteMonitor", () => {
  let transport: FakeTransport;
  let clock: number;
  let snapshots: RenderSnapshot[];
  let monitor: QuoteMonitor;

  beforeEach(() => {
    transport = new FakeTransport();
    clock = T0;
    snapshots = [];
    monitor = new QuoteMonitor({
      transport,
      renderer: (snap) => void snapshots.push(snap),
      options: { refreshCadenceMs: 60_000, burstThreshold: 2 },
      now: () => clock,
    });
  });

  afterEach(async () => {
    await monitor.stop();
  });

  it("subscribes each normalized symbol once", async () => {
    const subscribed = await monitor.start(["siu5", "SIU5", " ", "RIU5"]);

    expect(subscribed).toEqual(["SIU5", "RIU5"]);
    expect(transport.subscribedSymbols()).toEqual(["SIU5", "RIU5"]);
    expect(monitor.isRunning).toBe(true);
    expect(monitor.context.scheduler.currentState).toBe("armed");
  });

  it("skips symbols the transport refuses", async () => {
    transport.failSubscribe.add("BAD");

    const subscribed = await monitor.start(["SIU5", "BAD", "RIU5"]);

    expect(subscribed).toEqual(["SIU5", "RIU5"]);
    expect(monitor.counters().subscribeFailures).toBe(1);
  });

  it("feeds adapted messages into the aggregator", async () => {
    await monitor.start(["SIU5"]);
    clock = T0 + 120;
    transport.push("SIU5", book(101, 102, T0));

    const state = monitor.context.store.get("SIU5");
    expect(state?.bid).toEqual({ price: 101, volume: 1 });
    expect(state?.lastLatencyMs).toBe(120);
    expect(state?.lastReceiveInstant).toBe(T0 + 120);
  });

  it("renders once the burst threshold is reached", async () => {
    await monitor.start(["SIU5"]);
    transport.push("SIU5", book(101, 102, T0));
    expect(snapshots).toHaveLength(0);

    transport.push("SIU5", book(101.5, 102, T0));
    expect(snapshots).toHaveLength(1);
    expect(snapshots[0].instruments.get("SIU5")?.bidChange).toBe("up");
  });

  it("counts messages it cannot read", async () => {
    await monitor.start(["SIU5"]);
    transport.push("SIU5", "not json");
    transport.push("SIU5", { bid: "n/a" });
    transport.push("SIU5", book(101, 102, T0));

    expect(monitor.counters()).toEqual({
      messages: 3,
      rejected: { "not-an-object": 1, "malformed-book": 1 },
      subscribeFailures: 0,
      unsubscribeFailures: 0,
    });
    expect(monitor.context.store.size).toBe(1);
  });

  it("clears quote state when the feed is lost", async () => {
    await monitor.start(["SIU5"]);
    transport.push("SIU5", book(101, 102, T0));

    monitor.feedLost();

    expect(monitor.context.store.size).toBe(0);
    expect(monitor.context.latency.size).toBe(0);
    expect(monitor.isRunning).toBe(true);
  });

  it("unsubscribes on stop and returns the session summary", async () => {
    await monitor.start(["SIU5", "RIU5"]);
    clock = T0 + 120;
    transport.push("SIU5", book(101, 102, T0));
    clock = T0 + 2000;

    const summary = await monitor.stop();

    expect(transport.unsubscribed).toEqual(["sub-1", "sub-2"]);
    expect(monitor.isRunning).toBe(false);
    expect(monitor.context.scheduler.currentState).toBe("idle");
    expect(summary).toMatchObject({
      startedAt: T0,
      endedAt: T0 + 2000,
      uptimeSeconds: 2,
      totalUpdates: 1,
      updatesPerSecond: 0.5,
      latency: { count: 1, meanMs: 120, minMs: 120, maxMs: 120 },
      latencyGrade: "normal",
      instruments: [{ symbol: "SIU5", updates: 1, updatesPerSecond: 0.5, lastLatencyMs: 120, activity: "quiet" }],
    });
  });

  it("ignores messages that arrive after stop", async () => {
    await monitor.start(["SIU5"]);
    const [subscription] = Array.from(transport.handlers.values());
    await monitor.stop();

    subscription.onMessage(book(101, 102, T0));

    expect(monitor.context.store.size).toBe(0);
    expect(monitor.counters().messages).toBe(0);
  });

  it("finishes stopping when unsubscribe fails", async () => {
    await monitor.start(["SIU5", "RIU5"]);
    transport.failUnsubscribe = true;

    await expect(monitor.stop()).resolves.toMatchObject({ totalUpdates: 0 });
    expect(monitor.counters().unsubscribeFailures).toBe(2);
    expect(monitor.isRunning).toBe(false);
  });

  it("returns an empty summary when stopped before starting", async () => {
    const summary = await monitor.stop();
    expect(summary).toMatchObject({ uptimeSeconds: 0, totalUpdates: 0, latencyGrade: "unknown", instruments: [] });
  });

  it("abandons a start that a stop and restart overtook", async () => {
    const release = transport.holdNextSubscribe();
    const first = monitor.start(["SIU5", "RIU5"]);

    await monitor.stop();
    const second = await monitor.start(["BRU5"]);
    release();

    expect(await first).toEqual([]);
    expect(second).toEqual(["BRU5"]);
    expect(transport.subscribedSymbols()).toEqual(["BRU5"]);
    expect(transport.unsubscribed).toEqual(["sub-2"]);
    expect(monitor.isRunning).toBe(true);
    expect(monitor.context.scheduler.currentState).toBe("armed");
  });

  it("releases a pending subscription when stopped during start", async () => {
    const release = transport.holdNextSubscribe();
    const starting = monitor.start(["SIU5", "RIU5"]);

    await monitor.stop();
    release();

    expect(await starting).toEqual([]);
    expect(transport.handlers.size).toBe(0);
    expect(monitor.isRunning).toBe(false);
    expect(monitor.context.scheduler.currentState).toBe("idle");
  });

  it("does not subscribe twice when started twice", async () => {
    const subscribe = vi.spyOn(transport, "subscribe");
    await monitor.start(["SIU5"]);
    const again = await monitor.start(["RIU5"]);

    expect(again).toEqual(["SIU5"]);
    expect(subscribe).toHaveBeenCalledTimes(1);
  });
});

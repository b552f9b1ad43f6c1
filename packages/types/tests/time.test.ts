/**
 * Tests for the injectable clocks and the recording transaction context.
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import { ManualClock, SystemClock, toIsoTimestamp, SECONDS_PER_YEAR } from "../src/time.js";
import { RecordingContext } from "../src/transaction.js";

describe("ManualClock", () => {
  it("starts at the given time", () => {
    expect(new ManualClock(100).now()).toBe(100);
  });

  it("defaults to zero", () => {
    expect(new ManualClock().now()).toBe(0);
  });

  it("advances forward", () => {
    const clock = new ManualClock(10);
    expect(clock.advance(5)).toBe(15);
    expect(clock.now()).toBe(15);
  });

  it("refuses negative or fractional steps", () => {
    const clock = new ManualClock(10);
    expect(() => clock.advance(-1)).toThrow(RangeError);
    expect(() => clock.advance(0.5)).toThrow(RangeError);
  });

  it("sets forward but never backwards", () => {
    const clock = new ManualClock(10);
    expect(clock.set(20)).toBe(20);
    expect(() => clock.set(19)).toThrow(/cannot move from 20 to 19/);
  });
});

describe("SystemClock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("truncates to whole seconds", () => {
    vi.useFakeTimers();
    vi.setSystemTime(1_700_000_000_999);
    expect(new SystemClock().now()).toBe(1_700_000_000);
  });

  it("does not go backwards when the wall clock does", () => {
    vi.useFakeTimers();
    const clock = new SystemClock();
    vi.setSystemTime(2_000_000_000_000);
    expect(clock.now()).toBe(2_000_000_000);
    vi.setSystemTime(1_000_000_000_000);
    expect(clock.now()).toBe(2_000_000_000);
  });
});

describe("toIsoTimestamp", () => {
  it("renders epoch seconds", () => {
    expect(toIsoTimestamp(0)).toBe("1970-01-01T00:00:00.000Z");
    expect(toIsoTimestamp(86_400)).toBe("1970-01-02T00:00:00.000Z");
  });
});

describe("SECONDS_PER_YEAR", () => {
  it("is a 365-day year", () => {
    expect(SECONDS_PER_YEAR).toBe(31_536_000);
  });
});

describe("RecordingContext", () => {
  it("collects emitted events in order", () => {
    const ctx = new RecordingContext("0xa11ce", 50);
    ctx.emit({ streamId: "s-1", type: "a", source: "ledger", payload: {} });
    ctx.emit({ streamId: "s-1", type: "b", source: "ledger", payload: {} });

    expect(ctx.events.map((e) => e.type)).toEqual(["a", "b"]);
    expect(ctx.txId).toBe("tx:0xa11ce:50");
  });

  it("runs the check before buffering and keeps refused events out", () => {
    const ctx = new RecordingContext("0xa11ce", 50, "tx:1", (event) => {
      if (event.type === "b") throw new Error("refused b");
    });
    ctx.emit({ streamId: "s-1", type: "a", source: "ledger", payload: {} });

    expect(() => ctx.emit({ streamId: "s-1", type: "b", source: "ledger", payload: {} })).toThrow("refused b");
    expect(ctx.events.map((e) => e.type)).toEqual(["a"]);
  });
});

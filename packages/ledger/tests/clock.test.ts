import { describe, it, expect, vi, afterEach } from "vitest";
import { ManualClock, systemClock } from "../src/clock.js";

describe("ManualClock", () => {
  it("starts at the given time", () => {
    expect(new ManualClock(500).now()).toBe(500);
    expect(new ManualClock().now()).toBe(0);
  });

  it("advances by whole seconds", () => {
    const clock = new ManualClock(10);

    expect(clock.advance(5)).toBe(15);
    expect(clock.now()).toBe(15);
  });

  it("rejects negative or fractional steps", () => {
    const clock = new ManualClock(10);

    expect(() => clock.advance(-1)).toThrow(RangeError);
    expect(() => clock.advance(0.5)).toThrow(RangeError);
    expect(clock.now()).toBe(10);
  });

  it("jumps forward but never back", () => {
    const clock = new ManualClock(10);
    clock.set(20);

    expect(clock.now()).toBe(20);
    expect(() => clock.set(19)).toThrow(/cannot move from 20 to 19/);
  });
});

describe("systemClock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("truncates wall-clock milliseconds to seconds", () => {
    vi.useFakeTimers();
    vi.setSystemTime(1_700_000_000_999);

    expect(systemClock.now()).toBe(1_700_000_000);
  });
});

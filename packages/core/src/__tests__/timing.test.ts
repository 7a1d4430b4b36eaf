import { describe, it, expect, vi, afterEach } from "vitest";

import { randomInt, sleepSeconds } from "../timing.js";

describe("randomInt", () => {
  it("maps the RNG range onto inclusive bounds", () => {
    expect(randomInt(3, 7, () => 0)).toBe(3);
    expect(randomInt(3, 7, () => 0.999999)).toBe(7);
    expect(randomInt(3, 7, () => 0.5)).toBe(5);
  });

  it("returns min for a degenerate range", () => {
    expect(randomInt(4, 4, () => 0.7)).toBe(4);
  });

  it("clamps an RNG that returns exactly 1", () => {
    expect(randomInt(0, 2, () => 1)).toBe(2);
  });
});

describe("sleepSeconds", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the given number of seconds", async () => {
    vi.useFakeTimers();
    let done = false;
    const p = sleepSeconds(2).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await p;
    expect(done).toBe(true);
  });

  it("resolves early when the signal aborts", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;
    const p = sleepSeconds(1800, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await p;
    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("resolves immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleepSeconds(60, controller.signal)).resolves.toBeUndefined();
  });
});

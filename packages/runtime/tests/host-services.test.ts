import { describe, it, expect, vi } from "vitest";
import { MAX_TIMER_MS, pause } from "../src/services/index.js";
import { MAX_RANDOM_RANGE, randomInRange } from "../src/services/crypto.js";

describe("pause", () => {
  it("waits once for delays a single timer can hold", async () => {
    const wait = vi.fn(async () => undefined);
    await pause(1500, wait);
    expect(wait.mock.calls).toEqual([[1500]]);
  });

  it("splits longer delays into timer-sized chunks", async () => {
    const wait = vi.fn(async () => undefined);
    await pause(2147484000, wait);
    expect(wait.mock.calls).toEqual([[MAX_TIMER_MS], [353]]);
  });

  it("still yields once for a zero delay", async () => {
    const wait = vi.fn(async () => undefined);
    await pause(0, wait);
    expect(wait.mock.calls).toEqual([[0]]);
  });
});

describe("randomInRange", () => {
  it("draws across the widest accepted span", () => {
    const value = randomInRange(0, MAX_RANDOM_RANGE);
    expect(Number.isInteger(value)).toBe(true);
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(MAX_RANDOM_RANGE);
  });
});

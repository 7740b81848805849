import { describe, it, expect } from "@jest/globals";

import { MonotonicClock, SimulatedClock } from "../../src/runtime/clock";
import { asNumber } from "../../src/types/timestamp";

describe("clocks", () => {
  it("advances a simulated clock only when told to", () => {
    const clock = new SimulatedClock(10);
    expect(asNumber(clock.nowMs())).toBe(10);
    clock.tick(5);
    expect(asNumber(clock.nowMs())).toBe(15);
  });

  it("never runs a monotonic clock backwards", () => {
    const clock = new MonotonicClock();
    const a = asNumber(clock.nowMs());
    const b = asNumber(clock.nowMs());
    expect(b).toBeGreaterThanOrEqual(a);
  });
});

import { describe, it, expect } from "@jest/globals";

import { SimulatedClock } from "../../src/runtime/clock";
import { TIME_UNAVAILABLE, Time } from "../../src/runtime/time";

describe("Time", () => {
  it("reports -1 from every query before init()", () => {
    const time = new Time(new SimulatedClock());
    expect(time.isInitialized()).toBe(false);
    expect(time.getFrameTime()).toBe(TIME_UNAVAILABLE);
    expect(time.getTotalTime()).toBe(TIME_UNAVAILABLE);
    expect(time.getFrameRate()).toBe(TIME_UNAVAILABLE);
    expect(time.getTotalFrames()).toBe(TIME_UNAVAILABLE);
    expect(time.getFpsTimer()).toBe(TIME_UNAVAILABLE);
  });

  it("ignores calculate() before init()", () => {
    const time = new Time(new SimulatedClock());
    time.calculate();
    expect(time.getTotalFrames()).toBe(TIME_UNAVAILABLE);
  });

  it("measures frame deltas in seconds", () => {
    const clock = new SimulatedClock(500);
    const time = new Time(clock);
    time.init();
    expect(time.getFrameTime()).toBe(0);

    clock.tick(250);
    time.calculate();
    expect(time.getFrameTime()).toBe(0.25);
    expect(time.getTotalTime()).toBe(0.25);
    expect(time.getTotalFrames()).toBe(1);

    clock.tick(500);
    time.calculate();
    expect(time.getFrameTime()).toBe(0.5);
    expect(time.getTotalTime()).toBe(0.75);
    expect(time.getFpsTimer()).toBe(0.75);
  });

  it("reports 60 fps after sixty ticks of 1/60 s", () => {
    const clock = new SimulatedClock();
    const time = new Time(clock);
    time.init();

    for (let i = 0; i < 59; i++) {
      clock.tick(1000 / 60);
      time.calculate();
    }
    expect(time.getFrameRate()).toBe(0);

    clock.tick(1000 / 60);
    time.calculate();
    expect(time.getTotalFrames()).toBe(60);
    expect(time.getFrameRate()).toBe(60);
    expect(time.getFpsTimer()).toBe(0);
  });

  it("carries window overshoot into the next window", () => {
    const clock = new SimulatedClock();
    const time = new Time(clock);
    time.init();

    clock.tick(600);
    time.calculate();
    clock.tick(600);
    time.calculate();
    expect(time.getFrameRate()).toBe(2);
    expect(time.getFpsTimer()).toBeCloseTo(0.2, 10);

    clock.tick(900);
    time.calculate();
    expect(time.getFrameRate()).toBe(1);
    expect(time.getFpsTimer()).toBeCloseTo(0.1, 10);
  });

  it("resets every counter on init()", () => {
    const clock = new SimulatedClock();
    const time = new Time(clock);
    time.init();
    clock.tick(1500);
    time.calculate();
    time.init();
    expect(time.getTotalFrames()).toBe(0);
    expect(time.getTotalTime()).toBe(0);
    expect(time.getFrameRate()).toBe(0);
  });
});

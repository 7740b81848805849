import { describe, it, expect, jest } from "@jest/globals";

import { Bounds } from "../../src/math/bounds";
import { Vector } from "../../src/math/vector";
import {
  DEFAULT_WINDOW_HEIGHT,
  DEFAULT_WINDOW_WIDTH,
  Screen,
} from "../../src/runtime/screen";

describe("Screen", () => {
  it("starts at the requested window size", () => {
    const screen = new Screen();
    expect(screen.getWindowWidth()).toBe(DEFAULT_WINDOW_WIDTH);
    expect(screen.getWindowHeight()).toBe(DEFAULT_WINDOW_HEIGHT);
    expect(screen.getScreenWidth()).toBe(1300);
    expect(screen.getScreenHeight()).toBe(700);
  });

  it("tests points strictly and rectangles inclusively", () => {
    const screen = new Screen(100, 50);
    expect(screen.isOnScreen(new Vector(50, 25))).toBe(true);
    expect(screen.isOnScreen(new Vector(0, 25))).toBe(false);
    expect(screen.isOnScreen(new Bounds(100, 0, 10, 10))).toBe(true);
    expect(screen.isOnScreen(new Bounds(101, 0, 10, 10))).toBe(false);
  });

  it("is off screen unless fully inside", () => {
    const screen = new Screen(100, 50);
    expect(screen.isOffScreen(new Bounds(10, 10, 5, 5))).toBe(false);
    expect(screen.isOffScreen(new Bounds(95, 10, 10, 5))).toBe(true);
  });

  it("updates bounds and notifies listeners on resize", () => {
    const screen = new Screen(100, 50);
    const listener = jest.fn();
    const unsubscribe = screen.onResize(listener);

    screen.setScreenSize(200, 80);
    expect(listener).toHaveBeenCalledWith(200, 80);
    expect(screen.getBounds().getWidth()).toBe(200);
    expect(screen.isOnScreen(new Vector(150, 60))).toBe(true);
    expect(screen.getWindowWidth()).toBe(100);

    screen.setScreenSize(200, 80);
    expect(listener).toHaveBeenCalledTimes(1);

    unsubscribe();
    screen.setScreenSize(10, 10);
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

import { describe, it, expect, jest } from "@jest/globals";

import { HeadlessWindow } from "../../src/window/headless-window";

describe("HeadlessWindow", () => {
  it("defaults to a 1300x700 surface", () => {
    const w = new HeadlessWindow();
    expect(w.getSurface().getSurfaceWidth()).toBe(1300);
    expect(w.getSurface().getSurfaceHeight()).toBe(700);
  });

  it("tracks title and visibility", () => {
    const w = new HeadlessWindow(10, 10);
    w.init();
    expect(w.isInitialized()).toBe(true);
    w.setTitle("Demo");
    w.setVisible(true);
    expect(w.getTitle()).toBe("Demo");
    expect(w.isVisible()).toBe(true);
  });

  it("notifies close and resize listeners until unsubscribed", () => {
    const w = new HeadlessWindow(10, 10);
    const onClose = jest.fn();
    const onResize = jest.fn();
    const offClose = w.onClose(onClose);
    w.onResize(onResize);

    w.close();
    w.resize(20, 15);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onResize).toHaveBeenCalledWith(20, 15);
    expect(w.getSurface().getSurfaceWidth()).toBe(20);

    offClose();
    w.close();
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it("drops listeners and hides on dispose", () => {
    const w = new HeadlessWindow(10, 10);
    const onClose = jest.fn();
    w.onClose(onClose);
    w.setVisible(true);
    w.dispose();
    w.dispose();
    w.close();
    expect(onClose).not.toHaveBeenCalled();
    expect(w.isVisible()).toBe(false);
    expect(w.isDisposed()).toBe(true);
    expect(() => w.init()).toThrow(
      "HeadlessWindow cannot be initialised after dispose",
    );
  });
});

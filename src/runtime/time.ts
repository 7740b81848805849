import { asNumber } from "../types/timestamp";

import { MonotonicClock } from "./clock";

import type { Clock } from "./clock";
import type { Timestamp } from "../types/timestamp";

/** Returned by every query until {@link Time.init} has run. */
export const TIME_UNAVAILABLE = -1;

const MS_PER_SECOND = 1000;

// Deltas are differences of clock readings; summing them drifts by a few ulps.
const FPS_WINDOW_TOLERANCE = 1e-9;

/**
 * Frame-delta and frame-rate accumulator.
 *
 * One instance is owned by the running game and handed by reference to
 * whatever needs timing data; `init()` marks the start of the loop and
 * `calculate()` is called once at the top of every tick.
 */
export class Time {
  private totalTime = 0;
  private frameTime = 0;
  private fpsTimer = 0;
  private frameCount = 0;
  private frameRate = 0;
  private totalFrames = 0;
  private lastFrame: Timestamp | null = null;
  private initialized = false;

  constructor(private readonly clock: Clock = new MonotonicClock()) {}

  /** Reset every counter and anchor the next delta at the current clock reading. */
  init(): void {
    this.lastFrame = this.clock.nowMs();
    this.totalTime = 0;
    this.frameTime = 0;
    this.totalFrames = 0;
    this.frameCount = 0;
    this.frameRate = 0;
    this.fpsTimer = 0;
    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  calculate(): void {
    if (!this.initialized || this.lastFrame === null) return;

    const now = this.clock.nowMs();
    const frameSecs = (asNumber(now) - asNumber(this.lastFrame)) / MS_PER_SECOND;
    this.lastFrame = now;

    this.frameTime = frameSecs;
    this.totalTime += frameSecs;
    this.totalFrames += 1;
    this.frameCount += 1;

    // Subtract rather than reset so the overshoot carries into the next window.
    this.fpsTimer += frameSecs;
    if (this.fpsTimer >= 1 - FPS_WINDOW_TOLERANCE) {
      this.fpsTimer = Math.max(0, this.fpsTimer - 1);
      this.frameRate = this.frameCount;
      this.frameCount = 0;
    }
  }

  /** Seconds elapsed in the current frame-rate window. */
  getFpsTimer(): number {
    return this.initialized ? this.fpsTimer : TIME_UNAVAILABLE;
  }

  /** Seconds elapsed between the last two `calculate()` calls. */
  getFrameTime(): number {
    return this.initialized ? this.frameTime : TIME_UNAVAILABLE;
  }

  /** Seconds accumulated since `init()`. */
  getTotalTime(): number {
    return this.initialized ? this.totalTime : TIME_UNAVAILABLE;
  }

  /** Frames counted in the last complete one-second window. */
  getFrameRate(): number {
    return this.initialized ? this.frameRate : TIME_UNAVAILABLE;
  }

  getTotalFrames(): number {
    return this.initialized ? this.totalFrames : TIME_UNAVAILABLE;
  }
}

import { createFrameIndex, createSeconds } from "../types/brands";

import type { ImageLoader, ImageResource } from "../assets/image-loader";
import type { FrameIndex, Seconds } from "../types/brands";

export type AnimationMode = "SINGLE" | "LOOP";

export const DEFAULT_FRAME_DURATION = 0.5;

const MODES: ReadonlyArray<AnimationMode> = ["SINGLE", "LOOP"];

export function isAnimationMode(mode: unknown): mode is AnimationMode {
  return typeof mode === "string" && (MODES as ReadonlyArray<string>).includes(mode);
}

function assertAnimationMode(mode: unknown): asserts mode is AnimationMode {
  if (!isAnimationMode(mode)) {
    throw new Error('Animation mode must be either "SINGLE" or "LOOP"');
  }
}

/**
 * Timed frame sequence. SINGLE stops on its last frame and reports finished
 * once that frame has been shown for a full duration; LOOP wraps to frame 0.
 */
export class Animation<TFrame = ImageResource> {
  private frames: Array<TFrame> = [];
  private mode: AnimationMode;
  private frameDuration: Seconds;
  private currentFrame = 0;
  private frameTimer = 0;
  private paused = false;

  constructor(mode: string = "LOOP", frameDuration = DEFAULT_FRAME_DURATION) {
    assertAnimationMode(mode);
    this.mode = mode;
    this.frameDuration = createSeconds(frameDuration);
  }

  update(dt: number): void {
    if (this.paused) return;
    if (this.isEmpty() || this.isFinished()) return;

    this.frameTimer += dt;
    if (this.frameTimer < this.frameDuration) return;
    this.nextFrame();
  }

  /**
   * Advance one frame and restart the timer. On the last frame of a SINGLE
   * animation nothing changes, the timer included.
   */
  nextFrame(): void {
    if (this.isEmpty()) return;
    if (this.mode === "SINGLE" && this.currentFrame === this.lastFrameIndex()) {
      return;
    }
    this.frameTimer = 0;
    this.currentFrame = (this.currentFrame + 1) % this.frames.length;
  }

  reset(): void {
    this.currentFrame = 0;
    this.frameTimer = 0;
  }

  isFinished(): boolean {
    return (
      this.mode === "SINGLE" &&
      this.currentFrame === this.lastFrameIndex() &&
      this.frameTimer >= this.frameDuration
    );
  }

  private lastFrameIndex(): number {
    return this.frames.length - 1;
  }

  isPaused(): boolean {
    return this.paused;
  }

  pause(): void {
    this.setPaused(true);
  }

  resume(): void {
    this.setPaused(false);
  }

  setPaused(paused: boolean): void {
    this.paused = paused;
  }

  getFrameDuration(): Seconds {
    return this.frameDuration;
  }

  setFrameDuration(duration: number): void {
    if (duration < 0) {
      throw new RangeError("Animation frame duration must be non-negative");
    }
    this.frameDuration = createSeconds(duration);
  }

  getMode(): AnimationMode {
    return this.mode;
  }

  setMode(mode: string): void {
    assertAnimationMode(mode);
    this.mode = mode;
  }

  isSingleAnimation(): boolean {
    return this.mode === "SINGLE";
  }

  isLoopingAnimation(): boolean {
    return this.mode === "LOOP";
  }

  addFrame(frame: TFrame): void {
    this.frames.push(frame);
  }

  /** Load an image and append it; a failed load adds nothing. */
  async addFrameFrom(
    this: Animation<ImageResource>,
    loader: ImageLoader,
    directory: string,
    filename: string,
  ): Promise<boolean> {
    const frame = await loader.loadImage(directory, filename);
    if (frame === null) return false;
    this.addFrame(frame);
    return true;
  }

  /** Remove and return the frame at `index`, or null when out of range. */
  removeFrame(index: number): TFrame | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.frames.length) {
      return null;
    }
    const [removed] = this.frames.splice(index, 1);
    if (this.currentFrame >= this.frames.length) {
      this.currentFrame = Math.max(0, this.frames.length - 1);
    }
    return removed ?? null;
  }

  removeAllFrames(): Array<TFrame> {
    const removed = this.frames;
    this.frames = [];
    this.reset();
    return removed;
  }

  getFrame(index: number): TFrame | null {
    if (!Number.isInteger(index) || index < 0) return null;
    return this.frames[index] ?? null;
  }

  getAllFrames(): Array<TFrame> {
    return [...this.frames];
  }

  getCurrentFrame(): TFrame | null {
    return this.getFrame(this.currentFrame);
  }

  getCurrentFrameIndex(): FrameIndex {
    return createFrameIndex(this.currentFrame);
  }

  getTotalFrames(): number {
    return this.frames.length;
  }

  isEmpty(): boolean {
    return this.frames.length === 0;
  }
}

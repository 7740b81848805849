import { Bounds } from "../math/bounds";
import { Vector } from "../math/vector";

export const DEFAULT_WINDOW_WIDTH = 1300;
export const DEFAULT_WINDOW_HEIGHT = 700;

export type ScreenSizeListener = (width: number, height: number) => void;

/**
 * Size of the drawable area, shared by reference between the loop, the
 * window host and game objects that need on/off-screen tests.
 */
export class Screen {
  private screenWidth: number;
  private screenHeight: number;
  private bounds: Bounds;
  private readonly listeners = new Set<ScreenSizeListener>();

  constructor(
    private readonly windowWidth = DEFAULT_WINDOW_WIDTH,
    private readonly windowHeight = DEFAULT_WINDOW_HEIGHT,
  ) {
    this.screenWidth = windowWidth;
    this.screenHeight = windowHeight;
    this.bounds = new Bounds(0, 0, windowWidth, windowHeight);
  }

  setScreenSize(width: number, height: number): void {
    if (width === this.screenWidth && height === this.screenHeight) return;
    this.screenWidth = width;
    this.screenHeight = height;
    this.bounds = new Bounds(0, 0, width, height);
    for (const listener of this.listeners) listener(width, height);
  }

  onResize(listener: ScreenSizeListener): () => void {
    this.listeners.add(listener);
    return (): void => {
      this.listeners.delete(listener);
    };
  }

  getScreenWidth(): number {
    return this.screenWidth;
  }

  getScreenHeight(): number {
    return this.screenHeight;
  }

  /** Requested window size; the drawable area may end up smaller. */
  getWindowWidth(): number {
    return this.windowWidth;
  }

  getWindowHeight(): number {
    return this.windowHeight;
  }

  /** Origin-anchored rectangle covering the drawable area. */
  getBounds(): Bounds {
    return new Bounds(0, 0, this.screenWidth, this.screenHeight);
  }

  /** Any overlap for rectangles (edge contact counts), strict interior for points. */
  isOnScreen(target: Bounds | Vector): boolean {
    if (target instanceof Vector) return this.bounds.contains(target);
    return this.bounds.intersects(target);
  }

  /** True unless the rectangle lies strictly inside the drawable area. */
  isOffScreen(target: Bounds): boolean {
    return !this.bounds.containsBounds(target);
  }
}

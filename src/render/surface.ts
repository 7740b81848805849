import type { ImageResource } from "../assets/image-loader";
import type { Color } from "../types/brands";

export type TextStyle = Readonly<{
  font: string;
  size: number;
  color: Color;
}>;

/** Acquired drawing context for one render attempt. */
export type DrawHandle = {
  /** Erase a region to fully transparent pixels. */
  clear(x: number, y: number, width: number, height: number): void;
  fillRect(
    x: number,
    y: number,
    width: number,
    height: number,
    color: Color,
  ): void;
  drawImage(image: ImageResource, x: number, y: number): void;
  drawText(text: string, x: number, y: number, style: TextStyle): void;
  /** Release the handle; further drawing is an error. */
  dispose(): void;
};

/**
 * Double-buffered presentation surface. The two signals describe backing
 * memory that the platform may invalidate at any time:
 * - `wasContentsRestored()` after a handle is released: the buffer was reset
 *   while drawing, so the attempt must be redrawn;
 * - `wasContentsLost()` after presenting: the frame never reached the screen.
 */
export type SurfaceProvider = {
  acquireDrawHandle(): DrawHandle;
  presentHandle(): void;
  wasContentsRestored(): boolean;
  wasContentsLost(): boolean;
  getSurfaceWidth(): number;
  getSurfaceHeight(): number;
};

/**
 * Run `draw` against a freshly acquired handle and release it afterwards,
 * whether `draw` returns or throws.
 */
export function withDrawHandle<T>(
  provider: SurfaceProvider,
  draw: (handle: DrawHandle) => T,
): T {
  const handle = provider.acquireDrawHandle();
  try {
    return draw(handle);
  } finally {
    handle.dispose();
  }
}

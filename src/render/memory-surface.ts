import { TRANSPARENT, colorAsNumber } from "../types/brands";
import { debugLog } from "../utils/debug";

import type { DrawHandle, SurfaceProvider, TextStyle } from "./surface";
import type { ImageResource } from "../assets/image-loader";
import type { Color } from "../types/brands";

export type TextRun = Readonly<{
  text: string;
  x: number;
  y: number;
  style: TextStyle;
}>;

type Framebuffer = {
  pixels: Uint32Array;
  text: Array<TextRun>;
};

function makeFramebuffer(width: number, height: number): Framebuffer {
  return { pixels: new Uint32Array(width * height), text: [] };
}

class MemoryDrawHandle implements DrawHandle {
  private disposed = false;

  constructor(
    private readonly target: Framebuffer,
    private readonly width: number,
    private readonly height: number,
    private readonly onDispose: () => void,
  ) {}

  clear(x: number, y: number, width: number, height: number): void {
    this.fillRect(x, y, width, height, TRANSPARENT);
    if (x <= 0 && y <= 0 && x + width >= this.width && y + height >= this.height) {
      this.target.text.length = 0;
    }
  }

  fillRect(
    x: number,
    y: number,
    width: number,
    height: number,
    color: Color,
  ): void {
    this.ensureLive();
    const x0 = Math.max(0, Math.floor(x));
    const y0 = Math.max(0, Math.floor(y));
    const x1 = Math.min(this.width, Math.floor(x + width));
    const y1 = Math.min(this.height, Math.floor(y + height));
    for (let row = y0; row < y1; row++) {
      this.target.pixels.fill(
        colorAsNumber(color),
        row * this.width + x0,
        row * this.width + Math.max(x0, x1),
      );
    }
  }

  drawImage(image: ImageResource, x: number, y: number): void {
    this.ensureLive();
    const ox = Math.floor(x);
    const oy = Math.floor(y);
    for (let row = 0; row < image.height; row++) {
      const ty = oy + row;
      if (ty < 0 || ty >= this.height) continue;
      for (let col = 0; col < image.width; col++) {
        const tx = ox + col;
        if (tx < 0 || tx >= this.width) continue;
        const px = image.pixels[row * image.width + col] ?? 0;
        // alpha-tested blit: fully transparent source pixels leave the target untouched
        if ((px & 0xff) === 0) continue;
        this.target.pixels[ty * this.width + tx] = px;
      }
    }
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    this.ensureLive();
    this.target.text.push({ style, text, x, y });
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.onDispose();
  }

  private ensureLive(): void {
    if (this.disposed) throw new Error("Draw handle used after dispose");
  }
}

/**
 * In-process double-buffered surface.
 *
 * Frames are drawn into a back buffer and copied to the front buffer on
 * present. Lost and restored events can be scheduled to exercise the render
 * retry path deterministically.
 */
export class MemorySurface implements SurfaceProvider {
  private back: Framebuffer;
  private front: Framebuffer;
  private pendingRestores = 0;
  private pendingLosses = 0;
  private restored = false;
  private lost = false;
  private liveHandles = 0;

  acquisitions = 0;
  presents = 0;
  committedFrames = 0;

  constructor(
    private width: number,
    private height: number,
  ) {
    this.back = makeFramebuffer(width, height);
    this.front = makeFramebuffer(width, height);
  }

  /** The next `count` handle releases report restored contents. */
  scheduleContentsRestored(count = 1): void {
    this.pendingRestores += count;
  }

  /** The next `count` presents report lost contents. */
  scheduleContentsLost(count = 1): void {
    this.pendingLosses += count;
  }

  acquireDrawHandle(): DrawHandle {
    this.acquisitions += 1;
    this.liveHandles += 1;
    this.restored = false;
    return new MemoryDrawHandle(this.back, this.width, this.height, () => {
      this.liveHandles -= 1;
      this.releaseHandle();
    });
  }

  private releaseHandle(): void {
    if (this.pendingRestores > 0) {
      this.pendingRestores -= 1;
      this.back = makeFramebuffer(this.width, this.height);
      this.restored = true;
      debugLog("render", "back buffer restored while drawing");
    }
  }

  presentHandle(): void {
    this.presents += 1;
    if (this.pendingLosses > 0) {
      this.pendingLosses -= 1;
      this.lost = true;
      debugLog("render", "frame lost on present");
      return;
    }
    this.lost = false;
    this.front = {
      pixels: this.back.pixels.slice(),
      text: [...this.back.text],
    };
    this.committedFrames += 1;
  }

  wasContentsRestored(): boolean {
    return this.restored;
  }

  wasContentsLost(): boolean {
    return this.lost;
  }

  getSurfaceWidth(): number {
    return this.width;
  }

  getSurfaceHeight(): number {
    return this.height;
  }

  /** Number of acquired handles not yet disposed. */
  getLiveHandles(): number {
    return this.liveHandles;
  }

  /** Reallocate both buffers; previous contents are discarded. */
  resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.back = makeFramebuffer(width, height);
    this.front = makeFramebuffer(width, height);
  }

  /** Packed RGBA of the last presented frame; 0 outside the surface. */
  readPixel(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return 0;
    return this.front.pixels[y * this.width + x] ?? 0;
  }

  /** Text drawn into the last presented frame, in draw order. */
  readText(): ReadonlyArray<TextRun> {
    return this.front.text;
  }
}

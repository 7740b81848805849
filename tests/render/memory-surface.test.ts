import { describe, it, expect } from "@jest/globals";

import { MemorySurface } from "../../src/render/memory-surface";
import { withDrawHandle } from "../../src/render/surface";
import { TRANSPARENT, rgba } from "../../src/types/brands";

import type { ImageResource } from "../../src/assets/image-loader";

const RED = rgba(255, 0, 0);
const BLUE = rgba(0, 0, 255);
const STYLE = { color: RED, font: "Courier New", size: 14 };

describe("MemorySurface", () => {
  it("shows nothing until a handle is presented", () => {
    const surface = new MemorySurface(4, 4);
    withDrawHandle(surface, (h) => {
      h.fillRect(0, 0, 4, 4, RED);
    });
    expect(surface.readPixel(1, 1)).toBe(TRANSPARENT);
    surface.presentHandle();
    expect(surface.readPixel(1, 1)).toBe(RED);
    expect(surface.committedFrames).toBe(1);
  });

  it("clips rectangles to the surface", () => {
    const surface = new MemorySurface(4, 4);
    withDrawHandle(surface, (h) => {
      h.fillRect(2, 2, 10, 10, BLUE);
    });
    surface.presentHandle();
    expect(surface.readPixel(3, 3)).toBe(BLUE);
    expect(surface.readPixel(1, 1)).toBe(TRANSPARENT);
    expect(surface.readPixel(4, 4)).toBe(0);
  });

  it("skips fully transparent image pixels", () => {
    const surface = new MemorySurface(3, 1);
    const image: ImageResource = {
      height: 1,
      pixels: Uint32Array.from([BLUE, TRANSPARENT]),
      width: 2,
    };
    withDrawHandle(surface, (h) => {
      h.fillRect(0, 0, 3, 1, RED);
      h.drawImage(image, 1, 0);
    });
    surface.presentHandle();
    expect(surface.readPixel(0, 0)).toBe(RED);
    expect(surface.readPixel(1, 0)).toBe(BLUE);
    expect(surface.readPixel(2, 0)).toBe(RED);
  });

  it("records text runs and drops them on a full clear", () => {
    const surface = new MemorySurface(8, 8);
    withDrawHandle(surface, (h) => {
      h.drawText("hi", 1, 2, STYLE);
    });
    surface.presentHandle();
    expect(surface.readText()).toEqual([{ style: STYLE, text: "hi", x: 1, y: 2 }]);

    withDrawHandle(surface, (h) => {
      h.clear(0, 0, 8, 8);
    });
    surface.presentHandle();
    expect(surface.readText()).toEqual([]);
  });

  it("rejects drawing through a disposed handle", () => {
    const surface = new MemorySurface(2, 2);
    const handle = surface.acquireDrawHandle();
    handle.dispose();
    handle.dispose();
    expect(surface.getLiveHandles()).toBe(0);
    expect(() => handle.fillRect(0, 0, 1, 1, RED)).toThrow(
      "Draw handle used after dispose",
    );
  });

  it("releases the handle when drawing throws", () => {
    const surface = new MemorySurface(2, 2);
    expect(() =>
      withDrawHandle(surface, () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(surface.getLiveHandles()).toBe(0);
  });

  it("blanks the back buffer on a scheduled restore", () => {
    const surface = new MemorySurface(2, 2);
    surface.scheduleContentsRestored();
    withDrawHandle(surface, (h) => {
      h.fillRect(0, 0, 2, 2, RED);
    });
    expect(surface.wasContentsRestored()).toBe(true);
    surface.presentHandle();
    expect(surface.readPixel(0, 0)).toBe(TRANSPARENT);

    withDrawHandle(surface, (h) => {
      h.fillRect(0, 0, 2, 2, RED);
    });
    expect(surface.wasContentsRestored()).toBe(false);
  });

  it("keeps the previous frame when a present is lost", () => {
    const surface = new MemorySurface(1, 1);
    withDrawHandle(surface, (h) => {
      h.fillRect(0, 0, 1, 1, RED);
    });
    surface.presentHandle();

    surface.scheduleContentsLost();
    withDrawHandle(surface, (h) => {
      h.fillRect(0, 0, 1, 1, BLUE);
    });
    surface.presentHandle();
    expect(surface.wasContentsLost()).toBe(true);
    expect(surface.readPixel(0, 0)).toBe(RED);
    expect(surface.presents).toBe(2);
    expect(surface.committedFrames).toBe(1);
  });

  it("reallocates both buffers on resize", () => {
    const surface = new MemorySurface(2, 2);
    withDrawHandle(surface, (h) => {
      h.fillRect(0, 0, 2, 2, RED);
    });
    surface.presentHandle();
    surface.resize(5, 3);
    expect(surface.getSurfaceWidth()).toBe(5);
    expect(surface.getSurfaceHeight()).toBe(3);
    expect(surface.readPixel(0, 0)).toBe(TRANSPARENT);
  });
});

import { readFile as fsReadFile } from "node:fs/promises";
import path from "node:path";

import { debugLog } from "../utils/debug";

/** Decoded image: row-major packed RGBA pixels. */
export type ImageResource = Readonly<{
  width: number;
  height: number;
  pixels: Uint32Array;
}>;

/** Turns encoded file bytes into pixels; image formats live outside the engine. */
export type ImageDecoder = (bytes: Uint8Array, source: string) => ImageResource;

export type ImageLoaderDeps = {
  decode: ImageDecoder;
  readFile?: (filepath: string) => Promise<Uint8Array>;
};

export type ImageLoader = {
  /** Resolves to null when the file cannot be read or decoded. */
  loadImage(directory: string, filename: string): Promise<ImageResource | null>;
};

export function createImageLoader(deps: ImageLoaderDeps): ImageLoader {
  const readFile: (filepath: string) => Promise<Uint8Array> =
    deps.readFile ?? ((filepath) => fsReadFile(filepath));

  return {
    async loadImage(
      directory: string,
      filename: string,
    ): Promise<ImageResource | null> {
      const filepath = path.join(directory, filename);
      try {
        const bytes = await readFile(filepath);
        const image = deps.decode(bytes, filepath);
        debugLog("assets", `loaded ${filepath}`, {
          height: image.height,
          width: image.width,
        });
        return image;
      } catch (error: unknown) {
        console.warn(`Failed to load image ${filepath}:`, error);
        return null;
      }
    },
  };
}

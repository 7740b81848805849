import { debugLog } from "../utils/debug";
import { withDrawHandle } from "../render/surface";

import type { DrawHandle, SurfaceProvider } from "../render/surface";

export type RenderStats = Readonly<{
  /** acquire → clear → paint → release sequences run, retries included */
  renderPasses: number;
  /** present attempts, the last one being the committed frame */
  presents: number;
}>;

/**
 * Draw and present one frame, redrawing until the surface reports neither a
 * mid-draw restore nor a lost present. There is no retry cap; the loop ends
 * once the surface stabilises. Exceptions from `paint` propagate after the
 * handle has been released.
 */
export function renderFrame(
  provider: SurfaceProvider,
  paint: (handle: DrawHandle) => void,
): RenderStats {
  let renderPasses = 0;
  let presents = 0;

  do {
    do {
      withDrawHandle(provider, (handle) => {
        handle.clear(
          0,
          0,
          provider.getSurfaceWidth(),
          provider.getSurfaceHeight(),
        );
        paint(handle);
      });
      renderPasses += 1;
    } while (provider.wasContentsRestored());

    provider.presentHandle();
    presents += 1;
  } while (provider.wasContentsLost());

  if (renderPasses > 1) {
    debugLog("render", `frame needed ${String(renderPasses)} passes`, {
      presents,
    });
  }

  return { presents, renderPasses };
}

import type { KeyEventTarget } from "../device/adapter";
import type { SurfaceProvider } from "../render/surface";

export type CloseListener = () => void;
export type ResizeListener = (width: number, height: number) => void;
export type Unsubscribe = () => void;

/**
 * Platform window the game loop draws into. Close and resize notifications
 * may arrive at any time between ticks; the loop only reacts at tick
 * boundaries.
 */
export type WindowHost = {
  init(): void;
  setTitle(title: string): void;
  getTitle(): string;
  setVisible(visible: boolean): void;
  isVisible(): boolean;
  /** Release the surface and any platform resources. Idempotent. */
  dispose(): void;
  onClose(listener: CloseListener): Unsubscribe;
  onResize(listener: ResizeListener): Unsubscribe;
  getSurface(): SurfaceProvider;
  getKeyTarget(): KeyEventTarget;
};

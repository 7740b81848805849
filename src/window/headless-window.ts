import { ScriptedKeySource } from "../device/adapter";
import { MemorySurface } from "../render/memory-surface";
import { DEFAULT_WINDOW_HEIGHT, DEFAULT_WINDOW_WIDTH } from "../runtime/screen";
import { debugLog } from "../utils/debug";

import type {
  CloseListener,
  ResizeListener,
  Unsubscribe,
  WindowHost,
} from "./window-host";

/**
 * Window host with no platform behind it: an in-memory surface and a
 * scripted key source. `close()` and `resize()` stand in for the
 * notifications a real window system would send.
 */
export class HeadlessWindow implements WindowHost {
  private title = "";
  private visible = false;
  private initialized = false;
  private disposed = false;
  private readonly surface: MemorySurface;
  private readonly keySource = new ScriptedKeySource();
  private readonly closeListeners = new Set<CloseListener>();
  private readonly resizeListeners = new Set<ResizeListener>();

  constructor(
    width = DEFAULT_WINDOW_WIDTH,
    height = DEFAULT_WINDOW_HEIGHT,
  ) {
    this.surface = new MemorySurface(width, height);
  }

  init(): void {
    if (this.disposed) {
      throw new Error("HeadlessWindow cannot be initialised after dispose");
    }
    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  setTitle(title: string): void {
    this.title = title;
  }

  getTitle(): string {
    return this.title;
  }

  setVisible(visible: boolean): void {
    this.visible = visible;
  }

  isVisible(): boolean {
    return this.visible;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.visible = false;
    this.closeListeners.clear();
    this.resizeListeners.clear();
    debugLog("loop", "headless window disposed");
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  onClose(listener: CloseListener): Unsubscribe {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  onResize(listener: ResizeListener): Unsubscribe {
    this.resizeListeners.add(listener);
    return () => {
      this.resizeListeners.delete(listener);
    };
  }

  getSurface(): MemorySurface {
    return this.surface;
  }

  getKeyTarget(): ScriptedKeySource {
    return this.keySource;
  }

  /** Simulate the user closing the window. */
  close(): void {
    for (const listener of [...this.closeListeners]) listener();
  }

  /** Simulate an OS resize: the surface is reallocated, then listeners run. */
  resize(width: number, height: number): void {
    this.surface.resize(width, height);
    for (const listener of [...this.resizeListeners]) listener(width, height);
  }
}

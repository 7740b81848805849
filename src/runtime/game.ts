import { setTimeout as delay } from "node:timers/promises";

import { resolveSettings } from "../config/settings";
import { attachKeyboard } from "../device/adapter";
import { Keyboard } from "../device/keyboard";
import { SceneController } from "../scene/scene-controller";
import { debugLog } from "../utils/debug";

import { renderFrame } from "./render-frame";
import { Screen } from "./screen";
import { Time } from "./time";

import type { RenderStats } from "./render-frame";
import type { Clock } from "./clock";
import type { EngineSettings } from "../config/settings";
import type { DrawHandle } from "../render/surface";
import type { WindowHost } from "../window/window-host";

export type SleepFn = (ms: number) => Promise<void>;

export type GameOptions = Partial<{
  settings: Partial<EngineSettings>;
  clock: Clock;
  /** Pacing yield between ticks; defaults to a timer promise. */
  sleep: SleepFn;
}>;

const FPS_X = 20;
const FPS_BASELINE_PAD = 5;

/*
 * GAME LOOP
 *
 *   run(): init window → attach keyboard → onGameStart() → time.init()
 *          while running:
 *            time.calculate()
 *            tick(frameTime): keyboard.process() → scenes.processInputs
 *                             → scenes.update → renderFrame (retrying)
 *            await sleep(pacingMs)
 *          shutdown: onShutDown() → scenes.onShutDown() → hide → dispose
 *                    → detach keyboard
 *
 * `running` is the only cancellation signal. It is read once per tick, so a
 * stop() issued mid-tick lets that tick finish, render included.
 */
export abstract class Game {
  private readonly settings: EngineSettings;
  private readonly keyboard = new Keyboard();
  private readonly time: Time;
  private readonly screen: Screen;
  private readonly sceneController: SceneController;
  private readonly sleep: SleepFn;

  private running = false;
  private sleepTime: number;
  private fpsVisible: boolean;
  private teardown: Array<() => void> = [];

  constructor(
    protected readonly window: WindowHost,
    options: GameOptions = {},
  ) {
    this.settings = resolveSettings(options.settings ?? {});
    this.time = new Time(options.clock);
    this.screen = new Screen(
      this.settings.windowWidth,
      this.settings.windowHeight,
    );
    this.sceneController = new SceneController(this.keyboard);
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.sleepTime = this.settings.pacingMs;
    this.fpsVisible = this.settings.fpsVisible;
  }

  /** Create scenes and pick the first one. Runs before the first tick. */
  protected abstract onGameStart(): void;

  /** Game-level cleanup; runs before the current scene's shutdown hook. */
  protected abstract onShutDown(): void;

  /**
   * Run the loop until stop() is called or the window closes. Shutdown runs
   * even when a tick throws; the tick's error is rethrown afterwards, and a
   * shutdown failure on that path is only reported.
   */
  async run(): Promise<void> {
    if (this.running) throw new Error("Game is already running");

    this.window.init();
    this.window.setTitle(this.settings.title);
    const surface = this.window.getSurface();
    this.screen.setScreenSize(
      surface.getSurfaceWidth(),
      surface.getSurfaceHeight(),
    );
    this.teardown = [
      this.window.onResize((width, height) => {
        this.screen.setScreenSize(width, height);
      }),
      this.window.onClose(() => {
        debugLog("loop", "window closed, stopping");
        this.stop();
      }),
      attachKeyboard(this.window.getKeyTarget(), this.keyboard),
    ];

    this.running = true;
    this.window.setVisible(true);

    try {
      this.onGameStart();
      this.time.init();
      debugLog("loop", "started", { pacingMs: this.sleepTime });
      while (this.running) {
        this.time.calculate();
        this.tick(this.time.getFrameTime());
        await this.sleep(this.sleepTime);
      }
    } catch (error) {
      this.running = false;
      try {
        this.shutdown();
      } catch (shutdownError) {
        console.warn("Failed to shut down cleanly:", shutdownError);
      }
      throw error;
    }
    this.running = false;
    this.shutdown();
  }

  /** Request the loop to end at the next tick boundary. */
  stop(): void {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** One input → update → render pass with `dt` seconds of frame time. */
  tick(dt: number): RenderStats {
    this.keyboard.process();
    this.sceneController.processInputs(dt);
    this.sceneController.update(dt);
    return renderFrame(this.window.getSurface(), (handle) => {
      this.sceneController.render(handle);
      if (this.fpsVisible) this.renderFps(handle);
    });
  }

  private renderFps(handle: DrawHandle): void {
    const { fpsColor, fpsFont, fpsFontSize } = this.settings;
    handle.drawText(
      `FPS: ${String(this.time.getFrameRate())}`,
      FPS_X,
      fpsFontSize + FPS_BASELINE_PAD,
      { color: fpsColor, font: fpsFont, size: fpsFontSize },
    );
  }

  private shutdown(): void {
    debugLog("loop", "shutting down");
    // The window and listeners are released even when a shutdown hook throws.
    try {
      this.onShutDown();
      this.sceneController.onShutDown();
    } finally {
      const teardown = this.teardown;
      this.teardown = [];
      this.window.setVisible(false);
      this.window.dispose();
      for (const release of teardown) release();
    }
  }

  setFpsVisible(visible: boolean): void {
    this.fpsVisible = visible;
  }

  isFpsVisible(): boolean {
    return this.fpsVisible;
  }

  setSleepTime(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError("Sleep time must be a non-negative number");
    }
    this.sleepTime = ms;
  }

  getSleepTime(): number {
    return this.sleepTime;
  }

  getSettings(): EngineSettings {
    return this.settings;
  }

  getKeyboard(): Keyboard {
    return this.keyboard;
  }

  getTime(): Time {
    return this.time;
  }

  getScreen(): Screen {
    return this.screen;
  }

  getSceneController(): SceneController {
    return this.sceneController;
  }
}

import { Keyboard } from "../device/keyboard";
import { debugLog } from "../utils/debug";

import type { Scene } from "./scene";
import type { DrawHandle } from "../render/surface";

/**
 * Owns an ordered set of scenes and forwards the per-frame calls to the
 * current one. No current scene is a valid state: forwarding is then a no-op.
 */
export class SceneController {
  private readonly scenes: Array<Scene> = [];
  private currentScene: Scene | null = null;

  constructor(private keyboard: Keyboard = new Keyboard()) {}

  getKeyboard(): Keyboard {
    return this.keyboard;
  }

  setKeyboard(keyboard: Keyboard): void {
    this.keyboard = keyboard;
  }

  addScene(scene: Scene): void {
    if (this.scenes.includes(scene)) return;
    this.scenes.push(scene);
    scene.attachSceneController(this);
  }

  /**
   * Remove `scene` and detach it. An active scene is not exited: callers
   * deactivate it first if they need exit() to run.
   */
  removeScene(scene: Scene): boolean {
    const index = this.scenes.indexOf(scene);
    if (index === -1) return false;
    this.scenes.splice(index, 1);
    if (this.currentScene === scene) this.currentScene = null;
    scene.detachSceneController(this);
    return true;
  }

  /** Remove every scene and return them in insertion order. */
  removeAllScenes(): ReadonlyArray<Scene> {
    const removed = [...this.scenes];
    for (const scene of removed) this.removeScene(scene);
    return removed;
  }

  /** First scene carrying `name`, or null. */
  getScene(name: string | null): Scene | null {
    return this.scenes.find((scene) => scene.isNamed(name)) ?? null;
  }

  getAllScenes(): ReadonlyArray<Scene> {
    return [...this.scenes];
  }

  getTotalScenes(): number {
    return this.scenes.length;
  }

  /**
   * Exit the current scene, then resolve `name` and enter it. The exit
   * happens before resolution, so an unknown name (or null) leaves no
   * current scene.
   */
  setCurrentScene(name: string | null): Scene | null {
    if (this.currentScene !== null) {
      const leaving = this.currentScene;
      leaving.exit();
      leaving.transition("EXIT");
      this.currentScene = null;
    }

    const next = name === null ? null : this.getScene(name);
    if (next === null) {
      debugLog("scene", `no scene named ${String(name)}, none active`);
      return null;
    }

    next.enter();
    next.transition("ENTER");
    this.currentScene = next;
    return next;
  }

  getCurrentScene(): Scene | null {
    return this.currentScene;
  }

  getCurrentSceneName(): string | null {
    return this.currentScene?.getName() ?? null;
  }

  processInputs(dt: number): void {
    this.currentScene?.processInputs(dt, this.keyboard);
  }

  update(dt: number): void {
    this.currentScene?.update(dt);
  }

  render(handle: DrawHandle): void {
    this.currentScene?.render(handle);
  }

  onShutDown(): void {
    this.currentScene?.onShutDown();
  }
}

import { debugLog } from "../utils/debug";

import { SceneLifecycle } from "./lifecycle.machine";

import type { SceneLifecycleEvent, SceneLifecycleState } from "./lifecycle.machine";
import type { SceneController } from "./scene-controller";
import type { Keyboard } from "../device/keyboard";
import type { DrawHandle } from "../render/surface";

/**
 * A unit of game content driven by a SceneController. Concrete scenes
 * implement the hooks; attachment and lifecycle tracking live here.
 *
 * The controller reference is non-owning: the controller owns its scenes,
 * a scene only points back at whichever controller currently holds it.
 */
export abstract class Scene {
  private controller: SceneController | null = null;
  private readonly lifecycle = new SceneLifecycle();

  constructor(private name: string | null = null) {}

  abstract load(): void;
  abstract unload(): void;
  abstract enter(): void;
  abstract exit(): void;
  abstract processInputs(dt: number, keyboard: Keyboard): void;
  abstract update(dt: number): void;
  abstract render(handle: DrawHandle): void;
  abstract onShutDown(): void;

  /**
   * Bind this scene to `controller`. A scene held by another controller is
   * removed from it first; attaching to the current controller is a no-op.
   */
  attachSceneController(controller: SceneController): void {
    if (this.controller === controller) return;
    if (this.controller !== null) {
      this.controller.removeScene(this);
    }
    this.controller = controller;
    this.transition("ATTACH");
  }

  detachSceneController(controller: SceneController): void {
    if (this.controller !== controller) return;
    this.controller = null;
    this.transition("DETACH");
  }

  getSceneController(): SceneController | null {
    return this.controller;
  }

  getKeyboard(): Keyboard | null {
    return this.controller?.getKeyboard() ?? null;
  }

  getName(): string | null {
    return this.name;
  }

  setName(name: string | null): void {
    this.name = name;
  }

  /** An unnamed scene, or a null query, never matches. */
  isNamed(name: string | null): boolean {
    return this.name !== null && this.name === name;
  }

  getLifecycleState(): SceneLifecycleState {
    return this.lifecycle.getState();
  }

  /** @internal Called by the owning controller around enter()/exit(). */
  transition(event: SceneLifecycleEvent): SceneLifecycleState {
    const next = this.lifecycle.send(event);
    debugLog("scene", `${this.name ?? "<unnamed>"} ${event} -> ${next}`);
    return next;
  }
}

import { debugLog } from "../utils/debug";

import { ALT_MASK, CTRL_MASK, META_MASK, SHIFT_MASK } from "./keys";

import type { Keyboard } from "./keyboard";

/**
 * The subset of a DOM `KeyboardEvent` the latch needs. Any event source
 * (browser canvas, a terminal bridge, a scripted test source) can provide it.
 */
export type KeyEventLike = Readonly<{
  keyCode: number;
  key: string;
  shiftKey: boolean;
  ctrlKey: boolean;
  metaKey: boolean;
  altKey: boolean;
}>;

export type KeyEventType = "keydown" | "keyup" | "keypress";

export type KeyEventListener = (event: KeyEventLike) => void;

/** Minimal EventTarget shape; a DOM element satisfies it structurally. */
export type KeyEventTarget = {
  addEventListener(type: KeyEventType, listener: KeyEventListener): void;
  removeEventListener(type: KeyEventType, listener: KeyEventListener): void;
};

export function modifiersOf(event: KeyEventLike): number {
  let mask = 0;
  if (event.shiftKey) mask |= SHIFT_MASK;
  if (event.ctrlKey) mask |= CTRL_MASK;
  if (event.metaKey) mask |= META_MASK;
  if (event.altKey) mask |= ALT_MASK;
  return mask;
}

/**
 * Route a target's key events into the keyboard's producer API.
 * Returns a function that removes every listener it added.
 */
export function attachKeyboard(
  target: KeyEventTarget,
  keyboard: Keyboard,
): () => void {
  const onDown: KeyEventListener = (e) => {
    keyboard.notifyPressed(e.keyCode, modifiersOf(e));
  };
  const onUp: KeyEventListener = (e) => {
    keyboard.notifyReleased(e.keyCode, modifiersOf(e));
  };
  const onTyped: KeyEventListener = (e) => {
    keyboard.notifyTyped(e.key, modifiersOf(e));
  };

  target.addEventListener("keydown", onDown);
  target.addEventListener("keyup", onUp);
  target.addEventListener("keypress", onTyped);
  debugLog("input", "keyboard attached");

  return (): void => {
    target.removeEventListener("keydown", onDown);
    target.removeEventListener("keyup", onUp);
    target.removeEventListener("keypress", onTyped);
    debugLog("input", "keyboard detached");
  };
}

/**
 * In-process event source: records listeners and lets callers dispatch
 * synthetic events. Backs the headless window and the tests.
 */
export class ScriptedKeySource implements KeyEventTarget {
  private readonly listeners = new Map<KeyEventType, Set<KeyEventListener>>();

  addEventListener(type: KeyEventType, listener: KeyEventListener): void {
    const set = this.listeners.get(type) ?? new Set<KeyEventListener>();
    set.add(listener);
    this.listeners.set(type, set);
  }

  removeEventListener(type: KeyEventType, listener: KeyEventListener): void {
    this.listeners.get(type)?.delete(listener);
  }

  listenerCount(type: KeyEventType): number {
    return this.listeners.get(type)?.size ?? 0;
  }

  dispatch(type: KeyEventType, init: Partial<KeyEventLike>): void {
    const event: KeyEventLike = {
      altKey: init.altKey ?? false,
      ctrlKey: init.ctrlKey ?? false,
      key: init.key ?? "",
      keyCode: init.keyCode ?? 0,
      metaKey: init.metaKey ?? false,
      shiftKey: init.shiftKey ?? false,
    };
    for (const listener of this.listeners.get(type) ?? []) {
      listener(event);
    }
  }

  press(keyCode: number, init: Partial<KeyEventLike> = {}): void {
    this.dispatch("keydown", { ...init, keyCode });
  }

  release(keyCode: number, init: Partial<KeyEventLike> = {}): void {
    this.dispatch("keyup", { ...init, keyCode });
  }

  type(key: string, init: Partial<KeyEventLike> = {}): void {
    this.dispatch("keypress", { ...init, key });
  }
}

import { TOTAL_KEYS, createKeyCode, isKeyCode } from "../types/brands";
import { debugLog } from "../utils/debug";

import {
  ALT_MASK,
  CTRL_MASK,
  META_MASK,
  SHIFT_MASK,
  isModifierKey,
} from "./keys";

/*
 * KEYBOARD LATCH: producer / consumer split
 *
 * Producer side (event source callbacks: DOM listeners, a worker message port,
 * a test script) only ever writes:
 *   keys[], keysDownCount, modifiers, pendingPressed/Released/Typed
 *
 * Consumer side (the game loop) only ever reads:
 *   polledKeys[], polledKeysDown, polledModifiers, committedPressed/Released/Typed
 *
 * process() is the single bridge between the two halves. Every producer call
 * and process() runs to completion on the event loop, so each one is an
 * indivisible critical section: the loop can never observe a half-swapped
 * frame, and events delivered after process() returns wait for the next one.
 */
export class Keyboard {
  static readonly TOTAL_KEYS = TOTAL_KEYS;

  // producer side
  private readonly keys = new Array<boolean>(TOTAL_KEYS).fill(false);
  private keysDownCount = 0;
  private modifiers = 0;
  private pendingPressed: Array<number> = [];
  private pendingReleased: Array<number> = [];
  private pendingTyped: Array<string> = [];

  // consumer side
  private readonly polledKeys = new Array<number>(TOTAL_KEYS).fill(0);
  private polledKeysDown = 0;
  private polledModifiers = 0;
  private committedPressed: Array<number> = [];
  private committedReleased: Array<number> = [];
  private committedTyped: Array<string> = [];

  static isModifierKey(keyCode: number): boolean {
    return isModifierKey(keyCode);
  }

  // ---------------------------------------------------------------------------
  // Producer API
  // ---------------------------------------------------------------------------

  notifyPressed(keyCode: number, modifiers = 0): void {
    if (!isKeyCode(keyCode)) return;
    if (!this.keys[keyCode]) this.keysDownCount += 1;
    this.keys[keyCode] = true;
    this.pendingPressed.push(keyCode);
    this.modifiers |= modifiers;
  }

  notifyReleased(keyCode: number, modifiers = 0): void {
    if (!isKeyCode(keyCode)) return;
    if (this.keys[keyCode]) this.keysDownCount -= 1;
    this.keys[keyCode] = false;
    this.pendingReleased.push(keyCode);
    this.modifiers |= modifiers;
  }

  notifyTyped(char: string, modifiers = 0): void {
    this.pendingTyped.push(char);
    this.modifiers |= modifiers;
  }

  // ---------------------------------------------------------------------------
  // Consumer API
  // ---------------------------------------------------------------------------

  /**
   * Commit everything the producer delivered since the previous call.
   * Call exactly once per frame from the game loop, before any query.
   */
  process(): void {
    this.swapQueues();
    this.pollKeys();
    this.pollModifiers();
    if (this.committedPressed.length > 0 || this.committedReleased.length > 0) {
      debugLog("input", "frame input committed", {
        pressed: this.committedPressed,
        released: this.committedReleased,
      });
    }
  }

  /** Drop all held keys and queued events, e.g. after the window loses focus. */
  reset(): void {
    this.keys.fill(false);
    this.keysDownCount = 0;
    this.modifiers = 0;
    this.pendingPressed = [];
    this.pendingReleased = [];
    this.pendingTyped = [];
    this.polledKeys.fill(0);
    this.polledKeysDown = 0;
    this.polledModifiers = 0;
    this.committedPressed = [];
    this.committedReleased = [];
    this.committedTyped = [];
  }

  private swapQueues(): void {
    const pressed = this.pendingPressed;
    this.pendingPressed = this.committedPressed;
    this.pendingPressed.length = 0;
    this.committedPressed = pressed;

    const released = this.pendingReleased;
    this.pendingReleased = this.committedReleased;
    this.pendingReleased.length = 0;
    this.committedReleased = released;

    const typed = this.pendingTyped;
    this.pendingTyped = this.committedTyped;
    this.pendingTyped.length = 0;
    this.committedTyped = typed;
  }

  private pollKeys(): void {
    for (let i = 0; i < TOTAL_KEYS; i++) {
      this.polledKeys[i] = this.keys[i] === true ? this.framesDown(i) + 1 : 0;
    }
    this.polledKeysDown =
      this.keysDownCount > 0 ? this.polledKeysDown + 1 : 0;
  }

  private pollModifiers(): void {
    this.polledModifiers = this.modifiers;
    this.modifiers = 0;
  }

  private framesDown(index: number): number {
    return this.polledKeys[index] ?? 0;
  }

  private hasModifiers(bitmask: number | undefined): boolean {
    if (bitmask === undefined) return true;
    return (this.polledModifiers & bitmask) === bitmask;
  }

  // ---------------------------------------------------------------------------
  // Queries (committed state only)
  // ---------------------------------------------------------------------------

  /** Consecutive processed frames the key has been held; 0 when up. */
  getFramesDown(keyCode: number): number {
    return this.framesDown(createKeyCode(keyCode));
  }

  /** Held this frame, with every modifier in `bitmask` active when given. */
  isKeyDown(keyCode: number, bitmask?: number): boolean {
    return this.getFramesDown(keyCode) > 0 && this.hasModifiers(bitmask);
  }

  /** First processed frame after the key went down. */
  isKeyDownOnce(keyCode: number, bitmask?: number): boolean {
    return this.getFramesDown(keyCode) === 1 && this.hasModifiers(bitmask);
  }

  /** Released during the committed frame. */
  isKeyReleased(keyCode: number, bitmask?: number): boolean {
    const code = createKeyCode(keyCode);
    return this.committedReleased.includes(code) && this.hasModifiers(bitmask);
  }

  isAnyKeyDown(): boolean {
    return this.polledKeysDown > 0;
  }

  isAnyKeyDownOnce(): boolean {
    return this.polledKeysDown === 1;
  }

  getKeysPressed(): Array<number> {
    return [...this.committedPressed];
  }

  getKeysReleased(): Array<number> {
    return [...this.committedReleased];
  }

  getKeysTyped(): Array<string> {
    return [...this.committedTyped];
  }

  getModifiers(): number {
    return this.polledModifiers;
  }

  isShiftDown(): boolean {
    return (this.polledModifiers & SHIFT_MASK) !== 0;
  }

  isControlDown(): boolean {
    return (this.polledModifiers & CTRL_MASK) !== 0;
  }

  isMetaDown(): boolean {
    return (this.polledModifiers & META_MASK) !== 0;
  }

  isAltDown(): boolean {
    return (this.polledModifiers & ALT_MASK) !== 0;
  }

  isModifierActive(): boolean {
    return this.polledModifiers !== 0;
  }
}

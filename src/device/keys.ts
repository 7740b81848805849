import keyCodes from "./key-codes.json";

/**
 * Legacy DOM `KeyboardEvent.keyCode` values for every key the latch tracks.
 * All values fit the 256-slot key table.
 */
export const KEYS: Readonly<typeof keyCodes> = keyCodes;

export type KeyName = keyof typeof keyCodes;

// Modifier bits carried alongside key events
export const SHIFT_MASK = 1 << 6;
export const CTRL_MASK = 1 << 7;
export const META_MASK = 1 << 8;
export const ALT_MASK = 1 << 9;
export const MOUSE_BUTTON1_MASK = 1 << 10;
export const MOUSE_BUTTON2_MASK = 1 << 11;
export const MOUSE_BUTTON3_MASK = 1 << 12;
export const MOUSE_BUTTON4_MASK = 1 << 14;
export const MOUSE_BUTTON5_MASK = 1 << 15;

const MODIFIER_KEYS: ReadonlySet<number> = new Set([
  keyCodes.SHIFT,
  keyCodes.CONTROL,
  keyCodes.META,
  keyCodes.ALT,
]);

/** True for the Shift, Control, Meta and Alt key codes. */
export function isModifierKey(keyCode: number): boolean {
  return MODIFIER_KEYS.has(keyCode);
}

/** Reverse lookup used in debug output; undefined for unnamed codes. */
export function keyNameOf(keyCode: number): KeyName | undefined {
  for (const [name, code] of Object.entries(keyCodes)) {
    if (code === keyCode && isKeyName(name)) return name;
  }
  return undefined;
}

function isKeyName(name: string): name is KeyName {
  return Object.prototype.hasOwnProperty.call(keyCodes, name);
}

import { describe, it, expect } from "@jest/globals";

import { KEYS, isModifierKey, keyNameOf } from "../../src/device/keys";

describe("key table", () => {
  it("uses DOM legacy key codes", () => {
    expect(KEYS.ENTER).toBe(13);
    expect(KEYS.SPACE).toBe(32);
    expect(KEYS.LEFT).toBe(37);
    expect(KEYS.A).toBe(65);
    expect(KEYS.Z).toBe(90);
    expect(KEYS.F12).toBe(123);
  });

  it("keeps every code inside the 256-slot table", () => {
    for (const code of Object.values(KEYS)) {
      expect(code).toBeGreaterThanOrEqual(0);
      expect(code).toBeLessThan(256);
    }
  });

  it("maps codes back to names", () => {
    expect(keyNameOf(27)).toBe("ESCAPE");
    expect(keyNameOf(250)).toBeUndefined();
  });

  it("recognises modifier keys", () => {
    expect(isModifierKey(KEYS.CONTROL)).toBe(true);
    expect(isModifierKey(KEYS.META)).toBe(true);
    expect(isModifierKey(KEYS.TAB)).toBe(false);
  });
});

import { describe, test, expect } from "@jest/globals";

import {
  TRANSPARENT,
  createColor,
  createFrameIndex,
  createKeyCode,
  createSeconds,
  isColor,
  isFrameIndex,
  isKeyCode,
  isSeconds,
  rgba,
} from "@/types/brands";

describe("branded primitives", () => {
  test("Seconds are non-negative and finite", () => {
    expect(createSeconds(0.5)).toBe(0.5);
    expect(() => createSeconds(-0.1)).toThrow(
      "Seconds must be a non-negative finite number",
    );
    expect(isSeconds(Infinity)).toBe(false);
  });

  test("KeyCodes index the 256-slot table", () => {
    expect(createKeyCode(255)).toBe(255);
    expect(() => createKeyCode(256)).toThrow(
      "KeyCode must be an integer from 0 to 255",
    );
    expect(isKeyCode(-1)).toBe(false);
    expect(isKeyCode(2.5)).toBe(false);
  });

  test("FrameIndex is a non-negative integer", () => {
    expect(createFrameIndex(3)).toBe(3);
    expect(() => createFrameIndex(1.5)).toThrow();
    expect(isFrameIndex(-1)).toBe(false);
  });

  test("rgba packs channels as 0xRRGGBBAA", () => {
    expect(rgba(255, 0, 0)).toBe(0xff0000ff);
    expect(rgba(0x12, 0x34, 0x56, 0x78)).toBe(0x12345678);
    expect(TRANSPARENT).toBe(0);
    expect(() => rgba(256, 0, 0)).toThrow(RangeError);
  });

  test("createColor validates packed values", () => {
    expect(createColor(0xffffffff)).toBe(0xffffffff);
    expect(() => createColor(-1)).toThrow(RangeError);
    expect(isColor(0x1_0000_0000)).toBe(false);
  });
});

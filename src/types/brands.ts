// Branded primitive types for type safety and domain modeling

// Duration in seconds - for frame deltas and animation timing
declare const SecondsBrand: unique symbol;
export type Seconds = number & { readonly [SecondsBrand]: true };

// Key code - index into the 256-slot keyboard latch
declare const KeyCodeBrand: unique symbol;
export type KeyCode = number & { readonly [KeyCodeBrand]: true };

// Frame index - position inside an animation strip
declare const FrameIndexBrand: unique symbol;
export type FrameIndex = number & { readonly [FrameIndexBrand]: true };

// Packed 0xRRGGBBAA color
declare const ColorBrand: unique symbol;
export type Color = number & { readonly [ColorBrand]: true };

export const TOTAL_KEYS = 256;

// Seconds constructors and guards
export function createSeconds(value: number): Seconds {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("Seconds must be a non-negative finite number");
  }
  return value as Seconds;
}

export function isSeconds(n: unknown): n is Seconds {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

// KeyCode constructors and guards
export function createKeyCode(value: number): KeyCode {
  if (!isKeyCode(value)) {
    throw new RangeError(
      `KeyCode must be an integer from 0 to ${String(TOTAL_KEYS - 1)}`,
    );
  }
  return value;
}

export function isKeyCode(n: unknown): n is KeyCode {
  return (
    typeof n === "number" && Number.isInteger(n) && n >= 0 && n < TOTAL_KEYS
  );
}

// FrameIndex constructors and guards
export function createFrameIndex(value: number): FrameIndex {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("FrameIndex must be a non-negative integer");
  }
  return value as FrameIndex;
}

export function isFrameIndex(n: unknown): n is FrameIndex {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

// Color constructors and guards
function channel(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0 || v > 255) {
    throw new RangeError(`Color channel ${name} must be an integer 0..255`);
  }
  return v;
}

export function rgba(r: number, g: number, b: number, a = 255): Color {
  const packed =
    ((channel("r", r) << 24) |
      (channel("g", g) << 16) |
      (channel("b", b) << 8) |
      channel("a", a)) >>>
    0;
  return packed as Color;
}

export function isColor(n: unknown): n is Color {
  return (
    typeof n === "number" && Number.isInteger(n) && n >= 0 && n <= 0xffffffff
  );
}

export function createColor(value: number): Color {
  if (!isColor(value)) {
    throw new RangeError("Color must be a packed 32-bit RGBA integer");
  }
  return value;
}

export const TRANSPARENT: Color = rgba(0, 0, 0, 0);

// Conversion helpers for interop at boundaries
export const colorAsNumber = (c: Color): number => c as number;

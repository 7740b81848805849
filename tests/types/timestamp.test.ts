import { describe, test, expect } from "@jest/globals";

import {
  asNumber,
  assertTimestamp,
  createTimestamp,
  fromNow,
  isTimestamp,
} from "@/types/timestamp";

describe("Timestamp", () => {
  test("accepts zero and positive finite numbers", () => {
    expect(asNumber(createTimestamp(0))).toBe(0);
    expect(asNumber(createTimestamp(123.456))).toBe(123.456);
  });

  test("rejects negative and non-finite values", () => {
    expect(() => createTimestamp(-1)).toThrow(
      "Timestamp must be a finite, non-negative number.",
    );
    expect(() => createTimestamp(Number.NaN)).toThrow();
    expect(() => createTimestamp(Infinity)).toThrow();
  });

  test("guards unknown values", () => {
    expect(isTimestamp(5)).toBe(true);
    expect(isTimestamp("5")).toBe(false);
    expect(isTimestamp(-5)).toBe(false);
    expect(() => assertTimestamp(-1)).toThrow();
  });

  test("reads the current time", () => {
    expect(isTimestamp(fromNow())).toBe(true);
  });
});

import { describe, it, expect } from "@jest/globals";

import { EPSILON, Vector } from "../../src/math/vector";

describe("Vector", () => {
  it("defaults to the origin", () => {
    const v = new Vector();
    expect(v.x).toBe(0);
    expect(v.y).toBe(0);
    expect(v.isZero()).toBe(true);
  });

  it("builds polar vectors with cosine on x and sine on y", () => {
    const up = Vector.polar(90, 2);
    expect(up.x).toBeCloseTo(0, 10);
    expect(up.y).toBeCloseTo(2, 10);

    const diag = Vector.polar(45, Math.SQRT2);
    expect(diag.equals(new Vector(1, 1))).toBe(true);
  });

  it("translates in place with numbers or a vector", () => {
    const v = new Vector(1, 2);
    v.translate(3, 4);
    expect(v.toString()).toBe("(4,6)");
    v.translate(new Vector(-4, -6));
    expect(v.isZero()).toBe(true);
  });

  it("scales in place per axis", () => {
    const v = new Vector(2, 3);
    v.scale(2, -1);
    expect(v.toString()).toBe("(4,-3)");
  });

  it("rotates about the origin and about a pivot", () => {
    const v = new Vector(1, 0);
    v.rotate(90);
    expect(v.equals(new Vector(0, 1))).toBe(true);

    const p = new Vector(2, 1);
    p.rotate(180, new Vector(1, 1));
    expect(p.equals(new Vector(0, 1))).toBe(true);
  });

  it("returns new vectors from arithmetic", () => {
    const a = new Vector(1, 2);
    const b = new Vector(3, 5);
    expect(a.add(b).toString()).toBe("(4,7)");
    expect(b.sub(a).toString()).toBe("(2,3)");
    expect(a.mul(3).toString()).toBe("(3,6)");
    expect(b.div(2).toString()).toBe("(1.5,2.5)");
    expect(a.midpoint(b).toString()).toBe("(2,3.5)");
    expect(a.toString()).toBe("(1,2)");
  });

  it("measures length, distance and direction", () => {
    const a = new Vector(0, 0);
    const b = new Vector(3, 4);
    expect(b.length()).toBe(5);
    expect(b.lengthSqr()).toBe(25);
    expect(a.distanceTo(b)).toBe(5);
    expect(a.directionTo(new Vector(0, 10))).toBeCloseTo(90, 10);
    expect(a.directionTo(new Vector(-1, 0))).toBeCloseTo(180, 10);
  });

  it("compares signed components within a tolerance", () => {
    const v = new Vector(1, -1);
    expect(v.equals(new Vector(1, -1))).toBe(true);
    expect(v.equals(new Vector(1 + EPSILON / 2, -1))).toBe(true);
    expect(v.equals(new Vector(-1, 1))).toBe(false);
    expect(v.equals(new Vector(1.1, -1), 0.2)).toBe(true);
  });

  it("clones without aliasing", () => {
    const v = new Vector(5, 6);
    const c = v.clone();
    c.x = 0;
    expect(v.x).toBe(5);
    expect(c.equals(v)).toBe(false);
  });
});

/** Tolerance used by {@link Vector.equals} and {@link Vector.isZero}. */
export const EPSILON = 1e-4;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;
const toDegrees = (radians: number): number => (radians * 180) / Math.PI;

/**
 * 2D point / direction.
 *
 * Arithmetic (`add`, `sub`, `mul`, `div`, `midpoint`) returns new vectors;
 * `translate`, `scale` and `rotate` mutate in place.
 */
export class Vector {
  constructor(
    public x = 0,
    public y = 0,
  ) {}

  /** Vector of `length` pointing `degrees` from the positive x axis. */
  static polar(degrees: number, length: number): Vector {
    const rads = toRadians(degrees);
    return new Vector(length * Math.cos(rads), length * Math.sin(rads));
  }

  translate(tx: number, ty: number): void;
  translate(t: Vector): void;
  translate(txOrVector: number | Vector, ty = 0): void {
    if (typeof txOrVector === "number") {
      this.x += txOrVector;
      this.y += ty;
    } else {
      this.x += txOrVector.x;
      this.y += txOrVector.y;
    }
  }

  scale(sx: number, sy: number): void {
    this.x *= sx;
    this.y *= sy;
  }

  /** Rotate by `degrees` about `origin` (the coordinate origin when omitted). */
  rotate(degrees: number, origin?: Vector): void {
    const rad = toRadians(degrees);
    const sin = Math.sin(rad);
    const cos = Math.cos(rad);
    const ox = origin?.x ?? 0;
    const oy = origin?.y ?? 0;
    const dx = this.x - ox;
    const dy = this.y - oy;
    this.x = ox + (dx * cos - dy * sin);
    this.y = oy + (dx * sin + dy * cos);
  }

  add(v: Vector): Vector {
    return new Vector(this.x + v.x, this.y + v.y);
  }

  sub(v: Vector): Vector {
    return new Vector(this.x - v.x, this.y - v.y);
  }

  mul(scalar: number): Vector {
    return new Vector(scalar * this.x, scalar * this.y);
  }

  div(scalar: number): Vector {
    return new Vector(this.x / scalar, this.y / scalar);
  }

  distanceTo(v: Vector): number {
    return Math.hypot(this.x - v.x, this.y - v.y);
  }

  /** Angle in degrees from this point towards `v`. */
  directionTo(v: Vector): number {
    return toDegrees(Math.atan2(v.y - this.y, v.x - this.x));
  }

  midpoint(v: Vector): Vector {
    return new Vector((this.x + v.x) / 2, (this.y + v.y) / 2);
  }

  length(): number {
    return Math.sqrt(this.lengthSqr());
  }

  lengthSqr(): number {
    return this.x * this.x + this.y * this.y;
  }

  isZero(): boolean {
    return this.equals(new Vector(), EPSILON);
  }

  equals(that: Vector, epsilon = EPSILON): boolean {
    if (this === that) return true;
    return (
      Math.abs(this.x - that.x) <= epsilon &&
      Math.abs(this.y - that.y) <= epsilon
    );
  }

  clone(): Vector {
    return new Vector(this.x, this.y);
  }

  toString(): string {
    return `(${String(this.x)},${String(this.y)})`;
  }
}

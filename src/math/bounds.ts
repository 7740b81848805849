import { Vector } from "./vector";

/**
 * Axis-aligned rectangle anchored at its top-left corner.
 *
 * Edge semantics are asymmetric:
 * - `intersects` treats touching edges as overlapping;
 * - `contains` is strict, so a point on the edge is outside, and zero-area
 *   bounds lying on an edge are never contained.
 */
export class Bounds {
  private readonly topLeft: Vector;

  constructor(
    x = 0,
    y = 0,
    private width = 0,
    private height = 0,
  ) {
    this.topLeft = new Vector(x, y);
  }

  static at(pos: Vector, width = 0, height = 0): Bounds {
    return new Bounds(pos.x, pos.y, width, height);
  }

  intersects(other: Bounds): boolean {
    const myLeft = this.getX();
    const myRight = myLeft + this.width;
    const myTop = this.getY();
    const myBottom = myTop + this.height;

    const otherLeft = other.getX();
    const otherRight = otherLeft + other.getWidth();
    const otherTop = other.getY();
    const otherBottom = otherTop + other.getHeight();

    if (myRight < otherLeft) return false;
    if (myLeft > otherRight) return false;
    if (myBottom < otherTop) return false;
    if (myTop > otherBottom) return false;
    return true;
  }

  contains(p: Vector): boolean {
    const myLeft = this.getX();
    const myRight = myLeft + this.width;
    const myTop = this.getY();
    const myBottom = myTop + this.height;
    return p.x > myLeft && p.x < myRight && p.y > myTop && p.y < myBottom;
  }

  containsBounds(other: Bounds): boolean {
    return (
      this.contains(other.getTopLeft()) &&
      this.contains(other.getBottomRight()) &&
      this.contains(other.getTopRight()) &&
      this.contains(other.getBottomLeft())
    );
  }

  getX(): number {
    return this.topLeft.x;
  }

  getY(): number {
    return this.topLeft.y;
  }

  /** The owned top-left vector (mutations move the bounds). */
  getTopLeft(): Vector {
    return this.topLeft;
  }

  getTopRight(): Vector {
    return new Vector(this.topLeft.x + this.width, this.topLeft.y);
  }

  getBottomLeft(): Vector {
    return new Vector(this.topLeft.x, this.topLeft.y + this.height);
  }

  getBottomRight(): Vector {
    return new Vector(
      this.topLeft.x + this.width,
      this.topLeft.y + this.height,
    );
  }

  setX(x: number): void {
    this.topLeft.x = x;
  }

  setY(y: number): void {
    this.topLeft.y = y;
  }

  setTopLeft(x: number, y: number): void;
  setTopLeft(pos: Vector): void;
  setTopLeft(xOrPos: number | Vector, y = 0): void {
    if (typeof xOrPos === "number") {
      this.topLeft.x = xOrPos;
      this.topLeft.y = y;
    } else {
      this.topLeft.x = xOrPos.x;
      this.topLeft.y = xOrPos.y;
    }
  }

  getCenterX(): number {
    return this.topLeft.x + this.width / 2;
  }

  getCenterY(): number {
    return this.topLeft.y + this.height / 2;
  }

  getCenter(): Vector {
    return new Vector(this.getCenterX(), this.getCenterY());
  }

  setCenterX(x: number): void {
    this.setX(x - this.width / 2);
  }

  setCenterY(y: number): void {
    this.setY(y - this.height / 2);
  }

  setCenter(x: number, y: number): void;
  setCenter(pos: Vector): void;
  setCenter(xOrPos: number | Vector, y = 0): void {
    const cx = typeof xOrPos === "number" ? xOrPos : xOrPos.x;
    const cy = typeof xOrPos === "number" ? y : xOrPos.y;
    this.setTopLeft(cx - this.width / 2, cy - this.height / 2);
  }

  getWidth(): number {
    return this.width;
  }

  getHeight(): number {
    return this.height;
  }

  setWidth(w: number): void {
    this.width = w;
  }

  setHeight(h: number): void {
    this.height = h;
  }

  setSize(w: number, h: number): void {
    this.width = w;
    this.height = h;
  }
}

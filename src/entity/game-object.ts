import { Bounds } from "../math/bounds";

import type { Vector } from "../math/vector";
import type { DrawHandle } from "../render/surface";
import type { Screen } from "../runtime/screen";

/**
 * Something in the game world that follows the update/render cycle and
 * occupies a rectangle. Position and size queries delegate to the owned
 * {@link Bounds}.
 */
export abstract class GameObject {
  private readonly bounds = new Bounds();

  constructor(private name: string | null = null) {}

  abstract update(dt: number): void;
  abstract render(handle: DrawHandle): void;

  intersects(other: GameObject | Bounds): boolean {
    return this.bounds.intersects(
      other instanceof GameObject ? other.bounds : other,
    );
  }

  contains(point: Vector): boolean {
    return this.bounds.contains(point);
  }

  containsObject(other: GameObject): boolean {
    return this.bounds.containsBounds(other.bounds);
  }

  isOnScreen(screen: Screen): boolean {
    return screen.isOnScreen(this.bounds);
  }

  isOffScreen(screen: Screen): boolean {
    return screen.isOffScreen(this.bounds);
  }

  getBounds(): Bounds {
    return this.bounds;
  }

  setBounds(x: number, y: number, width: number, height: number): void;
  setBounds(pos: Vector, width: number, height: number): void;
  setBounds(
    xOrPos: number | Vector,
    yOrWidth: number,
    widthOrHeight: number,
    height = 0,
  ): void {
    if (typeof xOrPos === "number") {
      this.bounds.setTopLeft(xOrPos, yOrWidth);
      this.bounds.setSize(widthOrHeight, height);
    } else {
      this.bounds.setTopLeft(xOrPos.x, xOrPos.y);
      this.bounds.setSize(yOrWidth, widthOrHeight);
    }
  }

  getPosition(): Vector {
    return this.bounds.getTopLeft().clone();
  }

  setPosition(x: number, y: number): void;
  setPosition(pos: Vector): void;
  setPosition(xOrPos: number | Vector, y = 0): void {
    if (typeof xOrPos === "number") this.bounds.setTopLeft(xOrPos, y);
    else this.bounds.setTopLeft(xOrPos.x, xOrPos.y);
  }

  getX(): number {
    return this.bounds.getX();
  }

  getY(): number {
    return this.bounds.getY();
  }

  setX(x: number): void {
    this.bounds.setX(x);
  }

  setY(y: number): void {
    this.bounds.setY(y);
  }

  getCenterPosition(): Vector {
    return this.bounds.getCenter();
  }

  setCenterPosition(x: number, y: number): void;
  setCenterPosition(pos: Vector): void;
  setCenterPosition(xOrPos: number | Vector, y = 0): void {
    if (typeof xOrPos === "number") this.bounds.setCenter(xOrPos, y);
    else this.bounds.setCenter(xOrPos);
  }

  getCenterX(): number {
    return this.bounds.getCenterX();
  }

  getCenterY(): number {
    return this.bounds.getCenterY();
  }

  setCenterX(x: number): void {
    this.bounds.setCenterX(x);
  }

  setCenterY(y: number): void {
    this.bounds.setCenterY(y);
  }

  getWidth(): number {
    return this.bounds.getWidth();
  }

  getHeight(): number {
    return this.bounds.getHeight();
  }

  setWidth(width: number): void {
    this.bounds.setWidth(width);
  }

  setHeight(height: number): void {
    this.bounds.setHeight(height);
  }

  setSize(width: number, height: number): void {
    this.bounds.setSize(width, height);
  }

  getName(): string | null {
    return this.name;
  }

  setName(name: string | null): void {
    this.name = name;
  }
}

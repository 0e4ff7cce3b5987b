import { DegenerateGeometryError } from './DrawErrors';

/**
 * Immutable 2D vector over plain numbers.
 * @public
 */
export class Vec2 {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new DegenerateGeometryError(`Invalid coordinates passed to Vec2: (${x}, ${y})`);
    }
    this.x = x;
    this.y = y;
    Object.freeze(this);
  }

  get magnitude(): number {
    return Math.hypot(this.x, this.y);
  }

  get sqrMagnitude(): number {
    return this.x * this.x + this.y * this.y;
  }

  get normalized(): Vec2 {
    const mag = this.magnitude;
    return new Vec2(this.x / mag, this.y / mag);
  }

  static dot(a: Vec2, b: Vec2): number {
    return a.x * b.x + a.y * b.y;
  }

  /**
   * 2D cross product (scalar z-component of the 3D cross product).
   * Positive if b is counter-clockwise from a.
   */
  static cross(a: Vec2, b: Vec2): number {
    return a.x * b.y - a.y * b.x;
  }

  static distance(a: Vec2, b: Vec2): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
  }

  add(other: Vec2): Vec2 {
    return new Vec2(this.x + other.x, this.y + other.y);
  }

  sub(other: Vec2): Vec2 {
    return new Vec2(this.x - other.x, this.y - other.y);
  }

  mul(scalar: number): Vec2 {
    return new Vec2(this.x * scalar, this.y * scalar);
  }

  distanceTo(other: Vec2): number {
    return Vec2.distance(this, other);
  }

  equals(other: Vec2): boolean {
    return this.x === other.x && this.y === other.y;
  }

  toString(): string {
    return `Vec2(${this.x}, ${this.y})`;
  }
}

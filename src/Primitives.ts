import { DegenerateGeometryError } from './DrawErrors';
import { Geometry } from './Geometry';
import type { Line } from './Symbols';
import type { Vec2 } from './Vec2';

/**
 * Side length of a right-angle indicator, in the renderer's screen units.
 * Independent of the diagram's coordinate scale.
 * @public
 */
export const PERPENDICULAR_MARK_SIZE = 8;

export type LineDash = 'dotted';

export interface StrokeStyle {
  readonly color: string;
  readonly width: number;
}

export interface SegmentPrimitive extends StrokeStyle {
  readonly kind: 'segment';
  readonly p0: Vec2;
  readonly p1: Vec2;
  readonly dash?: LineDash;
}

export interface CirclePrimitive extends StrokeStyle {
  readonly kind: 'circle';
  readonly center: Vec2;
  readonly radius: number;
}

export interface TrianglePrimitive extends StrokeStyle {
  readonly kind: 'triangle';
  readonly p0: Vec2;
  readonly p1: Vec2;
  readonly p2: Vec2;
}

/** Head at `to` only. */
export interface ArrowPrimitive extends StrokeStyle {
  readonly kind: 'arrow';
  readonly from: Vec2;
  readonly to: Vec2;
}

/** Like an arrow, with the tail endpoint marked as well. */
export interface CompleteArrowPrimitive extends StrokeStyle {
  readonly kind: 'completeArrow';
  readonly from: Vec2;
  readonly to: Vec2;
}

/**
 * Right-angle indicator at the intersection of two lines. `directions` are unit
 * vectors from the corner along each line; the square spans `size` along both.
 */
export interface PerpendicularMarkPrimitive {
  readonly kind: 'perpendicularMark';
  readonly line0: Line;
  readonly line1: Line;
  readonly corner: Vec2;
  readonly directions: readonly [Vec2, Vec2];
  readonly size: number;
  readonly color: string;
}

/** A line drawn across the whole view, not just between its two defining points. */
export interface LineSymbolPrimitive extends StrokeStyle {
  readonly kind: 'lineSymbol';
  readonly line: Line;
  readonly dash?: LineDash;
}

/**
 * Renderer-agnostic drawable shape.
 * @public
 */
export type Primitive =
  | SegmentPrimitive
  | CirclePrimitive
  | TrianglePrimitive
  | ArrowPrimitive
  | CompleteArrowPrimitive
  | PerpendicularMarkPrimitive
  | LineSymbolPrimitive;

export type PrimitiveKind = Primitive['kind'];

export function segment(p0: Vec2, p1: Vec2, color: string, width: number, dash?: LineDash): SegmentPrimitive {
  const primitive: SegmentPrimitive = dash
    ? { kind: 'segment', p0, p1, color, width, dash }
    : { kind: 'segment', p0, p1, color, width };
  return Object.freeze(primitive);
}

export function circle(center: Vec2, radius: number, color: string, width: number): CirclePrimitive {
  if (!Number.isFinite(radius) || radius < 0) {
    throw new DegenerateGeometryError(`Invalid circle radius: ${radius}`);
  }
  const primitive: CirclePrimitive = { kind: 'circle', center, radius, color, width };
  return Object.freeze(primitive);
}

export function triangle(p0: Vec2, p1: Vec2, p2: Vec2, color: string, width: number): TrianglePrimitive {
  const primitive: TrianglePrimitive = { kind: 'triangle', p0, p1, p2, color, width };
  return Object.freeze(primitive);
}

export function arrow(from: Vec2, to: Vec2, color: string, width: number): ArrowPrimitive {
  const primitive: ArrowPrimitive = { kind: 'arrow', from, to, color, width };
  return Object.freeze(primitive);
}

export function completeArrow(from: Vec2, to: Vec2, color: string, width: number): CompleteArrowPrimitive {
  const primitive: CompleteArrowPrimitive = { kind: 'completeArrow', from, to, color, width };
  return Object.freeze(primitive);
}

export function lineSymbol(line: Line, color: string, width: number, dash?: LineDash): LineSymbolPrimitive {
  const primitive: LineSymbolPrimitive = dash
    ? { kind: 'lineSymbol', line, color, width, dash }
    : { kind: 'lineSymbol', line, color, width };
  return Object.freeze(primitive);
}

/** Unit vector from `corner` toward whichever defining point of `line` lies farther away. */
function directionAlong(line: Line, corner: Vec2): Vec2 {
  const [first, second] = line.points;
  const far = corner.distanceTo(first.num) >= corner.distanceTo(second.num) ? first.num : second.num;
  return far.sub(corner).normalized;
}

/**
 * @throws DegenerateGeometryError when the two lines are parallel
 */
export function perpendicularMark(line0: Line, line1: Line, color: string): PerpendicularMarkPrimitive {
  const [a, b] = line0.points;
  const [c, d] = line1.points;
  const corner = Geometry.lineIntersection(a.num, b.num, c.num, d.num);
  const directions: readonly [Vec2, Vec2] = [directionAlong(line0, corner), directionAlong(line1, corner)];
  const primitive: PerpendicularMarkPrimitive = {
    kind: 'perpendicularMark',
    line0,
    line1,
    corner,
    directions: Object.freeze(directions),
    size: PERPENDICULAR_MARK_SIZE,
    color,
  };
  return Object.freeze(primitive);
}

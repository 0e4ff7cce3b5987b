import { describe, it, expect } from 'vitest';
import { DegenerateGeometryError } from '../src/DrawErrors';
import {
  arrow,
  circle,
  completeArrow,
  lineSymbol,
  perpendicularMark,
  PERPENDICULAR_MARK_SIZE,
  segment,
  triangle,
} from '../src/Primitives';
import { SymbolsRegistry } from '../src/Symbols';
import { Vec2 } from '../src/Vec2';
import { expectVec } from './testUtils';

describe('Primitives', () => {
  const p0 = new Vec2(0, 0);
  const p1 = new Vec2(3, 4);
  const p2 = new Vec2(-1, 2);

  it('builds a solid segment without a dash key', () => {
    const s = segment(p0, p1, 'red', 2);

    expect(s).toEqual({ kind: 'segment', p0, p1, color: 'red', width: 2 });
    expect('dash' in s).toBe(false);
  });

  it('builds a dotted segment', () => {
    expect(segment(p0, p1, 'red', 0.5, 'dotted').dash).toBe('dotted');
  });

  it('builds circles and rejects negative radii', () => {
    expect(circle(p1, 5, 'blue', 1)).toEqual({ kind: 'circle', center: p1, radius: 5, color: 'blue', width: 1 });
    expect(() => circle(p1, -1, 'blue', 1)).toThrow(new DegenerateGeometryError('Invalid circle radius: -1'));
    expect(() => circle(p1, Number.POSITIVE_INFINITY, 'blue', 1)).toThrow(DegenerateGeometryError);
  });

  it('keeps triangle vertex order', () => {
    const t = triangle(p2, p0, p1, 'green', 1.5);

    expect([t.p0, t.p1, t.p2]).toEqual([p2, p0, p1]);
  });

  it('distinguishes arrows from complete arrows', () => {
    expect(arrow(p0, p1, 'black', 1).kind).toBe('arrow');
    expect(completeArrow(p0, p1, 'black', 1).kind).toBe('completeArrow');
  });

  it('returns frozen primitives', () => {
    expect(Object.isFrozen(segment(p0, p1, 'red', 2))).toBe(true);
    expect(Object.isFrozen(triangle(p0, p1, p2, 'red', 2))).toBe(true);
  });

  describe('lineSymbol and perpendicularMark', () => {
    const symbols = SymbolsRegistry.fromCoordinates({
      a: [-1, 0],
      b: [2, 0],
      x: [0, 1],
      y: [0, 3],
      u: [1, 1],
      v: [4, 1],
    });
    const [a, b, x, y, u, v] = symbols.points.namesToPoints(['a', 'b', 'x', 'y', 'u', 'v']);

    it('references the registry line', () => {
      const ab = symbols.lines.lineThroughPair(a, b);
      const symbol = lineSymbol(ab, 'black', 1, 'dotted');

      expect(symbol.line).toBe(ab);
      expect(symbol.dash).toBe('dotted');
    });

    it('places the mark at the intersection, pointing toward the farther defining points', () => {
      const xy = symbols.lines.lineThroughPair(x, y);
      const ab = symbols.lines.lineThroughPair(a, b);

      const mark = perpendicularMark(xy, ab, 'grey');

      expectVec(mark.corner, 0, 0);
      expectVec(mark.directions[0], 0, 1);
      expectVec(mark.directions[1], 1, 0);
      expect(mark.size).toBe(PERPENDICULAR_MARK_SIZE);
      expect(mark.color).toBe('grey');
      expect(mark.line0).toBe(xy);
      expect(mark.line1).toBe(ab);
    });

    it('rejects parallel lines', () => {
      const ab = symbols.lines.lineThroughPair(a, b);
      const uv = symbols.lines.lineThroughPair(u, v);

      expect(() => perpendicularMark(ab, uv, 'grey')).toThrow(DegenerateGeometryError);
    });
  });
});

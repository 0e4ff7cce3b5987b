import { DegenerateGeometryError } from './DrawErrors';
import { Vec2 } from './Vec2';

/**
 * Relative tolerance under which a determinant counts as zero.
 * @public
 */
export const GEOMETRY_EPSILON = 1e-9;

/**
 * Numeric helpers deriving auxiliary points from resolved coordinates.
 * @public
 */
export class Geometry {
  /**
   * Circumcenter of triangle abc, the intersection of its perpendicular bisectors.
   *
   * Solved in closed form relative to `a`:
   * d = 2 * cross(b - a, c - a), and the center offset is
   * ((|b'|² c'y - |c'|² b'y) / d, (|c'|² b'x - |b'|² c'x) / d).
   *
   * @throws DegenerateGeometryError when a, b and c are collinear or coincident
   */
  static circumcenter(a: Vec2, b: Vec2, c: Vec2): Vec2 {
    const ab = b.sub(a);
    const ac = c.sub(a);
    const scale = Math.max(ab.magnitude, ac.magnitude);
    const d = 2 * Vec2.cross(ab, ac);

    if (scale === 0 || Math.abs(d) <= GEOMETRY_EPSILON * scale * scale) {
      throw new DegenerateGeometryError(
        `Cannot compute circumcenter of collinear points ${a}, ${b}, ${c}`
      );
    }

    const abSq = ab.sqrMagnitude;
    const acSq = ac.sqrMagnitude;
    const offset = new Vec2(
      (ac.y * abSq - ab.y * acSq) / d,
      (ab.x * acSq - ac.x * abSq) / d
    );
    return a.add(offset);
  }

  /**
   * Intersection of the line through p0, p1 with the line through q0, q1.
   *
   * @throws DegenerateGeometryError when a line is a single point or the lines are parallel
   */
  static lineIntersection(p0: Vec2, p1: Vec2, q0: Vec2, q1: Vec2): Vec2 {
    const r = p1.sub(p0);
    const s = q1.sub(q0);
    const rLength = r.magnitude;
    const sLength = s.magnitude;
    if (rLength === 0 || sLength === 0) {
      throw new DegenerateGeometryError('Cannot intersect a line defined by coincident points');
    }

    const denom = Vec2.cross(r, s);
    if (Math.abs(denom) <= GEOMETRY_EPSILON * rLength * sLength) {
      throw new DegenerateGeometryError(`Lines through ${p0}, ${p1} and ${q0}, ${q1} are parallel`);
    }

    const t = Vec2.cross(q0.sub(p0), s) / denom;
    return p0.add(r.mul(t));
  }

  /**
   * Orthogonal projection of `point` onto the line through a and b.
   *
   * @throws DegenerateGeometryError when a and b coincide
   */
  static footOfPerpendicular(point: Vec2, a: Vec2, b: Vec2): Vec2 {
    const ab = b.sub(a);
    const lengthSq = ab.sqrMagnitude;
    if (lengthSq === 0) {
      throw new DegenerateGeometryError('Cannot project onto a line defined by coincident points');
    }
    const t = Vec2.dot(point.sub(a), ab) / lengthSq;
    return a.add(ab.mul(t));
  }
}

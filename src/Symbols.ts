import { DegenerateGeometryError, UnknownPointNameError } from './DrawErrors';
import { Vec2 } from './Vec2';

/**
 * A named point with solved coordinates.
 * @public
 */
export interface Point {
  readonly name: string;
  readonly num: Vec2;
}

/**
 * Identity of the line through two named points.
 * `points` are ordered by name so the identity does not depend on request order.
 * @public
 */
export interface Line {
  readonly key: string;
  readonly points: readonly [Point, Point];
}

/** @public */
export interface PointResolver {
  /** @throws UnknownPointNameError for the first name that is not registered */
  namesToPoints(names: readonly string[]): Point[];
}

/** @public */
export interface LineRegistry {
  /** Order independent and idempotent: (p, q) and (q, p) yield the same identity. */
  lineThroughPair(p: Point, q: Point): Line;
}

/**
 * What the dispatch engine needs from the symbol layer.
 * @public
 */
export interface SymbolsLookup {
  readonly points: PointResolver;
  readonly lines: LineRegistry;
}

/** Point names are non-empty and free of whitespace, so a space can join them into a line key. */
export const POINT_NAME = /^\S+$/;

export function lineKey(p: Point, q: Point): string {
  return p.name < q.name ? `${p.name} ${q.name}` : `${q.name} ${p.name}`;
}

/**
 * In-memory points table.
 * @public
 */
export class PointsRegistry implements PointResolver {
  private readonly byName = new Map<string, Point>();

  add(name: string, x: number, y: number): Point {
    if (!POINT_NAME.test(name)) {
      throw new Error(`Invalid point name: "${name}"`);
    }
    if (this.byName.has(name)) {
      throw new Error(`Point "${name}" is already registered`);
    }
    const point: Point = Object.freeze({ name, num: new Vec2(x, y) });
    this.byName.set(name, point);
    return point;
  }

  get size(): number {
    return this.byName.size;
  }

  namesToPoints(names: readonly string[]): Point[] {
    return names.map(name => {
      const point = this.byName.get(name);
      if (!point) {
        throw new UnknownPointNameError(name);
      }
      return point;
    });
  }
}

/**
 * In-memory line identities, one per unordered pair of point names.
 * @public
 */
export class LinesRegistry implements LineRegistry {
  private readonly byKey = new Map<string, Line>();

  lineThroughPair(p: Point, q: Point): Line {
    if (p.name === q.name || p.num.equals(q.num)) {
      throw new DegenerateGeometryError(`No unique line through "${p.name}" and "${q.name}"`);
    }

    const key = lineKey(p, q);
    const existing = this.byKey.get(key);
    if (existing) {
      return existing;
    }

    const points: readonly [Point, Point] = p.name < q.name ? [p, q] : [q, p];
    const line: Line = Object.freeze({ key, points: Object.freeze(points) });
    this.byKey.set(key, line);
    return line;
  }

  get size(): number {
    return this.byKey.size;
  }
}

/**
 * Reference symbol layer: a points table plus the line identities derived from it.
 * @public
 */
export class SymbolsRegistry implements SymbolsLookup {
  readonly points = new PointsRegistry();
  readonly lines = new LinesRegistry();

  static fromCoordinates(coordinates: Record<string, readonly [number, number]>): SymbolsRegistry {
    const registry = new SymbolsRegistry();
    for (const [name, [x, y]] of Object.entries(coordinates)) {
      registry.points.add(name, x, y);
    }
    return registry;
  }
}

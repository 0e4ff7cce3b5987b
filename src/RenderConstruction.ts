import { lookupConstruction, type ConstructionKind } from './ConstructionCatalog';
import { ArgumentCountMismatchError, ConstructionDrawError } from './DrawErrors';
import { Geometry } from './Geometry';
import {
  arrow,
  circle,
  completeArrow,
  lineSymbol,
  perpendicularMark,
  segment,
  triangle,
  type Primitive,
} from './Primitives';
import type { Construction, Problem } from './Problem';
import type { LineRegistry, Point, SymbolsLookup } from './Symbols';
import type { DrawTheme } from './Theme';

interface RuleContext {
  readonly lines: LineRegistry;
  readonly theme: DrawTheme;
}

/** Receives exactly as many points as the catalog arity of its kind. */
type RenderRule = (points: readonly Point[], context: RuleContext) => Primitive[];

const drawNothing: RenderRule = () => [];

function closedPolygon(points: readonly Point[], theme: DrawTheme): Primitive[] {
  return points.map((p, i) => {
    const next = points[(i + 1) % points.length];
    return segment(p.num, next.num, theme.triangleColor, theme.thickLineWidth);
  });
}

const circleThroughVertex: RenderRule = ([x, a, b, c], { theme }) => [
  circle(x.num, x.num.distanceTo(a.num), theme.lineColor, theme.thickLineWidth),
  triangle(a.num, b.num, c.num, theme.triangleColor, theme.thickLineWidth),
];

const plainTriangle: RenderRule = ([a, b, c], { theme }) => [
  triangle(a.num, b.num, c.num, theme.triangleColor, theme.thickLineWidth),
];

const parallelThrough: RenderRule = ([x, y, a, b], { theme }) => [
  segment(a.num, b.num, theme.lineColor, theme.thickLineWidth),
  segment(x.num, y.num, theme.lineColor, theme.thinLineWidth, 'dotted'),
];

const supportingLine: RenderRule = ([, a, b], { lines, theme }) => [
  lineSymbol(lines.lineThroughPair(a, b), theme.lineColor, theme.thickLineWidth),
];

const triangleWithCevians: RenderRule = ([d, a, b, c], { lines, theme }) => [
  triangle(a.num, b.num, c.num, theme.triangleColor, theme.thickLineWidth),
  lineSymbol(lines.lineThroughPair(a, d), theme.lineColor, theme.thickLineWidth),
  lineSymbol(lines.lineThroughPair(b, d), theme.lineColor, theme.thickLineWidth),
  lineSymbol(lines.lineThroughPair(c, d), theme.lineColor, theme.thickLineWidth),
];

/** Both triangles, then their oriented edges a→b→c→a and p→q→r→p. */
function pairedTriangles(abc: readonly Point[], pqr: readonly Point[], theme: DrawTheme): Primitive[] {
  const [a, b, c] = abc;
  const [p, q, r] = pqr;
  const primitives: Primitive[] = [
    triangle(a.num, b.num, c.num, theme.triangleColor, theme.thickLineWidth),
    triangle(p.num, q.num, r.num, theme.triangleColor, theme.thickLineWidth),
  ];
  for (const [from, to] of [[a, b], [b, c], [c, a], [p, q], [q, r], [r, p]]) {
    primitives.push(arrow(from.num, to.num, theme.triangleColor, theme.thinLineWidth));
  }
  return primitives;
}

const similarTriangles: RenderRule = ([r, a, b, c, p, q], { theme }) => pairedTriangles([a, b, c], [p, q, r], theme);

const congruentTriangles: RenderRule = ([q, r, a, b, c, p], { theme }) => pairedTriangles([a, b, c], [p, q, r], theme);

const RENDER_RULES: Record<ConstructionKind, RenderRule> = {
  free: drawNothing,
  circle: circleThroughVertex,
  circumcenter: circleThroughVertex,
  on_circum: ([, a, b, c], { theme }) => {
    const center = Geometry.circumcenter(a.num, b.num, c.num);
    return [
      triangle(a.num, b.num, c.num, theme.triangleColor, theme.thickLineWidth),
      circle(center, center.distanceTo(a.num), theme.circleColor, theme.thickLineWidth),
    ];
  },
  on_circle: ([, o, a], { theme }) => [
    circle(o.num, o.num.distanceTo(a.num), theme.lineColor, theme.thickLineWidth),
  ],
  triangle: plainTriangle,
  acute_triangle: plainTriangle,
  triangle12: plainTriangle,
  quadrangle: (points, { theme }) => closedPolygon(points, theme),
  pentagon: (points, { theme }) => closedPolygon(points, theme),
  on_line: ([, a, b], { theme }) => [segment(a.num, b.num, theme.lineColor, theme.thickLineWidth)],
  segment: ([a, b], { theme }) => [segment(a.num, b.num, theme.lineColor, theme.thickLineWidth)],
  on_tline: ([x, y, a, b], { lines, theme }) => {
    const xy = lines.lineThroughPair(x, y);
    const ab = lines.lineThroughPair(a, b);
    return [
      lineSymbol(xy, theme.lineColor, theme.thickLineWidth),
      lineSymbol(ab, theme.lineColor, theme.thinLineWidth, 'dotted'),
      perpendicularMark(xy, ab, theme.perpendicularColor),
    ];
  },
  on_pline: parallelThrough,
  on_pline0: parallelThrough,
  intersection_ll: ([, a, b, c, d], { lines, theme }) => [
    lineSymbol(lines.lineThroughPair(a, b), theme.lineColor, theme.thickLineWidth),
    lineSymbol(lines.lineThroughPair(c, d), theme.lineColor, theme.thickLineWidth),
  ],
  intersection_lp: ([x, a, b, c, m, n], { lines, theme }) => [
    lineSymbol(lines.lineThroughPair(a, b), theme.lineColor, theme.thickLineWidth),
    lineSymbol(lines.lineThroughPair(m, n), theme.lineColor, theme.thickLineWidth),
    segment(c.num, x.num, theme.lineColor, theme.thinLineWidth, 'dotted'),
  ],
  on_dia: ([x, a, b], { lines, theme }) => {
    const xa = lines.lineThroughPair(x, a);
    const xb = lines.lineThroughPair(x, b);
    return [
      lineSymbol(xa, theme.lineColor, theme.thickLineWidth),
      lineSymbol(xb, theme.lineColor, theme.thickLineWidth),
      perpendicularMark(xa, xb, theme.perpendicularColor),
    ];
  },
  r_triangle: ([x, a, b], { lines, theme }) => [
    triangle(x.num, a.num, b.num, theme.triangleColor, theme.thickLineWidth),
    perpendicularMark(lines.lineThroughPair(x, a), lines.lineThroughPair(x, b), theme.perpendicularColor),
  ],
  midpoint: supportingLine,
  between: supportingLine,
  between_bound: supportingLine,
  trisegment: ([, , a, b], { lines, theme }) => [
    lineSymbol(lines.lineThroughPair(a, b), theme.lineColor, theme.thickLineWidth),
  ],
  foot: ([f, a, b, c], { lines, theme }) => {
    const af = lines.lineThroughPair(a, f);
    const bc = lines.lineThroughPair(b, c);
    return [
      lineSymbol(af, theme.lineColor, theme.thickLineWidth),
      lineSymbol(bc, theme.lineColor, theme.thickLineWidth),
      perpendicularMark(af, bc, theme.perpendicularColor),
    ];
  },
  incenter: triangleWithCevians,
  excenter: triangleWithCevians,
  simtri: similarTriangles,
  simtrir: similarTriangles,
  contri: congruentTriangles,
  contrir: congruentTriangles,
  shift: ([x, b, c, d], { theme }) => [
    completeArrow(d.num, c.num, theme.lineColor, theme.thinLineWidth),
    completeArrow(b.num, x.num, theme.lineColor, theme.thinLineWidth),
  ],
  mirror: ([x, a, b], { theme }) => [
    completeArrow(b.num, a.num, theme.lineColor, theme.thinLineWidth),
    completeArrow(b.num, x.num, theme.lineColor, theme.thinLineWidth),
  ],
};

/**
 * Drawing primitives for a single construction, in back-to-front order.
 *
 * Names outside the catalog, and `free`, draw nothing and are not errors.
 *
 * @throws ArgumentCountMismatchError when `construction.args` disagrees with the catalog arity
 * @throws UnknownPointNameError from the resolver
 * @throws DegenerateGeometryError when derived geometry is undefined for the given coordinates
 * @public
 */
export function renderConstruction(
  construction: Construction,
  symbols: SymbolsLookup,
  theme: DrawTheme
): readonly Primitive[] {
  const entry = lookupConstruction(construction.name);
  if (!entry || entry.kind === 'free') {
    return [];
  }

  if (construction.args.length !== entry.arity) {
    throw new ArgumentCountMismatchError(construction.name, entry.arity, construction.args.length);
  }

  const points = symbols.points.namesToPoints(construction.args);
  return Object.freeze(RENDER_RULES[entry.kind](points, { lines: symbols.lines, theme }));
}

/** @public */
export interface RenderClausesOptions {
  verbose?: boolean;
}

/** @public */
export interface RenderFailure {
  clauseIndex: number;
  construction: Construction;
  error: ConstructionDrawError;
}

/** @public */
export interface RenderClausesResult {
  primitives: Primitive[];
  failures: RenderFailure[];
}

/**
 * Renders every construction of every clause in order. A construction that
 * fails with a {@link ConstructionDrawError} is recorded and skipped; other
 * errors propagate.
 * @public
 */
export function renderClauses(
  problem: Problem,
  symbols: SymbolsLookup,
  theme: DrawTheme,
  options: RenderClausesOptions = {}
): RenderClausesResult {
  const { verbose = false } = options;
  const primitives: Primitive[] = [];
  const failures: RenderFailure[] = [];

  problem.clauses.forEach((clause, clauseIndex) => {
    for (const construction of clause.constructions) {
      try {
        primitives.push(...renderConstruction(construction, symbols, theme));
      } catch (error) {
        if (!(error instanceof ConstructionDrawError)) {
          throw error;
        }
        failures.push({ clauseIndex, construction, error });
        if (verbose) {
          console.warn(`  Skipped ${construction.name} ${construction.args.join(' ')} (clause ${clauseIndex}): ${error.message}`);
        }
      }
    }
  });

  return { primitives, failures };
}

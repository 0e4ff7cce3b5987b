export { parseClause, parseProblemText, ProblemSyntaxError } from './ClauseParser';
export {
  CONSTRUCTION_ARITY,
  CONSTRUCTION_KINDS,
  isConstructionKind,
  lookupConstruction,
  type CatalogEntry,
  type ConstructionKind,
} from './ConstructionCatalog';
export {
  ArgumentCountMismatchError,
  ConstructionDrawError,
  DegenerateGeometryError,
  UnknownPointNameError,
} from './DrawErrors';
export { Geometry, GEOMETRY_EPSILON } from './Geometry';
export {
  arrow,
  circle,
  completeArrow,
  lineSymbol,
  perpendicularMark,
  PERPENDICULAR_MARK_SIZE,
  segment,
  triangle,
} from './Primitives';
export type {
  ArrowPrimitive,
  CirclePrimitive,
  CompleteArrowPrimitive,
  LineDash,
  LineSymbolPrimitive,
  PerpendicularMarkPrimitive,
  Primitive,
  PrimitiveKind,
  SegmentPrimitive,
  StrokeStyle,
  TrianglePrimitive,
} from './Primitives';
export type { Clause, Construction, Problem } from './Problem';
export { loadProblemDocument, problemDocumentSchema, type LoadedProblem, type ProblemDocument } from './ProblemDocument';
export {
  renderClauses,
  renderConstruction,
  type RenderClausesOptions,
  type RenderClausesResult,
  type RenderFailure,
} from './RenderConstruction';
export {
  LinesRegistry,
  PointsRegistry,
  SymbolsRegistry,
  type Line,
  type LineRegistry,
  type Point,
  type PointResolver,
  type SymbolsLookup,
} from './Symbols';
export { createTheme, DEFAULT_THEME, themeSchema, type DrawTheme, type ThemeOverrides } from './Theme';
export { Vec2 } from './Vec2';

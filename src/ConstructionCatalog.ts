/**
 * Arity of every construction kind the engine knows how to draw.
 * @public
 */
export const CONSTRUCTION_ARITY = {
  free: 1,
  segment: 2,
  triangle: 3,
  acute_triangle: 3,
  triangle12: 3,
  r_triangle: 3,
  on_circle: 3,
  on_line: 3,
  on_dia: 3,
  midpoint: 3,
  between: 3,
  between_bound: 3,
  mirror: 3,
  circle: 4,
  circumcenter: 4,
  on_circum: 4,
  quadrangle: 4,
  on_tline: 4,
  on_pline: 4,
  on_pline0: 4,
  trisegment: 4,
  foot: 4,
  incenter: 4,
  excenter: 4,
  shift: 4,
  pentagon: 5,
  intersection_ll: 5,
  intersection_lp: 6,
  simtri: 6,
  simtrir: 6,
  contri: 6,
  contrir: 6,
} as const satisfies Record<string, number>;

/** @public */
export type ConstructionKind = keyof typeof CONSTRUCTION_ARITY;

/** @public */
export interface CatalogEntry {
  readonly kind: ConstructionKind;
  readonly arity: number;
}

/** @public */
export const CONSTRUCTION_KINDS: readonly ConstructionKind[] = Object.freeze(
  Object.keys(CONSTRUCTION_ARITY).filter(isConstructionKind)
);

export function isConstructionKind(name: string): name is ConstructionKind {
  return Object.prototype.hasOwnProperty.call(CONSTRUCTION_ARITY, name);
}

/** Returns undefined for names outside the catalog. */
export function lookupConstruction(name: string): CatalogEntry | undefined {
  if (!isConstructionKind(name)) {
    return undefined;
  }
  return { kind: name, arity: CONSTRUCTION_ARITY[name] };
}

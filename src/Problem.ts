/**
 * A named, fixed-arity construction over point names.
 * @public
 */
export interface Construction {
  readonly name: string;
  readonly args: readonly string[];
}

/**
 * Constructions that jointly place the clause's new points.
 * @public
 */
export interface Clause {
  readonly points: readonly string[];
  readonly constructions: readonly Construction[];
}

/** @public */
export interface Problem {
  readonly clauses: readonly Clause[];
  /** Goal text after `?`, kept verbatim; never drawn. */
  readonly goal?: string;
}

import { CONSTRUCTION_ARITY, CONSTRUCTION_KINDS } from '../ConstructionCatalog';
import type { Primitive } from '../Primitives';
import type { RenderClausesResult } from '../RenderConstruction';
import type { Line } from '../Symbols';

interface LineOutput {
  readonly key: string;
  readonly through: readonly [string, string];
}

export type PrimitiveOutput =
  | Exclude<Primitive, { kind: 'lineSymbol' } | { kind: 'perpendicularMark' }>
  | (Omit<Extract<Primitive, { kind: 'lineSymbol' }>, 'line'> & { readonly line: LineOutput })
  | (Omit<Extract<Primitive, { kind: 'perpendicularMark' }>, 'line0' | 'line1'> & {
      readonly line0: LineOutput;
      readonly line1: LineOutput;
    });

export interface FailureOutput {
  readonly clause: number;
  readonly construction: string;
  readonly error: { readonly name: string; readonly message: string };
}

export interface RenderOutput {
  readonly primitives: PrimitiveOutput[];
  readonly failures: FailureOutput[];
}

function lineOutput(line: Line): LineOutput {
  return { key: line.key, through: [line.points[0].name, line.points[1].name] };
}

/** Replaces line identities by the names they pass through; everything else is already plain data. */
export function toPrimitiveOutput(primitive: Primitive): PrimitiveOutput {
  switch (primitive.kind) {
    case 'lineSymbol':
      return { ...primitive, line: lineOutput(primitive.line) };
    case 'perpendicularMark':
      return { ...primitive, line0: lineOutput(primitive.line0), line1: lineOutput(primitive.line1) };
    default:
      return primitive;
  }
}

export function toRenderOutput(result: RenderClausesResult): RenderOutput {
  return {
    primitives: result.primitives.map(toPrimitiveOutput),
    failures: result.failures.map(({ clauseIndex, construction, error }) => ({
      clause: clauseIndex,
      construction: [construction.name, ...construction.args].join(' '),
      error: { name: error.name, message: error.message },
    })),
  };
}

export function formatCatalog(): string {
  return CONSTRUCTION_KINDS.map(kind => `${kind.padEnd(20)} ${CONSTRUCTION_ARITY[kind]}`).join('\n');
}

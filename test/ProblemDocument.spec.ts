import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { ProblemSyntaxError } from '../src/ClauseParser';
import { loadProblemDocument } from '../src/ProblemDocument';
import { DEFAULT_THEME } from '../src/Theme';

const points = [
  { name: 'a', x: 0, y: 0 },
  { name: 'b', x: 4, y: 0 },
  { name: 'c', x: 1, y: 3 },
];

describe('loadProblemDocument', () => {
  it('loads clause text, coordinates and the default theme', () => {
    const loaded = loadProblemDocument({ points, problem: 'a b c = triangle a b c' });

    expect(loaded.problem.clauses).toEqual([
      { points: ['a', 'b', 'c'], constructions: [{ name: 'triangle', args: ['a', 'b', 'c'] }] },
    ]);
    expect(loaded.symbols.points.size).toBe(3);
    expect(loaded.symbols.points.namesToPoints(['c'])[0].num.y).toBe(3);
    expect(loaded.theme).toEqual(DEFAULT_THEME);
  });

  it('accepts structured clauses and fills in missing point lists', () => {
    const loaded = loadProblemDocument({
      points,
      problem: { clauses: [{ constructions: [{ name: 'segment', args: ['a', 'b'] }] }] },
    });

    expect(loaded.problem.clauses[0].points).toEqual([]);
  });

  it('applies the document theme, then the explicit overrides', () => {
    const loaded = loadProblemDocument(
      { points, problem: 'segment a b', theme: { lineColor: 'navy', thinLineWidth: 0.3 } },
      { lineColor: 'maroon' }
    );

    expect(loaded.theme.lineColor).toBe('maroon');
    expect(loaded.theme.thinLineWidth).toBe(0.3);
  });

  it('rejects duplicate points with the offending path', () => {
    let caught: unknown;
    try {
      loadProblemDocument({ points: [...points, { name: 'b', x: 1, y: 1 }], problem: 'segment a b' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ZodError);
    expect(caught instanceof ZodError && caught.issues.map(issue => issue.path)).toEqual([['points', 3, 'name']]);
  });

  it('rejects malformed documents', () => {
    expect(() => loadProblemDocument({ points: [{ name: 'a', x: 'zero', y: 0 }], problem: 'free a' })).toThrow(ZodError);
    expect(() => loadProblemDocument({ points, problem: '' })).toThrow(ZodError);
    expect(() => loadProblemDocument(null)).toThrow(ZodError);
  });

  it('surfaces clause syntax errors', () => {
    expect(() => loadProblemDocument({ points, problem: 'x =' })).toThrow(ProblemSyntaxError);
  });
});

import type { Clause, Construction, Problem } from './Problem';

/** @public */
export class ProblemSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProblemSyntaxError';
  }
}

function words(text: string): string[] {
  return text.trim().split(/\s+/).filter(word => word.length > 0);
}

function parseConstruction(text: string, clauseText: string): Construction {
  const [name, ...args] = words(text);
  if (!name) {
    throw new ProblemSyntaxError(`Empty construction in clause "${clauseText}"`);
  }
  return { name, args };
}

/**
 * Parses one clause: `x y = name args, name args`. Without `=`, the clause
 * introduces no new points.
 */
export function parseClause(text: string): Clause {
  const clauseText = text.trim();
  const separator = clauseText.indexOf('=');
  const pointsText = separator === -1 ? '' : clauseText.slice(0, separator);
  const constructionsText = separator === -1 ? clauseText : clauseText.slice(separator + 1);

  if (constructionsText.trim().length === 0) {
    throw new ProblemSyntaxError(`Clause "${clauseText}" has no constructions`);
  }

  return {
    points: words(pointsText),
    constructions: constructionsText.split(',').map(part => parseConstruction(part, clauseText)),
  };
}

/**
 * Parses problem text of the form
 * `a b c = triangle a b c; h = on_tline h a b c, on_tline h b a c ? perp a h b c`.
 * Clauses are separated by `;`; anything after `?` is the goal.
 *
 * @public
 */
export function parseProblemText(text: string): Problem {
  const goalSeparator = text.indexOf('?');
  const body = goalSeparator === -1 ? text : text.slice(0, goalSeparator);
  const goal = goalSeparator === -1 ? '' : text.slice(goalSeparator + 1).trim();

  const clauses = body
    .split(';')
    .filter(part => part.trim().length > 0)
    .map(parseClause);

  return goal ? { clauses, goal } : { clauses };
}

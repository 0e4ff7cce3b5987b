import { z } from 'zod';
import { parseProblemText } from './ClauseParser';
import type { Problem } from './Problem';
import { POINT_NAME, SymbolsRegistry } from './Symbols';
import { createTheme, themeOverridesSchema, type DrawTheme } from './Theme';

const pointNameSchema = z.string().regex(POINT_NAME, 'point names must be non-empty and contain no whitespace');

const constructionSchema = z.object({
  name: z.string().min(1),
  args: z.array(pointNameSchema),
});

const clauseSchema = z.object({
  points: z.array(pointNameSchema).default([]),
  constructions: z.array(constructionSchema).min(1, 'a clause needs at least one construction'),
});

/**
 * Input of the command line tool: solved coordinates, the clauses to draw,
 * and an optional theme override. `problem` is either clause text or structured clauses.
 * @public
 */
export const problemDocumentSchema = z.object({
  points: z
    .array(z.object({ name: pointNameSchema, x: z.number().finite(), y: z.number().finite() }))
    .superRefine((points, ctx) => {
      const seen = new Set<string>();
      points.forEach((point, index) => {
        if (seen.has(point.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `duplicate point "${point.name}"`,
          });
        }
        seen.add(point.name);
      });
    }),
  problem: z.union([
    z.string().min(1),
    z.object({ clauses: z.array(clauseSchema), goal: z.string().optional() }),
  ]),
  theme: themeOverridesSchema.optional(),
});

export type ProblemDocument = z.infer<typeof problemDocumentSchema>;

/** @public */
export interface LoadedProblem {
  problem: Problem;
  symbols: SymbolsRegistry;
  theme: DrawTheme;
}

/**
 * Validates a parsed JSON document and builds the registry and theme it describes.
 *
 * @param themeOverrides - applied on top of the document's own theme
 * @throws ZodError on a malformed document
 * @throws ProblemSyntaxError on malformed clause text
 * @public
 */
export function loadProblemDocument(input: unknown, themeOverrides: unknown = {}): LoadedProblem {
  const document = problemDocumentSchema.parse(input);

  const symbols = new SymbolsRegistry();
  for (const { name, x, y } of document.points) {
    symbols.points.add(name, x, y);
  }

  const problem = typeof document.problem === 'string' ? parseProblemText(document.problem) : document.problem;
  const theme = createTheme(themeOverrides, createTheme(document.theme ?? {}));

  return { problem, symbols, theme };
}

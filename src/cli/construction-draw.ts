#!/usr/bin/env tsx
/**
 * construction-draw - turn a solved problem document into drawing primitives.
 *
 * Reads point coordinates and clauses from JSON, renders every construction
 * and prints the primitive list as JSON for a rendering backend to consume.
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { z } from 'zod';
import { renderClauses } from '../RenderConstruction';
import { CliError, ExitCode } from './cli-error';
import { loadProblemFiles } from './input';
import { formatCatalog, toRenderOutput } from './render-output';

export const renderArgsSchema = z.object({
  input: z.string().min(1, '--input is required'),
  theme: z.string().min(1).optional(),
  pretty: z.boolean().default(false),
  verbose: z.boolean().default(false),
  strict: z.boolean().default(false),
});

export type RenderArgs = z.infer<typeof renderArgsSchema>;

function runRender(args: RenderArgs): void {
  const { problem, symbols, theme } = loadProblemFiles(args.input, args.theme);
  const result = renderClauses(problem, symbols, theme, { verbose: args.verbose });

  console.log(JSON.stringify(toRenderOutput(result), null, args.pretty ? 2 : undefined));

  if (args.strict && result.failures.length > 0) {
    throw new CliError(`${result.failures.length} construction(s) could not be drawn`, ExitCode.ConstructionsSkipped);
  }
}

const terminalWidth = typeof process.stdout.columns === 'number' ? process.stdout.columns : 120;

void yargs(hideBin(process.argv))
  .scriptName('construction-draw')
  .usage('$0 <command> [options]')
  .strict()
  .demandCommand(1, 'Specify a command.')
  .command(
    'render',
    'Render every construction of a problem document to primitives (JSON on stdout).',
    cmd => cmd
      .option('input', { alias: 'i', type: 'string', demandOption: true, describe: 'Problem document (JSON).' })
      .option('theme', { type: 'string', describe: 'Theme overrides (JSON); wins over the document theme.' })
      .option('pretty', { type: 'boolean', default: false, describe: 'Indent the JSON output.' })
      .option('verbose', { type: 'boolean', default: false, describe: 'Log skipped constructions to stderr.' })
      .option('strict', { type: 'boolean', default: false, describe: 'Exit with code 2 if any construction was skipped.' }),
    argv => {
      const parsed = renderArgsSchema.safeParse(argv);
      if (!parsed.success) {
        throw CliError.fromZodError('arguments', parsed.error);
      }
      runRender(parsed.data);
    }
  )
  .command(
    'catalog',
    'List the known construction kinds with their arity.',
    cmd => cmd,
    () => {
      console.log(formatCatalog());
    }
  )
  .fail((msg, err, instance) => {
    if (err instanceof CliError) {
      console.error(err.message);
      process.exit(err.exitCode);
    }
    if (msg) {
      console.error(msg);
    }
    if (err) {
      console.error(err.message);
    }
    instance.showHelp();
    process.exit(ExitCode.Failure);
  })
  .wrap(Math.min(terminalWidth, 120))
  .help()
  .parse();

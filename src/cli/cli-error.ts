import type { ZodError } from 'zod';

/** Process exit codes of the construction-draw CLI. */
export const ExitCode = {
  Failure: 1,
  ConstructionsSkipped: 2,
  InvalidInput: 3,
} as const;

export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = ExitCode.Failure) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }

  /** One line per zod issue, prefixed with the path into `source`. */
  static fromZodError(source: string, error: ZodError): CliError {
    const lines = error.issues.map(issue => {
      const where = issue.path.length ? issue.path.join('.') : '(root)';
      return `  ${where}: ${issue.message}`;
    });
    return new CliError(`Invalid ${source}:\n${lines.join('\n')}`, ExitCode.InvalidInput);
  }
}

import fs from 'node:fs';
import path from 'node:path';
import { ZodError } from 'zod';
import { ProblemSyntaxError } from '../ClauseParser';
import { loadProblemDocument, type LoadedProblem } from '../ProblemDocument';
import { CliError, ExitCode } from './cli-error';

export function requireJsonFile(filePath: string): unknown {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new CliError(`File not found: ${filePath}`);
  }
  const text = fs.readFileSync(resolved, 'utf8');
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError(`${filePath} is not valid JSON: ${reason}`, ExitCode.InvalidInput);
  }
}

/** Reads the problem document and the optional theme file, mapping validation errors to CliError. */
export function loadProblemFiles(inputPath: string, themePath?: string): LoadedProblem {
  const document = requireJsonFile(inputPath);
  const themeOverrides = themePath ? requireJsonFile(themePath) : {};
  try {
    return loadProblemDocument(document, themeOverrides);
  } catch (error) {
    if (error instanceof ZodError) {
      throw CliError.fromZodError(themePath ? `${inputPath} or ${themePath}` : inputPath, error);
    }
    if (error instanceof ProblemSyntaxError) {
      throw new CliError(error.message, ExitCode.InvalidInput);
    }
    throw error;
  }
}

import { AutodiffError } from '../AutodiffError';
import { GraphFileError } from '../GraphFile';

export const EXIT_USAGE = 1;
export const EXIT_BAD_GRAPH_FILE = 2;
export const EXIT_EVALUATION = 3;

export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = EXIT_USAGE) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

export function assert(condition: unknown, message: string, exitCode = EXIT_USAGE): asserts condition {
  if (!condition) {
    throw new CliError(message, exitCode);
  }
}

/**
 * Runs `fn`, turning graph-file and engine failures into CliErrors with
 * their own exit codes. Anything else propagates unchanged.
 */
export function withCliErrors<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof GraphFileError) {
      throw new CliError(err.message, EXIT_BAD_GRAPH_FILE);
    }
    if (err instanceof AutodiffError) {
      throw new CliError(`${err.name}: ${err.message}`, EXIT_EVALUATION);
    }
    throw err;
  }
}

import { parseArgs } from 'node:util';

export type CliCommand =
  | { kind: 'single'; filePath: string; envFilePath?: string }
  | {
      kind: 'repo';
      baselineRoot: string;
      submissionRoot: string;
      envFilePath?: string;
    };

export const USAGE = [
  'Usage:',
  '  submission-annotator single <file> [--env <file>]',
  '  submission-annotator repo <baseline-root> <submission-root> [--env <file>]',
].join('\n');

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const parseCommandLine = (argv: readonly string[]) =>
  parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      env: { type: 'string' },
    },
  });

export const parseCliArgs = (argv: readonly string[]): CliCommand => {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    throw new CliUsageError(
      typeof error === 'object' &&
        error !== null &&
        'message' in error &&
        typeof error.message === 'string'
        ? error.message
        : String(error),
    );
  }

  const [command, ...operands] = parsed.positionals;
  const envFilePath = parsed.values.env;

  if (command === 'single' && operands.length === 1) {
    return { kind: 'single', filePath: operands[0], envFilePath };
  }
  if (command === 'repo' && operands.length === 2) {
    return {
      kind: 'repo',
      baselineRoot: operands[0],
      submissionRoot: operands[1],
      envFilePath,
    };
  }
  throw new CliUsageError(
    command === 'single' || command === 'repo'
      ? `Wrong number of arguments for "${command}"`
      : `Unknown command "${command ?? ''}"`,
  );
};

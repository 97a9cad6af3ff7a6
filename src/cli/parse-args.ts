export interface ParsedArgs {
  command?: string;
  positionals: string[];
  flags: Record<string, string>;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** `--name value` and `--name=value` flags; everything else is positional. */
export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const positionals: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    if (eq !== -1) {
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }

    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new CliUsageError(`Missing value for ${arg}`);
    }
    flags[arg.slice(2)] = value;
    i++;
  }

  return { command, positionals, flags };
}

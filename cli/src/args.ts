export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ParsedArgs {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
}

/**
 * `--key value` and `--key=value` set values, a bare `--key` followed by
 * another option (or nothing) is a flag, and everything else is positional.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let idx = 0; idx < args.length; idx++) {
    const arg = args[idx];
    if (arg === undefined) {
      continue;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const trimmed = arg.slice(2);
    const equalsAt = trimmed.indexOf('=');
    if (equalsAt >= 0) {
      values.set(trimmed.slice(0, equalsAt), trimmed.slice(equalsAt + 1));
      continue;
    }

    const next = args[idx + 1];
    if (next !== undefined && !next.startsWith('--')) {
      values.set(trimmed, next);
      idx++;
      continue;
    }

    flags.add(trimmed);
  }

  return { positionals, values, flags };
}

export function option(args: ParsedArgs, name: string): string | undefined {
  return args.values.get(name);
}

export function requireOption(args: ParsedArgs, name: string): string {
  const value = args.values.get(name);
  if (value === undefined || value === '') {
    throw new UsageError(`--${name} is required`);
  }
  return value;
}

export function intOption(args: ParsedArgs, name: string): number | undefined {
  const raw = args.values.get(name);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new UsageError(`--${name} must be a whole number, got '${raw}'`);
  }
  return Number.parseInt(raw, 10);
}

export function hasFlag(args: ParsedArgs, name: string): boolean {
  return args.flags.has(name) || args.values.get(name) === 'true';
}

export function positional(args: ParsedArgs, index: number, label: string): string {
  const value = args.positionals[index];
  if (value === undefined) {
    throw new UsageError(`Missing <${label}>`);
  }
  return value;
}

/** Copies the given options into a query or body object, `--team-type` becoming `team_type`. */
export function pickOptions(args: ParsedArgs, names: readonly string[]): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const name of names) {
    const value = args.values.get(name);
    if (value !== undefined) {
      picked[name.replace(/-/g, '_')] = value;
    }
  }
  return picked;
}

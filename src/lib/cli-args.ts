export type ParsedCommand = {
  command: string | null;
  positional: string[];
  options: Map<string, string>;
  flags: Set<string>;
};

/**
 * Splits `argv` into the command, its positional arguments, `--name value` /
 * `--name=value` options and bare `--flag`s. Options not listed in
 * `valueOptions` are treated as flags, so a following token stays positional.
 */
export function parseCommand(argv: string[], valueOptions: readonly string[] = []): ParsedCommand {
  const [command, ...rest] = argv;
  const positional: string[] = [];
  const options = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (!token.startsWith('--')) {
      positional.push(token);
      continue;
    }

    const eq = token.indexOf('=');
    if (eq !== -1) {
      options.set(token.slice(0, eq), token.slice(eq + 1));
      continue;
    }

    const value = rest[i + 1];
    if (!valueOptions.includes(token) || value === undefined || value.startsWith('--')) {
      flags.add(token);
      continue;
    }

    options.set(token, value);
    i += 1;
  }

  return { command: command ?? null, positional, options, flags };
}

export function positiveIntOption(parsed: ParsedCommand, name: string): number | undefined {
  const raw = parsed.options.get(name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be an integer >= 1`);
  }
  return value;
}

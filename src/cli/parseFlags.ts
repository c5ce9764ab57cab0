export type Flags = Record<string, string | boolean>;

export type ParsedArgs = {
  command?: string;
  flags: Flags;
};

/**
 * Splits argv into a leading command and `--flag value` pairs. A flag with no
 * value after it is `true`. Negative numbers count as values.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags: Flags = {};
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      command ??= token;
      continue;
    }

    const key = token.slice(2);
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }

  return { command, flags };
}

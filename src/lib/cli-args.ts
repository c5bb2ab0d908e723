export type ParsedCliArgs = {
  positional: string[];
  named: Map<string, string>;
  repeated: Map<string, string[]>;
  flags: Set<string>;
};

/**
 * Splits argv into positionals, `--name value` pairs and bare `--flags`. A named option given more
 * than once keeps its last value in `named` and every value in `repeated`.
 */
export function parseCliArgs(argv: string[]): ParsedCliArgs {
  const positional: string[] = [];
  const named = new Map<string, string>();
  const repeated = new Map<string, string[]>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      positional.push(token);
      continue;
    }

    const value = argv[i + 1];
    if (!value || value.startsWith('--')) {
      flags.add(token);
      continue;
    }

    named.set(token, value);
    repeated.set(token, [...(repeated.get(token) ?? []), value]);
    i += 1;
  }

  return { positional, named, repeated, flags };
}

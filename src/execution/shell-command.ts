export type ShellCommandParse =
  | { ok: true; packages: string[] }
  | { ok: false; error: string };

const PACKAGE_SPEC = /^(?:@[a-z0-9][\w.-]*\/)?[a-z0-9][\w.-]*(?:@[\w.^~<>=*|-]+)?$/i;

export function isValidPackageSpec(spec: string): boolean {
  return PACKAGE_SPEC.test(spec);
}

/**
 * The shell tool accepts exactly one command form, `npm install <spec...>` (or `npm i`), which is
 * routed to package installation. Flags and anything else are rejected.
 */
export function parseShellCommand(command: string): ShellCommandParse {
  const tokens = command.trim().split(/\s+/).filter(Boolean);
  const [tool, verb, ...specs] = tokens;
  if (tool !== 'npm' || (verb !== 'install' && verb !== 'i')) {
    return { ok: false, error: "Only 'npm install <package>' commands are supported. Use execute_code for everything else." };
  }
  if (specs.length === 0) {
    return { ok: false, error: 'npm install requires at least one package name' };
  }
  const invalid = specs.find((spec) => !isValidPackageSpec(spec));
  if (invalid) {
    return { ok: false, error: `invalid package spec: ${invalid}` };
  }
  return { ok: true, packages: specs };
}

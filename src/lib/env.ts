export function intFromEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return parsed;
}

export function oneOfFromEnv<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`${name} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

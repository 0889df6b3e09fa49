/**
 * Typed readers for environment variables.
 * Blank values count as unset; malformed numbers come back as NaN so the
 * caller's schema reports them instead of silently using a default.
 */

export type Env = Record<string, string | undefined>;

function read(name: string | readonly string[], env: Env): string | undefined {
  const names = typeof name === 'string' ? [name] : name;
  for (const key of names) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Read a string. Pass several names to accept aliases; the first one set wins.
 */
export function getEnvString(name: string | readonly string[], defaultValue: string, env?: Env): string;
export function getEnvString(name: string | readonly string[], defaultValue?: undefined, env?: Env): string | undefined;
export function getEnvString(
  name: string | readonly string[],
  defaultValue?: string,
  env: Env = process.env
): string | undefined {
  return read(name, env) ?? defaultValue;
}

export function getEnvInt(name: string | readonly string[], defaultValue: number, env: Env = process.env): number {
  const value = read(name, env);
  if (value === undefined) return defaultValue;
  return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

export function getEnvFloat(name: string | readonly string[], defaultValue: number, env: Env = process.env): number {
  const value = read(name, env);
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

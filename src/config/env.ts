/**
 * Tolerant readers over environment variables. Every helper returns
 * `undefined` when the variable is unset, blank or malformed so the caller can
 * fall back to its own defaults; the configuration layer then validates the
 * merged result as a whole.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

export type EnvSource = Readonly<Record<string, string | undefined>>;

function readTrimmed(env: EnvSource, name: string): string | undefined {
  const raw = env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Interprets "1/true/yes/on" and "0/false/no/off", case-insensitively. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const value = readTrimmed(env, name)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  if (TRUE_LITERALS.has(value)) {
    return true;
  }
  if (FALSE_LITERALS.has(value)) {
    return false;
  }
  return undefined;
}

/** Base-10 integer literal within the safe integer range. */
export function readOptionalInt(name: string, env: EnvSource = process.env): number | undefined {
  const value = readTrimmed(env, name);
  if (value === undefined || !/^[-+]?\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/** Finite floating-point literal. `Infinity` and `NaN` are rejected. */
export function readOptionalNumber(name: string, env: EnvSource = process.env): number | undefined {
  const value = readTrimmed(env, name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return readTrimmed(env, name);
}

/** Case-insensitive lookup of an enum-like literal within {@link allowed}. */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const value = readTrimmed(env, name)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  return allowed.find((candidate) => candidate.toLowerCase() === value);
}

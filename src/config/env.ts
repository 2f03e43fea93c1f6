/**
 * Environment readers shared by every configuration block. Values are trimmed,
 * blank strings count as "unset", and malformed literals fall back to the
 * supplied default instead of aborting start-up.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Source of environment values. Tests pass plain objects instead of mutating `process.env`. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads a boolean flag. Accepts "1/true/yes/on" and "0/false/no/off" in any
 * case; anything else yields {@link defaultValue}.
 */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Reads a base-10 integer, returning {@link defaultValue} for missing or out-of-range values. */
export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Reads a floating-point number; `Infinity` and `NaN` literals are rejected. */
export function readNumber(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const value = Number.parseFloat(normalised);
  return withinBounds(value, options) ? value : defaultValue;
}

export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like value against an allow-list. Comparison ignores case and
 * the canonical spelling from {@link allowed} is returned.
 */
function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === lower);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}

/**
 * Splits a CSV literal into a deduplicated array, trimming whitespace and
 * ignoring empty segments. Insertion order is kept so operators can express
 * priorities (the search fallback order relies on it).
 */
export function parseCsvList(value: string): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const segment of value.split(",")) {
    const item = segment.trim();
    if (item.length === 0) {
      continue;
    }
    const lower = item.toLowerCase();
    if (seen.has(lower)) {
      continue;
    }
    seen.add(lower);
    ordered.push(item);
  }
  return ordered;
}

/**
 * Readers turning raw environment variables into typed values. Every reader
 * takes the environment as an argument (defaulting to `process.env`) so the
 * configuration loaders can be exercised with plain objects in tests.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

interface NumberBounds {
  readonly min?: number;
  readonly max?: number;
}

/** Trimmed value of `name`, or `undefined` when unset or blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  const raw = env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Accepts `1/true/yes/on` and `0/false/no/off` (case-insensitive). Anything
 * else falls back to {@link defaultValue}.
 */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const value = readOptionalString(name, env)?.toLowerCase();
  if (value === undefined) {
    return defaultValue;
  }
  if (TRUE_LITERALS.has(value)) {
    return true;
  }
  if (FALSE_LITERALS.has(value)) {
    return false;
  }
  return defaultValue;
}

/** Base-10 integer within `bounds`; malformed or out-of-range values yield the default. */
export function readInt(
  name: string,
  defaultValue: number,
  bounds: NumberBounds = {},
  env: EnvSource = process.env,
): number {
  const value = readOptionalString(name, env);
  if (value === undefined || !/^[-+]?\d+$/.test(value)) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) && withinBounds(parsed, bounds) ? parsed : defaultValue;
}

export function readNumber(
  name: string,
  defaultValue: number,
  bounds: NumberBounds = {},
  env: EnvSource = process.env,
): number {
  const value = readOptionalString(name, env);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  return withinBounds(parsed, bounds) ? parsed : defaultValue;
}

/**
 * Splits a CSV literal, trimming entries and dropping blanks and
 * case-insensitive duplicates. Order is preserved so operators can rank
 * engines explicitly.
 */
export function parseCsvList(value: string): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const segment of value.split(",")) {
    const item = segment.trim();
    if (item.length === 0 || seen.has(item.toLowerCase())) {
      continue;
    }
    seen.add(item.toLowerCase());
    ordered.push(item);
  }
  return ordered;
}

function withinBounds(value: number, bounds: NumberBounds): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (bounds.min !== undefined && value < bounds.min) {
    return false;
  }
  return bounds.max === undefined || value <= bounds.max;
}

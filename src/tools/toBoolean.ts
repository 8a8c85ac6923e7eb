/**
 * Coerces a flag value coming from code, config files or env vars.
 *
 * - booleans are returned as is
 * - numbers are `true` unless zero
 * - strings are `true` for `"true"` (any case) or a non-zero numeric string
 *
 * Returns `undefined` for anything else so callers decide how to fail.
 */
export function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "number") {
    return value !== 0;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.toLowerCase() === "true") {
      return true;
    }
    const numeric = Number(trimmed);
    return trimmed !== "" && !Number.isNaN(numeric) && numeric !== 0;
  }

  return undefined;
}

/**
 * Environment Variable Parsing Utilities
 *
 * Value-based parsing functions that accept a raw string value and return
 * a parsed value or `undefined`, so callers only override what is set.
 *
 * Conventions:
 * - Returns `undefined` for missing, empty or unparseable input
 * - Does NOT throw; range checks belong to the schema
 */

/**
 * Parse a string value as an integer.
 *
 * @example
 * ```typescript
 * const cycles = safeParseInt(process.env.COOLDOWN_CYCLES) ?? 5;
 * ```
 */
export function safeParseInt(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Parse a string value as a finite float.
 */
export function safeParseFloat(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Parse "true"/"false"/"1"/"0"/"yes"/"no" (case-insensitive).
 */
export function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return undefined;
  }
}

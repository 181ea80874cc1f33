/**
 * Environment Variable Parsing Utilities
 *
 * Value-based parsing functions that accept a raw string value and return
 * a parsed number or a safe default.
 *
 * Conventions:
 * - Returns `defaultValue` for `undefined`, empty string, or NaN results
 * - Does NOT throw -- always returns a valid number
 * - Warns through console: config loads before any logger exists
 */

/**
 * Parse a string value as a float with bounds validation.
 * Returns `defaultValue` if the value is missing, invalid, or out of range.
 *
 * @param value - Raw string to parse (typically from process.env)
 * @param defaultValue - Fallback when value is missing, invalid, or out of range
 * @param min - Minimum allowed value (inclusive)
 * @param max - Maximum allowed value (inclusive)
 * @param label - Optional label for warning messages (e.g., env var name)
 *
 * @example
 * ```typescript
 * const stopLoss = safeParseFloatBounded(process.env.STOP_LOSS_PERCENTAGE, 0.02, 0, 1);
 * ```
 */
export function safeParseFloatBounded(
  value: string | undefined,
  defaultValue: number,
  min: number,
  max: number,
  label?: string
): number {
  if (!value || value.trim() === '') return defaultValue;
  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed)) {
    if (label) console.warn(`[CONFIG] Invalid float value for ${label}: "${value}" - using default`);
    return defaultValue;
  }
  if (parsed < min || parsed > max) {
    if (label) console.warn(`[CONFIG] Value for ${label} (${parsed}) out of range [${min}, ${max}] - using default`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse a string value as an integer with minimum bound validation.
 * Returns `defaultValue` if missing or invalid, `min` if below minimum.
 *
 * @param value - Raw string to parse (typically from process.env)
 * @param defaultValue - Fallback when value is missing or invalid
 * @param min - Minimum allowed value (inclusive, defaults to 1)
 * @param label - Optional label for warning messages
 */
export function safeParseIntBounded(
  value: string | undefined,
  defaultValue: number,
  min = 1,
  label?: string
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    if (label) console.warn(`[CONFIG] Invalid integer value for ${label}: "${value}" - using default`);
    return defaultValue;
  }
  if (parsed < min) {
    if (label) console.warn(`[CONFIG] Value for ${label} (${parsed}) below minimum ${min} - using minimum`);
    return min;
  }
  return parsed;
}

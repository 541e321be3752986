/**
 * Numeric Coercion Utilities
 *
 * Every numeric field scraped from the league site passes through
 * {@link coerceNumeric}. Text that is not a plain number becomes the
 * fallback (0 unless stated), never an error.
 */

const NUMERIC_TEXT = /^[+-]?\d+(\.\d+)?$/;

/**
 * Converts a raw value into a finite number, or returns the fallback
 *
 * Accepts finite numbers and strings such as "12", "-3" or "7.5"
 * (surrounding whitespace ignored). Anything else yields the fallback.
 *
 * @example
 * coerceNumeric('12')   // 12
 * coerceNumeric('DNP')  // 0
 * coerceNumeric('', -1) // -1
 */
export function coerceNumeric(value: unknown, fallback = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value !== 'string') return fallback;
  const text = value.trim();
  return NUMERIC_TEXT.test(text) ? Number(text) : fallback;
}

/**
 * Like {@link coerceNumeric} but returns null for blank cells
 *
 * Used when reading persisted tables, where an empty cell means the
 * value was never recorded rather than recorded as zero.
 */
export function coerceOptional(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  return coerceNumeric(value);
}

/**
 * Rounds half away from zero to the given number of decimals
 *
 * Goes through exponent notation so that values like 1.005 round as
 * written rather than as their binary approximation.
 */
export function roundTo(value: number, decimals: number): number {
  const sign = value < 0 ? -1 : 1;
  const text = String(Math.abs(value));
  const shifted = text.includes('e')
    ? Math.round(Math.abs(value) * 10 ** decimals)
    : Math.round(Number(`${text}e${decimals}`));
  if (shifted === 0) return 0;
  return sign * Number(`${shifted}e-${decimals}`);
}

/**
 * Shooting percentage made/attempted * 100, 0 when nothing was attempted
 *
 * @param decimals - Rounding applied to the result, or null for none
 */
export function percentage(made: number, attempted: number, decimals: number | null = 1): number {
  if (!attempted) return 0;
  const pct = (made / attempted) * 100;
  return decimals === null ? pct : roundTo(pct, decimals);
}

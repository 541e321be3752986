/**
 * Validation Utilities
 *
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

export { ValidationError } from '../errors/index.js';

/**
 * Validates a game ID as assigned by the league site
 *
 * Game codes are numeric (e.g. "24817"); schedule exports sometimes print
 * them as floats, which {@link normalizeGameId} takes care of first.
 *
 * @param gameId - Game ID to validate
 * @returns True if the ID is a non-empty string of digits
 */
export function isValidGameId(gameId: string): boolean {
  return /^\d+$/.test(gameId);
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * True for null, undefined, NaN and strings that are empty after trimming
 */
export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  return String(value).trim() === '';
}

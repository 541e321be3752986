/**
 * Game ID Utility
 *
 * The schedule workbook carries game codes as numbers, so a code can come
 * back from a spreadsheet round-trip as "24817.0". Everything downstream
 * (match URLs, the already-scraped set) keys on the plain digit string.
 */

/**
 * Normalizes a raw game code into its canonical string form
 *
 * @param raw - Code from the schedule table (string or number)
 * @returns The digit string, or null if the cell is blank
 *
 * @example
 * normalizeGameId(24817)      // "24817"
 * normalizeGameId('24817.0')  // "24817"
 * normalizeGameId(' abc ')    // "abc"
 * normalizeGameId('')         // null
 */
export function normalizeGameId(raw: unknown): string | null {
  if (raw === null || raw === undefined) return null;

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? String(Math.trunc(raw)) : null;
  }

  const text = String(raw).trim();
  if (!text) return null;

  // Floats written by spreadsheet tools
  const float = text.match(/^(\d+)\.0+$/);
  return float ? float[1] : text;
}

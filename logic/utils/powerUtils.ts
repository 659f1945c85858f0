/**
 * Power Utilities
 *
 * Pure helpers for power-demand input.
 * Flow cards only carry text, so power samples arrive either as a
 * comma-separated list ("1.5, 2.0, 1.8") or as a JSON-style array ("[1.5, 2.0]").
 */

/**
 * Parse a text list of kW values into numbers.
 * Unparseable tokens become NaN so validation can point at their position.
 *
 * @returns parsed values, empty for blank input
 */
export function parsePowerKwText(text: string): number[] {
  let trimmed = text.trim();
  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    trimmed = trimmed.slice(1, -1);
  }

  return trimmed
    .split(/[,;\s]+/)
    .filter((token) => token !== '')
    .map((token) => Number(token));
}

/**
 * Degrees-minutes-seconds conversion.
 */

import { InvalidInputError } from './errors.js';

const HEMISPHERES = new Set(['N', 'S', 'E', 'W']);

/**
 * Convert a DMS string such as `25°46'26.5"N` to decimal degrees.
 * Southern and western hemispheres come back negative.
 *
 * @throws InvalidInputError if the text is not degrees, minutes, seconds and a hemisphere letter
 */
export function parseDms(dms: string): number {
  const text = dms.trim();
  const hemisphere = text.slice(-1).toUpperCase();

  if (!HEMISPHERES.has(hemisphere)) {
    throw new InvalidInputError(`Invalid DMS format: ${dms}`, 'dms');
  }

  const parts = text
    .slice(0, -1)
    .replace(/°/g, ' ')
    .replace(/'/g, ' ')
    .replace(/"/g, '')
    .trim()
    .split(/\s+/);

  const values = parts.map(Number);
  if (values.length !== 3 || parts.some(p => p === '') || values.some(v => !Number.isFinite(v))) {
    throw new InvalidInputError(`Invalid DMS format: ${dms}`, 'dms');
  }

  const [degrees, minutes, seconds] = values;
  const decimal = degrees + minutes / 60 + seconds / 3600;

  return hemisphere === 'S' || hemisphere === 'W' ? -decimal : decimal;
}

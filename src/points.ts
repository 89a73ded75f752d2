/**
 * Survey point types and validated construction.
 *
 * Raw records arrive as text from the file collaborators. They are converted
 * to {@link SurveyPoint} values exactly once, here, so the analysis layer only
 * ever sees finite, in-range numbers.
 */

import { isValidCoordinate, type Coordinate } from './geo-utils.js';
import { InvalidInputError } from './errors.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * A survey record as read from a file. `x` holds the latitude text and `y`
 * the longitude text.
 */
export interface SurveyRecord {
  x: string;
  y: string;
  comment: string;
}

export interface SurveyPoint extends Coordinate {
  readonly latitude: number;
  readonly longitude: number;
  readonly comment: string;
}

export type Dataset = readonly SurveyPoint[];

// ============================================================================
// CONSTRUCTION
// ============================================================================

// Plain decimal or exponent notation; no hex, binary or octal literals.
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse coordinate text into a finite number.
 *
 * @returns The number, or null for blank or non-numeric text
 */
export function parseCoordinate(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Build a point from a raw record, throwing on the first unusable field.
 *
 * @param row - 1-based data row, used in the error message
 */
export function createPoint(record: SurveyRecord, row?: number): SurveyPoint {
  const where = row !== undefined ? ` in row ${row}` : '';

  const latitude = parseCoordinate(record.x);
  if (latitude === null) {
    throw new InvalidInputError(`Field 'x' (latitude)${where} is not a number: "${record.x}"`, 'x', row);
  }

  const longitude = parseCoordinate(record.y);
  if (longitude === null) {
    throw new InvalidInputError(`Field 'y' (longitude)${where} is not a number: "${record.y}"`, 'y', row);
  }

  if (!isValidCoordinate(latitude, 0)) {
    throw new InvalidInputError(`Field 'x' (latitude)${where} is outside [-90, 90]: ${latitude}`, 'x', row);
  }
  if (!isValidCoordinate(0, longitude)) {
    throw new InvalidInputError(`Field 'y' (longitude)${where} is outside [-180, 180]: ${longitude}`, 'y', row);
  }

  return Object.freeze({ latitude, longitude, comment: record.comment });
}

/**
 * Convert every record, failing the whole batch on the first bad one.
 */
export function toDataset(records: readonly SurveyRecord[]): SurveyPoint[] {
  return records.map((record, i) => createPoint(record, i + 1));
}

/**
 * Turn a point back into the text record the CSV sink writes.
 */
export function toRecord(point: SurveyPoint): SurveyRecord {
  return {
    x: String(point.latitude),
    y: String(point.longitude),
    comment: point.comment,
  };
}

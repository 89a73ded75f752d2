/**
 * Preprocessing
 *
 * Cleaning, keyword filtering and comment normalization. Each function returns
 * a new array and leaves its input untouched, so it can run before or after
 * analysis without affecting results already computed.
 */

import { isValidCoordinate } from './geo-utils.js';
import { parseCoordinate, type SurveyPoint, type SurveyRecord } from './points.js';

/**
 * Drop records with unusable coordinates and repeated positions.
 *
 * The first record at a given (latitude, longitude) wins; order is kept.
 */
export function cleanData(records: readonly SurveyRecord[]): SurveyPoint[] {
  const cleaned: SurveyPoint[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    const latitude = parseCoordinate(record.x);
    const longitude = parseCoordinate(record.y);
    if (latitude === null || longitude === null || !isValidCoordinate(latitude, longitude)) {
      continue;
    }

    const key = `${latitude},${longitude}`;
    if (seen.has(key)) continue;

    seen.add(key);
    cleaned.push(Object.freeze({ latitude, longitude, comment: record.comment }));
  }

  return cleaned;
}

/**
 * Keep points whose comment contains `keyword`, ignoring case.
 */
export function filterData<T extends { readonly comment: string }>(points: readonly T[], keyword: string): T[] {
  const needle = keyword.toLowerCase();
  return points.filter(point => point.comment.toLowerCase().includes(needle));
}

/**
 * "  deep LEDGE " -> "Deep ledge"
 */
export function capitalizeComment(comment: string): string {
  const trimmed = comment.trim();
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}

/**
 * Copy of the points with every comment trimmed and capitalized.
 */
export function standardizeComments(points: readonly SurveyPoint[]): SurveyPoint[] {
  return points.map(point => Object.freeze({ ...point, comment: capitalizeComment(point.comment) }));
}

/**
 * Analysis Module
 *
 * Pairwise distance table, radius clustering and dataset summary, all built
 * on the great-circle primitive. Every function is pure: inputs are never
 * mutated and results reference the caller's point objects.
 */

import { EARTH_RADIUS_KM, greatCircleDistance, type BoundingBox } from './geo-utils.js';
import { EmptyDatasetError } from './errors.js';
import type { Dataset, SurveyPoint } from './points.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface AnalysisConfig {
  /** Sphere radius used for every distance evaluation */
  earthRadiusKm: number;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  earthRadiusKm: EARTH_RADIUS_KM,
};

// ============================================================================
// TYPES
// ============================================================================

export interface DistanceRecord {
  pointA: SurveyPoint;
  pointB: SurveyPoint;
  distanceKm: number;
}

export type Cluster = SurveyPoint[];

export interface DatasetSummary {
  totalPoints: number;
  averageLatitude: number;
  averageLongitude: number;
  boundingBox: BoundingBox;
}

// ============================================================================
// PAIRWISE DISTANCES
// ============================================================================

/**
 * Distance for every unordered pair (i, j), i < j, in lexicographic order.
 * Yields n * (n - 1) / 2 records.
 */
export function computeAllDistances(
  dataset: Dataset,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): DistanceRecord[] {
  const distances: DistanceRecord[] = [];

  for (let i = 0; i < dataset.length; i++) {
    for (let j = i + 1; j < dataset.length; j++) {
      const pointA = dataset[i];
      const pointB = dataset[j];
      distances.push({
        pointA,
        pointB,
        distanceKm: greatCircleDistance(pointA, pointB, config.earthRadiusKm),
      });
    }
  }

  return distances;
}

// ============================================================================
// CLUSTERING
// ============================================================================

/**
 * Greedy radius clustering.
 *
 * Each unvisited point, in dataset order, seeds a cluster and claims every
 * still-unvisited point within `radiusKm` of the seed. Membership is measured
 * against the seed only, so two members may be further apart than the radius
 * and the outcome depends on input order. The result is a partition of the
 * dataset.
 */
export function clusterByRadius(
  dataset: Dataset,
  radiusKm: number,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): Cluster[] {
  const clusters: Cluster[] = [];
  const visited = new Set<number>();

  for (let i = 0; i < dataset.length; i++) {
    if (visited.has(i)) continue;

    const seed = dataset[i];
    const cluster: Cluster = [seed];
    visited.add(i);

    for (let j = 0; j < dataset.length; j++) {
      if (visited.has(j)) continue;

      const candidate = dataset[j];
      if (greatCircleDistance(seed, candidate, config.earthRadiusKm) <= radiusKm) {
        cluster.push(candidate);
        visited.add(j);
      }
    }

    clusters.push(cluster);
  }

  return clusters;
}

// ============================================================================
// SUMMARY
// ============================================================================

/**
 * Bounding box of a non-empty dataset.
 */
export function getBoundingBox(dataset: Dataset): BoundingBox {
  if (dataset.length === 0) {
    throw new EmptyDatasetError('compute the bounding box of');
  }

  const box: BoundingBox = {
    minLat: dataset[0].latitude,
    maxLat: dataset[0].latitude,
    minLon: dataset[0].longitude,
    maxLon: dataset[0].longitude,
  };

  for (const point of dataset) {
    box.minLat = Math.min(box.minLat, point.latitude);
    box.maxLat = Math.max(box.maxLat, point.latitude);
    box.minLon = Math.min(box.minLon, point.longitude);
    box.maxLon = Math.max(box.maxLon, point.longitude);
  }

  return box;
}

/**
 * Count, mean position and bounding box of a dataset.
 *
 * @throws EmptyDatasetError when the dataset has no points
 */
export function summarize(dataset: Dataset): DatasetSummary {
  if (dataset.length === 0) {
    throw new EmptyDatasetError('summarize');
  }

  let sumLat = 0;
  let sumLon = 0;

  for (const point of dataset) {
    sumLat += point.latitude;
    sumLon += point.longitude;
  }

  return {
    totalPoints: dataset.length,
    averageLatitude: sumLat / dataset.length,
    averageLongitude: sumLon / dataset.length,
    boundingBox: getBoundingBox(dataset),
  };
}

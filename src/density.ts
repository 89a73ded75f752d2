/**
 * Density grid
 *
 * Bins a dataset into a latitude × longitude histogram. This is the data a
 * heatmap renderer consumes; nothing here draws.
 */

import { EmptyDatasetError, InvalidInputError } from './errors.js';
import { getBoundingBox } from './analysis.js';
import type { Dataset } from './points.js';

export const DEFAULT_DENSITY_BINS = 50;

export interface DensityGrid {
  bins: number;
  /** bins + 1 ascending latitude edges */
  latEdges: number[];
  /** bins + 1 ascending longitude edges */
  lonEdges: number[];
  /** counts[latBin][lonBin] */
  counts: number[][];
  /** counts normalized so the grid integrates to 1 over its area */
  density: number[][];
}

function axisRange(min: number, max: number): [number, number] {
  // A flat axis still needs a non-zero width to bin into.
  return min === max ? [min - 0.5, max + 0.5] : [min, max];
}

function edges(min: number, max: number, bins: number): number[] {
  const step = (max - min) / bins;
  return Array.from({ length: bins + 1 }, (_, i) => (i === bins ? max : min + i * step));
}

function binIndex(value: number, min: number, max: number, bins: number): number {
  const index = Math.floor(((value - min) / (max - min)) * bins);
  // The last bin is closed on the right.
  return Math.min(index, bins - 1);
}

/**
 * Build a bins × bins histogram spanning the dataset's bounding box.
 */
export function densityGrid(dataset: Dataset, bins: number = DEFAULT_DENSITY_BINS): DensityGrid {
  if (!Number.isInteger(bins) || bins < 1) {
    throw new InvalidInputError(`Bin count must be a positive integer, got ${bins}`, 'bins');
  }
  if (dataset.length === 0) {
    throw new EmptyDatasetError('build a density grid for');
  }

  const box = getBoundingBox(dataset);
  const [minLat, maxLat] = axisRange(box.minLat, box.maxLat);
  const [minLon, maxLon] = axisRange(box.minLon, box.maxLon);

  const counts = Array.from({ length: bins }, () => new Array<number>(bins).fill(0));

  for (const point of dataset) {
    const row = binIndex(point.latitude, minLat, maxLat, bins);
    const col = binIndex(point.longitude, minLon, maxLon, bins);
    counts[row][col]++;
  }

  const binArea = ((maxLat - minLat) / bins) * ((maxLon - minLon) / bins);
  const density = counts.map(row => row.map(count => count / (dataset.length * binArea)));

  return {
    bins,
    latEdges: edges(minLat, maxLat, bins),
    lonEdges: edges(minLon, maxLon, bins),
    counts,
    density,
  };
}

import { describe, it, expect } from 'vitest';
import {
  computeAllDistances,
  clusterByRadius,
  getBoundingBox,
  summarize,
  DEFAULT_ANALYSIS_CONFIG,
} from '../src/analysis.js';
import { EmptyDatasetError } from '../src/errors.js';
import { greatCircleDistance } from '../src/geo-utils.js';
import type { SurveyPoint } from '../src/points.js';

// Helper to create test points
function makePoint(latitude: number, longitude: number, comment = ''): SurveyPoint {
  return { latitude, longitude, comment };
}

function makeDataset(n: number): SurveyPoint[] {
  return Array.from({ length: n }, (_, i) => makePoint(25 + i * 0.1, -82 + i * 0.05, `p${i}`));
}

// ============================================================================
// PAIRWISE DISTANCES
// ============================================================================

describe('computeAllDistances', () => {
  it.each([
    [0, 0],
    [1, 0],
    [2, 1],
    [5, 10],
  ])('yields n(n-1)/2 records for %i points', (n, expected) => {
    expect(computeAllDistances(makeDataset(n))).toHaveLength(expected);
  });

  it('emits pairs in lexicographic index order', () => {
    const [p0, p1, p2, p3] = makeDataset(4);
    const pairs = computeAllDistances([p0, p1, p2, p3]).map(d => [d.pointA.comment, d.pointB.comment]);

    expect(pairs).toEqual([
      ['p0', 'p1'],
      ['p0', 'p2'],
      ['p0', 'p3'],
      ['p1', 'p2'],
      ['p1', 'p3'],
      ['p2', 'p3'],
    ]);
  });

  it('carries the great-circle distance of each pair', () => {
    const a = makePoint(25.7742, -80.1937, 'miami');
    const b = makePoint(27.3364, -82.5307, 'st pete');

    const [record] = computeAllDistances([a, b]);
    expect(record.pointA).toBe(a);
    expect(record.pointB).toBe(b);
    expect(record.distanceKm).toBe(greatCircleDistance(a, b));
  });

  it('uses the configured sphere radius', () => {
    const dataset = [makePoint(0, 0), makePoint(0, 90)];
    const [record] = computeAllDistances(dataset, { earthRadiusKm: 1 });
    expect(record.distanceKm).toBeCloseTo(Math.PI / 2, 12);
  });

  it('reports zero for duplicate positions', () => {
    const [record] = computeAllDistances([makePoint(26, -81, 'a'), makePoint(26, -81, 'b')]);
    expect(record.distanceKm).toBe(0);
  });
});

// ============================================================================
// CLUSTERING
// ============================================================================

describe('clusterByRadius', () => {
  it('returns no clusters for an empty dataset', () => {
    expect(clusterByRadius([], 10)).toEqual([]);
  });

  it('measures membership against the seed only', () => {
    // Along the equator 0.0675° ≈ 7.5 km: P0-P1 7.5, P1-P2 7.5, P0-P2 15
    const p0 = makePoint(0, 0, 'P0');
    const p1 = makePoint(0, 0.0675, 'P1');
    const p2 = makePoint(0, 0.135, 'P2');

    const clusters = clusterByRadius([p0, p1, p2], 10);

    expect(clusters).toEqual([[p0, p1], [p2]]);
    expect(greatCircleDistance(p1, p2)).toBeLessThanOrEqual(10);
  });

  it('depends on dataset order', () => {
    const p0 = makePoint(0, 0, 'P0');
    const p1 = makePoint(0, 0.0675, 'P1');
    const p2 = makePoint(0, 0.135, 'P2');

    // Seeding at the middle point claims both ends
    expect(clusterByRadius([p1, p0, p2], 10)).toEqual([[p1, p0, p2]]);
  });

  it('starts a new cluster at each unclaimed point', () => {
    const far = makePoint(0, 0, 'far');
    const seed = makePoint(0, 1, 'seed');
    const near = makePoint(0, 0.95, 'near');

    // "far" claims nothing; "seed" then claims "near"
    expect(clusterByRadius([far, seed, near], 10)).toEqual([[far], [seed, near]]);
  });

  it('includes points exactly at the radius', () => {
    const a = makePoint(0, 0);
    const b = makePoint(0, 1);
    const radius = greatCircleDistance(a, b);

    expect(clusterByRadius([a, b], radius)).toEqual([[a, b]]);
  });

  it('groups only identical coordinates with radius 0', () => {
    const a = makePoint(26.5, -82.1, 'first');
    const b = makePoint(26.5, -82.1, 'second');
    const c = makePoint(26.5001, -82.1, 'third');

    expect(clusterByRadius([a, c, b], 0)).toEqual([[a, b], [c]]);
  });

  it('always returns a partition of the dataset', () => {
    const dataset = [
      ...makeDataset(12),
      makePoint(25.3, -81.9, 'dup'),
      makePoint(25.3, -81.9, 'dup2'),
    ];

    for (const radius of [0, 1, 5, 12.5, 40, 1000]) {
      const clusters = clusterByRadius(dataset, radius);
      const flattened = clusters.flat();

      expect(clusters.every(c => c.length > 0)).toBe(true);
      expect(flattened).toHaveLength(dataset.length);
      expect(new Set(flattened).size).toBe(dataset.length);
      for (const point of dataset) {
        expect(flattened).toContain(point);
      }
    }
  });

  it('does not mutate the input', () => {
    const dataset = makeDataset(6);
    const copy = dataset.map(p => ({ ...p }));

    clusterByRadius(dataset, 15);
    computeAllDistances(dataset);
    summarize(dataset);

    expect(dataset).toEqual(copy);
  });

  it('uses the configured sphere radius', () => {
    const a = makePoint(0, 0);
    const b = makePoint(0, 1);

    // 1° on a unit sphere is ~0.01745
    expect(clusterByRadius([a, b], 0.02, { earthRadiusKm: 1 })).toEqual([[a, b]]);
    expect(clusterByRadius([a, b], 0.02, DEFAULT_ANALYSIS_CONFIG)).toEqual([[a], [b]]);
  });
});

// ============================================================================
// SUMMARY
// ============================================================================

describe('summarize', () => {
  it('summarizes a two-point dataset', () => {
    const summary = summarize([makePoint(25.0, -80.0, 'a'), makePoint(27.0, -82.0, 'b')]);

    expect(summary).toEqual({
      totalPoints: 2,
      averageLatitude: 26.0,
      averageLongitude: -81.0,
      boundingBox: { minLat: 25.0, maxLat: 27.0, minLon: -82.0, maxLon: -80.0 },
    });
  });

  it('summarizes a single point', () => {
    const summary = summarize([makePoint(28.25, -84.5)]);

    expect(summary.totalPoints).toBe(1);
    expect(summary.averageLatitude).toBe(28.25);
    expect(summary.averageLongitude).toBe(-84.5);
    expect(summary.boundingBox).toEqual({ minLat: 28.25, maxLat: 28.25, minLon: -84.5, maxLon: -84.5 });
  });

  it('takes min and max per axis independently', () => {
    const box = getBoundingBox([makePoint(26, -80), makePoint(24, -83), makePoint(29, -81)]);
    expect(box).toEqual({ minLat: 24, maxLat: 29, minLon: -83, maxLon: -80 });
  });

  it('fails with EmptyDatasetError on an empty dataset', () => {
    expect(() => summarize([])).toThrow(EmptyDatasetError);
    expect(() => summarize([])).toThrow('Cannot summarize an empty dataset');
  });

  it('tags the empty-dataset failure with its code', () => {
    try {
      summarize([]);
      expect.unreachable('summarize should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(EmptyDatasetError);
      expect(error).toMatchObject({ code: 'EMPTY_DATASET' });
    }
  });
});

import { describe, it, expect } from 'vitest';
import {
  escapeXML,
  formatClusters,
  formatDistances,
  formatPoints,
  formatSummary,
  isOutputFormat,
} from '../src/formatters.js';
import { computeAllDistances, summarize } from '../src/analysis.js';
import type { SurveyPoint } from '../src/points.js';

const a: SurveyPoint = { latitude: 25, longitude: -80, comment: 'a' };
const b: SurveyPoint = { latitude: 25.01, longitude: -80, comment: 'b' };
const c: SurveyPoint = { latitude: 27, longitude: -82, comment: 'Crab & <lobster>' };

describe('isOutputFormat', () => {
  it('recognizes the export formats', () => {
    expect(isOutputFormat('geojson')).toBe(true);
    expect(isOutputFormat('table')).toBe(true);
    expect(isOutputFormat('xlsx')).toBe(false);
  });
});

describe('escapeXML', () => {
  it('escapes markup characters', () => {
    expect(escapeXML(`<a href="x">Tom's & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom&apos;s &amp; Jerry&apos;s&lt;/a&gt;'
    );
  });
});

describe('formatPoints', () => {
  it('writes GeoJSON with [lon, lat] coordinates', () => {
    const collection = JSON.parse(formatPoints([a], 'geojson'));

    expect(collection).toEqual({
      type: 'FeatureCollection',
      features: [{
        type: 'Feature',
        geometry: { type: 'Point', coordinates: [-80, 25] },
        properties: { comment: 'a' },
      }],
    });
  });

  it('writes CSV in the x,y,comment layout', () => {
    expect(formatPoints([a, c], 'csv')).toBe('x,y,comment\n25,-80,a\n27,-82,Crab & <lobster>');
  });

  it('writes a fixed-width table', () => {
    const lines = formatPoints([a], 'table').split('\n');

    expect(lines[0]).toBe('#     | Lat          | Lon          | Comment');
    expect(lines[1]).toBe('-'.repeat(lines[0].length));
    expect(lines[2]).toBe('1     | 25.000000    | -80.000000   | a');
  });

  it('writes KML placemarks with escaped descriptions', () => {
    const kml = formatPoints([c], 'kml');

    expect(kml).toContain('<description>Crab &amp; &lt;lobster&gt;</description>');
    expect(kml).toContain('<coordinates>-82,27,0</coordinates>');
  });

  it('writes GPX waypoints with the comment in cmt', () => {
    const gpx = formatPoints([c], 'gpx');

    expect(gpx).toContain('<wpt lat="27" lon="-82">');
    expect(gpx).toContain('<cmt>Crab &amp; &lt;lobster&gt;</cmt>');
  });
});

describe('formatClusters', () => {
  const clusters = [[a, b], [c]];

  it('numbers clusters from 1 in CSV', () => {
    expect(formatClusters(clusters, 'csv')).toBe(
      'cluster,x,y,comment\n1,25,-80,a\n1,25.01,-80,b\n2,27,-82,Crab & <lobster>'
    );
  });

  it('keeps nested clusters in JSON', () => {
    const parsed = JSON.parse(formatClusters(clusters, 'json'));

    expect(parsed).toEqual([
      { cluster: 1, size: 2, points: [a, b] },
      { cluster: 2, size: 1, points: [c] },
    ]);
  });

  it('tags GeoJSON features with their cluster', () => {
    const collection = JSON.parse(formatClusters(clusters, 'geojson'));
    const tags = collection.features.map((f: { properties: { cluster: number } }) => f.properties.cluster);

    expect(tags).toEqual([1, 1, 2]);
  });

  it('adds a cluster column to the table', () => {
    const lines = formatClusters([[a]], 'table').split('\n');

    expect(lines[0]).toBe('#     | Lat          | Lon          | Cluster | Comment');
    expect(lines[2]).toBe('1     | 25.000000    | -80.000000   | 1       | a');
  });
});

describe('formatDistances', () => {
  const distances = computeAllDistances([
    { latitude: 0, longitude: 0, comment: '' },
    { latitude: 0, longitude: 1, comment: '' },
  ]);

  it('writes CSV rounded to metres', () => {
    expect(formatDistances(distances, 'csv')).toBe('lat_a,lon_a,lat_b,lon_b,distance_km\n0,0,0,1,111.195');
  });

  it('writes JSON coordinate pairs', () => {
    const [record] = JSON.parse(formatDistances(distances, 'json'));

    expect(record.pointA).toEqual([0, 0]);
    expect(record.pointB).toEqual([0, 1]);
    expect(record.distanceKm).toBeCloseTo(111.195, 3);
  });
});

describe('formatSummary', () => {
  it('lists count, means and ranges', () => {
    const summary = summarize([
      { latitude: 25, longitude: -80, comment: 'a' },
      { latitude: 27, longitude: -82, comment: 'b' },
    ]);

    expect(formatSummary(summary)).toBe([
      'Total points:      2',
      'Average latitude:  26.000000',
      'Average longitude: -81.000000',
      'Latitude range:    25 to 27',
      'Longitude range:   -82 to -80',
    ].join('\n'));
  });
});

/**
 * Output formatters
 *
 * Turn points, clusters, distance tables and summaries into text for the CLI
 * or a downstream renderer.
 */

import type { Cluster, DatasetSummary, DistanceRecord } from './analysis.js';
import type { Dataset, SurveyPoint } from './points.js';
import { escapeCsv, serializeCsv } from './parser.js';

export type OutputFormat = 'json' | 'geojson' | 'csv' | 'table' | 'kml' | 'gpx';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'geojson', 'csv', 'table', 'kml', 'gpx'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export function escapeXML(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

interface PointFeature {
  type: 'Feature';
  geometry: { type: 'Point'; coordinates: [number, number] };
  properties: Record<string, unknown>;
}

function toFeature(point: SurveyPoint, properties: Record<string, unknown> = {}): PointFeature {
  return {
    type: 'Feature',
    geometry: { type: 'Point', coordinates: [point.longitude, point.latitude] },
    properties: { comment: point.comment, ...properties },
  };
}

function formatTable(points: Dataset, extra?: (index: number) => string): string {
  const header = `${'#'.padEnd(5)} | ${'Lat'.padEnd(12)} | ${'Lon'.padEnd(12)} | ${extra ? 'Cluster | ' : ''}Comment`;
  const separator = '-'.repeat(header.length);
  const rows = points.map((p, i) => {
    const index = String(i + 1).padEnd(5);
    const lat = p.latitude.toFixed(6).padEnd(12);
    const lon = p.longitude.toFixed(6).padEnd(12);
    const cluster = extra ? `${extra(i).padEnd(7)} | ` : '';
    return `${index} | ${lat} | ${lon} | ${cluster}${p.comment}`;
  });
  return [header, separator, ...rows].join('\n');
}

/**
 * Render a dataset in one of the export formats.
 */
export function formatPoints(points: Dataset, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(points, null, 2);

    case 'geojson':
      return JSON.stringify({
        type: 'FeatureCollection',
        features: points.map(p => toFeature(p)),
      }, null, 2);

    case 'csv':
      return serializeCsv(points).trimEnd();

    case 'table':
      return formatTable(points);

    case 'kml': {
      const placemarks = points.map(p => `    <Placemark>
      <description>${escapeXML(p.comment)}</description>
      <Point>
        <coordinates>${p.longitude},${p.latitude},0</coordinates>
      </Point>
    </Placemark>`).join('\n');

      return `<?xml version="1.0" encoding="UTF-8"?>
<kml xmlns="http://www.opengis.net/kml/2.2">
  <Document>
    <name>Survey Points</name>
${placemarks}
  </Document>
</kml>`;
    }

    case 'gpx': {
      const waypoints = points.map(p => `  <wpt lat="${p.latitude}" lon="${p.longitude}">
    <cmt>${escapeXML(p.comment)}</cmt>
  </wpt>`).join('\n');

      return `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="crabgrounds" xmlns="http://www.topografix.com/GPX/1/1">
${waypoints}
</gpx>`;
    }
  }
}

/**
 * Render clusters. Point formats carry a 1-based `cluster` number per point;
 * `json` keeps the nested cluster arrays.
 */
export function formatClusters(clusters: readonly Cluster[], format: OutputFormat): string {
  const flat = clusters.flat();
  const clusterOf: number[] = clusters.flatMap((cluster, i) => cluster.map(() => i + 1));

  switch (format) {
    case 'json':
      return JSON.stringify(clusters.map((points, i) => ({ cluster: i + 1, size: points.length, points })), null, 2);

    case 'geojson':
      return JSON.stringify({
        type: 'FeatureCollection',
        features: flat.map((p, i) => toFeature(p, { cluster: clusterOf[i] })),
      }, null, 2);

    case 'csv': {
      const rows = flat.map((p, i) =>
        [clusterOf[i].toString(), p.latitude.toString(), p.longitude.toString(), escapeCsv(p.comment)].join(',')
      );
      return ['cluster,x,y,comment', ...rows].join('\n');
    }

    case 'table':
      return formatTable(flat, i => String(clusterOf[i]));

    case 'kml':
    case 'gpx':
      return formatPoints(flat, format);
  }
}

/**
 * Render the pairwise distance table as JSON or CSV.
 */
export function formatDistances(distances: readonly DistanceRecord[], format: 'json' | 'csv'): string {
  if (format === 'json') {
    return JSON.stringify(distances.map(d => ({
      pointA: [d.pointA.latitude, d.pointA.longitude],
      pointB: [d.pointB.latitude, d.pointB.longitude],
      distanceKm: d.distanceKm,
    })), null, 2);
  }

  const rows = distances.map(d =>
    [d.pointA.latitude, d.pointA.longitude, d.pointB.latitude, d.pointB.longitude, d.distanceKm.toFixed(3)].join(',')
  );
  return ['lat_a,lon_a,lat_b,lon_b,distance_km', ...rows].join('\n');
}

export function formatSummary(summary: DatasetSummary): string {
  const box = summary.boundingBox;
  return [
    `Total points:      ${summary.totalPoints}`,
    `Average latitude:  ${summary.averageLatitude.toFixed(6)}`,
    `Average longitude: ${summary.averageLongitude.toFixed(6)}`,
    `Latitude range:    ${box.minLat} to ${box.maxLat}`,
    `Longitude range:   ${box.minLon} to ${box.maxLon}`,
  ].join('\n');
}

/**
 * Survey File I/O
 *
 * Reads survey records from CSV, GPX, KML and KMZ files and writes datasets
 * back to the `x,y,comment` CSV layout. Records come back as text; turning
 * them into points is left to {@link createPoint} / {@link cleanData}.
 */

import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { DOMParser } from '@xmldom/xmldom';
import * as unzipper from 'unzipper';
import {
  InvalidInputError,
  MalformedFileError,
  SurveyFileNotFoundError,
  SurveyFileWriteError,
} from './errors.js';
import type { Dataset, SurveyRecord } from './points.js';

// ============================================================================
// TYPES
// ============================================================================

export type SupportedFormat = 'csv' | 'gpx' | 'kml' | 'kmz' | 'unknown';

export const CSV_FIELDS = ['x', 'y', 'comment'] as const;

type CsvField = (typeof CSV_FIELDS)[number];

const FIELD_ALIASES: Record<CsvField, string[]> = {
  x: ['x', 'lat', 'latitude'],
  y: ['y', 'lon', 'lng', 'longitude'],
  comment: ['comment', 'comments', 'notes', 'annotation'],
};

// ============================================================================
// FILE TYPE DETECTION
// ============================================================================

/**
 * Detect file type from extension
 */
export function getFileType(filePath: string): SupportedFormat {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.csv': return 'csv';
    case '.gpx': return 'gpx';
    case '.kml': return 'kml';
    case '.kmz': return 'kmz';
    default: return 'unknown';
  }
}

export function getSupportedExtensions(): string[] {
  return ['.csv', '.gpx', '.kml', '.kmz'];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fsPromises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new SurveyFileNotFoundError(filePath, { cause: error });
    }
    throw new MalformedFileError(`An error occurred while reading the file: ${filePath}`, filePath, undefined, { cause: error });
  }
}

// ============================================================================
// CSV
// ============================================================================

/**
 * Detect CSV delimiter
 */
function detectDelimiter(headerLine: string): string {
  const delimiters = [',', '\t', ';', '|'];
  let maxCount = 0;
  let detected = ',';

  for (const delim of delimiters) {
    const count = headerLine.split(delim).length - 1;
    if (count > maxCount) {
      maxCount = count;
      detected = delim;
    }
  }

  return detected;
}

/**
 * Split CSV text into rows of cells, honouring double-quoted cells and ""
 * escapes. A quoted cell may span line breaks. Blank lines are skipped.
 */
export function splitCsvRows(text: string, delimiter = ','): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;

  const endRow = (): void => {
    row.push(cell);
    if (row.length > 1 || row[0].trim() !== '') rows.push(row);
    row = [];
    cell = '';
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"' && cell.trim() === '') {
      cell = '';
      quoted = true;
    } else if (ch === delimiter) {
      row.push(cell);
      cell = '';
    } else if (ch === '\r' || ch === '\n') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRow();
    } else {
      cell += ch;
    }
  }

  if (row.length > 0 || cell !== '') endRow();
  return rows;
}

/**
 * Split one CSV line into cells.
 */
export function splitCsvLine(line: string, delimiter = ','): string[] {
  return splitCsvRows(line, delimiter)[0] ?? [''];
}

export function escapeCsv(str: string): string {
  if (/[,"\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Find the column index of each required field, or null when absent.
 */
function findColumns(headers: string[]): Record<CsvField, number | null> {
  const lower = headers.map(h => h.trim().toLowerCase());
  const locate = (field: CsvField): number | null => {
    const index = lower.findIndex(h => FIELD_ALIASES[field].includes(h));
    return index >= 0 ? index : null;
  };

  return { x: locate('x'), y: locate('y'), comment: locate('comment') };
}

/**
 * Parse CSV text into records. Cells missing from short rows become ''.
 *
 * @param source - File name used in error messages
 */
export function parseCsv(content: string, source = '<input>'): SurveyRecord[] {
  const text = content.replace(/^\uFEFF/, '');
  const headerLine = text.split(/\r\n|\r|\n/).find(line => line.trim()) ?? '';
  const [headers, ...rows] = splitCsvRows(text, detectDelimiter(headerLine));

  if (headers === undefined) {
    throw new MalformedFileError(`CSV file has no header row: ${source}`, source);
  }

  const columns = findColumns(headers);
  const missing = CSV_FIELDS.filter(field => columns[field] === null);

  if (missing.length > 0) {
    throw new MalformedFileError(
      `CSV file must contain the columns: ${CSV_FIELDS.join(', ')} (missing: ${missing.join(', ')})`,
      source,
      { missingColumns: missing }
    );
  }

  // Comments are kept exactly as written; only coordinates are trimmed.
  const cell = (values: string[], index: number | null): string =>
    index === null ? '' : values[index] ?? '';

  return rows.map(values => ({
    x: cell(values, columns.x).trim(),
    y: cell(values, columns.y).trim(),
    comment: cell(values, columns.comment),
  }));
}

/**
 * Load survey records from a CSV file with `x`, `y` and `comment` columns.
 */
export async function loadCsv(filePath: string): Promise<SurveyRecord[]> {
  const content = await readText(filePath);
  return parseCsv(content, filePath);
}

/**
 * Render a dataset as CSV text, header included.
 *
 * @throws InvalidInputError naming the first row with a missing field
 */
export function serializeCsv(dataset: Dataset): string {
  dataset.forEach((point, i) => {
    if (typeof point.latitude !== 'number' || Number.isNaN(point.latitude)) {
      throw new InvalidInputError(`Row ${i + 1} is missing field 'x' (latitude)`, 'x', i + 1);
    }
    if (typeof point.longitude !== 'number' || Number.isNaN(point.longitude)) {
      throw new InvalidInputError(`Row ${i + 1} is missing field 'y' (longitude)`, 'y', i + 1);
    }
    if (typeof point.comment !== 'string') {
      throw new InvalidInputError(`Row ${i + 1} is missing field 'comment'`, 'comment', i + 1);
    }
  });

  const rows = dataset.map(p => [p.latitude.toString(), p.longitude.toString(), escapeCsv(p.comment)].join(','));
  return [CSV_FIELDS.join(','), ...rows].join('\n') + '\n';
}

/**
 * Save a dataset to a CSV file. Nothing is written if any record is incomplete.
 */
export async function saveCsv(filePath: string, dataset: Dataset): Promise<void> {
  const content = serializeCsv(dataset);

  try {
    await fsPromises.writeFile(filePath, content, 'utf-8');
  } catch (error) {
    throw new SurveyFileWriteError(filePath, { cause: error });
  }
}

// ============================================================================
// GPX / KML
// ============================================================================

function parseXml(content: string, source: string): Document {
  const problems: string[] = [];
  let doc: Document | undefined;

  try {
    doc = new DOMParser({
      errorHandler: {
        warning: () => undefined,
        error: (msg: string) => { problems.push(msg); },
        fatalError: (msg: string) => { problems.push(msg); },
      },
    }).parseFromString(content, 'text/xml');
  } catch (error) {
    throw new MalformedFileError(`Invalid XML in ${source}`, source, undefined, { cause: error });
  }

  if (!doc || !doc.documentElement || problems.length > 0) {
    throw new MalformedFileError(`Invalid XML in ${source}: ${problems[0] ?? 'no root element'}`, source);
  }

  return doc;
}

function childText(el: Element, tag: string): string | null {
  const text = el.getElementsByTagName(tag)[0]?.textContent?.trim();
  return text ? text : null;
}

/**
 * Extract GPX waypoints. The comment comes from `cmt`, then `desc`, then `name`.
 */
export function parseGpx(content: string, source = '<input>'): SurveyRecord[] {
  const doc = parseXml(content, source);
  const records: SurveyRecord[] = [];

  const waypoints = doc.getElementsByTagName('wpt');
  for (let i = 0; i < waypoints.length; i++) {
    const wpt = waypoints[i];
    records.push({
      x: wpt.getAttribute('lat') ?? '',
      y: wpt.getAttribute('lon') ?? '',
      comment: childText(wpt, 'cmt') ?? childText(wpt, 'desc') ?? childText(wpt, 'name') ?? '',
    });
  }

  return records;
}

/**
 * Extract KML Point placemarks. KML stores `lon,lat[,alt]`.
 */
export function parseKml(content: string, source = '<input>'): SurveyRecord[] {
  const doc = parseXml(content, source);
  const records: SurveyRecord[] = [];

  const placemarks = doc.getElementsByTagName('Placemark');
  for (let i = 0; i < placemarks.length; i++) {
    const placemark = placemarks[i];
    const pointEl = placemark.getElementsByTagName('Point')[0];
    if (!pointEl) continue;

    const coords = childText(pointEl, 'coordinates');
    if (!coords) continue;

    const [lon = '', lat = ''] = coords.split(',').map(c => c.trim());
    records.push({
      x: lat,
      y: lon,
      comment: childText(placemark, 'description') ?? childText(placemark, 'name') ?? '',
    });
  }

  return records;
}

/**
 * Read the first KML document inside a KMZ archive.
 */
async function parseKmz(filePath: string): Promise<SurveyRecord[]> {
  let directory: unzipper.CentralDirectory;
  try {
    directory = await unzipper.Open.file(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new SurveyFileNotFoundError(filePath, { cause: error });
    }
    throw new MalformedFileError(`Not a valid KMZ archive: ${filePath}`, filePath, undefined, { cause: error });
  }

  const kmlFile = directory.files.find(f => f.path.toLowerCase().endsWith('.kml'));
  if (!kmlFile) {
    throw new MalformedFileError(`No KML file found in KMZ archive: ${filePath}`, filePath);
  }

  const content = await kmlFile.buffer();
  return parseKml(content.toString('utf-8'), filePath);
}

// ============================================================================
// MAIN LOAD FUNCTION
// ============================================================================

/**
 * Load survey records from any supported file, picking the reader by extension.
 */
export async function loadSurveyFile(filePath: string): Promise<SurveyRecord[]> {
  const fileType = getFileType(filePath);

  switch (fileType) {
    case 'csv':
      return loadCsv(filePath);
    case 'gpx':
      return parseGpx(await readText(filePath), filePath);
    case 'kml':
      return parseKml(await readText(filePath), filePath);
    case 'kmz':
      return parseKmz(filePath);
    case 'unknown':
      throw new MalformedFileError(
        `Unsupported file type: ${path.extname(filePath) || '(none)'} (expected ${getSupportedExtensions().join(', ')})`,
        filePath
      );
  }
}

/**
 * crabgrounds command line program
 *
 * Commands:
 *   summary   - Point count, mean position and bounding box
 *   distances - Pairwise great-circle distances
 *   clusters  - Greedy radius clustering
 *   bearing   - Distance and initial bearing between two positions
 *   clean     - Drop invalid and duplicate records, optionally tidy comments
 *   filter    - Keep records whose comment contains a keyword
 *   density   - Binned latitude/longitude histogram
 *   dms       - Convert DMS strings to decimal degrees
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import ora, { type Ora } from 'ora';

import {
  DEFAULT_ANALYSIS_CONFIG,
  clusterByRadius,
  computeAllDistances,
  summarize,
  type AnalysisConfig,
} from './analysis.js';
import { parseDms } from './coordinates.js';
import { DEFAULT_DENSITY_BINS, densityGrid } from './density.js';
import { SurveyError, SurveyFileWriteError } from './errors.js';
import {
  OUTPUT_FORMATS,
  formatClusters,
  formatDistances,
  formatPoints,
  formatSummary,
  isOutputFormat,
  type OutputFormat,
} from './formatters.js';
import { greatCircleDistance, initialBearing } from './geo-utils.js';
import { loadSurveyFile } from './parser.js';
import { createPoint, toDataset, type SurveyPoint } from './points.js';
import { cleanData, filterData, standardizeComments } from './preprocessing.js';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '1.0.0';

// ============================================================================
// OUTPUT
// ============================================================================

/**
 * Where results (`log`) and diagnostics (`error`) go.
 */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

const consoleOutput: CliOutput = {
  log: message => console.log(message),
  error: message => console.error(message),
};

interface LoadOptions {
  strict?: boolean;
  quiet?: boolean;
}

interface WriteOptions {
  output?: string;
  quiet?: boolean;
}

interface PointsOptions extends LoadOptions, WriteOptions {
  format: OutputFormat;
}

// ============================================================================
// OPTION PARSERS
// ============================================================================

function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

function parsePositive(value: string): number {
  const parsed = parseNonNegative(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a number greater than zero.');
  }
  return parsed;
}

function parseBins(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return value;
}

type DistanceFormat = 'json' | 'csv';

function parseDistanceFormat(value: string): DistanceFormat {
  if (value !== 'json' && value !== 'csv') {
    throw new InvalidArgumentError('Expected one of: json, csv.');
  }
  return value;
}

/**
 * "lat,lon" -> point, validated the same way as file records.
 */
function parsePosition(value: string, label: string): SurveyPoint {
  const [x = '', y = ''] = value.split(',');
  return createPoint({ x, y, comment: label });
}

// ============================================================================
// SHARED STEPS
// ============================================================================

function startSpinner(text: string, quiet?: boolean): Ora | null {
  return quiet ? null : ora(text).start();
}

/**
 * Read every file and turn the records into one dataset. Without `strict`,
 * unusable and duplicate records are dropped; with it the first bad record
 * aborts the run.
 */
async function loadDataset(files: string[], options: LoadOptions): Promise<SurveyPoint[]> {
  const batches = await Promise.all(files.map(f => loadSurveyFile(path.resolve(f))));
  const records = batches.flat();
  return options.strict ? toDataset(records) : cleanData(records);
}

async function emit(text: string, options: WriteOptions, output: CliOutput): Promise<void> {
  if (!options.output) {
    output.log(text);
    return;
  }

  try {
    await fsPromises.writeFile(options.output, text + '\n', 'utf-8');
  } catch (error) {
    throw new SurveyFileWriteError(options.output, { cause: error });
  }

  if (!options.quiet) {
    output.error(`Output written to ${options.output}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof SurveyError) {
    return `Error [${error.code}]: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a command body, reporting failure through the spinner and commander.
 */
async function runAction(
  command: Command,
  spinner: Ora | null,
  failText: string,
  body: () => Promise<void>
): Promise<void> {
  try {
    await body();
  } catch (error) {
    if (spinner) spinner.fail(failText);
    command.error(describeError(error), { exitCode: 1, code: 'crabgrounds.failed' });
  }
}

function addLoadOptions(command: Command): Command {
  return command
    .option('--strict', 'Fail on the first invalid record instead of skipping it')
    .option('-q, --quiet', 'Suppress progress output');
}

// ============================================================================
// PROGRAM
// ============================================================================

export function createProgram(output: CliOutput = consoleOutput): Command {
  const program = new Command()
    .name('crabgrounds')
    .description('Distance, clustering and extent analysis for fishing-ground survey points')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: str => output.log(str.trimEnd()),
      writeErr: str => output.error(str.trimEnd()),
    });

  // --------------------------------------------------------------------------
  // SUMMARY
  // --------------------------------------------------------------------------

  addLoadOptions(
    program
      .command('summary')
      .description('Show point count, mean position and bounding box')
      .argument('<files...>', 'Survey files (CSV, GPX, KML, KMZ)')
      .option('--json', 'Print the summary as JSON')
  ).action(async (files: string[], options: LoadOptions & { json?: boolean }, command: Command) => {
    const spinner = startSpinner('Summarizing...', options.quiet);

    await runAction(command, spinner, 'Summary failed', async () => {
      const dataset = await loadDataset(files, options);
      const summary = summarize(dataset);

      if (spinner) spinner.succeed(`Summarized ${summary.totalPoints} points`);
      output.log(options.json ? JSON.stringify(summary, null, 2) : formatSummary(summary));
    });
  });

  // --------------------------------------------------------------------------
  // DISTANCES
  // --------------------------------------------------------------------------

  addLoadOptions(
    program
      .command('distances')
      .description('Compute great-circle distances between every pair of points')
      .argument('<files...>', 'Survey files (CSV, GPX, KML, KMZ)')
      .option('-f, --format <format>', 'Output format: json, csv', parseDistanceFormat, 'csv')
      .option('-o, --output <file>', 'Output file (defaults to stdout)')
      .option('--earth-radius <km>', 'Sphere radius in kilometers', parsePositive, DEFAULT_ANALYSIS_CONFIG.earthRadiusKm)
  ).action(async (
    files: string[],
    options: LoadOptions & WriteOptions & { format: DistanceFormat; earthRadius: number },
    command: Command
  ) => {
    const spinner = startSpinner('Computing distances...', options.quiet);

    await runAction(command, spinner, 'Distance computation failed', async () => {
      const dataset = await loadDataset(files, options);
      const config: AnalysisConfig = { earthRadiusKm: options.earthRadius };
      const distances = computeAllDistances(dataset, config);

      if (spinner) spinner.succeed(`${distances.length} distances between ${dataset.length} points`);
      await emit(formatDistances(distances, options.format), options, output);
    });
  });

  // --------------------------------------------------------------------------
  // CLUSTERS
  // --------------------------------------------------------------------------

  addLoadOptions(
    program
      .command('clusters')
      .description('Group points that lie within a radius of a seed point')
      .argument('<files...>', 'Survey files (CSV, GPX, KML, KMZ)')
      .option('-r, --radius <km>', 'Cluster radius in kilometers', parseNonNegative, 10)
      .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, parseFormat, 'table')
      .option('-o, --output <file>', 'Output file (defaults to stdout)')
      .option('--earth-radius <km>', 'Sphere radius in kilometers', parsePositive, DEFAULT_ANALYSIS_CONFIG.earthRadiusKm)
  ).action(async (
    files: string[],
    options: PointsOptions & { radius: number; earthRadius: number },
    command: Command
  ) => {
    const spinner = startSpinner('Clustering...', options.quiet);

    await runAction(command, spinner, 'Clustering failed', async () => {
      const dataset = await loadDataset(files, options);
      const clusters = clusterByRadius(dataset, options.radius, { earthRadiusKm: options.earthRadius });

      if (spinner) spinner.succeed(`${clusters.length} clusters from ${dataset.length} points (radius ${options.radius} km)`);
      await emit(formatClusters(clusters, options.format), options, output);
    });
  });

  // --------------------------------------------------------------------------
  // BEARING
  // --------------------------------------------------------------------------

  program
    .command('bearing')
    .description('Distance and initial bearing between two "lat,lon" positions (use -- before negative values)')
    .argument('<from>', 'Start position, e.g. 25.7742,-80.1937')
    .argument('<to>', 'End position, e.g. 27.3364,-82.5307')
    .action(async (from: string, to: string, _options: object, command: Command) => {
      await runAction(command, null, 'Bearing failed', async () => {
        const a = parsePosition(from, 'from');
        const b = parsePosition(to, 'to');

        output.log(`Distance: ${greatCircleDistance(a, b).toFixed(3)} km`);
        output.log(`Bearing:  ${initialBearing(a, b).toFixed(1)}°`);
      });
    });

  // --------------------------------------------------------------------------
  // CLEAN / FILTER
  // --------------------------------------------------------------------------

  addLoadOptions(
    program
      .command('clean')
      .description('Drop invalid and duplicate records')
      .argument('<files...>', 'Survey files (CSV, GPX, KML, KMZ)')
      .option('-s, --standardize', 'Trim and capitalize comments')
      .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, parseFormat, 'csv')
      .option('-o, --output <file>', 'Output file (defaults to stdout)')
  ).action(async (files: string[], options: PointsOptions & { standardize?: boolean }, command: Command) => {
    const spinner = startSpinner('Cleaning...', options.quiet);

    await runAction(command, spinner, 'Clean failed', async () => {
      const dataset = await loadDataset(files, options);
      const points = options.standardize ? standardizeComments(dataset) : dataset;

      if (spinner) spinner.succeed(`Kept ${points.length} points`);
      await emit(formatPoints(points, options.format), options, output);
    });
  });

  addLoadOptions(
    program
      .command('filter')
      .description('Keep points whose comment contains a keyword (case-insensitive)')
      .argument('<keyword>', 'Text to look for in comments')
      .argument('<files...>', 'Survey files (CSV, GPX, KML, KMZ)')
      .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, parseFormat, 'csv')
      .option('-o, --output <file>', 'Output file (defaults to stdout)')
  ).action(async (keyword: string, files: string[], options: PointsOptions, command: Command) => {
    const spinner = startSpinner(`Filtering for "${keyword}"...`, options.quiet);

    await runAction(command, spinner, 'Filter failed', async () => {
      const dataset = await loadDataset(files, options);
      const points = filterData(dataset, keyword);

      if (spinner) spinner.succeed(`${points.length} of ${dataset.length} points match "${keyword}"`);
      await emit(formatPoints(points, options.format), options, output);
    });
  });

  // --------------------------------------------------------------------------
  // DENSITY
  // --------------------------------------------------------------------------

  addLoadOptions(
    program
      .command('density')
      .description('Bin points into a latitude/longitude histogram (JSON)')
      .argument('<files...>', 'Survey files (CSV, GPX, KML, KMZ)')
      .option('-b, --bins <count>', 'Bins per axis', parseBins, DEFAULT_DENSITY_BINS)
      .option('-o, --output <file>', 'Output file (defaults to stdout)')
  ).action(async (files: string[], options: LoadOptions & WriteOptions & { bins: number }, command: Command) => {
    const spinner = startSpinner('Binning...', options.quiet);

    await runAction(command, spinner, 'Density grid failed', async () => {
      const dataset = await loadDataset(files, options);
      const grid = densityGrid(dataset, options.bins);

      if (spinner) spinner.succeed(`${dataset.length} points in a ${grid.bins}x${grid.bins} grid`);
      await emit(JSON.stringify(grid), options, output);
    });
  });

  // --------------------------------------------------------------------------
  // DMS
  // --------------------------------------------------------------------------

  program
    .command('dms')
    .description('Convert degrees-minutes-seconds strings to decimal degrees')
    .argument('<values...>', `DMS values, e.g. 25°46'26.5"N`)
    .action(async (values: string[], _options: object, command: Command) => {
      await runAction(command, null, 'Conversion failed', async () => {
        for (const value of values) {
          output.log(`${value} = ${parseDms(value).toFixed(6)}`);
        }
      });
    });

  return program;
}

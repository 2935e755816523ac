/**
 * Pipeline runner
 *
 * Loader → Cleaner → Transformer → Geo Extractor → Aggregator, producing one
 * frozen DatasetSnapshot. Fatal stage errors are logged and rethrown;
 * geometry failures are kept in the snapshot.
 */

import { Aggregator } from '../analytics/aggregator.js';
import type { DatasetConfig } from '../core/config.js';
import type { EnergyType } from '../core/constants.js';
import { isPipelineError } from '../core/errors.js';
import type {
  CleaningReport,
  ColumnMap,
  Observation,
  Region,
  WideMwhTable,
  YearRange,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { GeoExtractor, type GeoExtraction } from '../geo/geo-extractor.js';
import { loadRawTable } from '../ingestion/csv-loader.js';
import { transformTable } from '../transformation/index.js';
import { cleanTable } from '../validation/cleaner.js';

const log = createLogger({ module: 'pipeline' });

export interface DatasetSnapshot {
  /** Increments on every successful reload of a context */
  readonly version: number;
  readonly sourcePath: string;
  readonly loadedAt: string;
  readonly columns: ColumnMap;
  readonly ignoredColumns: readonly string[];
  readonly cleaning: CleaningReport;
  readonly regions: readonly Region[];
  readonly yearRange: YearRange;
  readonly energyTypes: readonly EnergyType[];
  readonly skippedEnergyTypes: readonly EnergyType[];
  readonly wide: WideMwhTable;
  readonly observations: readonly Observation[];
  readonly geo: GeoExtraction;
  readonly aggregator: Aggregator;
}

export interface PipelineOptions {
  readonly sourcePath: string;
  readonly dataset?: Partial<DatasetConfig>;
  readonly maxViews?: number;
  /** Shared geometry cache; a private one is created when absent */
  readonly geoExtractor?: GeoExtractor;
  readonly version?: number;
}

async function timed<T>(stage: string, run: () => T | Promise<T>): Promise<T> {
  const started = performance.now();
  try {
    const result = await run();
    log.debug(`Stage ${stage} finished`, { durationMs: Math.round(performance.now() - started) });
    return result;
  } catch (error) {
    log.error(`Stage ${stage} failed`, {
      error: isPipelineError(error) ? error.toLogString() : String(error),
    });
    throw error;
  }
}

/**
 * Run every stage on `options.sourcePath` and return a frozen snapshot.
 *
 * @throws LoadError | FormatError | SchemaError | ValidationError
 */
export async function runPipeline(options: PipelineOptions): Promise<DatasetSnapshot> {
  const started = performance.now();
  const { sourcePath } = options;
  const geoExtractor = options.geoExtractor ?? new GeoExtractor();

  const raw = await timed('load', () => loadRawTable(sourcePath));
  const clean = await timed('clean', () =>
    cleanTable(raw, {
      expectedRegionCount: options.dataset?.expectedRegionCount,
      expectedYearRange: options.dataset?.expectedYearRange,
    })
  );
  const transformed = await timed('transform', () =>
    transformTable(clean, { requiredEnergyTypes: options.dataset?.requiredEnergyTypes })
  );
  const geo = await timed('geo', () => geoExtractor.extract(sourcePath, clean));

  const observations = Object.freeze(transformed.observations.map((row) => Object.freeze(row)));

  const snapshot: DatasetSnapshot = Object.freeze({
    version: options.version ?? 1,
    sourcePath,
    loadedAt: new Date().toISOString(),
    columns: raw.columns,
    ignoredColumns: raw.ignoredColumns,
    cleaning: clean.report,
    regions: clean.regions,
    yearRange: clean.yearRange,
    energyTypes: transformed.energyTypes,
    skippedEnergyTypes: transformed.skippedEnergyTypes,
    wide: transformed.wide,
    observations,
    geo,
    aggregator: new Aggregator(observations, { maxViews: options.maxViews }),
  });

  log.info('Dataset loaded', {
    sourcePath,
    rows: clean.rows.length,
    observations: observations.length,
    regions: clean.regions.length,
    years: `${clean.yearRange.min}-${clean.yearRange.max}`,
    energyTypes: transformed.energyTypes.length,
    geoFailures: geo.failedRegionCodes,
    durationMs: Math.round(performance.now() - started),
  });

  return snapshot;
}

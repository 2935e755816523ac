/**
 * Regional energy pipeline
 *
 * Loader → Cleaner → Transformer → Geo Extractor → Aggregator over the
 * regional renewable production source, owned by an EnergyPipelineContext.
 *
 * @packageDocumentation
 */

// Core
export * from './core/constants.js';
export * from './core/errors.js';
export type * from './core/types.js';
export {
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  type DatasetConfig,
  type Environment,
  type LoadConfigOptions,
  type PipelineConfig,
} from './core/config.js';
export {
  configureLogging,
  createLogger,
  logger,
  Logger,
  type LogLevel,
  type LogMetadata,
} from './core/utils/logger.js';
export { compareCodes, compareObservations } from './core/utils/ordering.js';

// Stages
export { loadRawTable, parseRawTable, decodeUtf8 } from './ingestion/csv-loader.js';
export { resolveHeader, type ResolvedHeader } from './ingestion/header.js';
export { cleanTable, type CleanOptions } from './validation/cleaner.js';
export { gwhToMwh, meltToLong, toMegawattHours, transformTable, type TransformOptions } from './transformation/index.js';
export * from './geo/index.js';
export * from './analytics/index.js';

// Context & serving
export * from './context/index.js';
export { EnergyDashboardAPI, type APIResponse, type APIServerOptions, type ErrorCode } from './serving/api.js';

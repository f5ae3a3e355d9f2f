/**
 * Forest Atlas
 *
 * Hansen forest baseline and annual loss extraction, and gap-filled Dynamic
 * World forest-area time series, over the Earth Engine REST API.
 *
 * @packageDocumentation
 */

// Configuration
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './core/config.js';
export type {
  ForestAtlasConfig,
  EarthEngineConfig,
  HansenConfig,
  DynamicWorldConfig,
  DatabaseConfig,
  LoggingConfig,
  LoadConfigOptions,
} from './core/config.js';

// Domain types and errors
export type {
  RegionGeometry,
  ExtractionRequest,
  AnnualLossRecord,
  AggregationWindow,
  PeriodMetric,
  RetryPolicy,
  TimeSeriesSummary,
  TimeSeriesResult,
  RegionType,
  RegionRecord,
} from './core/types.js';
export {
  ForestAtlasError,
  InvalidRequestError,
  YearOutOfRangeError,
  RasterServiceError,
  ReductionExhaustedError,
  ConfigurationError,
  RegionNotFoundError,
} from './core/errors.js';
export type { RasterFailureKind } from './core/errors.js';
export { parseRegionGeometry, validateRegionGeometry, geometryAreaHa } from './core/geometry.js';
export { Logger, createLogger, logger } from './core/utils/logger.js';
export type { LogLevel, LogMetadata } from './core/utils/logger.js';

// Raster service
export { Image, ImageCollection } from './raster/image.js';
export type { ImageExpression, CollectionExpression, ReducerKind } from './raster/image.js';
export type {
  RasterSession,
  BandValues,
  CollectionQuery,
  ReduceRegionRequest,
} from './raster/session.js';
export { EarthEngineSession } from './raster/earth-engine/session.js';
export {
  EarthEngineContext,
  initializeEarthEngine,
  resetEarthEngine,
} from './raster/earth-engine/initialize.js';

// Extraction
export { RetryingReducer } from './resilience/retrying-reducer.js';
export type { SleepFn, ReduceRequest } from './resilience/retrying-reducer.js';
export {
  BaselineLossExtractor,
  createExtractionRequest,
  toLossYearCode,
} from './ingestion/hansen-baseline.js';
export { generateWindows, listWindows } from './ingestion/temporal-windows.js';
export { GapFillingCompositor, compositorSettingsFromConfig } from './ingestion/gap-filling-compositor.js';
export type { CompositorSettings, CompositeRequest } from './ingestion/gap-filling-compositor.js';
export { TimeSeriesAssembler, summarizeTimeSeries } from './ingestion/time-series.js';
export type { TimeSeriesRequest } from './ingestion/time-series.js';

// Persistence
export { ForestRepository } from './persistence/repository.js';
export type { DatabaseAdapter, RegionInsert } from './persistence/repository.js';
export { createDatabaseAdapter, parseDatabaseUrl } from './persistence/adapters/factory.js';
export { SQLiteAdapter } from './persistence/adapters/sqlite.js';
export { PostgreSQLAdapter } from './persistence/adapters/postgresql.js';

// Reporting
export { formatAnnualLossReport, formatAnnualLossCsv } from './reporting/annual-loss-report.js';
export { formatTimeSeriesReport } from './reporting/time-series-report.js';

/**
 * 程式庫匯出
 */

export { distance, EARTH_RADIUS_M } from './distance.js';
export { InvalidFilterInputError, SourceUnavailableError } from './errors.js';
export { RowTable, type Table } from './table.js';
export {
  byBounds,
  byIdentifier,
  byInventory,
  byProximity,
  byRegion,
  type StationTable,
} from './station-filters.js';
export {
  StationSelection,
  serializeRow,
  type FetchOptions,
  type LoadOptions,
  type SerializedStationRow,
  type StationTableLoader,
} from './station-selection.js';
export { StructuredLogger, loggers, type LogLevel } from './logger.js';
export { CacheService } from '../services/cache.js';
export { ConfigService, createSelectionConfig, DEFAULT_SELECTION_CONFIG } from '../services/config.js';
export {
  DEFAULT_RESOURCE_KEY,
  StationSourceLoader,
  buildStationTable,
  parseStationDirectory,
} from '../services/station-source.js';
export { RetryError } from '../services/retry.js';
export { INVENTORY_COLUMNS, RESOLUTIONS, STATION_COLUMNS } from '../types/station.js';
export type * from '../types/station.js';
export type * from '../types/config.js';

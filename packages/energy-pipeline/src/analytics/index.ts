export { Aggregator, type AggregatorOptions, type AggregatorStats } from './aggregator.js';
export {
  createMatcher,
  filterCacheKey,
  normalizeFilter,
  yearRangeFrom,
  type FilterSpec,
  type NormalizedFilter,
} from './filter-spec.js';
export {
  FilteredView,
  PivotTable,
  type CumulativePoint,
  type EnergyShare,
  type EnergyTypeChange,
  type PivotDimension,
  type PivotKey,
  type ProductionChange,
  type RegionTotal,
  type ViewSummary,
  type YoyGrowthPoint,
} from './filtered-view.js';

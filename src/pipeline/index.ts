/**
 * Analysis pipeline stages
 */

export { clean, canonicalColumnName, DEFAULT_SIGMA_THRESHOLD, DEFAULT_CATEGORICAL_COLUMNS } from './Cleaner';
export type { CleanOptions } from './Cleaner';

export { normalize } from './Normalizer';
export type { NormalizeOptions } from './Normalizer';

export { derive, isApplicable } from './MetricDeriver';
export type { DeriveOptions } from './MetricDeriver';

export {
  ratioMetric,
  polaritiesOf,
  EFFICIENCY,
  STRESS_TO_WEIGHT_RATIO,
  SAFETY_FACTOR,
  STANDARD_METRICS,
} from './metrics';
export type {
  Polarity,
  GuardPolicy,
  RatioFormula,
  CustomFormula,
  MetricDefinition,
} from './metrics';

export { bucketize, bucketIndex, fixedWidthBoundaries, resolveLabels } from './Bucketizer';
export type { BucketSpec } from './Bucketizer';

export { aggregate, aggregateToTable, statOf, REDUCERS } from './Aggregator';
export type { Reducer, ReductionSpec, GroupKey, ColumnStats, AggregateRow } from './Aggregator';

export { compare, compareGroups, improvementPct } from './Comparator';
export type {
  MetricValues,
  PolarityMap,
  CompareGroupsOptions,
  GroupComparison,
} from './Comparator';

export { AnalysisPipeline } from './AnalysisPipeline';

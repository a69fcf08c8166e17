/**
 * Performance analysis
 *
 * Compares the candidate design against the baseline overall, per load bucket
 * and per joint type. Every performance measurement is lower-is-better.
 */

import { RecordTable } from '../../core/table';
import { CaliperError, ErrorCode } from '../../core/errors';
import { Logger, defaultLogger } from '../../core/logging';
import {
  AnalysisPipeline,
  aggregate,
  aggregateToTable,
  bucketize,
  clean,
  compare,
  compareGroups,
  derive,
  ratioMetric,
  type AggregateRow,
  type GroupComparison,
  type MetricValues,
  type Polarity,
  type ReductionSpec,
} from '../../pipeline';
import type { ComparisonResult } from '../results/ComparisonResult';
import type { AnalysisConfig } from '../config/AnalysisConfig';

export const PERFORMANCE_MEASUREMENTS = [
  'power_consumption',
  'positioning_error',
  'temperature',
  'noise_level',
  'response_time',
] as const;

/**
 * Power drawn per kg of payload, computed from group means (W/kg)
 */
export const POWER_EFFICIENCY = ratioMetric(
  'power_efficiency',
  'power_consumption_mean',
  'load_mean',
  { polarity: 'lower-is-better', onGuardFail: 'undefined', unit: 'W/kg' }
);

export interface GroupedComparison {
  /** Group columns in order, variant column first */
  groupKeys: string[];
  rows: AggregateRow[];
  comparisons: GroupComparison[];
}

export interface PerformanceAnalysis {
  cleaned: RecordTable;
  /** Means per design variant */
  designSummary: AggregateRow[];
  /** Candidate vs baseline over the whole dataset */
  efficiency: ComparisonResult;
  payload: GroupedComparison;
  /** Null when the data carries no joint_type column */
  joints: GroupedComparison | null;
}

export interface AnalysisOptions {
  logger?: Logger;
}

interface CleanedState {
  cleaned: RecordTable;
  measurements: string[];
}

type EfficiencyState = CleanedState & Pick<PerformanceAnalysis, 'designSummary' | 'efficiency'>;
type PayloadState = EfficiencyState & Pick<PerformanceAnalysis, 'payload'>;

export function runPerformanceAnalysis(
  table: RecordTable,
  config: AnalysisConfig,
  options: AnalysisOptions = {}
): PerformanceAnalysis {
  const logger = (options.logger ?? defaultLogger()).child('performance');
  const { column: variantColumn } = config.variants;

  return AnalysisPipeline.start<RecordTable>(logger)
    .stage('clean', (input): CleanedState => {
      const cleaned = clean(input, {
        sigmaThreshold: config.cleaning.sigmaThreshold,
        categoricalColumns: config.cleaning.categoricalColumns,
        logger,
      });
      cleaned.requireColumns([variantColumn, 'load', 'power_consumption'], {
        analysis: 'performance',
      });
      const measurements = PERFORMANCE_MEASUREMENTS.filter((m) => cleaned.hasColumn(m));
      logger.info(`${cleaned.size} of ${input.size} records kept after cleaning`);
      return { cleaned, measurements };
    })
    .stage('efficiency', (state): EfficiencyState => {
      const { designSummary, efficiency } = efficiencyMetrics(
        state.cleaned,
        state.measurements,
        config
      );
      return { ...state, designSummary, efficiency };
    })
    .stage('payload', (state): PayloadState => {
      const bucketed = bucketize(state.cleaned, config.loadBuckets);
      const payload = groupedComparison(
        bucketed,
        [variantColumn, config.loadBuckets.target],
        state.measurements,
        config,
        logger
      );
      return { ...state, payload };
    })
    .stage('joints', (state): PerformanceAnalysis => {
      let joints: GroupedComparison | null = null;
      if (state.cleaned.hasColumn('joint_type')) {
        joints = groupedComparison(
          state.cleaned,
          [variantColumn, 'joint_type'],
          state.measurements,
          config,
          logger
        );
      } else {
        logger.info('no joint_type column; joint comparison skipped');
      }
      return {
        cleaned: state.cleaned,
        designSummary: state.designSummary,
        efficiency: state.efficiency,
        payload: state.payload,
        joints,
      };
    })
    .run(table);
}

/**
 * Overall comparison: per-variant means, power per kg of load, and the
 * specification weights of each design
 */
export function efficiencyMetrics(
  cleaned: RecordTable,
  measurements: readonly string[],
  config: AnalysisConfig
): { designSummary: AggregateRow[]; efficiency: ComparisonResult } {
  const { column: variantColumn, baseline, candidate } = config.variants;
  const reductions = meanOf(['load', ...measurements]);

  const designSummary = aggregate(cleaned, [variantColumn], reductions);
  const summaryTable = derive(aggregateToTable(designSummary, [variantColumn], reductions), [
    POWER_EFFICIENCY,
  ]);

  const valuesFor = (variant: string): MetricValues => {
    const row = summaryTable.rows.find((r) => r[variantColumn] === variant);
    if (!row) {
      throw new CaliperError(ErrorCode.INVALID_DATA, `No '${variant}' records left to compare`, {
        column: variantColumn,
        variant,
      });
    }
    const values: Record<string, number | null> = {};
    const weight = config.designWeights[variant];
    if (weight !== undefined) {
      values.weight = weight;
    }
    values.power_efficiency = numberOrNull(row.power_efficiency);
    for (const m of measurements) {
      values[m] = numberOrNull(row[`${m}_mean`]);
    }
    return values;
  };

  const baselineValues = valuesFor(baseline);
  const candidateValues = valuesFor(candidate);

  const polarities: Record<string, Polarity> = {};
  if (baselineValues.weight !== undefined && candidateValues.weight !== undefined) {
    polarities.weight = 'lower-is-better';
  }
  polarities.power_efficiency = POWER_EFFICIENCY.polarity;
  for (const m of measurements) {
    if (m !== 'power_consumption') {
      polarities[m] = 'lower-is-better';
    }
  }

  const efficiency = compare(baselineValues, candidateValues, polarities, {
    variants: { baseline, candidate },
    sampleSize: cleaned.size,
  });
  return { designSummary, efficiency };
}

function groupedComparison(
  table: RecordTable,
  groupKeys: string[],
  measurements: readonly string[],
  config: AnalysisConfig,
  logger: Logger
): GroupedComparison {
  const rows = aggregate(table, groupKeys, meanOf(measurements));
  const polarities: Record<string, Polarity> = {};
  for (const m of measurements) {
    polarities[m] = 'lower-is-better';
  }
  const comparisons = compareGroups(rows, {
    variantColumn: config.variants.column,
    baseline: config.variants.baseline,
    candidate: config.variants.candidate,
    polarities,
    logger,
  });
  return { groupKeys, rows, comparisons };
}

function meanOf(columns: readonly string[]): ReductionSpec {
  const spec: Record<string, 'mean'> = {};
  for (const c of columns) {
    spec[c] = 'mean';
  }
  return spec;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

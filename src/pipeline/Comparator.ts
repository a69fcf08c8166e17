/**
 * Comparator
 *
 * Signed percentage improvement of a candidate over a baseline:
 *   lower-is-better:  (baseline - candidate) / baseline * 100
 *   higher-is-better: (candidate - baseline) / baseline * 100
 * Both read "positive means the candidate wins".
 *
 * A non-positive baseline is a data-quality problem for this operation and is
 * always surfaced as DIVISION_BY_ZERO_METRIC.
 */

import { CaliperError, ErrorCode, missingColumnError } from '../core/errors';
import { Logger, defaultLogger } from '../core/logging';
import { ComparisonResult, type MetricComparison } from '../domain/results/ComparisonResult';
import type { ResultMetadata } from '../domain/results/ResultMetadata';
import { statOf, type AggregateRow, type GroupKey, type Reducer } from './Aggregator';
import type { Polarity } from './metrics';

/** Metric values of one side of a comparison */
export type MetricValues = Readonly<Record<string, number | null | undefined>>;

export type PolarityMap = Readonly<Record<string, Polarity>> | ReadonlyMap<string, Polarity>;

function isMapLike(polarities: PolarityMap): polarities is ReadonlyMap<string, Polarity> {
  return polarities instanceof Map;
}

function polarityEntries(polarities: PolarityMap): Array<[string, Polarity]> {
  return isMapLike(polarities) ? Array.from(polarities.entries()) : Object.entries(polarities);
}

/**
 * Percent improvement of one metric
 *
 * @throws CaliperError DIVISION_BY_ZERO_METRIC when baseline <= 0
 */
export function improvementPct(
  baseline: number,
  candidate: number,
  polarity: Polarity,
  metric = 'value'
): number {
  if (!Number.isFinite(baseline) || !Number.isFinite(candidate)) {
    throw new CaliperError(ErrorCode.INVALID_DATA, `Metric '${metric}' has a non-finite value`, {
      metric,
      baseline,
      candidate,
    });
  }
  if (baseline <= 0) {
    throw new CaliperError(
      ErrorCode.DIVISION_BY_ZERO_METRIC,
      `Baseline value for '${metric}' must be positive to express an improvement`,
      { metric, baseline, candidate }
    );
  }

  const delta = polarity === 'lower-is-better' ? baseline - candidate : candidate - baseline;
  return (delta / baseline) * 100;
}

/**
 * Compare every metric named in `polarities`, in declaration order
 *
 * Metrics present in the values but absent from `polarities` are ignored.
 *
 * @throws CaliperError MISSING_COLUMN when a declared metric is absent on either side
 */
export function compare(
  baseline: MetricValues,
  candidate: MetricValues,
  polarities: PolarityMap,
  metadata: Partial<ResultMetadata> = {}
): ComparisonResult {
  const comparisons: MetricComparison[] = [];

  for (const [metric, polarity] of polarityEntries(polarities)) {
    const b = baseline[metric];
    const c = candidate[metric];
    if (b === undefined || b === null || c === undefined || c === null) {
      const side = b === undefined || b === null ? 'baseline' : 'candidate';
      throw missingColumnError([metric], { stage: 'compare', side });
    }
    comparisons.push({
      metric,
      baseline: b,
      candidate: c,
      improvementPct: improvementPct(b, c, polarity, metric),
      polarity,
    });
  }

  return new ComparisonResult(comparisons, { timestamp: new Date(), ...metadata });
}

export interface CompareGroupsOptions {
  /** Categorical column holding the design variant */
  variantColumn: string;
  baseline: string;
  candidate: string;
  polarities: PolarityMap;
  /** Statistic compared for each metric; defaults to mean */
  reducer?: Reducer;
  logger?: Logger;
}

export interface GroupComparison {
  /** Group key without the variant column */
  readonly key: GroupKey;
  readonly result: ComparisonResult;
}

/**
 * Pair aggregate rows that differ only in the variant column and compare them
 *
 * Groups present for only one variant are skipped with a warning.
 */
export function compareGroups(
  rows: readonly AggregateRow[],
  options: CompareGroupsOptions
): GroupComparison[] {
  const logger = (options.logger ?? defaultLogger()).child('compare');
  const reducer = options.reducer ?? 'mean';
  const metrics = polarityEntries(options.polarities).map(([metric]) => metric);

  const pairs = new Map<string, { key: GroupKey; baseline?: AggregateRow; candidate?: AggregateRow }>();
  for (const row of rows) {
    const variant = row.key[options.variantColumn];
    if (variant === undefined) {
      throw missingColumnError([options.variantColumn], { stage: 'compare' });
    }
    if (variant !== options.baseline && variant !== options.candidate) {
      continue;
    }

    const key: Record<string, string> = {};
    for (const [name, value] of Object.entries(row.key)) {
      if (name !== options.variantColumn) {
        key[name] = value;
      }
    }
    const id = JSON.stringify(Object.entries(key));
    const pair = pairs.get(id) ?? { key: Object.freeze(key) };
    if (variant === options.baseline) {
      pair.baseline = row;
    } else {
      pair.candidate = row;
    }
    pairs.set(id, pair);
  }

  const results: GroupComparison[] = [];
  for (const { key, baseline, candidate } of pairs.values()) {
    if (!baseline || !candidate) {
      logger.warn(
        `group ${JSON.stringify(key)} has no ${baseline ? options.candidate : options.baseline} rows; skipped`
      );
      continue;
    }

    const result = compare(
      valuesOf(baseline, metrics, reducer),
      valuesOf(candidate, metrics, reducer),
      options.polarities,
      {
        variants: { baseline: options.baseline, candidate: options.candidate },
        group: key,
        sampleSize: baseline.size + candidate.size,
      }
    );
    results.push({ key, result });
  }
  return results;
}

function valuesOf(row: AggregateRow, metrics: string[], reducer: Reducer): Record<string, number | null> {
  const out: Record<string, number | null> = {};
  for (const metric of metrics) {
    if (row.stats[metric] !== undefined) {
      out[metric] = statOf(row, metric, reducer);
    }
  }
  return out;
}

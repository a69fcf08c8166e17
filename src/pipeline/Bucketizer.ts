/**
 * Bucketizer
 *
 * Discretizes a continuous column into a categorical grouping dimension.
 * Buckets are [b0, b1), [b1, b2), ..., [b(n-1), bn]: half-open except the last,
 * which includes its upper edge. Every value lands in exactly one bucket or
 * the call fails; nothing is dropped.
 */

import { RecordTable } from '../core/table';
import { CaliperError, ErrorCode } from '../core/errors';

export interface BucketSpec {
  /** Numeric column to discretize */
  column: string;
  /** Strictly increasing edges; n edges make n - 1 buckets */
  boundaries: readonly number[];
  /** One label per bucket; defaults to "lo-hi" */
  labels?: readonly string[];
  /** Name of the new categorical column; defaults to `<column>_category` */
  target?: string;
}

/**
 * Edges of equal-width buckets covering [min, max]
 * The last bucket is clipped to `max` when the range is not a multiple of `width`.
 */
export function fixedWidthBoundaries(min: number, max: number, width: number): number[] {
  if (!Number.isFinite(min) || !Number.isFinite(max) || !(max > min)) {
    throw new CaliperError(ErrorCode.INVALID_CONFIG, 'Bucket range must satisfy min < max', {
      min,
      max,
    });
  }
  if (!(width > 0) || !Number.isFinite(width)) {
    throw new CaliperError(ErrorCode.INVALID_CONFIG, 'Bucket width must be positive', { width });
  }

  // bucket count is exact for ranges that divide evenly despite rounding
  const count = Math.max(1, Math.ceil((max - min) / width - 1e-9));
  const edges: number[] = [];
  for (let i = 0; i < count; i++) {
    edges.push(min + i * width);
  }
  edges.push(max);
  return edges;
}

/**
 * Validate a spec and resolve its labels
 */
export function resolveLabels(spec: BucketSpec): string[] {
  const { boundaries } = spec;
  if (boundaries.length < 2) {
    throw new CaliperError(
      ErrorCode.INVALID_CONFIG,
      `Bucket spec for '${spec.column}' needs at least two boundaries`,
      { column: spec.column, boundaries: [...boundaries] }
    );
  }
  for (let i = 0; i < boundaries.length; i++) {
    if (!Number.isFinite(boundaries[i]) || (i > 0 && !(boundaries[i] > boundaries[i - 1]))) {
      throw new CaliperError(
        ErrorCode.INVALID_CONFIG,
        `Bucket boundaries for '${spec.column}' must be finite and strictly increasing`,
        { column: spec.column, boundaries: [...boundaries] }
      );
    }
  }

  if (spec.labels === undefined) {
    return boundaries.slice(1).map((hi, i) => `${boundaries[i]}-${hi}`);
  }
  if (spec.labels.length !== boundaries.length - 1) {
    throw new CaliperError(
      ErrorCode.INVALID_CONFIG,
      `Bucket spec for '${spec.column}' has ${spec.labels.length} labels for ${boundaries.length - 1} buckets`,
      { column: spec.column, labels: [...spec.labels] }
    );
  }
  return [...spec.labels];
}

/**
 * Index of the bucket holding `value`, or -1 when it lies outside every bucket
 */
export function bucketIndex(value: number, boundaries: readonly number[]): number {
  const last = boundaries.length - 1;
  if (!(value >= boundaries[0]) || !(value <= boundaries[last])) {
    return -1;
  }
  if (value === boundaries[last]) {
    return last - 1;
  }

  let lo = 0;
  let hi = last - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (boundaries[mid] <= value) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo;
}

/**
 * Add the categorical bucket column described by `spec`
 *
 * @throws CaliperError INVALID_PARTITION when a value is missing or out of range
 */
export function bucketize(table: RecordTable, spec: BucketSpec): RecordTable {
  table.requireNumeric(spec.column, { stage: 'bucketize' });
  const labels = resolveLabels(spec);
  const target = spec.target ?? `${spec.column}_category`;

  const values = table.rows.map((row, rowIndex) => {
    const value = row[spec.column];
    const index = typeof value === 'number' ? bucketIndex(value, spec.boundaries) : -1;
    if (index < 0) {
      throw new CaliperError(
        ErrorCode.INVALID_PARTITION,
        `Value ${value === null ? 'missing' : value} in '${spec.column}' at row ${rowIndex} falls outside [${spec.boundaries[0]}, ${spec.boundaries[spec.boundaries.length - 1]}]`,
        { column: spec.column, row: rowIndex, value, boundaries: [...spec.boundaries] }
      );
    }
    return labels[index];
  });

  return table.withColumn({ name: target, kind: 'categorical' }, values);
}

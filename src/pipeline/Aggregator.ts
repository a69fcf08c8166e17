/**
 * Aggregator
 *
 * Groups rows by the value combination of one or more categorical columns and
 * reduces numeric columns per group. Only combinations present in the data are
 * emitted; an absent combination is simply not there.
 */

import { RecordTable, type CellValue, type ColumnSpec } from '../core/table';
import { CaliperError, ErrorCode } from '../core/errors';
import * as stats from '../core/math/statistics';

export type Reducer = 'mean' | 'max' | 'min' | 'std' | 'sum' | 'count';

export const REDUCERS: readonly Reducer[] = ['mean', 'max', 'min', 'std', 'sum', 'count'];

/** Column to reducer(s), e.g. `{ load: ['mean', 'max', 'std'] }` */
export type ReductionSpec = Readonly<Record<string, Reducer | readonly Reducer[]>>;

export type GroupKey = Readonly<Record<string, string>>;

/** Reduced statistics of one column; null where a statistic is undefined */
export type ColumnStats = Readonly<Partial<Record<Reducer, number | null>>>;

export interface AggregateRow {
  readonly key: GroupKey;
  /** Number of rows in the group */
  readonly size: number;
  readonly stats: Readonly<Record<string, ColumnStats>>;
}

const REDUCE: Record<Reducer, (values: number[]) => number | null> = {
  mean: stats.mean,
  max: stats.max,
  min: stats.min,
  std: stats.sampleStd,
  sum: stats.sum,
  count: (values) => values.length,
};

/**
 * Group `table` by `groupKeys` and apply `reductions` per group
 *
 * Rows come back sorted by key tuple. Missing cells in a reduced column are
 * skipped; `count` counts the non-missing ones.
 *
 * @throws CaliperError MISSING_COLUMN for an absent key or reduced column
 */
export function aggregate(
  table: RecordTable,
  groupKeys: readonly string[],
  reductions: ReductionSpec
): AggregateRow[] {
  const plan = planReductions(table, groupKeys, reductions);

  const groups = new Map<string, { key: Record<string, string>; rows: number[] }>();
  table.rows.forEach((row, rowIndex) => {
    const key: Record<string, string> = {};
    for (const name of groupKeys) {
      key[name] = keyLabel(row[name], name, rowIndex);
    }
    const id = JSON.stringify(groupKeys.map((name) => key[name]));
    const group = groups.get(id);
    if (group) {
      group.rows.push(rowIndex);
    } else {
      groups.set(id, { key, rows: [rowIndex] });
    }
  });

  const result: AggregateRow[] = [];
  for (const { key, rows } of groups.values()) {
    const columnStats: Record<string, ColumnStats> = {};
    for (const [column, reducers] of plan) {
      const values: number[] = [];
      for (const i of rows) {
        const v = table.rows[i][column];
        if (typeof v === 'number') {
          values.push(v);
        }
      }
      const reduced: Partial<Record<Reducer, number | null>> = {};
      for (const reducer of reducers) {
        reduced[reducer] = REDUCE[reducer](values);
      }
      columnStats[column] = Object.freeze(reduced);
    }
    result.push(
      Object.freeze({
        key: Object.freeze(key),
        size: rows.length,
        stats: Object.freeze(columnStats),
      })
    );
  }

  return result.sort((a, b) => compareKeys(a.key, b.key, groupKeys));
}

/**
 * Read one statistic off an aggregate row
 */
export function statOf(row: AggregateRow, column: string, reducer: Reducer): number | null {
  const value = row.stats[column]?.[reducer];
  return value === undefined ? null : value;
}

/**
 * Flatten aggregate rows into a table: key columns (categorical) followed by
 * one numeric `<column>_<reducer>` column per statistic and a `size` column
 *
 * Lets group-level ratios (e.g. mean power over mean load) go through the
 * Metric Deriver.
 */
export function aggregateToTable(
  rows: readonly AggregateRow[],
  groupKeys: readonly string[],
  reductions: ReductionSpec
): RecordTable {
  const statColumns: Array<{ column: string; reducer: Reducer; name: string }> = [];
  for (const [column, spec] of Object.entries(reductions)) {
    for (const reducer of asList(spec)) {
      statColumns.push({ column, reducer, name: `${column}_${reducer}` });
    }
  }

  const columns: ColumnSpec[] = [
    ...groupKeys.map((name): ColumnSpec => ({ name, kind: 'categorical' })),
    ...statColumns.map(({ name }): ColumnSpec => ({ name, kind: 'numeric' })),
    { name: 'size', kind: 'numeric' },
  ];

  const records = rows.map((row) => {
    const record: Record<string, CellValue> = {};
    for (const name of groupKeys) {
      record[name] = row.key[name] ?? null;
    }
    for (const { column, reducer, name } of statColumns) {
      record[name] = statOf(row, column, reducer);
    }
    record.size = row.size;
    return record;
  });

  return new RecordTable(columns, records);
}

function asList(spec: Reducer | readonly Reducer[]): readonly Reducer[] {
  return typeof spec === 'string' ? [spec] : spec;
}

function planReductions(
  table: RecordTable,
  groupKeys: readonly string[],
  reductions: ReductionSpec
): Array<[string, readonly Reducer[]]> {
  const context = { stage: 'aggregate' };
  table.requireColumns([...groupKeys, ...Object.keys(reductions)], context);

  for (const name of groupKeys) {
    const spec = table.column(name);
    if (spec?.kind === 'numeric') {
      throw new CaliperError(
        ErrorCode.INVALID_INPUT,
        `Group key '${name}' is numeric; bucketize it first`,
        { ...context, column: name }
      );
    }
  }

  const plan: Array<[string, readonly Reducer[]]> = [];
  for (const [column, spec] of Object.entries(reductions)) {
    table.requireNumeric(column, context);
    const reducers = asList(spec);
    const unknown = reducers.filter((r) => !REDUCERS.includes(r));
    if (reducers.length === 0 || unknown.length > 0) {
      throw new CaliperError(
        ErrorCode.INVALID_CONFIG,
        `Column '${column}' needs one or more of: ${REDUCERS.join(', ')}`,
        { ...context, column, reducers: [...reducers] }
      );
    }
    plan.push([column, reducers]);
  }
  return plan;
}

function keyLabel(value: CellValue, column: string, rowIndex: number): string {
  if (value === null) {
    throw new CaliperError(
      ErrorCode.INVALID_DATA,
      `Row ${rowIndex} has no value for group key '${column}'`,
      { stage: 'aggregate', column, row: rowIndex }
    );
  }
  return String(value);
}

function compareKeys(a: GroupKey, b: GroupKey, groupKeys: readonly string[]): number {
  for (const name of groupKeys) {
    const x = a[name];
    const y = b[name];
    if (x < y) return -1;
    if (x > y) return 1;
  }
  return 0;
}

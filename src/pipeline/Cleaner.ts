/**
 * Cleaner
 *
 * Canonicalizes column names, casts declared categorical columns, drops
 * incomplete rows and rejects outliers column by column.
 *
 * Outlier rejection is sequential: each numeric column's mean and sample
 * deviation are computed over the rows that survived every earlier column's
 * pass. A row dropped for an extreme `load` therefore no longer widens the
 * bounds of `power_consumption`.
 */

import { RecordTable, type CellValue } from '../core/table';
import { CaliperError, ErrorCode } from '../core/errors';
import { Logger, defaultLogger } from '../core/logging';
import { sigmaBounds } from '../core/math/statistics';

export const DEFAULT_SIGMA_THRESHOLD = 3;

export const DEFAULT_CATEGORICAL_COLUMNS: readonly string[] = [
  'joint_id',
  'joint_type',
  'design_type',
  'load_category',
];

export interface CleanOptions {
  /** Half-width of the kept band in standard deviations */
  sigmaThreshold?: number;
  /** Columns (canonical names) cast to categorical labels */
  categoricalColumns?: readonly string[];
  /**
   * Order of the outlier passes (canonical names). Numeric columns not listed
   * follow in table order.
   */
  columnOrder?: readonly string[];
  logger?: Logger;
}

/**
 * Lowercase, trim, and join whitespace runs with underscores
 */
export function canonicalColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '_');
}

export function clean(table: RecordTable, options: CleanOptions = {}): RecordTable {
  const sigmaThreshold = options.sigmaThreshold ?? DEFAULT_SIGMA_THRESHOLD;
  const logger = (options.logger ?? defaultLogger()).child('clean');

  if (!(sigmaThreshold > 0) || !Number.isFinite(sigmaThreshold)) {
    throw new CaliperError(ErrorCode.INVALID_CONFIG, 'sigmaThreshold must be a positive number', {
      sigmaThreshold,
    });
  }

  let data = canonicalizeColumns(table);
  data = castCategorical(data, options.categoricalColumns ?? DEFAULT_CATEGORICAL_COLUMNS);

  const before = data.size;
  data = dropIncompleteRows(data);
  logger.debug(`dropped ${before - data.size} incomplete rows of ${before}`);

  for (const column of outlierPassOrder(data, options.columnOrder ?? [])) {
    data = rejectOutliers(data, column, sigmaThreshold, logger);
  }

  logger.debug(`kept ${data.size} of ${table.size} rows`);
  return data;
}

function canonicalizeColumns(table: RecordTable): RecordTable {
  const seen = new Map<string, string>();
  for (const name of table.columnNames) {
    const canonical = canonicalColumnName(name);
    const previous = seen.get(canonical);
    if (previous !== undefined) {
      throw new CaliperError(
        ErrorCode.INVALID_INPUT,
        `Columns '${previous}' and '${name}' both canonicalize to '${canonical}'`,
        { columns: [previous, name], canonical }
      );
    }
    seen.set(canonical, name);
  }
  return table.renameColumns(canonicalColumnName);
}

function castCategorical(table: RecordTable, columns: readonly string[]): RecordTable {
  let data = table;
  for (const name of columns) {
    const spec = data.column(name);
    if (!spec || spec.kind === 'categorical') {
      continue;
    }
    data = data.mapColumn(name, toLabel, 'categorical');
  }
  return data;
}

function toLabel(value: CellValue): CellValue {
  return value === null ? null : String(value);
}

function dropIncompleteRows(table: RecordTable): RecordTable {
  const names = table.columnNames;
  return table.filter((row) => names.every((name) => row[name] !== null));
}

function outlierPassOrder(table: RecordTable, declared: readonly string[]): string[] {
  const numeric = table.columnsOfKind('numeric').map((c) => c.name);
  const first = declared.filter((name) => numeric.includes(name));
  return [...first, ...numeric.filter((name) => !first.includes(name))];
}

function rejectOutliers(
  table: RecordTable,
  column: string,
  k: number,
  logger: Logger
): RecordTable {
  const bounds = sigmaBounds(table.numericValues(column), k);
  if (bounds === null) {
    logger.debug(`skipped '${column}': fewer than two values`);
    return table;
  }

  const [lower, upper] = bounds;
  const kept = table.filter((row) => {
    const value = row[column];
    return typeof value === 'number' && value >= lower && value <= upper;
  });

  if (kept.size < table.size) {
    logger.debug(
      `'${column}': removed ${table.size - kept.size} rows outside [${lower}, ${upper}]`
    );
  }
  return kept;
}

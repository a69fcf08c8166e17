/**
 * Record Table
 *
 * The in-memory dataset every pipeline stage consumes and returns.
 * Rows are observations, columns are named fields with a declared kind.
 *
 * Invariants:
 * - every row holds exactly the table's column set (absent cells are `null`)
 * - numeric cells are finite numbers or `null`
 * - tables are never mutated; every operation returns a new table
 */

import { CaliperError, ErrorCode, missingColumnError, type ErrorContext } from '../errors';

/** A single cell. `null` is the missing / undefined marker. */
export type CellValue = number | string | null;

/**
 * - numeric: continuous measurement, takes part in statistics
 * - categorical: label used for grouping (design variant, joint, bucket)
 * - identifier: row identity, never reduced or grouped by default
 */
export type ColumnKind = 'numeric' | 'categorical' | 'identifier';

export interface ColumnSpec {
  readonly name: string;
  readonly kind: ColumnKind;
  /** Documentation only; never enforced */
  readonly unit?: string;
}

export type Row = Readonly<Record<string, CellValue>>;

/** Row shape accepted when building a table; absent keys become `null` */
export type RowInput = Readonly<Record<string, CellValue | undefined>>;

export interface FromRecordsOptions {
  /** Columns forced to categorical */
  categorical?: readonly string[];
  /** Columns forced to identifier */
  identifiers?: readonly string[];
  /** Columns forced to numeric; unparseable values become null */
  numeric?: readonly string[];
  units?: Readonly<Record<string, string>>;
}

export class RecordTable {
  readonly columns: readonly ColumnSpec[];
  readonly rows: readonly Row[];
  private readonly index: ReadonlyMap<string, ColumnSpec>;

  constructor(columns: readonly ColumnSpec[], rows: readonly RowInput[]) {
    const index = new Map<string, ColumnSpec>();
    for (const spec of columns) {
      if (index.has(spec.name)) {
        throw new CaliperError(ErrorCode.INVALID_INPUT, `Duplicate column '${spec.name}'`, {
          column: spec.name,
        });
      }
      index.set(spec.name, Object.freeze({ ...spec }));
    }

    this.index = index;
    this.columns = Object.freeze(Array.from(index.values()));
    this.rows = Object.freeze(rows.map((row, i) => this.normalizeRow(row, i)));
    for (const spec of this.columns) {
      if (spec.kind === 'categorical') {
        this.requireUniformLabels(spec.name);
      }
    }
  }

  /**
   * Build an empty table with the given schema
   */
  static empty(columns: readonly ColumnSpec[]): RecordTable {
    return new RecordTable(columns, []);
  }

  /**
   * Build a table from loosely typed records (parsed CSV, JSON, generated data)
   *
   * Column order is first-appearance order. Kinds are inferred unless declared:
   * a column whose non-missing values are all finite numbers or numeric strings
   * is numeric, anything else is categorical.
   */
  static fromRecords(
    records: ReadonlyArray<Readonly<Record<string, unknown>>>,
    options: FromRecordsOptions = {}
  ): RecordTable {
    const names: string[] = [];
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key);
          names.push(key);
        }
      }
    }

    const categorical = new Set(options.categorical ?? []);
    const identifiers = new Set(options.identifiers ?? []);
    const numeric = new Set(options.numeric ?? []);

    const columns: ColumnSpec[] = names.map((name) => {
      let kind: ColumnKind;
      if (identifiers.has(name)) {
        kind = 'identifier';
      } else if (categorical.has(name)) {
        kind = 'categorical';
      } else if (numeric.has(name)) {
        kind = 'numeric';
      } else {
        kind = inferKind(records.map((r) => r[name]));
      }
      const unit = options.units?.[name];
      return unit === undefined ? { name, kind } : { name, kind, unit };
    });

    const rows = records.map((record, rowIndex) => {
      const row: Record<string, CellValue> = {};
      for (const spec of columns) {
        row[spec.name] = toCell(record[spec.name], spec, rowIndex);
      }
      return row;
    });

    return new RecordTable(columns, rows);
  }

  get size(): number {
    return this.rows.length;
  }

  get columnNames(): string[] {
    return this.columns.map((c) => c.name);
  }

  hasColumn(name: string): boolean {
    return this.index.has(name);
  }

  column(name: string): ColumnSpec | undefined {
    return this.index.get(name);
  }

  columnsOfKind(kind: ColumnKind): ColumnSpec[] {
    return this.columns.filter((c) => c.kind === kind);
  }

  /**
   * Names from `names` that this table lacks, in the given order
   */
  missingColumns(names: readonly string[]): string[] {
    return names.filter((name) => !this.index.has(name));
  }

  /**
   * Throw MISSING_COLUMN unless every named column exists
   */
  requireColumns(names: readonly string[], context: ErrorContext = {}): void {
    const missing = this.missingColumns(names);
    if (missing.length > 0) {
      throw missingColumnError(missing, context);
    }
  }

  /**
   * Throw unless the column exists and is numeric
   */
  requireNumeric(name: string, context: ErrorContext = {}): ColumnSpec {
    const spec = this.index.get(name);
    if (!spec) {
      throw missingColumnError([name], context);
    }
    if (spec.kind !== 'numeric') {
      throw new CaliperError(
        ErrorCode.INVALID_INPUT,
        `Column '${name}' is ${spec.kind}, expected numeric`,
        { ...context, column: name, kind: spec.kind }
      );
    }
    return spec;
  }

  /**
   * All cells of a column, missing ones included
   */
  values(name: string): CellValue[] {
    if (!this.index.has(name)) {
      throw missingColumnError([name]);
    }
    return this.rows.map((row) => row[name]);
  }

  /**
   * Non-missing values of a numeric column
   */
  numericValues(name: string): number[] {
    this.requireNumeric(name);
    const out: number[] = [];
    for (const row of this.rows) {
      const v = row[name];
      if (typeof v === 'number') {
        out.push(v);
      }
    }
    return out;
  }

  filter(predicate: (row: Row, index: number) => boolean): RecordTable {
    return new RecordTable(this.columns, this.rows.filter(predicate));
  }

  /**
   * Add a column, or replace an existing one in place
   */
  withColumn(spec: ColumnSpec, values: readonly CellValue[]): RecordTable {
    if (values.length !== this.rows.length) {
      throw new CaliperError(
        ErrorCode.INVALID_INPUT,
        `Column '${spec.name}' has ${values.length} values for ${this.rows.length} rows`,
        { column: spec.name, values: values.length, rows: this.rows.length }
      );
    }

    const columns = this.index.has(spec.name)
      ? this.columns.map((c) => (c.name === spec.name ? spec : c))
      : [...this.columns, spec];

    const rows = this.rows.map((row, i) => ({ ...row, [spec.name]: values[i] }));
    return new RecordTable(columns, rows);
  }

  /**
   * Rewrite one column's cells, optionally changing its kind
   */
  mapColumn(
    name: string,
    fn: (value: CellValue, row: Row) => CellValue,
    kind?: ColumnKind
  ): RecordTable {
    const spec = this.index.get(name);
    if (!spec) {
      throw missingColumnError([name]);
    }
    const values = this.rows.map((row) => fn(row[name], row));
    return this.withColumn({ ...spec, kind: kind ?? spec.kind }, values);
  }

  /**
   * Rename columns; the mapper must keep names unique
   */
  renameColumns(mapper: (name: string) => string): RecordTable {
    const renames = this.columns.map((c) => [c.name, mapper(c.name)] as const);
    const columns = this.columns.map((c, i) => ({ ...c, name: renames[i][1] }));
    const rows = this.rows.map((row) => {
      const out: Record<string, CellValue> = {};
      for (const [from, to] of renames) {
        out[to] = row[from];
      }
      return out;
    });
    return new RecordTable(columns, rows);
  }

  /**
   * Keep only the named columns, in the given order
   */
  select(names: readonly string[]): RecordTable {
    this.requireColumns(names);
    const columns = names.map((name) => this.index.get(name)).filter(isColumnSpec);
    const rows = this.rows.map((row) => {
      const out: Record<string, CellValue> = {};
      for (const name of names) {
        out[name] = row[name];
      }
      return out;
    });
    return new RecordTable(columns, rows);
  }

  /**
   * Plain mutable copies of the rows
   */
  toRecords(): Record<string, CellValue>[] {
    return this.rows.map((row) => ({ ...row }));
  }

  /**
   * Labels of one categorical column are all strings or all numbers
   */
  private requireUniformLabels(name: string): void {
    let labelType: string | null = null;
    for (let rowIndex = 0; rowIndex < this.rows.length; rowIndex++) {
      const value = this.rows[rowIndex][name];
      if (value === null) {
        continue;
      }
      if (labelType === null) {
        labelType = typeof value;
      } else if (typeof value !== labelType) {
        throw new CaliperError(
          ErrorCode.INVALID_DATA,
          `Categorical column '${name}' mixes ${labelType} and ${typeof value} labels at row ${rowIndex}`,
          { column: name, row: rowIndex }
        );
      }
    }
  }

  private normalizeRow(row: RowInput, rowIndex: number): Row {
    for (const key of Object.keys(row)) {
      if (!this.index.has(key)) {
        throw new CaliperError(
          ErrorCode.INVALID_INPUT,
          `Row ${rowIndex} has column '${key}' outside the table schema`,
          { row: rowIndex, column: key }
        );
      }
    }

    const out: Record<string, CellValue> = {};
    for (const spec of this.columns) {
      const value = row[spec.name];
      if (value === undefined || value === null) {
        out[spec.name] = null;
      } else if (spec.kind === 'numeric') {
        if (typeof value !== 'number') {
          throw new CaliperError(
            ErrorCode.INVALID_DATA,
            `Numeric column '${spec.name}' holds non-numeric value at row ${rowIndex}`,
            { row: rowIndex, column: spec.name, value }
          );
        }
        out[spec.name] = Number.isFinite(value) ? value : null;
      } else {
        out[spec.name] = value;
      }
    }
    return Object.freeze(out);
  }
}

function isColumnSpec(spec: ColumnSpec | undefined): spec is ColumnSpec {
  return spec !== undefined;
}

function isMissing(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === 'number' && Number.isNaN(value)) ||
    (typeof value === 'string' && value.trim() === '')
  );
}

function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function inferKind(values: unknown[]): ColumnKind {
  const present = values.filter((v) => !isMissing(v));
  if (present.length === 0) {
    return 'categorical';
  }
  return present.every((v) => parseNumber(v) !== null) ? 'numeric' : 'categorical';
}

function toCell(value: unknown, spec: ColumnSpec, rowIndex: number): CellValue {
  if (isMissing(value)) {
    return null;
  }
  if (spec.kind === 'numeric') {
    return parseNumber(value);
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  throw new CaliperError(
    ErrorCode.INVALID_INPUT,
    `Unsupported value in column '${spec.name}' at row ${rowIndex}`,
    { row: rowIndex, column: spec.name, type: typeof value }
  );
}

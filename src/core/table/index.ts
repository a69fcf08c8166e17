/**
 * Record Table exports
 */

export { RecordTable } from './RecordTable';
export type {
  CellValue,
  ColumnKind,
  ColumnSpec,
  Row,
  RowInput,
  FromRecordsOptions,
} from './RecordTable';

import { CaliperError, isCaliperError } from '../core/errors';
import { Logger, type LogLevel } from '../core/logging';
import { RecordTable, type FromRecordsOptions } from '../core/table';

/**
 * Run `fn` and return the CaliperError it throws
 */
export function caught(fn: () => unknown): CaliperError {
  try {
    fn();
  } catch (error) {
    if (isCaliperError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a CaliperError to be thrown');
}

/**
 * Logger that records message lines instead of printing them
 */
export function recordingLogger(level: LogLevel = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    level,
    sink: (_level, line) => lines.push(line),
    now: () => new Date('2024-01-01T00:00:00.000Z'),
  });
  return { logger, lines };
}

export function table(
  records: ReadonlyArray<Readonly<Record<string, unknown>>>,
  options?: FromRecordsOptions
): RecordTable {
  return RecordTable.fromRecords(records, options);
}

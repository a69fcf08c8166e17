/**
 * Normalizer
 *
 * Min-max rescaling of numeric columns to [0, 1].
 */

import { RecordTable } from '../core/table';
import { Logger, defaultLogger } from '../core/logging';
import { min, max } from '../core/math/statistics';

export interface NormalizeOptions {
  logger?: Logger;
}

/**
 * Rescale `columns` (default: every numeric column) with (x - min) / (max - min)
 *
 * A constant column maps to 0. Absent or non-numeric columns are skipped,
 * missing cells stay missing.
 */
export function normalize(
  table: RecordTable,
  columns?: readonly string[],
  options: NormalizeOptions = {}
): RecordTable {
  const logger = (options.logger ?? defaultLogger()).child('normalize');
  const targets = columns ?? table.columnsOfKind('numeric').map((c) => c.name);

  let data = table;
  for (const name of targets) {
    const spec = data.column(name);
    if (!spec || spec.kind !== 'numeric') {
      logger.debug(`skipped '${name}': ${spec ? spec.kind : 'absent'}`);
      continue;
    }

    const values = data.numericValues(name);
    const lo = min(values);
    const hi = max(values);
    if (lo === null || hi === null) {
      continue;
    }

    const range = hi - lo;
    data = data.mapColumn(name, (value) => {
      if (typeof value !== 'number') {
        return value;
      }
      return range > 0 ? (value - lo) / range : 0;
    });
  }
  return data;
}

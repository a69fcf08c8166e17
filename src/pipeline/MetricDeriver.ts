/**
 * Metric Deriver
 *
 * Adds one numeric column per applicable metric definition. A definition whose
 * inputs are not all present numeric columns is skipped without error, so the
 * same definition list can run over performance and structural tables alike.
 */

import { RecordTable, type CellValue, type Row } from '../core/table';
import { CaliperError, ErrorCode } from '../core/errors';
import { Logger, defaultLogger } from '../core/logging';
import type { MetricDefinition, RatioFormula } from './metrics';

export interface DeriveOptions {
  logger?: Logger;
}

/**
 * Whether every input of `definition` is a numeric column of `table`
 */
export function isApplicable(table: RecordTable, definition: MetricDefinition): boolean {
  return definition.inputs.every((name) => table.column(name)?.kind === 'numeric');
}

export function derive(
  table: RecordTable,
  definitions: readonly MetricDefinition[],
  options: DeriveOptions = {}
): RecordTable {
  const logger = (options.logger ?? defaultLogger()).child('derive');

  let data = table;
  for (const definition of definitions) {
    validateDefinition(definition);

    if (!isApplicable(data, definition)) {
      const missing = definition.inputs.filter((name) => data.column(name)?.kind !== 'numeric');
      logger.debug(`omitted '${definition.name}': needs ${missing.join(', ')}`);
      continue;
    }

    const values = data.rows.map((row) => evaluate(definition, row));
    data = data.withColumn(
      definition.unit === undefined
        ? { name: definition.name, kind: 'numeric' }
        : { name: definition.name, kind: 'numeric', unit: definition.unit },
      values
    );
  }
  return data;
}

function validateDefinition(definition: MetricDefinition): void {
  const { formula } = definition;
  if (formula.kind !== 'ratio') {
    return;
  }
  const referenced = new Set([formula.numerator, formula.denominator, formula.guard ?? formula.denominator]);
  const undeclared = Array.from(referenced).filter((name) => !definition.inputs.includes(name));
  if (undeclared.length > 0) {
    throw new CaliperError(
      ErrorCode.INVALID_CONFIG,
      `Metric '${definition.name}' reads undeclared inputs: ${undeclared.join(', ')}`,
      { metric: definition.name, undeclared }
    );
  }
}

function evaluate(definition: MetricDefinition, row: Row): CellValue {
  const inputs: Record<string, number> = {};
  for (const name of definition.inputs) {
    const value = row[name];
    if (typeof value !== 'number') {
      return null;
    }
    inputs[name] = value;
  }

  const { formula } = definition;
  if (formula.kind === 'ratio') {
    return evaluateRatio(formula, inputs);
  }

  const result = formula.compute(inputs);
  return result !== null && Number.isFinite(result) ? result : null;
}

function evaluateRatio(formula: RatioFormula, inputs: Record<string, number>): CellValue {
  const guard = inputs[formula.guard ?? formula.denominator];
  if (!(guard > 0)) {
    return formula.onGuardFail === 'zero' ? 0 : null;
  }
  const result = inputs[formula.numerator] / inputs[formula.denominator];
  // a guard column other than the denominator can leave a zero denominator
  if (!Number.isFinite(result)) {
    return formula.onGuardFail === 'zero' ? 0 : null;
  }
  return result;
}

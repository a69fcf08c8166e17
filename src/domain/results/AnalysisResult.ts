/**
 * Base class for all analysis results in Caliper
 */

import type { ResultMetadata } from './ResultMetadata';

/** A flat value a CSV cell can hold */
export type CsvValue = string | number | boolean | null;

export type ExportFormat = 'json' | 'csv';

/**
 * Abstract base class that all analysis results extend
 * Provides common serialization and export
 */
export abstract class AnalysisResult {
  /**
   * @param metadata - Metadata about the analysis
   */
  constructor(protected metadata: ResultMetadata) {}

  /**
   * Get the metadata for this result
   */
  getMetadata(): ResultMetadata {
    return this.metadata;
  }

  /**
   * Convert the result to a JSON-serializable object
   */
  abstract toJSON(): object;

  /**
   * Rows of the CSV export, one object per line
   * Default: the flattened JSON form as a single line
   */
  protected toCSVRows(): Array<Record<string, CsvValue>> {
    return [flatten(this.toJSON())];
  }

  /**
   * Export the result in the specified format
   */
  export(format: ExportFormat): string {
    if (format === 'json') {
      return JSON.stringify(this.toJSON(), null, 2);
    }
    return this.exportCSV();
  }

  private exportCSV(): string {
    const rows = this.toCSVRows();
    const headers: string[] = [];
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!headers.includes(key)) {
          headers.push(key);
        }
      }
    }

    const lines = [headers.map(csvCell).join(',')];
    for (const row of rows) {
      lines.push(headers.map((h) => csvCell(row[h] ?? null)).join(','));
    }
    return lines.join('\n');
  }
}

/**
 * Flatten nested objects into dotted keys; arrays are joined with ';'
 */
export function flatten(data: object, prefix = ''): Record<string, CsvValue> {
  const result: Record<string, CsvValue> = {};

  for (const [key, value] of Object.entries(data)) {
    const name = prefix + key;
    if (value === null || value === undefined) {
      result[name] = null;
    } else if (value instanceof Date) {
      result[name] = value.toISOString();
    } else if (Array.isArray(value)) {
      result[name] = value.map(String).join(';');
    } else if (typeof value === 'object') {
      Object.assign(result, flatten(value, name + '.'));
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[name] = value;
    } else {
      result[name] = String(value);
    }
  }

  return result;
}

function csvCell(value: CsvValue): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

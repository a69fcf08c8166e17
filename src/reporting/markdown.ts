/**
 * Markdown rendering of analysis results
 *
 * Plain GitHub-flavoured tables; numbers are fixed to two decimals unless
 * they are integers, missing values render as '-'.
 */

import { CaliperError, ErrorCode } from '../core/errors';
import { REDUCERS, statOf, type AggregateRow, type GroupKey, type Reducer } from '../pipeline';
import type { ComparisonResult } from '../domain/results/ComparisonResult';
import type { GroupedComparison, PerformanceAnalysis } from '../domain/analyses/performance';
import type { StructuralAnalysis } from '../domain/analyses/structural';

type Cell = string | number | null;

export function formatNumber(value: number | null, digits = 2): string {
  if (value === null || !Number.isFinite(value)) {
    return '-';
  }
  return Number.isInteger(value) ? String(value) : value.toFixed(digits);
}

export function formatImprovement(pct: number): string {
  return `${pct > 0 ? '+' : ''}${pct.toFixed(2)}%`;
}

function cellText(value: Cell): string {
  if (typeof value === 'number' || value === null) {
    return formatNumber(value);
  }
  return value.replace(/\|/g, '\\|');
}

/**
 * Render a header row, divider and body rows
 */
export function renderTable(headers: readonly string[], rows: ReadonlyArray<readonly Cell[]>): string {
  const lines = [
    `| ${headers.map(cellText).join(' | ')} |`,
    `|${headers.map(() => '---').join('|')}|`,
  ];
  for (const row of rows) {
    lines.push(`| ${row.map(cellText).join(' | ')} |`);
  }
  return lines.join('\n');
}

/**
 * One line per metric: both values and the signed improvement
 */
export function renderComparisonTable(result: ComparisonResult): string {
  const variants = result.getMetadata().variants;
  const headers = [
    'Metric',
    variants ? `Baseline (${variants.baseline})` : 'Baseline',
    variants ? `Candidate (${variants.candidate})` : 'Candidate',
    'Improvement',
  ];
  return renderTable(
    headers,
    result.toArray().map((c) => [c.metric, c.baseline, c.candidate, formatImprovement(c.improvementPct)])
  );
}

/**
 * Group keys, group size, then one column per statistic
 *
 * `columns` picks and orders the statistics; by default every statistic of
 * the first row is shown.
 */
export function renderAggregateTable(
  rows: readonly AggregateRow[],
  groupKeys: readonly string[],
  columns?: ReadonlyArray<readonly [string, Reducer]>
): string {
  const picked = columns ?? defaultStatColumns(rows);
  const headers = [...groupKeys, 'n', ...picked.map(([column, reducer]) => `${column} ${reducer}`)];
  return renderTable(
    headers,
    rows.map((row) => [
      ...groupKeys.map((name) => row.key[name] ?? null),
      row.size,
      ...picked.map(([column, reducer]) => statOf(row, column, reducer)),
    ])
  );
}

function defaultStatColumns(rows: readonly AggregateRow[]): Array<[string, Reducer]> {
  const first = rows[0];
  if (!first) {
    return [];
  }
  const out: Array<[string, Reducer]> = [];
  for (const [column, reduced] of Object.entries(first.stats)) {
    for (const reducer of Object.keys(reduced)) {
      if (isReducer(reducer)) {
        out.push([column, reducer]);
      }
    }
  }
  return out;
}

function isReducer(name: string): name is Reducer {
  return REDUCERS.some((r) => r === name);
}

export interface PivotSpec {
  /** Key whose values become table rows */
  rowKey: string;
  /** Key whose values become table columns */
  columnKey: string;
  column: string;
  reducer: Reducer;
}

/**
 * Cross-tabulate one statistic by two group keys
 *
 * Row and column labels follow first appearance. Rows must be keyed by
 * exactly `rowKey` and `columnKey`.
 */
export function renderPivot(rows: readonly AggregateRow[], spec: PivotSpec): string {
  const rowLabels: string[] = [];
  const columnLabels: string[] = [];
  const cells = new Map<string, number | null>();

  for (const row of rows) {
    const r = pivotLabel(row.key, spec.rowKey);
    const c = pivotLabel(row.key, spec.columnKey);
    const id = JSON.stringify([r, c]);
    if (cells.has(id)) {
      throw new CaliperError(
        ErrorCode.INVALID_INPUT,
        `Pivot cell (${r}, ${c}) appears more than once; group by '${spec.rowKey}' and '${spec.columnKey}' only`,
        { rowKey: spec.rowKey, columnKey: spec.columnKey, row: r, column: c }
      );
    }
    if (!rowLabels.includes(r)) rowLabels.push(r);
    if (!columnLabels.includes(c)) columnLabels.push(c);
    cells.set(id, statOf(row, spec.column, spec.reducer));
  }

  return renderTable(
    [spec.rowKey, ...columnLabels],
    rowLabels.map((r) => [r, ...columnLabels.map((c) => cells.get(JSON.stringify([r, c])) ?? null)])
  );
}

function pivotLabel(key: GroupKey, name: string): string {
  const label = key[name];
  if (label === undefined) {
    throw new CaliperError(ErrorCode.MISSING_COLUMN, `Pivot key '${name}' not found in group key`, {
      columns: [name],
    });
  }
  return label;
}

function renderGrouped(grouped: GroupedComparison): string {
  if (grouped.comparisons.length === 0) {
    return '_No group has rows for both variants._';
  }
  return grouped.comparisons
    .map(({ key, result }) => {
      const title = Object.entries(key)
        .map(([name, value]) => `${name} = ${value}`)
        .join(', ');
      return `### ${title}\n\n${renderComparisonTable(result)}`;
    })
    .join('\n\n');
}

export function renderPerformanceReport(analysis: PerformanceAnalysis): string {
  const sections = [
    '# Performance analysis',
    `Records after cleaning: ${analysis.cleaned.size}`,
    '## Overall efficiency',
    renderComparisonTable(analysis.efficiency),
    '## Payload performance',
    renderGrouped(analysis.payload),
    '## Joint performance',
    analysis.joints ? renderGrouped(analysis.joints) : '_No joint_type column._',
  ];
  return sections.join('\n\n') + '\n';
}

export function renderStructuralReport(analysis: StructuralAnalysis): string {
  const factors = analysis.stressFactors;
  const sections = [
    '# Structural analysis',
    `Records after cleaning: ${analysis.cleaned.size}`,
    '## Stress factors',
    renderTable(
      ['Factor', 'Value'],
      [
        ['max_stress', factors.max_stress],
        ['mean_stress', factors.mean_stress],
        ['stress_std', factors.stress_std],
        ['min_safety_factor', factors.min_safety_factor],
        ['stress_to_weight_ratio', factors.stress_to_weight_ratio],
      ]
    ),
    '## Joint loads',
  ];

  const joints = analysis.jointLoads;
  if (joints === null) {
    sections.push('_No joint_id column._');
  } else {
    sections.push(renderAggregateTable(joints.rows, ['joint_id']));
    if (joints.efficiency !== null) {
      sections.push(
        renderTable(['joint_id', 'efficiency'], Array.from(joints.efficiency.entries()))
      );
    }
  }

  sections.push('## Benchmark comparison', renderComparisonTable(analysis.benchmark));
  return sections.join('\n\n') + '\n';
}

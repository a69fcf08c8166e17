/**
 * Result of comparing a candidate against a baseline, metric by metric
 */

import { AnalysisResult, type CsvValue } from './AnalysisResult';
import type { ResultMetadata } from './ResultMetadata';
import type { Polarity } from '../../pipeline/metrics';

export interface MetricComparison {
  readonly metric: string;
  readonly baseline: number;
  readonly candidate: number;
  /** Signed percent; positive whenever the candidate is better */
  readonly improvementPct: number;
  readonly polarity: Polarity;
}

/**
 * Insertion-ordered mapping from metric name to its comparison
 */
export class ComparisonResult extends AnalysisResult {
  private readonly entries: ReadonlyMap<string, MetricComparison>;

  constructor(comparisons: readonly MetricComparison[], metadata: ResultMetadata) {
    super(metadata);
    const entries = new Map<string, MetricComparison>();
    for (const comparison of comparisons) {
      entries.set(comparison.metric, Object.freeze({ ...comparison }));
    }
    this.entries = entries;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Metric names in comparison order
   */
  metrics(): string[] {
    return Array.from(this.entries.keys());
  }

  get(metric: string): MetricComparison | undefined {
    return this.entries.get(metric);
  }

  has(metric: string): boolean {
    return this.entries.has(metric);
  }

  /**
   * Improvement of one metric in percent, undefined when not compared
   */
  improvement(metric: string): number | undefined {
    return this.entries.get(metric)?.improvementPct;
  }

  toArray(): MetricComparison[] {
    return Array.from(this.entries.values());
  }

  [Symbol.iterator](): IterableIterator<MetricComparison> {
    return this.entries.values();
  }

  /**
   * Metrics on which the candidate wins (improvement > 0)
   */
  improvedMetrics(): string[] {
    return this.toArray()
      .filter((c) => c.improvementPct > 0)
      .map((c) => c.metric);
  }

  toJSON(): object {
    return {
      metadata: this.metadata,
      comparisons: this.toArray(),
    };
  }

  protected toCSVRows(): Array<Record<string, CsvValue>> {
    const group = this.metadata.group ?? {};
    return this.toArray().map((c) => ({
      ...group,
      metric: c.metric,
      baseline: c.baseline,
      candidate: c.candidate,
      improvement_pct: c.improvementPct,
      polarity: c.polarity,
    }));
  }
}

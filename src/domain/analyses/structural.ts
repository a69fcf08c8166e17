/**
 * Structural analysis
 *
 * Stress statistics of the candidate design, load distribution across joints,
 * and a comparison against published benchmark constants for the baseline
 * design (no baseline rows are needed).
 */

import { RecordTable } from '../../core/table';
import { defaultLogger } from '../../core/logging';
import * as stats from '../../core/math/statistics';
import {
  AnalysisPipeline,
  STANDARD_METRICS,
  aggregate,
  aggregateToTable,
  clean,
  compare,
  derive,
  ratioMetric,
  type AggregateRow,
  type Polarity,
  type Reducer,
} from '../../pipeline';
import type { ComparisonResult } from '../results/ComparisonResult';
import type { AnalysisConfig } from '../config/AnalysisConfig';
import type { AnalysisOptions } from './performance';

export interface StressFactors {
  max_stress: number | null;
  mean_stress: number | null;
  stress_std: number | null;
  /** Smallest per-row safety factor; null without yield strength data */
  min_safety_factor: number | null;
  /** Mean stress over mean weight; null without a weight column */
  stress_to_weight_ratio: number | null;
}

export interface JointLoads {
  rows: AggregateRow[];
  /** Mean load over mean power per joint; null without a power column */
  efficiency: ReadonlyMap<string, number | null> | null;
}

export interface StructuralAnalysis {
  cleaned: RecordTable;
  stressFactors: StressFactors;
  /** Null when the data carries no joint_id column */
  jointLoads: JointLoads | null;
  benchmark: ComparisonResult;
}

/** Benchmark metrics and which way is better */
export const BENCHMARK_POLARITIES: Readonly<Record<string, Polarity>> = {
  mean_stress: 'lower-is-better',
  weight: 'lower-is-better',
  power_efficiency: 'higher-is-better',
  assembly_time: 'lower-is-better',
};

const JOINT_LOAD_COLUMNS = ['load', 'deflection', 'stress'] as const;
const JOINT_LOAD_REDUCERS: readonly Reducer[] = ['mean', 'max', 'std'];

/**
 * Load handled per unit of power, from per-joint means
 */
export const JOINT_EFFICIENCY = ratioMetric('efficiency', 'load_mean', 'power_mean', {
  polarity: 'higher-is-better',
  onGuardFail: 'zero',
});

interface DerivedState {
  cleaned: RecordTable;
}

type FactorState = DerivedState & Pick<StructuralAnalysis, 'stressFactors'>;
type JointState = FactorState & Pick<StructuralAnalysis, 'jointLoads'>;

export function runStructuralAnalysis(
  table: RecordTable,
  config: AnalysisConfig,
  options: AnalysisOptions = {}
): StructuralAnalysis {
  const logger = (options.logger ?? defaultLogger()).child('structural');

  return AnalysisPipeline.start<RecordTable>(logger)
    .stage('clean', (input): DerivedState => {
      const cleaned = clean(input, {
        sigmaThreshold: config.cleaning.sigmaThreshold,
        categoricalColumns: config.cleaning.categoricalColumns,
        logger,
      });
      cleaned.requireColumns(['stress'], { analysis: 'structural' });
      logger.info(`${cleaned.size} of ${input.size} records kept after cleaning`);
      return { cleaned };
    })
    .stage('derive', (state): DerivedState => ({
      cleaned: derive(state.cleaned, STANDARD_METRICS, { logger }),
    }))
    .stage('stress-factors', (state): FactorState => ({
      ...state,
      stressFactors: stressFactors(state.cleaned),
    }))
    .stage('joint-loads', (state): JointState => {
      const jointLoads = state.cleaned.hasColumn('joint_id') ? analyzeJointLoads(state.cleaned) : null;
      if (jointLoads === null) {
        logger.warn('no joint_id column; joint load analysis skipped');
      }
      return { ...state, jointLoads };
    })
    .stage('benchmark', (state): StructuralAnalysis => ({
      ...state,
      benchmark: compareWithBenchmark(state.cleaned, config),
    }))
    .run(table);
}

export function stressFactors(table: RecordTable): StressFactors {
  const stress = table.numericValues('stress');
  const meanStress = stats.mean(stress);

  let stressToWeight: number | null = null;
  if (table.column('weight')?.kind === 'numeric') {
    const meanWeight = stats.mean(table.numericValues('weight'));
    if (meanStress !== null && meanWeight !== null && meanWeight > 0) {
      stressToWeight = meanStress / meanWeight;
    }
  }

  const safety =
    table.column('safety_factor')?.kind === 'numeric' ? table.numericValues('safety_factor') : [];

  return {
    max_stress: stats.max(stress),
    mean_stress: meanStress,
    stress_std: stats.sampleStd(stress),
    min_safety_factor: stats.min(safety),
    stress_to_weight_ratio: stressToWeight,
  };
}

/**
 * Per-joint mean/max/std of load, deflection and stress, plus per-joint
 * efficiency when power was recorded
 */
export function analyzeJointLoads(table: RecordTable): JointLoads {
  const reductions: Record<string, readonly Reducer[]> = {};
  for (const column of JOINT_LOAD_COLUMNS) {
    if (table.hasColumn(column)) {
      reductions[column] = JOINT_LOAD_REDUCERS;
    }
  }
  const rows = aggregate(table, ['joint_id'], reductions);

  let efficiency: Map<string, number | null> | null = null;
  if (table.column('power')?.kind === 'numeric' && table.hasColumn('load')) {
    const powerReductions = { load: 'mean', power: 'mean' } as const;
    const perJoint = derive(
      aggregateToTable(aggregate(table, ['joint_id'], powerReductions), ['joint_id'], powerReductions),
      [JOINT_EFFICIENCY]
    );
    efficiency = new Map();
    for (const row of perJoint.rows) {
      const value = row.efficiency;
      efficiency.set(String(row.joint_id), typeof value === 'number' ? value : null);
    }
  }

  return { rows, efficiency };
}

/**
 * Candidate metrics from the data where it has them, configured estimates
 * otherwise, against the configured baseline benchmarks
 */
export function compareWithBenchmark(table: RecordTable, config: AnalysisConfig): ComparisonResult {
  const candidate: Record<string, number | null> = { ...config.candidateEstimates };
  candidate.mean_stress = stats.mean(table.numericValues('stress'));
  if (table.column('weight')?.kind === 'numeric') {
    candidate.weight = stats.mean(table.numericValues('weight'));
  }

  const polarities: Record<string, Polarity> = {};
  for (const [metric, polarity] of Object.entries(BENCHMARK_POLARITIES)) {
    if (config.benchmarks[metric] !== undefined) {
      polarities[metric] = polarity;
    }
  }

  return compare(config.benchmarks, candidate, polarities, {
    variants: { baseline: config.variants.baseline, candidate: config.variants.candidate },
    sampleSize: table.size,
  });
}

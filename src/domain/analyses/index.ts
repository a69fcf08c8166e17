/**
 * End-to-end analyses built on the pipeline stages
 */

export {
  runPerformanceAnalysis,
  efficiencyMetrics,
  PERFORMANCE_MEASUREMENTS,
  POWER_EFFICIENCY,
} from './performance';
export type { PerformanceAnalysis, GroupedComparison, AnalysisOptions } from './performance';

export {
  runStructuralAnalysis,
  stressFactors,
  analyzeJointLoads,
  compareWithBenchmark,
  BENCHMARK_POLARITIES,
  JOINT_EFFICIENCY,
} from './structural';
export type { StructuralAnalysis, StressFactors, JointLoads } from './structural';

/**
 * Metric definitions
 *
 * Derived quantities are described as data so that heterogeneous datasets can
 * share one deriver. Polarity is carried along for the Comparator.
 */

export type Polarity = 'lower-is-better' | 'higher-is-better';

/**
 * What a ratio metric yields when its guard value is not positive
 * - zero: the metric is 0
 * - undefined: the cell is missing (null)
 */
export type GuardPolicy = 'zero' | 'undefined';

export interface RatioFormula {
  kind: 'ratio';
  numerator: string;
  denominator: string;
  /** Column whose value must be > 0; defaults to the denominator */
  guard?: string;
  onGuardFail: GuardPolicy;
}

export interface CustomFormula {
  kind: 'formula';
  /** Receives the row's input values by name; return null for undefined */
  compute: (inputs: Readonly<Record<string, number>>) => number | null;
}

export interface MetricDefinition {
  name: string;
  /** Columns the formula reads; all must be present for the metric to be computed */
  inputs: readonly string[];
  formula: RatioFormula | CustomFormula;
  polarity: Polarity;
  unit?: string;
  description?: string;
}

/**
 * Build a guarded ratio definition
 */
export function ratioMetric(
  name: string,
  numerator: string,
  denominator: string,
  options: {
    polarity: Polarity;
    onGuardFail: GuardPolicy;
    guard?: string;
    unit?: string;
    description?: string;
  }
): MetricDefinition {
  const guard = options.guard ?? denominator;
  const inputs = [numerator, denominator];
  if (!inputs.includes(guard)) {
    inputs.push(guard);
  }
  return {
    name,
    inputs,
    formula: { kind: 'ratio', numerator, denominator, guard, onGuardFail: options.onGuardFail },
    polarity: options.polarity,
    unit: options.unit,
    description: options.description,
  };
}

export const EFFICIENCY = ratioMetric('efficiency', 'load', 'power_consumption', {
  polarity: 'higher-is-better',
  onGuardFail: 'zero',
  unit: 'kg/W',
  description: 'Load carried per unit of power drawn',
});

export const STRESS_TO_WEIGHT_RATIO = ratioMetric('stress_to_weight_ratio', 'stress', 'weight', {
  polarity: 'lower-is-better',
  onGuardFail: 'zero',
  unit: 'MPa/kg',
});

export const SAFETY_FACTOR = ratioMetric('safety_factor', 'yield_strength', 'stress', {
  polarity: 'higher-is-better',
  onGuardFail: 'undefined',
  description: 'Yield strength over applied stress; undefined without positive stress',
});

export const STANDARD_METRICS: readonly MetricDefinition[] = [
  EFFICIENCY,
  STRESS_TO_WEIGHT_RATIO,
  SAFETY_FACTOR,
];

/**
 * Polarity lookup for a set of definitions, in definition order
 */
export function polaritiesOf(definitions: readonly MetricDefinition[]): Record<string, Polarity> {
  const out: Record<string, Polarity> = {};
  for (const def of definitions) {
    out[def.name] = def.polarity;
  }
  return out;
}

/**
 * Descriptive statistics over plain number arrays
 *
 * Thin wrappers over jstat that return null where a statistic is undefined
 * (empty input, sample deviation of a single value) instead of NaN.
 */

import jStat from 'jstat';

export function mean(values: number[]): number | null {
  return values.length === 0 ? null : jStat.mean(values);
}

export function sum(values: number[]): number {
  return values.length === 0 ? 0 : jStat.sum(values);
}

export function min(values: number[]): number | null {
  return values.length === 0 ? null : jStat.min(values);
}

export function max(values: number[]): number | null {
  return values.length === 0 ? null : jStat.max(values);
}

/**
 * Sample standard deviation (n - 1 denominator)
 * Undefined for fewer than two values
 */
export function sampleStd(values: number[]): number | null {
  return values.length < 2 ? null : jStat.stdev(values, true);
}

/**
 * Closed interval [mean - k*std, mean + k*std] using the sample deviation
 * Returns null when the deviation is undefined
 *
 * A constant sample collapses to [value, value] exactly, without the rounding
 * jstat's mean would introduce.
 */
export function sigmaBounds(values: number[], k: number): [number, number] | null {
  if (values.length >= 2 && values.every((v) => v === values[0])) {
    return [values[0], values[0]];
  }
  const mu = mean(values);
  const sigma = sampleStd(values);
  if (mu === null || sigma === null) {
    return null;
  }
  return [mu - k * sigma, mu + k * sigma];
}

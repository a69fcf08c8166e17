/**
 * Analysis configuration
 *
 * Everything that varies between runs: seed, log level, cleaning threshold,
 * variant labels, load buckets and the benchmark constants used when no
 * baseline rows exist. Validated with zod; defaults fill every omitted field.
 */

import { z } from 'zod';
import { CaliperError, ErrorCode } from '../../core/errors';
import { DEFAULT_CATEGORICAL_COLUMNS, DEFAULT_SIGMA_THRESHOLD } from '../../pipeline/Cleaner';

const positiveRecord = z.record(z.string(), z.number().positive().finite());

const bucketSchema = z
  .object({
    column: z.string().min(1).default('load'),
    boundaries: z
      .array(z.number().finite())
      .min(2)
      .default([0, 0.75, 1.5, 2.25, 3.0])
      .refine((b) => b.every((v, i) => i === 0 || v > b[i - 1]), {
        message: 'boundaries must be strictly increasing',
      }),
    labels: z.array(z.string().min(1)).optional(),
    target: z.string().min(1).default('load_category'),
  })
  .refine((b) => b.labels === undefined || b.labels.length === b.boundaries.length - 1, {
    message: 'labels must name every bucket',
    path: ['labels'],
  });

export const analysisConfigSchema = z.object({
  seed: z.number().int().default(42),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  cleaning: z
    .object({
      sigmaThreshold: z.number().positive().finite().default(DEFAULT_SIGMA_THRESHOLD),
      categoricalColumns: z.array(z.string().min(1)).default([...DEFAULT_CATEGORICAL_COLUMNS]),
    })
    .default({}),
  variants: z
    .object({
      column: z.string().min(1).default('design_type'),
      baseline: z.string().min(1).default('traditional'),
      candidate: z.string().min(1).default('gearless'),
    })
    .refine((v) => v.baseline !== v.candidate, {
      message: 'baseline and candidate labels must differ',
    })
    .default({}),
  loadBuckets: bucketSchema.default({ labels: ['0-25%', '25-50%', '50-75%', '75-100%'] }),
  benchmarks: positiveRecord.default({
    mean_stress: 150,
    weight: 3.2,
    power_efficiency: 0.65,
    assembly_time: 4.5,
  }),
  candidateEstimates: positiveRecord.default({
    weight: 2.1,
    power_efficiency: 0.82,
    assembly_time: 2.8,
  }),
  designWeights: positiveRecord.default({
    traditional: 3.2,
    gearless: 2.4,
  }),
});

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;

/**
 * Validate raw configuration and fill defaults
 *
 * @throws CaliperError INVALID_CONFIG listing every zod issue
 */
export function parseAnalysisConfig(input: unknown = {}): AnalysisConfig {
  const parsed = analysisConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new CaliperError(
      ErrorCode.INVALID_CONFIG,
      `Invalid analysis configuration: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { issues }
    );
  }
  return parsed.data;
}

/**
 * Configuration with every default applied
 */
export function defaultAnalysisConfig(): AnalysisConfig {
  return parseAnalysisConfig({});
}

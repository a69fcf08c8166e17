// src/core/data-generation.ts
/**
 * Synthetic measurement datasets
 *
 * Used when no recorded test data is available. Each generator models the
 * baseline (geared) and candidate (gearless) arms with a linear response to
 * load plus Gaussian noise. All randomness comes from the RNG seeded in the
 * constructor.
 */

import { RNG } from './math/random';
import { RecordTable } from './table';

export const JOINT_TYPES = ['base', 'shoulder', 'elbow', 'wrist'] as const;
export const JOINT_IDS = ['base', 'elbow', 'wrist', 'end_effector'] as const;

export interface VariantLabels {
  baseline: string;
  candidate: string;
}

/**
 * Linear response `base + slope * load + N(0, noise)` for one measurement
 */
interface LinearResponse {
  base: number;
  slope: number;
  noise: number;
}

interface DesignProfile {
  power_consumption: LinearResponse;
  positioning_error: LinearResponse;
  temperature: LinearResponse;
  noise_level: LinearResponse;
  response_time: LinearResponse;
}

const PROFILES: { baseline: DesignProfile; candidate: DesignProfile } = {
  // geared: friction and backlash raise every baseline figure
  baseline: {
    power_consumption: { base: 25, slope: 12, noise: 2 },
    positioning_error: { base: 0.8, slope: 0.15, noise: 0.1 },
    temperature: { base: 35, slope: 7, noise: 2 },
    noise_level: { base: 65, slope: 3, noise: 2 },
    response_time: { base: 150, slope: 40, noise: 15 },
  },
  candidate: {
    power_consumption: { base: 18, slope: 8, noise: 2 },
    positioning_error: { base: 0.3, slope: 0.06, noise: 0.1 },
    temperature: { base: 28, slope: 4, noise: 2 },
    noise_level: { base: 48, slope: 4, noise: 1 },
    response_time: { base: 100, slope: 20, noise: 10 },
  },
};

export interface PerformanceDataOptions {
  sampleSize?: number;
  /** Maximum payload in kg; loads are uniform in [0, maxLoad) */
  maxLoad?: number;
  variants?: VariantLabels;
}

export interface StructuralDataOptions {
  sampleSize?: number;
  /** Material yield strength in MPa, constant across samples */
  yieldStrength?: number;
}

export class SampleDataGenerator {
  private readonly rng: RNG;

  constructor(readonly seed: number) {
    this.rng = new RNG(seed);
  }

  /**
   * Performance test records for both designs
   *
   * Columns: test_id, joint_type, design_type, load (kg), power_consumption (W),
   * positioning_error (mm), temperature (°C), noise_level (dB), response_time (ms)
   */
  performance(options: PerformanceDataOptions = {}): RecordTable {
    const n = options.sampleSize ?? 200;
    const maxLoad = options.maxLoad ?? 3;
    const variants = options.variants ?? { baseline: 'traditional', candidate: 'gearless' };

    const records = Array.from({ length: n }, (_, i) => {
      const jointType = this.rng.pick(JOINT_TYPES);
      const isCandidate = this.rng.uniform() < 0.5;
      const profile = isCandidate ? PROFILES.candidate : PROFILES.baseline;
      const load = this.rng.uniformRange(0, maxLoad);

      return {
        test_id: i + 1,
        joint_type: jointType,
        design_type: isCandidate ? variants.candidate : variants.baseline,
        load,
        power_consumption: this.respond(profile.power_consumption, load),
        positioning_error: Math.max(0, this.respond(profile.positioning_error, load)),
        temperature: this.respond(profile.temperature, load),
        noise_level: this.respond(profile.noise_level, load),
        response_time: this.respond(profile.response_time, load),
      };
    });

    return RecordTable.fromRecords(records, {
      identifiers: ['test_id'],
      categorical: ['joint_type', 'design_type'],
      units: {
        load: 'kg',
        power_consumption: 'W',
        positioning_error: 'mm',
        temperature: '°C',
        noise_level: 'dB',
        response_time: 'ms',
      },
    });
  }

  /**
   * Structural stress test records of the candidate design
   *
   * Columns: joint_id, position (mm), load (N), stress (MPa), deflection (mm),
   * yield_strength (MPa), weight (kg), power (W)
   */
  structural(options: StructuralDataOptions = {}): RecordTable {
    const n = options.sampleSize ?? 1500;
    const yieldStrength = options.yieldStrength ?? 300;

    const records = Array.from({ length: n }, () => {
      const load = this.rng.normalDistribution(50, 15);
      return {
        joint_id: this.rng.pick(JOINT_IDS),
        position: this.rng.uniformRange(0, 100),
        load,
        stress: this.rng.normalDistribution(120, 30),
        deflection: load * 0.05 + this.rng.normalDistribution(0, 0.2),
        yield_strength: yieldStrength,
        weight: this.rng.normalDistribution(2.1, 0.2),
        power: load * 0.4 + this.rng.normalDistribution(0, 2),
      };
    });

    return RecordTable.fromRecords(records, {
      categorical: ['joint_id'],
      units: {
        position: 'mm',
        load: 'N',
        stress: 'MPa',
        deflection: 'mm',
        yield_strength: 'MPa',
        weight: 'kg',
        power: 'W',
      },
    });
  }

  private respond(response: LinearResponse, load: number): number {
    return response.base + response.slope * load + this.rng.normalDistribution(0, response.noise);
  }
}

import { describe, it, expect } from 'vitest';
import { SampleDataGenerator, JOINT_IDS, JOINT_TYPES } from '../../core/data-generation';
import { RNG } from '../../core/math/random';

describe('RNG', () => {
  it('should repeat a sequence for the same seed', () => {
    const a = new RNG(123);
    const b = new RNG(123);
    const seqA = Array.from({ length: 5 }, () => a.normal());
    const seqB = Array.from({ length: 5 }, () => b.normal());
    expect(seqA).toEqual(seqB);
  });

  it('should stay within the requested ranges', () => {
    const rng = new RNG(1);
    for (let i = 0; i < 200; i++) {
      const u = rng.uniformRange(2, 3);
      expect(u).toBeGreaterThanOrEqual(2);
      expect(u).toBeLessThan(3);
      const k = rng.integer(1, 4);
      expect(k).toBeGreaterThanOrEqual(1);
      expect(k).toBeLessThanOrEqual(4);
    }
  });

  it('should refuse to pick from an empty list', () => {
    expect(() => new RNG(1).pick([])).toThrow('Cannot pick from an empty list');
  });
});

describe('SampleDataGenerator', () => {
  describe('performance', () => {
    const data = new SampleDataGenerator(42).performance({ sampleSize: 120 });

    it('should produce the measurement schema', () => {
      expect(data.size).toBe(120);
      expect(data.columnNames).toEqual([
        'test_id',
        'joint_type',
        'design_type',
        'load',
        'power_consumption',
        'positioning_error',
        'temperature',
        'noise_level',
        'response_time',
      ]);
      expect(data.column('test_id')?.kind).toBe('identifier');
      expect(data.column('design_type')?.kind).toBe('categorical');
      expect(data.column('power_consumption')?.unit).toBe('W');
    });

    it('should only use known labels and loads in range', () => {
      for (const row of data.rows) {
        expect(['traditional', 'gearless']).toContain(row.design_type);
        expect(JOINT_TYPES).toContain(row.joint_type);
        expect(row.load).toBeGreaterThanOrEqual(0);
        expect(row.load).toBeLessThan(3);
        expect(row.positioning_error).toBeGreaterThanOrEqual(0);
      }
    });

    it('should be reproducible from its seed', () => {
      const again = new SampleDataGenerator(42).performance({ sampleSize: 120 });
      expect(again.toRecords()).toEqual(data.toRecords());

      const other = new SampleDataGenerator(43).performance({ sampleSize: 120 });
      expect(other.toRecords()).not.toEqual(data.toRecords());
    });

    it('should apply custom variant labels', () => {
      const custom = new SampleDataGenerator(5).performance({
        sampleSize: 50,
        variants: { baseline: 'a', candidate: 'b' },
      });
      for (const label of custom.values('design_type')) {
        expect(['a', 'b']).toContain(label);
      }
    });
  });

  describe('structural', () => {
    it('should produce the stress schema with constant yield strength', () => {
      const data = new SampleDataGenerator(7).structural({ sampleSize: 80, yieldStrength: 250 });

      expect(data.size).toBe(80);
      expect(data.columnNames).toEqual([
        'joint_id',
        'position',
        'load',
        'stress',
        'deflection',
        'yield_strength',
        'weight',
        'power',
      ]);
      expect(new Set(data.values('yield_strength'))).toEqual(new Set([250]));
      for (const id of data.values('joint_id')) {
        expect(JOINT_IDS).toContain(id);
      }
    });
  });
});

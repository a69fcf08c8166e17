import { describe, it, expect } from 'vitest';
import { clean, canonicalColumnName } from '../../pipeline';
import { ErrorCode } from '../../core/errors';
import { caught, recordingLogger, table } from '../helpers';

describe('Cleaner', () => {
  describe('canonicalColumnName', () => {
    it('should trim, lowercase and join whitespace with underscores', () => {
      expect(canonicalColumnName('  Power Consumption ')).toBe('power_consumption');
      expect(canonicalColumnName('Noise\tLevel')).toBe('noise_level');
      expect(canonicalColumnName('load')).toBe('load');
    });
  });

  it('should canonicalize every column name', () => {
    const out = clean(table([{ ' Design Type': 'gearless', 'Power  Consumption': 20 }]));
    expect(out.columnNames).toEqual(['design_type', 'power_consumption']);
  });

  it('should reject names that collide after canonicalization', () => {
    const error = caught(() => clean(table([{ Load: 1, 'load ': 2 }])));
    expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(error.message).toBe("Columns 'Load' and 'load ' both canonicalize to 'load'");
  });

  it('should drop rows with any missing cell', () => {
    const out = clean(
      table([
        { design_type: 'gearless', load: 1, power: 10 },
        { design_type: null, load: 1, power: 10 },
        { design_type: 'traditional', load: 1, power: null },
        { design_type: 'traditional', load: 1, power: 10 },
      ])
    );
    expect(out.toRecords()).toEqual([
      { design_type: 'gearless', load: 1, power: 10 },
      { design_type: 'traditional', load: 1, power: 10 },
    ]);
  });

  it('should cast declared categorical columns and never filter them', () => {
    const out = clean(
      table([
        { joint_id: 1, x: 0 },
        { joint_id: 1, x: 0 },
        { joint_id: 1, x: 0 },
        { joint_id: 1000, x: 0 },
      ]),
      { sigmaThreshold: 1.5 }
    );
    expect(out.column('joint_id')?.kind).toBe('categorical');
    expect(out.values('joint_id')).toEqual(['1', '1', '1', '1000']);
  });

  it('should keep values exactly on the sigma bound', () => {
    const data = table([{ x: 0 }, { x: 0 }, { x: 0 }, { x: 4 }]);
    // mean 1, sample std 2: the upper bound at k = 1.5 is exactly 4
    expect(clean(data, { sigmaThreshold: 1.5 }).size).toBe(4);
    expect(clean(data, { sigmaThreshold: 1.49 }).values('x')).toEqual([0, 0, 0]);
  });

  describe('sequential outlier rejection', () => {
    const data = table([
      { a: 0, b: 0 },
      { a: 0, b: 0 },
      { a: 0, b: 0 },
      { a: 0, b: 0 },
      { a: 0, b: 4 },
      { a: 100, b: 4 },
    ]);

    it('should compute each column bound over the survivors of earlier passes', () => {
      // 'a' removes the last row, then 'b' over [0, 0, 0, 0, 4] has upper bound ~3.48
      const out = clean(data, { sigmaThreshold: 1.5 });
      expect(out.toRecords()).toEqual([
        { a: 0, b: 0 },
        { a: 0, b: 0 },
        { a: 0, b: 0 },
        { a: 0, b: 0 },
      ]);
    });

    it('should follow the declared pass order', () => {
      // 'b' first over all six rows keeps both 4s (upper bound ~4.43)
      const out = clean(data, { sigmaThreshold: 1.5, columnOrder: ['b'] });
      expect(out.size).toBe(5);
      expect(out.values('b')).toEqual([0, 0, 0, 0, 4]);
    });
  });

  describe('zero-variance columns', () => {
    it('should keep every row through the pass over a constant column', () => {
      const { logger, lines } = recordingLogger();
      const out = clean(
        table([
          { x: 0.1, y: 0 },
          { x: 0.1, y: 0 },
          { x: 0.1, y: 0 },
          { x: 0.1, y: 4 },
        ]),
        { sigmaThreshold: 1, logger }
      );

      expect(lines.filter((line) => line.includes("'x'"))).toEqual([]);
      expect(lines).toContain(
        "[2024-01-01T00:00:00.000Z] [DEBUG] clean: 'y': removed 1 rows outside [-1, 3]"
      );
      expect(out.values('x')).toEqual([0.1, 0.1, 0.1]);
    });

    it('should keep a constant column under any threshold', () => {
      const out = clean(table([{ x: 0.1 }, { x: 0.1 }, { x: 0.1 }]), { sigmaThreshold: 0.01 });
      expect(out.size).toBe(3);
    });
  });

  it('should keep both rows of a two-row column', () => {
    const out = clean(table([{ power_consumption: 20 }, { power_consumption: 1000 }]));
    expect(out.values('power_consumption')).toEqual([20, 1000]);
  });

  it('should skip the sigma pass for a single value', () => {
    const out = clean(table([{ load: 7 }]));
    expect(out.values('load')).toEqual([7]);
  });

  it('should leave identifier columns alone', () => {
    const out = clean(
      table(
        [
          { test_id: 1, x: 1 },
          { test_id: 2, x: 1 },
          { test_id: 999, x: 1 },
        ],
        { identifiers: ['test_id'] }
      ),
      { sigmaThreshold: 1 }
    );
    expect(out.values('test_id')).toEqual([1, 2, 999]);
  });

  it('should reject a non-positive threshold', () => {
    const error = caught(() => clean(table([{ x: 1 }]), { sigmaThreshold: 0 }));
    expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
    expect(error.context).toEqual({ sigmaThreshold: 0 });
  });

  it('should log what each pass removed', () => {
    const { logger, lines } = recordingLogger();
    clean(table([{ x: 0 }, { x: 0 }, { x: 0 }, { x: 4 }]), { sigmaThreshold: 1, logger });
    expect(lines).toContain(
      "[2024-01-01T00:00:00.000Z] [DEBUG] clean: 'x': removed 1 rows outside [-1, 3]"
    );
  });
});

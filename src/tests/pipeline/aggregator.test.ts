import { describe, it, expect } from 'vitest';
import { aggregate, aggregateToTable, statOf } from '../../pipeline';
import { ErrorCode } from '../../core/errors';
import { caught, table } from '../helpers';

const runs = table([
  { design_type: 'traditional', joint_type: 'base', power: 20, error: 1 },
  { design_type: 'gearless', joint_type: 'base', power: 14, error: 0.5 },
  { design_type: 'traditional', joint_type: 'wrist', power: 30, error: 2 },
  { design_type: 'gearless', joint_type: 'base', power: 16, error: null },
  { design_type: 'traditional', joint_type: 'base', power: 22, error: 3 },
]);

describe('Aggregator', () => {
  it('should reduce numeric columns per group in key order', () => {
    const rows = aggregate(runs, ['design_type'], { power: ['mean', 'max', 'min', 'sum'] });

    expect(rows.map((r) => r.key)).toEqual([
      { design_type: 'gearless' },
      { design_type: 'traditional' },
    ]);
    expect(rows[0].stats.power).toEqual({ mean: 15, max: 16, min: 14, sum: 30 });
    expect(rows[1].stats.power).toEqual({ mean: 24, max: 30, min: 20, sum: 72 });
  });

  it('should partition every row into exactly one group', () => {
    const rows = aggregate(runs, ['design_type', 'joint_type'], { power: 'count' });
    expect(rows.reduce((n, r) => n + r.size, 0)).toBe(runs.size);
    expect(rows.reduce((n, r) => n + (statOf(r, 'power', 'count') ?? 0), 0)).toBe(runs.size);
  });

  it('should emit only combinations present in the data', () => {
    const rows = aggregate(runs, ['design_type', 'joint_type'], { power: 'mean' });
    expect(rows.map((r) => [r.key.design_type, r.key.joint_type, r.size])).toEqual([
      ['gearless', 'base', 2],
      ['traditional', 'base', 2],
      ['traditional', 'wrist', 1],
    ]);
  });

  it('should count non-missing values and skip missing ones', () => {
    const rows = aggregate(runs, ['design_type'], { error: ['count', 'mean'] });
    expect(rows[0].size).toBe(2);
    expect(rows[0].stats.error).toEqual({ count: 1, mean: 0.5 });
    expect(rows[1].stats.error).toEqual({ count: 3, mean: 2 });
  });

  it('should leave the deviation of a single-row group undefined', () => {
    const rows = aggregate(runs, ['design_type', 'joint_type'], { power: 'std' });
    expect(statOf(rows[2], 'power', 'std')).toBeNull();
    expect(statOf(rows[0], 'power', 'std')).toBeCloseTo(Math.SQRT2, 12);
  });

  it('should return null from statOf for statistics not computed', () => {
    const rows = aggregate(runs, ['design_type'], { power: 'mean' });
    expect(statOf(rows[0], 'power', 'max')).toBeNull();
    expect(statOf(rows[0], 'torque', 'mean')).toBeNull();
  });

  it('should freeze its output', () => {
    const rows = aggregate(runs, ['design_type'], { power: 'mean' });
    expect(Object.isFrozen(rows[0])).toBe(true);
    expect(Object.isFrozen(rows[0].stats.power)).toBe(true);
  });

  describe('errors', () => {
    it('should report missing key and value columns', () => {
      const error = caught(() => aggregate(runs, ['load_category'], { torque: 'mean' }));
      expect(error.code).toBe(ErrorCode.MISSING_COLUMN);
      expect(error.context).toEqual({ stage: 'aggregate', columns: ['load_category', 'torque'] });
    });

    it('should refuse numeric group keys', () => {
      const error = caught(() => aggregate(runs, ['power'], { error: 'mean' }));
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.message).toBe("Group key 'power' is numeric; bucketize it first");
    });

    it('should refuse an empty reducer list', () => {
      expect(caught(() => aggregate(runs, ['design_type'], { power: [] })).code).toBe(
        ErrorCode.INVALID_CONFIG
      );
    });

    it('should refuse reducing a categorical column', () => {
      expect(caught(() => aggregate(runs, ['design_type'], { joint_type: 'mean' })).code).toBe(
        ErrorCode.INVALID_INPUT
      );
    });

    it('should refuse rows without a group key', () => {
      const data = table([
        { design_type: 'gearless', power: 1 },
        { design_type: null, power: 2 },
      ]);
      const error = caught(() => aggregate(data, ['design_type'], { power: 'mean' }));
      expect(error.code).toBe(ErrorCode.INVALID_DATA);
      expect(error.context).toEqual({ stage: 'aggregate', column: 'design_type', row: 1 });
    });
  });

  describe('aggregateToTable', () => {
    it('should flatten statistics into named columns', () => {
      const reductions = { power: ['mean', 'max'], error: 'count' } as const;
      const rows = aggregate(runs, ['design_type'], reductions);
      const out = aggregateToTable(rows, ['design_type'], reductions);

      expect(out.columnNames).toEqual(['design_type', 'power_mean', 'power_max', 'error_count', 'size']);
      expect(out.column('design_type')?.kind).toBe('categorical');
      expect(out.toRecords()).toEqual([
        { design_type: 'gearless', power_mean: 15, power_max: 16, error_count: 1, size: 2 },
        { design_type: 'traditional', power_mean: 24, power_max: 30, error_count: 3, size: 3 },
      ]);
    });
  });
});

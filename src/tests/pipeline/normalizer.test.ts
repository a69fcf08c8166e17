import { describe, it, expect } from 'vitest';
import { normalize } from '../../pipeline';
import { table } from '../helpers';

describe('Normalizer', () => {
  it('should rescale to [0, 1]', () => {
    const out = normalize(table([{ x: 2 }, { x: 4 }, { x: 6 }]));
    expect(out.values('x')).toEqual([0, 0.5, 1]);
  });

  it('should map a constant column to zero', () => {
    const out = normalize(table([{ x: 5 }, { x: 5 }, { x: 5 }]));
    expect(out.values('x')).toEqual([0, 0, 0]);
  });

  it('should keep missing cells missing', () => {
    const out = normalize(table([{ x: 0 }, { x: null }, { x: 10 }]));
    expect(out.values('x')).toEqual([0, null, 1]);
  });

  it('should only touch the requested columns', () => {
    const data = table([
      { a: 1, b: 10 },
      { a: 3, b: 20 },
    ]);
    const out = normalize(data, ['a']);
    expect(out.values('a')).toEqual([0, 1]);
    expect(out.values('b')).toEqual([10, 20]);
  });

  it('should skip absent and categorical columns', () => {
    const data = table([
      { design_type: 'gearless', a: 1 },
      { design_type: 'traditional', a: 2 },
    ]);
    const out = normalize(data, ['design_type', 'torque', 'a']);
    expect(out.values('design_type')).toEqual(['gearless', 'traditional']);
    expect(out.values('a')).toEqual([0, 1]);
  });

  it('should leave the column kind numeric', () => {
    const out = normalize(table([{ x: 1 }, { x: 2 }]));
    expect(out.column('x')?.kind).toBe('numeric');
  });
});

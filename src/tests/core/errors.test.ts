import { describe, it, expect } from 'vitest';
import {
  CaliperError,
  ErrorCode,
  isCaliperError,
  missingColumnError,
  wrapError,
} from '../../core/errors';

describe('CaliperError', () => {
  describe('constructor', () => {
    it('should create error with code and message', () => {
      const error = new CaliperError(ErrorCode.INVALID_DATA, 'Test message');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CaliperError);
      expect(error.name).toBe('CaliperError');
      expect(error.code).toBe(ErrorCode.INVALID_DATA);
      expect(error.message).toBe('Test message');
      expect(error.context).toBeUndefined();
    });

    it('should create error with context', () => {
      const context = { metric: 'power_consumption', baseline: 0 };
      const error = new CaliperError(ErrorCode.DIVISION_BY_ZERO_METRIC, 'Zero baseline', context);

      expect(error.code).toBe(ErrorCode.DIVISION_BY_ZERO_METRIC);
      expect(error.context).toEqual(context);
    });

    it('should preserve stack trace', () => {
      const error = new CaliperError(ErrorCode.INTERNAL_ERROR, 'Test');
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain('CaliperError');
    });
  });

  describe('toString', () => {
    it('should format error without context', () => {
      const error = new CaliperError(ErrorCode.INVALID_INPUT, 'Bad input');
      expect(error.toString()).toBe('CaliperError [INVALID_INPUT]: Bad input');
    });

    it('should format error with context', () => {
      const error = new CaliperError(ErrorCode.INVALID_PARTITION, 'Out of range', {
        column: 'load',
        value: 4,
      });

      expect(error.toString()).toBe(
        'CaliperError [INVALID_PARTITION]: Out of range Context: {"column":"load","value":4}'
      );
    });
  });

  describe('is / isOneOf', () => {
    it('should match its own code only', () => {
      const error = new CaliperError(ErrorCode.MISSING_COLUMN, 'Test');
      expect(error.is(ErrorCode.MISSING_COLUMN)).toBe(true);
      expect(error.is(ErrorCode.INVALID_DATA)).toBe(false);
    });

    it('should check membership in a list of codes', () => {
      const error = new CaliperError(ErrorCode.INVALID_PARTITION, 'Test');
      expect(error.isOneOf([ErrorCode.INVALID_DATA, ErrorCode.INVALID_PARTITION])).toBe(true);
      expect(error.isOneOf([ErrorCode.INVALID_CONFIG])).toBe(false);
      expect(error.isOneOf([])).toBe(false);
    });
  });
});

describe('isCaliperError', () => {
  it('should return true for CaliperError instances', () => {
    expect(isCaliperError(new CaliperError(ErrorCode.INVALID_INPUT, 'Test'))).toBe(true);
  });

  it('should return false for anything else', () => {
    expect(isCaliperError(new Error('Test'))).toBe(false);
    expect(isCaliperError('string error')).toBe(false);
    expect(isCaliperError(null)).toBe(false);
    expect(isCaliperError({ code: ErrorCode.INVALID_INPUT, message: 'Test' })).toBe(false);
  });
});

describe('wrapError', () => {
  it('should return CaliperError unchanged', () => {
    const original = new CaliperError(ErrorCode.INVALID_DATA, 'Original');
    expect(wrapError(original)).toBe(original);
  });

  it('should wrap a regular Error with its stack', () => {
    const original = new Error('Regular error');
    const wrapped = wrapError(original);

    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('Regular error');
    expect(wrapped.context).toEqual({ originalStack: original.stack });
  });

  it('should use the given code', () => {
    expect(wrapError(new Error('x'), ErrorCode.INVALID_CONFIG).code).toBe(ErrorCode.INVALID_CONFIG);
  });

  it('should wrap non-Error values', () => {
    const wrapped = wrapError(42);
    expect(wrapped.message).toBe('42');
    expect(wrapped.context).toEqual({ originalError: 42 });
  });
});

describe('missingColumnError', () => {
  it('should name a single column', () => {
    const error = missingColumnError(['load']);
    expect(error.code).toBe(ErrorCode.MISSING_COLUMN);
    expect(error.message).toBe("Required column 'load' not found");
    expect(error.context).toEqual({ columns: ['load'] });
  });

  it('should name several columns and keep extra context', () => {
    const error = missingColumnError(['load', 'stress'], { stage: 'aggregate' });
    expect(error.message).toBe("Required columns 'load', 'stress' not found");
    expect(error.context).toEqual({ stage: 'aggregate', columns: ['load', 'stress'] });
  });
});

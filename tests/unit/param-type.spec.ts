import { describe, it, expect } from 'vitest';
import {
  coerceParam,
  inferParamType,
  inferParamTypes,
} from '../../src/core/domain/value-objects/param-type.js';

describe('parameter types', () => {
  it('should infer types from runtime values', () => {
    expect(inferParamTypes([1, 10n, 1.5, 'x', true, null, new Date(0)])).toEqual([
      'integer',
      'integer',
      'double',
      'string',
      'string',
      'string',
      'string',
    ]);
    expect(inferParamType(Buffer.from('x'))).toBe('string');
  });

  it('should coerce to integers', () => {
    expect(coerceParam(3.9, 'integer')).toBe(3);
    expect(coerceParam('42 apples', 'integer')).toBe(42);
    expect(coerceParam('apples', 'integer')).toBe(0);
    expect(coerceParam(true, 'integer')).toBe(1);
    expect(coerceParam(Number.NaN, 'integer')).toBe(0);
    expect(coerceParam(new Date(5000), 'integer')).toBe(5);
    expect(coerceParam('9007199254740993', 'integer')).toBe(9007199254740993n);
  });

  it('should coerce to doubles', () => {
    expect(coerceParam('2.75kg', 'double')).toBe(2.75);
    expect(coerceParam('n/a', 'double')).toBe(0);
    expect(coerceParam(4n, 'double')).toBe(4);
  });

  it('should coerce to strings', () => {
    expect(coerceParam(12, 'string')).toBe('12');
    expect(coerceParam(true, 'string')).toBe('1');
    expect(coerceParam(false, 'string')).toBe('0');
    const date = new Date(0);
    expect(coerceParam(date, 'string')).toBe(date);
  });

  it('should keep null for every type', () => {
    expect(coerceParam(null, 'integer')).toBeNull();
    expect(coerceParam(null, 'double')).toBeNull();
    expect(coerceParam(null, 'string')).toBeNull();
  });
});

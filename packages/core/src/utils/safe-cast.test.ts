import { describe, it, expect } from 'vitest';
import { safeString, safeRecord, safeInteger } from './safe-cast.js';

describe('safeString', () => {
  it('should return the value when it is a string', () => {
    expect(safeString('hello')).toBe('hello');
    expect(safeString('')).toBe('');
  });

  it('should return fallback when value is not a string', () => {
    expect(safeString(42, 'fallback')).toBe('fallback');
    expect(safeString(undefined, '')).toBe('');
    expect(safeString(['a', 'b'], 'default')).toBe('default');
  });

  it('should throw TypeError when value is not a string and no fallback', () => {
    expect(() => safeString(42)).toThrow('Expected string, got number');
    expect(() => safeString(undefined)).toThrow('Expected string, got undefined');
  });
});

describe('safeRecord', () => {
  it('should return plain objects unchanged', () => {
    const value = { a: 1 };
    expect(safeRecord(value)).toBe(value);
  });

  it('should return the fallback for arrays, null and primitives', () => {
    expect(safeRecord([1, 2], {})).toEqual({});
    expect(safeRecord(null, { x: 1 })).toEqual({ x: 1 });
    expect(safeRecord('text', {})).toEqual({});
  });

  it('should throw a descriptive TypeError without a fallback', () => {
    expect(() => safeRecord(null)).toThrow('Expected record (object), got null');
    expect(() => safeRecord([])).toThrow('Expected record (object), got array');
    expect(() => safeRecord(3)).toThrow('Expected record (object), got number');
  });
});

describe('safeInteger', () => {
  it('should parse integer strings', () => {
    expect(safeInteger('2', 1)).toBe(2);
    expect(safeInteger(' 10 ', 1)).toBe(10);
    expect(safeInteger('-3', 1)).toBe(-3);
    expect(safeInteger('0', 1)).toBe(0);
  });

  it('should accept integer numbers', () => {
    expect(safeInteger(7, 1)).toBe(7);
  });

  it('should fall back for anything else', () => {
    expect(safeInteger('2.5', 1)).toBe(1);
    expect(safeInteger('abc', 1)).toBe(1);
    expect(safeInteger('', 10)).toBe(10);
    expect(safeInteger(undefined, 10)).toBe(10);
    expect(safeInteger(2.5, 1)).toBe(1);
    expect(safeInteger(['2'], 1)).toBe(1);
  });
});

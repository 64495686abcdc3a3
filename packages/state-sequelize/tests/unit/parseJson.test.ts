import { describe, it, expect } from 'vitest';
import { parseJson } from '../../src/utils/parseJson.js';

describe('parseJson', () => {
  it('should return an already parsed array as-is', () => {
    const details = [{ rowIndex: 2, field: 'price', reason: 'Invalid price format: abc' }];
    expect(parseJson(details)).toBe(details);
  });

  it('should parse a JSON string', () => {
    expect(parseJson('[{"rowIndex":2,"field":"sku","reason":"SKU is required"}]')).toEqual([
      { rowIndex: 2, field: 'sku', reason: 'SKU is required' },
    ]);
  });

  it('should return null as-is', () => {
    expect(parseJson(null)).toBeNull();
  });

  it('should throw on malformed text', () => {
    expect(() => parseJson('[{')).toThrow(SyntaxError);
  });
});

import { generateId } from './id.js';
import { isJsonObject } from '../types/json.js';

describe('generateId', () => {
  it('returns 32 lowercase hex characters', () => {
    expect(generateId()).toMatch(/^[0-9a-f]{32}$/);
  });

  it('returns distinct values', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateId()));
    expect(ids.size).toBe(50);
  });
});

describe('isJsonObject', () => {
  it('accepts plain objects', () => {
    expect(isJsonObject({ a: 1 })).toBe(true);
  });

  it('rejects arrays, null and primitives', () => {
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('x')).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { isJsonValue, isRecord, nonEmpty } from './guards.js';

describe('guards', () => {
  describe('isRecord', () => {
    it('should accept plain objects', () => {
      expect(isRecord({ patient: '123' })).toBe(true);
    });

    it.each([[null], [[]], ['text'], [1]])('should reject %j', (value) => {
      expect(isRecord(value)).toBe(false);
    });
  });

  describe('nonEmpty', () => {
    it('should return non-empty strings', () => {
      expect(nonEmpty('value')).toBe('value');
    });

    it.each(['', null, undefined])('should map %j to undefined', (value) => {
      expect(nonEmpty(value)).toBeUndefined();
    });
  });

  describe('isJsonValue', () => {
    it('should accept safe integers and fractions', () => {
      expect(isJsonValue(Number.MAX_SAFE_INTEGER)).toBe(true);
      expect(isJsonValue(-72.5)).toBe(true);
    });

    it('should accept nested JSON', () => {
      expect(isJsonValue({ patient: '123', banner: true, tags: [1, null, { a: 'b' }] })).toBe(true);
    });

    it.each([
      ['undefined', undefined],
      ['NaN', Number.NaN],
      ['Infinity', Number.POSITIVE_INFINITY],
      ['a function member', { fn: () => 1 }],
      ['an array holding undefined', [1, undefined]],
      ['an unsafe integer', 2 ** 53],
      ['a large integer inside an object', { id: 1e21 }],
    ])('should reject %s', (_label, value) => {
      expect(isJsonValue(value)).toBe(false);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { coerceNumeric, coerceOptional, percentage, roundTo } from '../../src/util/numeric.js';

describe('numeric', () => {
  describe('coerceNumeric', () => {
    it('should parse plain numbers', () => {
      expect(coerceNumeric('12')).toBe(12);
      expect(coerceNumeric(' 7.5 ')).toBe(7.5);
      expect(coerceNumeric('-3')).toBe(-3);
      expect(coerceNumeric(4)).toBe(4);
    });

    it('should fall back for anything else', () => {
      expect(coerceNumeric('DNP')).toBe(0);
      expect(coerceNumeric('1,200')).toBe(0);
      expect(coerceNumeric('')).toBe(0);
      expect(coerceNumeric(undefined)).toBe(0);
      expect(coerceNumeric(Number.NaN)).toBe(0);
      expect(coerceNumeric('x', -1)).toBe(-1);
    });
  });

  describe('coerceOptional', () => {
    it('should keep blanks missing', () => {
      expect(coerceOptional('')).toBeNull();
      expect(coerceOptional(' ')).toBeNull();
      expect(coerceOptional(null)).toBeNull();
      expect(coerceOptional('8')).toBe(8);
      expect(coerceOptional('n/a')).toBe(0);
    });
  });

  describe('roundTo', () => {
    it('should round half away from zero', () => {
      expect(roundTo(1.005, 2)).toBe(1.01);
      expect(roundTo(2.45, 1)).toBe(2.5);
      expect(roundTo(-2.45, 1)).toBe(-2.5);
      expect(roundTo(52.94117647058823, 1)).toBe(52.9);
    });

    it('should not return negative zero', () => {
      expect(Object.is(roundTo(-0.04, 1), 0)).toBe(true);
    });
  });

  describe('percentage', () => {
    it('should compute made over attempted', () => {
      expect(percentage(5, 9)).toBe(55.6);
      expect(percentage(2, 2)).toBe(100);
      expect(percentage(1, 3, null)).toBeCloseTo(33.3333, 3);
    });

    it('should be zero with no attempts', () => {
      expect(percentage(0, 0)).toBe(0);
      expect(percentage(3, 0)).toBe(0);
    });
  });
});

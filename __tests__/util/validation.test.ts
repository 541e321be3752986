import { describe, it, expect } from 'vitest';
import { isBlank, isValidGameId, isValidUrl, ValidationError } from '../../src/util/validation.js';

describe('validation', () => {
  describe('isValidGameId', () => {
    it('should validate numeric game codes', () => {
      expect(isValidGameId('24817')).toBe(true);
      expect(isValidGameId('1')).toBe(true);
    });

    it('should reject invalid formats', () => {
      expect(isValidGameId('24817.0')).toBe(false);
      expect(isValidGameId('../24817')).toBe(false);
      expect(isValidGameId('abc')).toBe(false);
      expect(isValidGameId('')).toBe(false);
    });
  });

  describe('isValidUrl', () => {
    it('should validate correct URLs', () => {
      expect(isValidUrl('http://localhost:8000')).toBe(true);
      expect(isValidUrl('https://league.test/league/2030-1/')).toBe(true);
    });

    it('should reject invalid URLs', () => {
      expect(isValidUrl('not-a-url')).toBe(false);
      expect(isValidUrl('')).toBe(false);
    });
  });

  describe('isBlank', () => {
    it('should treat missing, NaN and whitespace as blank', () => {
      expect(isBlank(undefined)).toBe(true);
      expect(isBlank(null)).toBe(true);
      expect(isBlank(Number.NaN)).toBe(true);
      expect(isBlank('  ')).toBe(true);
    });

    it('should treat zero and text as present', () => {
      expect(isBlank(0)).toBe(false);
      expect(isBlank('0')).toBe(false);
      expect(isBlank('ליגה')).toBe(false);
    });
  });

  describe('ValidationError', () => {
    it('should create error with field name', () => {
      const error = new ValidationError('Invalid value', 'testField');
      expect(error.message).toBe('Invalid value');
      expect(error.field).toBe('testField');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error).toBeInstanceOf(Error);
    });
  });
});

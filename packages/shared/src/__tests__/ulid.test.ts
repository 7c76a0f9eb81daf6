import { describe, it, expect } from 'vitest';
import { generateUlid, isValidUlid } from '../utils/ulid';

describe('ULID utilities', () => {
  describe('generateUlid', () => {
    it('generates a 26-character string', () => {
      const id = generateUlid();
      expect(id).toHaveLength(26);
    });

    it('generates unique IDs', () => {
      const ids = new Set(Array.from({ length: 100 }, () => generateUlid()));
      expect(ids.size).toBe(100);
    });

    it('generates increasing IDs within a process', () => {
      const ids = Array.from({ length: 50 }, () => generateUlid());
      expect([...ids].sort()).toEqual(ids);
    });
  });

  describe('isValidUlid', () => {
    it('returns true for valid ULIDs', () => {
      const id = generateUlid();
      expect(isValidUlid(id)).toBe(true);
      expect(isValidUlid('01ARZ3NDEKTSV4RRFFQ69G5FAV')).toBe(true);
    });

    it('returns false for invalid strings', () => {
      expect(isValidUlid('')).toBe(false);
      expect(isValidUlid('too-short')).toBe(false);
      expect(isValidUlid('not-a-valid-ulid-at-all!!!!')).toBe(false);
      expect(isValidUlid('01ARZ3NDEKTSV4RRFFQ69G5FAU')).toBe(false);
    });

    it('returns false for non-string values', () => {
      expect(isValidUlid(null)).toBe(false);
      expect(isValidUlid(undefined)).toBe(false);
    });
  });
});

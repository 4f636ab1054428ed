/**
 * Input parsing tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import {
  parseAccountId,
  parseDurationDays,
  parsePersonName,
  parsePrice,
  parseSlotCount,
  parseSlotKey,
  roundToCents,
} from '../validation.js';

describe('validation', () => {
  describe('identifiers', () => {
    it('should trim names', () => {
      expect(parsePersonName('  Ann Lee ')).toBe('Ann Lee');
      expect(parseAccountId('family-1')).toBe('family-1');
    });

    it('should reject empty names', () => {
      expect(() => parsePersonName('   ')).toThrow(new ValidationError('Person name must not be empty'));
    });

    it('should limit names by encoded size', () => {
      expect(parsePersonName('a'.repeat(48))).toHaveLength(48);
      expect(() => parsePersonName('a'.repeat(49))).toThrow('Person name must be at most 48 bytes');
      expect(() => parseAccountId('é'.repeat(25))).toThrow('Account id must be at most 48 bytes');
    });

    it('should accept alphanumeric slot keys only', () => {
      expect(parseSlotKey(' A1 ')).toBe('A1');
      expect(() => parseSlotKey('a_1')).toThrow('Slot keys must be letters and digits only');
      expect(() => parseSlotKey('1'.repeat(12))).toThrow('Slot keys must be at most 11 characters');
    });
  });

  describe('parseDurationDays', () => {
    it('should parse whole days', () => {
      expect(parseDurationDays(' 30 ')).toBe(30);
    });

    it.each([
      ['abc', 'Duration must be a number'],
      ['1.5', 'Duration must be a number'],
      ['0', 'Duration must be positive'],
      ['-7', 'Duration must be positive'],
      ['4000', 'Duration must be at most 3650 days'],
    ])('should reject %j', (text, message) => {
      expect(() => parseDurationDays(text)).toThrow(new ValidationError(message));
    });
  });

  describe('parsePrice', () => {
    it.each([
      ['9.99', 9.99],
      ['9,99', 9.99],
      ['10', 10],
      ['.5', 0.5],
      ['0', 0],
    ])('should parse %j', (text, price) => {
      expect(parsePrice(text)).toBe(price);
    });

    it.each([
      ['abc', 'Price must be a number'],
      ['', 'Price must be a number'],
      ['1.2.3', 'Price must be a number'],
      ['-1', 'Price must not be negative'],
    ])('should reject %j', (text, message) => {
      expect(() => parsePrice(text)).toThrow(new ValidationError(message));
    });
  });

  describe('parseSlotCount', () => {
    it('should parse a count', () => {
      expect(parseSlotCount('0')).toBe(0);
      expect(parseSlotCount('6')).toBe(6);
    });

    it('should reject bad counts', () => {
      expect(() => parseSlotCount('four')).toThrow('Slot count must be a number');
      expect(() => parseSlotCount('-1')).toThrow('Slot count must not be negative');
      expect(() => parseSlotCount('101')).toThrow('Slot count must be at most 100');
    });
  });

  it('should round to cents', () => {
    expect(roundToCents(22.984)).toBe(22.98);
    expect(roundToCents(0.1 + 0.2)).toBe(0.3);
  });
});

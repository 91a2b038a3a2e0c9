/**
 * Unit tests for quantity parsing
 */

import { describe, it, expect } from 'vitest';

import { isQuantity, parseQuantity } from '../../src/utils';

describe('parseQuantity', () => {
  it('should parse plain numbers', () => {
    expect(parseQuantity('20')).toBe(20);
    expect(parseQuantity('2.5')).toBe(2.5);
    expect(parseQuantity('.5')).toBe(0.5);
  });

  it('should parse milli quantities', () => {
    expect(parseQuantity('500m')).toBe(0.5);
  });

  it('should parse decimal suffixes', () => {
    expect(parseQuantity('1.5k')).toBe(1500);
    expect(parseQuantity('2M')).toBe(2_000_000);
    expect(parseQuantity('1G')).toBe(1e9);
  });

  it('should parse binary suffixes', () => {
    expect(parseQuantity('2Mi')).toBe(2_097_152);
    expect(parseQuantity('100Gi')).toBe(107_374_182_400);
    expect(parseQuantity('1Ki')).toBe(1024);
  });

  it('should ignore surrounding whitespace', () => {
    expect(parseQuantity(' 4 ')).toBe(4);
  });

  it('should reject malformed quantities', () => {
    expect(parseQuantity('')).toBeNull();
    expect(parseQuantity('-1')).toBeNull();
    expect(parseQuantity('1e3')).toBeNull();
    expect(parseQuantity('10 Gi')).toBeNull();
    expect(parseQuantity('Gi')).toBeNull();
    expect(parseQuantity('5gi')).toBeNull();
  });
});

describe('isQuantity', () => {
  it('should only accept quantity strings', () => {
    expect(isQuantity('100Gi')).toBe(true);
    expect(isQuantity('lots')).toBe(false);
    expect(isQuantity(100)).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { mask, toUnsigned, valueToSigned, signedToValue, SimulationError } from '../src/index.js';

describe('value helpers', () => {
  it('should build masks', () => {
    expect(mask(1)).toBe(1n);
    expect(mask(8)).toBe(255n);
    expect(mask(65)).toBe(2n ** 65n - 1n);
  });

  it('should convert between signed and unsigned views', () => {
    expect(valueToSigned(13n, 4)).toBe(-3n);
    expect(valueToSigned(7n, 4)).toBe(7n);
    expect(valueToSigned(8n, 4)).toBe(-8n);
    expect(signedToValue(-3, 4)).toBe(13n);
    expect(signedToValue(-8n, 4)).toBe(8n);
    expect(signedToValue(5, 4)).toBe(5n);
  });

  it('should reject signed values out of range', () => {
    expect(() => signedToValue(8, 4)).toThrow('8 does not fit in 4 signed bits');
    expect(() => signedToValue(-9, 4)).toThrow(SimulationError);
    expect(() => signedToValue(0.5, 4)).toThrow(/not an integer/);
  });

  it('should validate unsigned values', () => {
    expect(toUnsigned(255, 8, 'input "a"')).toBe(255n);
    expect(toUnsigned(2n ** 40n, 41, 'input "a"')).toBe(2n ** 40n);
    expect(() => toUnsigned(256, 8, 'input "a"')).toThrow('input "a": 256 does not fit in 8 bits');
    expect(() => toUnsigned(-1, 8, 'input "a"')).toThrow(/is negative/);
    expect(() => toUnsigned(1.5, 8, 'input "a"')).toThrow('input "a": 1.5 is not an integer');
  });
});

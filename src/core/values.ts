// Unsigned bit-vector value helpers shared by the simulators

import { SimulationError } from './errors.js';

export function mask(bitwidth: number): bigint {
  return (1n << BigInt(bitwidth)) - 1n;
}

/**
 * Check that a caller-supplied value is an integer in [0, 2^bitwidth).
 */
export function toUnsigned(value: number | bigint, bitwidth: number, what: string): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new SimulationError(`${what}: ${value} is not an integer`);
  }
  const n = BigInt(value);
  if (n < 0n) {
    throw new SimulationError(`${what}: ${n} is negative; convert signed values with signedToValue()`);
  }
  if (n >> BigInt(bitwidth) !== 0n) {
    throw new SimulationError(`${what}: ${n} does not fit in ${bitwidth} bits`);
  }
  return n;
}

// Reinterpret an unsigned value as two's complement
export function valueToSigned(value: bigint, bitwidth: number): bigint {
  const signBit = 1n << BigInt(bitwidth - 1);
  return value & signBit ? value - (1n << BigInt(bitwidth)) : value;
}

/**
 * Two's-complement encoding of a signed integer, for use as an input value.
 */
export function signedToValue(value: number | bigint, bitwidth: number): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new SimulationError(`${value} is not an integer`);
  }
  const n = BigInt(value);
  const limit = 1n << BigInt(bitwidth - 1);
  if (n < -limit || n >= limit) {
    throw new SimulationError(`${n} does not fit in ${bitwidth} signed bits`);
  }
  return n & mask(bitwidth);
}

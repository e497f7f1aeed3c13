// Operators built from the primitive nets: selection, concatenation,
// reductions, signed arithmetic, probes and hardware assertions

import { WireVector, Output, asWires, blockOf, concatWires } from './wirevector.js';
import type { WireLike } from './wirevector.js';
import { ConstructionError } from './errors.js';
import { plainNet } from '../types/netlist.js';

/**
 * Concatenate values; the first argument ends up in the most significant bits.
 */
export function concat(...args: WireLike[]): WireVector {
  if (args.length === 0) {
    throw new ConstructionError('concat needs at least one argument');
  }
  const block = blockOf(...args);
  return concatWires(
    block,
    args.map((a) => asWires(block, a))
  );
}

/**
 * Concatenate a list whose first element is the least significant.
 */
export function concatList(list: readonly WireLike[]): WireVector {
  return concat(...[...list].reverse());
}

/**
 * Zero-extend (or sign-extend) every value to the widest one.
 */
export function matchBitwidth(args: readonly WireLike[], signed: boolean = false): WireVector[] {
  const block = blockOf(...args);
  const wires = args.map((a) => asWires(block, a));
  const width = Math.max(...wires.map((w) => w.width));
  return wires.map((w) => (signed ? w.signExtended(width) : w.zeroExtended(width)));
}

/**
 * Two-way multiplexer: `trueCase` when the 1-bit `sel` is 1.
 */
export function select(sel: WireLike, trueCase: WireLike, falseCase: WireLike): WireVector {
  const block = blockOf(sel, trueCase, falseCase);
  const s = asWires(block, sel);
  if (s.width !== 1) {
    throw new ConstructionError(`select needs a 1-bit selector, "${s.name}" is ${s.width} bits`);
  }
  const [f, t] = matchBitwidth([asWires(block, falseCase), asWires(block, trueCase)]);
  const dest = new WireVector(block, t.width);
  block.addNet(plainNet('select', [s, f, t], [dest]));
  return dest;
}

/**
 * N-way multiplexer picking `values[index]`. Missing entries up to
 * 2^index.width take `defaultValue`, which is then required.
 */
export function mux(index: WireLike, values: readonly WireLike[], defaultValue?: WireLike): WireVector {
  const block = blockOf(index, ...values, defaultValue);
  const idx = asWires(block, index);
  const slots = 2 ** idx.width;
  if (values.length === 0) {
    throw new ConstructionError('mux needs at least one value');
  }
  if (values.length > slots) {
    throw new ConstructionError(`mux has ${values.length} values but a ${idx.width}-bit index selects only ${slots}`);
  }
  if (values.length < slots && defaultValue === undefined) {
    throw new ConstructionError(`mux with ${values.length} of ${slots} values needs a default`);
  }

  const padded = defaultValue === undefined ? [...values] : [...values, defaultValue];
  const matched = matchBitwidth(padded.map((v) => asWires(block, v)));
  const inputs = matched.slice(0, values.length);
  const fallback = matched[matched.length - 1];

  const bits: WireVector[] = [];
  for (let i = 0; i < idx.width; i++) {
    bits.push(idx.width === 1 ? idx : idx.bit(i));
  }

  // Select over index bits from the top; a range past the values is all default
  const build = (base: number, bit: number): WireVector => {
    if (bit < 0) {
      return base < inputs.length ? inputs[base] : fallback;
    }
    if (base >= inputs.length) {
      return fallback;
    }
    const half = 2 ** bit;
    return select(bits[bit], build(base + half, bit - 1), build(base, bit - 1));
  };
  return build(0, idx.width - 1);
}

type BitOp = 'and' | 'or' | 'xor';

// Balanced tree over the bits of `wire`
function reduceBits(wire: WireLike, op: BitOp): WireVector {
  const block = blockOf(wire);
  const w = asWires(block, wire);
  let layer: WireVector[] = [];
  for (let i = 0; i < w.width; i++) {
    layer.push(w.width === 1 ? w : w.bit(i));
  }
  while (layer.length > 1) {
    const next: WireVector[] = [];
    for (let i = 0; i + 1 < layer.length; i += 2) {
      next.push(layer[i][op](layer[i + 1]));
    }
    if (layer.length % 2 === 1) {
      next.push(layer[layer.length - 1]);
    }
    layer = next;
  }
  return layer[0];
}

export function andAllBits(wire: WireLike): WireVector {
  return reduceBits(wire, 'and');
}

export function orAllBits(wire: WireLike): WireVector {
  return reduceBits(wire, 'or');
}

export function xorAllBits(wire: WireLike): WireVector {
  return reduceBits(wire, 'xor');
}

export function parity(wire: WireLike): WireVector {
  return xorAllBits(wire);
}

function checkSingleBits(name: string, wires: readonly WireLike[]): WireVector[] {
  if (wires.length === 0) {
    throw new ConstructionError(`${name} needs at least one argument`);
  }
  const block = blockOf(...wires);
  return wires.map((arg) => {
    const w = asWires(block, arg);
    if (w.width !== 1) {
      throw new ConstructionError(`${name} takes 1-bit arguments, "${w.name}" is ${w.width} bits`);
    }
    return w;
  });
}

// 1 when any of the 1-bit arguments is 1
export function rtlAny(...wires: WireLike[]): WireVector {
  return checkSingleBits('rtlAny', wires).reduce((acc, w) => acc.or(w));
}

// 1 when all of the 1-bit arguments are 1
export function rtlAll(...wires: WireLike[]): WireVector {
  return checkSingleBits('rtlAll', wires).reduce((acc, w) => acc.and(w));
}

// Signed arithmetic: operands are read as two's complement

export function signedAdd(a: WireLike, b: WireLike): WireVector {
  const block = blockOf(a, b);
  const x = asWires(block, a);
  const y = asWires(block, b);
  const width = Math.max(x.width, y.width) + 1;
  return x.signExtended(width).add(y.signExtended(width)).truncate(width);
}

export function signedMult(a: WireLike, b: WireLike): WireVector {
  const block = blockOf(a, b);
  const x = asWires(block, a);
  const y = asWires(block, b);
  const width = x.width + y.width;
  return x.signExtended(width).mul(y.signExtended(width)).truncate(width);
}

// a < b exactly when the borrow of a - b disagrees with the operands' signs
export function signedLt(a: WireLike, b: WireLike): WireVector {
  const [x, y] = matchBitwidth([a, b], true);
  const borrow = x.sub(y).bit(-1);
  return borrow.xor(x.bit(-1)).xor(y.bit(-1));
}

export function signedLe(a: WireLike, b: WireLike): WireVector {
  const [x, y] = matchBitwidth([a, b], true);
  return signedLt(x, y).or(x.eq(y));
}

export function signedGt(a: WireLike, b: WireLike): WireVector {
  return signedLt(b, a);
}

export function signedGe(a: WireLike, b: WireLike): WireVector {
  return signedLe(b, a);
}

/**
 * Expose `wire` as an Output so simulations and traces can see it.
 * Returns `wire` so the probe can be inserted inline.
 */
export function probe(wire: WireVector, name?: string): WireVector {
  const block = wire.block;
  const out = new Output(block, wire.width, name ?? block.uniqueName(`probe_${wire.name}_`));
  out.connect(wire);
  return wire;
}

/**
 * Hardware assertion: simulation fails with `message` in any cycle where the
 * 1-bit `wire` is 0.
 */
export function rtlAssert(wire: WireLike, message: string): Output {
  const block = blockOf(wire);
  const w = asWires(block, wire);
  if (w.width !== 1) {
    throw new ConstructionError(`rtlAssert needs a 1-bit wire, "${w.name}" is ${w.width} bits`);
  }
  const out = new Output(block, 1, block.uniqueName('assert'));
  out.connect(w);
  block.addAssertion(out, message);
  return out;
}

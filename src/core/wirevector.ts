// WireVector family: the typed, fixed-width value nodes of the block graph
//
// Every operator builds a new destination wire plus the LogicNet that drives
// it; operands are never modified. Bit 0 is the least significant bit.

import type { Block } from './block.js';
import { ConstructionError, ConditionalError } from './errors.js';
import { plainNet, bitSelectNet } from '../types/netlist.js';
import type { BinaryOp } from '../types/netlist.js';

export type WireKind = 'wire' | 'input' | 'output' | 'const' | 'register';

// Values accepted wherever a wire is expected; non-wires become Consts
export type ConstValue = number | bigint | boolean | string;
export type WireLike = WireVector | ConstValue;

const KIND_CODE: Record<WireKind, string> = {
  wire: 'W',
  input: 'I',
  output: 'O',
  const: 'C',
  register: 'R',
};

export function checkBitwidth(bitwidth: number, what: string): void {
  if (!Number.isInteger(bitwidth) || bitwidth <= 0) {
    throw new ConstructionError(`${what} needs a positive integer bitwidth, got ${bitwidth}`);
  }
}

export class WireVector {
  readonly block: Block;
  readonly name: string;
  private declaredBitwidth: number | undefined;

  constructor(block: Block, bitwidth?: number, name?: string) {
    if (bitwidth !== undefined) {
      checkBitwidth(bitwidth, `wire "${name ?? '<unnamed>'}"`);
    }
    this.block = block;
    this.name = block.nextTempName(name);
    this.declaredBitwidth = bitwidth;
    block.addWireVector(this);
  }

  get kind(): WireKind {
    return 'wire';
  }

  /**
   * Declared bitwidth, or undefined until the first unconditional connect
   * fixes it.
   */
  get bitwidth(): number | undefined {
    return this.declaredBitwidth;
  }

  /**
   * Bitwidth of a wire that is about to be used; throws if it was never fixed.
   */
  get width(): number {
    if (this.declaredBitwidth === undefined) {
      throw new ConstructionError(`wire "${this.name}" is used before its bitwidth is defined`);
    }
    return this.declaredBitwidth;
  }

  /** @internal Fix a bitwidth that was left undefined at construction. */
  inferBitwidth(bitwidth: number): void {
    if (this.declaredBitwidth !== undefined) {
      throw new ConstructionError(`wire "${this.name}" already has bitwidth ${this.declaredBitwidth}`);
    }
    checkBitwidth(bitwidth, `wire "${this.name}"`);
    this.declaredBitwidth = bitwidth;
  }

  toString(): string {
    return `${this.name}/${this.declaredBitwidth ?? '?'}${KIND_CODE[this.kind]}`;
  }

  // Connection

  /**
   * Drive this wire from `value` (the `<<=` connection). A wire is driven by
   * exactly one net. Narrower values are zero-extended and wider ones
   * truncated to this wire's bitwidth; an undefined bitwidth is taken from
   * the value.
   */
  connect(value: WireLike): this {
    if (this.block.activeConditional?.isPending(this)) {
      throw new ConditionalError(
        `wire "${this.name}" is already assigned under the open conditional and cannot also be connected`
      );
    }
    const rhs = asWires(this.block, value, this.declaredBitwidth);
    if (this.declaredBitwidth === undefined) {
      this.inferBitwidth(rhs.width);
    }
    this.block.addNet(plainNet('wire', [rhs], [this]));
    return this;
  }

  /**
   * Conditional connection: records `value` under the predicate scope that is
   * currently open. Only valid inside conditionalAssignment.
   */
  assign(value: WireLike): this {
    this.block.requireConditional(this.name).recordWire(this, value);
    return this;
  }

  // Bitwise and arithmetic operators

  and(other: WireLike): WireVector {
    return this.logicOp(other, 'and');
  }

  or(other: WireLike): WireVector {
    return this.logicOp(other, 'or');
  }

  xor(other: WireLike): WireVector {
    return this.logicOp(other, 'xor');
  }

  nand(other: WireLike): WireVector {
    return this.logicOp(other, 'nand');
  }

  add(other: WireLike): WireVector {
    return this.logicOp(other, 'add');
  }

  sub(other: WireLike): WireVector {
    return this.logicOp(other, 'sub');
  }

  mul(other: WireLike): WireVector {
    return this.logicOp(other, 'mul');
  }

  not(): WireVector {
    const dest = new WireVector(this.block, this.width);
    this.block.addNet(plainNet('not', [this], [dest]));
    return dest;
  }

  // Unsigned comparisons, each a single bit

  lt(other: WireLike): WireVector {
    return this.logicOp(other, 'lt');
  }

  gt(other: WireLike): WireVector {
    return this.logicOp(other, 'gt');
  }

  eq(other: WireLike): WireVector {
    return this.logicOp(other, 'eq');
  }

  ne(other: WireLike): WireVector {
    return this.eq(other).not();
  }

  le(other: WireLike): WireVector {
    return this.lt(other).or(this.eq(other));
  }

  ge(other: WireLike): WireVector {
    return this.gt(other).or(this.eq(other));
  }

  // Bit selection

  /**
   * Select arbitrary bits: result bit k is source bit `indices[k]`.
   * Negative indices count back from the most significant bit.
   */
  bits(indices: readonly number[]): WireVector {
    const width = this.width;
    if (indices.length === 0) {
      throw new ConstructionError(`bit selection from "${this.name}" must pick at least one bit`);
    }
    const selected = indices.map((i) => {
      const index = i < 0 ? width + i : i;
      if (!Number.isInteger(index) || index < 0 || index >= width) {
        throw new ConstructionError(`bit index ${i} is out of range for "${this.name}" (bitwidth ${width})`);
      }
      return index;
    });
    const dest = new WireVector(this.block, selected.length);
    this.block.addNet(bitSelectNet(selected, this, dest));
    return dest;
  }

  bit(index: number): WireVector {
    return this.bits([index]);
  }

  /**
   * Bits `start` (inclusive) to `end` (exclusive), clamped to the wire;
   * negative bounds count back from the most significant bit.
   */
  slice(start: number = 0, end?: number): WireVector {
    const width = this.width;
    const clamp = (i: number): number => Math.min(width, Math.max(0, i < 0 ? width + i : i));
    const lo = clamp(start);
    const hi = clamp(end ?? width);
    if (hi <= lo) {
      throw new ConstructionError(`slice [${start}, ${end ?? width}) of "${this.name}" selects no bits`);
    }
    const indices: number[] = [];
    for (let i = lo; i < hi; i++) {
      indices.push(i);
    }
    return this.bits(indices);
  }

  // Width changes

  zeroExtended(bitwidth: number): WireVector {
    const ext = this.extensionWidth(bitwidth);
    if (ext === 0) return this;
    return concatWires(this.block, [new Const(this.block, 0, ext), this]);
  }

  signExtended(bitwidth: number): WireVector {
    const ext = this.extensionWidth(bitwidth);
    if (ext === 0) return this;
    const msb = this.bit(-1);
    return concatWires(this.block, [msb.bits(new Array<number>(ext).fill(0)), this]);
  }

  truncate(bitwidth: number): WireVector {
    checkBitwidth(bitwidth, `truncation of "${this.name}"`);
    if (bitwidth > this.width) {
      throw new ConstructionError(
        `cannot truncate "${this.name}" (bitwidth ${this.width}) to a larger bitwidth ${bitwidth}`
      );
    }
    return bitwidth === this.width ? this : this.slice(0, bitwidth);
  }

  private extensionWidth(bitwidth: number): number {
    checkBitwidth(bitwidth, `extension of "${this.name}"`);
    const ext = bitwidth - this.width;
    if (ext < 0) {
      throw new ConstructionError(
        `cannot extend "${this.name}" (bitwidth ${this.width}) to a smaller bitwidth ${bitwidth}`
      );
    }
    return ext;
  }

  // Operands are zero-extended to a common width before the net is built
  private logicOp(other: WireLike, op: BinaryOp): WireVector {
    let a: WireVector = this;
    let b = asWires(this.block, other);
    const width = Math.max(a.width, b.width);
    a = a.zeroExtended(width);
    b = b.zeroExtended(width);

    let resultWidth = width;
    if (op === 'add' || op === 'sub') {
      resultWidth = width + 1;
    } else if (op === 'mul') {
      resultWidth = width * 2;
    } else if (op === 'lt' || op === 'gt' || op === 'eq') {
      resultWidth = 1;
    }

    const dest = new WireVector(this.block, resultWidth);
    this.block.addNet(plainNet(op, [a, b], [dest]));
    return dest;
  }
}

/**
 * A wire whose value is supplied by the caller on every simulation step.
 */
export class Input extends WireVector {
  constructor(block: Block, bitwidth: number, name?: string) {
    checkBitwidth(bitwidth, `input "${name ?? '<unnamed>'}"`);
    super(block, bitwidth, name);
  }

  override get kind(): WireKind {
    return 'input';
  }

  override connect(_value: WireLike): this {
    throw new ConstructionError(`input "${this.name}" cannot be driven from inside the block`);
  }

  override assign(_value: WireLike): this {
    throw new ConditionalError(`input "${this.name}" cannot be assigned from inside the block`);
  }
}

/**
 * A wire visible outside the block; nothing inside the block may read it.
 */
export class Output extends WireVector {
  override get kind(): WireKind {
    return 'output';
  }
}

interface ParsedConst {
  value: bigint;
  bitwidth: number;
}

const VERILOG_CONST = /^(\d+)'([bodh])([0-9a-f_]+)$/i;

const VERILOG_DIGITS: Record<string, { pattern: RegExp; prefix: string }> = {
  b: { pattern: /^[01]+$/, prefix: '0b' },
  o: { pattern: /^[0-7]+$/, prefix: '0o' },
  d: { pattern: /^[0-9]+$/, prefix: '' },
  h: { pattern: /^[0-9a-f]+$/i, prefix: '0x' },
};

function minimumBitwidth(value: bigint): number {
  return value === 0n ? 1 : value.toString(2).length;
}

function parseVerilogConst(text: string): ParsedConst {
  const match = VERILOG_CONST.exec(text);
  if (!match) {
    throw new ConstructionError(`"${text}" is not a Verilog-style constant such as "8'hff"`);
  }
  const bitwidth = Number(match[1]);
  const base = VERILOG_DIGITS[match[2].toLowerCase()];
  const digits = match[3].replace(/_/g, '');
  if (!base.pattern.test(digits)) {
    throw new ConstructionError(`"${text}" has digits that do not match its base`);
  }
  return { value: BigInt(base.prefix + digits), bitwidth };
}

/**
 * Convert a constant to its unsigned storage value and bitwidth. Negative
 * integers need an explicit bitwidth and are stored as two's complement.
 */
export function parseConst(value: ConstValue, bitwidth?: number): ParsedConst {
  if (bitwidth !== undefined) {
    checkBitwidth(bitwidth, 'constant');
  }

  let parsed: ParsedConst;
  if (typeof value === 'boolean') {
    if (bitwidth !== undefined && bitwidth !== 1) {
      throw new ConstructionError(`boolean constant cannot have bitwidth ${bitwidth}`);
    }
    parsed = { value: value ? 1n : 0n, bitwidth: 1 };
  } else if (typeof value === 'string') {
    if (bitwidth !== undefined) {
      throw new ConstructionError(
        `constant "${value}" carries its own width; pass no bitwidth with a Verilog-style string`
      );
    }
    parsed = parseVerilogConst(value);
    checkBitwidth(parsed.bitwidth, `constant "${value}"`);
  } else if (typeof value === 'number' || typeof value === 'bigint') {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new ConstructionError(`constant ${value} is not a safe integer; pass a bigint instead`);
    }
    const n = BigInt(value);
    if (n >= 0n) {
      parsed = { value: n, bitwidth: bitwidth ?? minimumBitwidth(n) };
    } else {
      if (bitwidth === undefined) {
        throw new ConstructionError(`negative constant ${n} needs an explicit bitwidth`);
      }
      if (n < -(1n << BigInt(bitwidth - 1))) {
        throw new ConstructionError(`negative constant ${n} does not fit in ${bitwidth} bits`);
      }
      parsed = { value: n & ((1n << BigInt(bitwidth)) - 1n), bitwidth };
    }
  } else {
    throw new ConstructionError(`cannot make a constant from a value of type ${typeof value}`);
  }

  if (parsed.value >> BigInt(parsed.bitwidth) !== 0n) {
    throw new ConstructionError(`constant ${parsed.value} does not fit in ${parsed.bitwidth} bits`);
  }
  return parsed;
}

/**
 * A wire that always holds one value.
 */
export class Const extends WireVector {
  readonly value: bigint;

  constructor(block: Block, value: ConstValue, bitwidth?: number) {
    const parsed = parseConst(value, bitwidth);
    super(block, parsed.bitwidth, block.nextConstName(parsed.value));
    this.value = parsed.value;
  }

  override get kind(): WireKind {
    return 'const';
  }

  override connect(_value: WireLike): this {
    throw new ConstructionError(`constant "${this.name}" cannot be driven`);
  }

  override assign(_value: WireLike): this {
    throw new ConditionalError(`constant "${this.name}" cannot be assigned`);
  }
}

/**
 * A wire with a state element: its value in a cycle is what `next` held at
 * the end of the previous cycle. With no next connection it keeps its value.
 *
 *   counter.next.connect(counter.add(1))
 */
export class Register extends WireVector {
  private driver: WireVector | undefined;
  private readonly nextHandle: RegisterNext;

  constructor(block: Block, bitwidth: number, name?: string) {
    checkBitwidth(bitwidth, `register "${name ?? '<unnamed>'}"`);
    super(block, bitwidth, name);
    this.nextHandle = new RegisterNext(this);
  }

  override get kind(): WireKind {
    return 'register';
  }

  // Handle for setting the value latched at the next clock edge
  get next(): RegisterNext {
    return this.nextHandle;
  }

  // The wire the register latches each cycle, once it has been connected
  get nextWire(): WireVector | undefined {
    return this.driver;
  }

  override connect(_value: WireLike): this {
    throw new ConstructionError(`register "${this.name}" cannot be connected directly; use .next`);
  }

  override assign(_value: WireLike): this {
    throw new ConditionalError(`register "${this.name}" cannot be assigned directly; use .next`);
  }

  /** @internal Add the register net latching `value`. */
  buildRegister(value: WireVector): void {
    if (this.driver !== undefined) {
      throw new ConstructionError(`next value of register "${this.name}" is set more than once`);
    }
    this.block.addNet(plainNet('register', [value], [this]));
    this.driver = value;
  }
}

export class RegisterNext {
  constructor(readonly register: Register) {}

  connect(value: WireLike): Register {
    const reg = this.register;
    if (reg.block.activeConditional?.isPending(reg)) {
      throw new ConditionalError(
        `register "${reg.name}" is already assigned under the open conditional and cannot also be connected`
      );
    }
    reg.buildRegister(asWires(reg.block, value, reg.width));
    return reg;
  }

  assign(value: WireLike): Register {
    const reg = this.register;
    reg.block.requireConditional(reg.name).recordRegister(reg, value);
    return reg;
  }
}

/**
 * The one explicit conversion from plain values to wires. Integers, booleans
 * and Verilog-style strings become Consts. With a bitwidth, narrower wires are
 * zero-extended and wider ones truncated, or rejected when `truncating` is
 * false.
 */
export function asWires(
  block: Block,
  value: WireLike,
  bitwidth?: number,
  truncating: boolean = true
): WireVector {
  if (!(value instanceof WireVector)) {
    return new Const(block, value, bitwidth);
  }
  if (value.block !== block) {
    throw new ConstructionError(
      `wire "${value.name}" belongs to a different block than the one it is being used in`
    );
  }
  const width = value.width;
  if (bitwidth === undefined || bitwidth === width) {
    return value;
  }
  if (bitwidth > width) {
    return value.zeroExtended(bitwidth);
  }
  if (!truncating) {
    throw new ConstructionError(`wire "${value.name}" (bitwidth ${width}) is wider than ${bitwidth} bits`);
  }
  return value.truncate(bitwidth);
}

/**
 * Find the block shared by every wire in `args`; plain values have none.
 */
export function blockOf(...args: unknown[]): Block {
  let block: Block | undefined;
  for (const arg of args) {
    if (arg instanceof WireVector) {
      if (block !== undefined && arg.block !== block) {
        throw new ConstructionError(`wire "${arg.name}" belongs to a different block than the other operands`);
      }
      block = arg.block;
    }
  }
  if (block === undefined) {
    throw new ConstructionError('at least one operand must be a WireVector to know which block to build in');
  }
  return block;
}

/** @internal Concatenate wires, first one in the most significant bits. */
export function concatWires(block: Block, wires: readonly WireVector[]): WireVector {
  if (wires.length === 1) {
    return wires[0];
  }
  const width = wires.reduce((sum, w) => sum + w.width, 0);
  const dest = new WireVector(block, width);
  block.addNet(plainNet('concat', wires, [dest]));
  return dest;
}

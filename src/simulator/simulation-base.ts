// Simulation controller shared by every engine
//
// The base class owns everything that does not depend on how nets are
// evaluated: construction checks, initial state, input validation, hardware
// assertions, the cycle counter, stepMultiple and tracing. Engines implement
// evaluate/commit/discard over their own state.

import type { Block } from '../core/block.js';
import { Input, Register, Const } from '../core/wirevector.js';
import type { WireVector } from '../core/wirevector.js';
import type { MemBlockBase } from '../core/memory.js';
import { SimulationError, OutputMismatchError } from '../core/errors.js';
import type { OutputMismatch } from '../core/errors.js';
import { toUnsigned, valueToSigned } from '../core/values.js';
import { levelize } from '../circuit/levelizer.js';
import type { LevelizedBlock } from '../circuit/levelizer.js';
import type { SimulationTrace } from './trace.js';

export type Value = number | bigint;

// Initial contents of one memory: address -> value
export type MemoryInit = ReadonlyMap<Value, Value> | Readonly<Record<string, Value>>;

export interface SimulationOptions {
  registerValueMap?: ReadonlyMap<Register | string, Value> | Readonly<Record<string, Value>>;
  memoryValueMap?: ReadonlyMap<MemBlockBase, MemoryInit>;
  // Initial value of registers and memory words not given above
  defaultValue?: Value;
  tracer?: SimulationTrace;
}

export type StepInputs = ReadonlyMap<Input | string, Value> | Readonly<Record<string, Value>>;

// One string of digits (one character per cycle) or one value per cycle
export type Sequence = string | readonly Value[];

export interface StepMultipleOptions {
  nsteps?: number;
  stopAfterFirstError?: boolean;
}

function isMap<K, V>(source: ReadonlyMap<K, V> | Readonly<Record<string, V>>): source is ReadonlyMap<K, V> {
  return source instanceof Map;
}

function entriesOf<K, V>(source: ReadonlyMap<K, V> | Readonly<Record<string, V>>): [K | string, V][] {
  return isMap(source) ? [...source.entries()] : Object.entries(source);
}

export abstract class SimulationBase {
  readonly block: Block;
  readonly tracer: SimulationTrace | undefined;
  readonly defaultValue: bigint;

  protected readonly levelized: LevelizedBlock;
  // Wire lists as of construction
  protected readonly inputWires: ReadonlySet<Input>;
  protected readonly constWires: readonly Const[];
  protected readonly initialRegisters: ReadonlyMap<Register, bigint>;
  protected readonly initialMemories: ReadonlyMap<MemBlockBase, ReadonlyMap<bigint, bigint>>;

  private cycleCount = 0;

  constructor(block: Block, options: SimulationOptions = {}) {
    block.sanityCheck();
    this.block = block;
    this.levelized = levelize(block);
    this.inputWires = new Set(block.inputs);
    this.constWires = block.consts;

    const defaultValue = options.defaultValue ?? 0;
    if (typeof defaultValue === 'number' && !Number.isSafeInteger(defaultValue)) {
      throw new SimulationError(`default value ${defaultValue} is not an integer`);
    }
    this.defaultValue = BigInt(defaultValue);
    if (this.defaultValue < 0n) {
      throw new SimulationError(`default value ${this.defaultValue} is negative`);
    }

    this.initialRegisters = this.resolveRegisters(options.registerValueMap);
    this.initialMemories = this.resolveMemories(options.memoryValueMap);

    if (options.tracer && options.tracer.block !== block) {
      throw new SimulationError('tracer was created for a different block');
    }
    this.tracer = options.tracer;
  }

  // Engine hooks

  /** Evaluate every combinational net for one cycle without committing. */
  protected abstract evaluate(inputs: ReadonlyMap<Input, bigint>): void;

  /** Value a wire took in the evaluation that has not been committed yet. */
  protected abstract pendingValue(wire: WireVector): bigint;

  /** Latch registers and memory writes; the evaluation becomes current. */
  protected abstract commit(): void;

  /** Drop an evaluation that failed or was rejected. */
  protected abstract discard(): void;

  /** Current value: registers post-commit, other wires from the last step. */
  protected abstract currentValue(wire: WireVector): bigint;

  /** Words of a writable memory; addresses left out hold the default word. */
  protected abstract memoryWords(mem: MemBlockBase): Iterable<[bigint, bigint]>;

  // Stepping

  /**
   * Run one clock cycle with the given input values.
   */
  step(inputs: StepInputs = {}): void {
    const values = this.validateInputs(inputs);
    try {
      this.evaluate(values);
      this.checkAssertions();
    } catch (e) {
      this.discard();
      throw e;
    }
    this.commit();
    this.cycleCount++;
    this.tracer?.record(this);
  }

  /**
   * Run several cycles from per-input sequences, comparing outputs against
   * `expected` after each step.
   *
   *   sim.stepMultiple({ a: '0101' }, { q: '0010' })
   */
  stepMultiple(
    inputs: Readonly<Record<string, Sequence>>,
    expected: Readonly<Record<string, Sequence>> = {},
    options: StepMultipleOptions = {}
  ): void {
    const all = [...Object.entries(inputs), ...Object.entries(expected)];
    let nsteps = options.nsteps;
    if (nsteps === undefined) {
      if (all.length === 0) {
        throw new SimulationError('stepMultiple needs input sequences or nsteps');
      }
      nsteps = all[0][1].length;
      for (const [name, seq] of all) {
        if (seq.length !== nsteps) {
          throw new SimulationError(
            `sequence for "${name}" has ${seq.length} entries, expected ${nsteps}; pass nsteps to run fewer`
          );
        }
      }
    } else {
      if (!Number.isInteger(nsteps) || nsteps < 0) {
        throw new SimulationError(`nsteps must be a non-negative integer, got ${nsteps}`);
      }
      for (const [name, seq] of all) {
        if (seq.length < nsteps) {
          throw new SimulationError(`sequence for "${name}" has only ${seq.length} entries for ${nsteps} steps`);
        }
      }
    }

    const mismatches: OutputMismatch[] = [];
    for (let i = 0; i < nsteps; i++) {
      const stepInputs: Record<string, Value> = {};
      for (const [name, seq] of Object.entries(inputs)) {
        stepInputs[name] = sequenceValue(name, seq, i);
      }
      this.step(stepInputs);

      for (const [name, seq] of Object.entries(expected)) {
        const want = BigInt(sequenceValue(name, seq, i));
        const actual = this.inspect(name);
        if (actual !== want) {
          mismatches.push({ cycle: i, wire: name, expected: want, actual });
          if (options.stopAfterFirstError) {
            throw new OutputMismatchError(mismatches);
          }
        }
      }
    }
    if (mismatches.length > 0) {
      throw new OutputMismatchError(mismatches);
    }
  }

  // Inspection

  get cycle(): number {
    return this.cycleCount;
  }

  inspect(wire: WireVector | string): bigint {
    const w = this.resolveWire(wire);
    if (this.cycleCount === 0 && !(w instanceof Register) && !(w instanceof Const)) {
      throw new SimulationError(`"${w.name}" has not been computed yet; call step() first`);
    }
    return this.currentValue(w);
  }

  // Two's-complement view of inspect()
  inspectSigned(wire: WireVector | string): bigint {
    const w = this.resolveWire(wire);
    return valueToSigned(this.inspect(w), w.width);
  }

  /**
   * Contents of a writable memory, listing the addresses whose word differs
   * from the default value.
   */
  inspectMem(mem: MemBlockBase): ReadonlyMap<bigint, bigint> {
    this.checkMemory(mem);
    if (mem.readOnly) {
      throw new SimulationError(`"${mem.name}" is a ROM; read its contents with readData()`);
    }
    const fallback = this.defaultWord(mem);
    const contents = new Map<bigint, bigint>();
    for (const [addr, value] of this.memoryWords(mem)) {
      if (value !== fallback) {
        contents.set(addr, value);
      }
    }
    return new Map([...contents].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }

  // Helpers for engines

  protected resolveWire(wire: WireVector | string): WireVector {
    if (typeof wire === 'string') {
      const found = this.block.getWireVectorByName(wire);
      if (!found) {
        throw new SimulationError(`no wire named "${wire}" in the simulated block`);
      }
      return found;
    }
    if (wire.block !== this.block) {
      throw new SimulationError(`wire "${wire.name}" does not belong to the simulated block`);
    }
    return wire;
  }

  // Register initial value, default value truncated to the register's width
  protected initialValue(reg: Register): bigint {
    return this.initialRegisters.get(reg) ?? this.defaultValue & ((1n << BigInt(reg.width)) - 1n);
  }

  protected defaultWord(mem: MemBlockBase): bigint {
    return this.defaultValue & ((1n << BigInt(mem.bitwidth)) - 1n);
  }

  private checkMemory(mem: MemBlockBase): void {
    if (mem.block !== this.block) {
      throw new SimulationError(`memory "${mem.name}" does not belong to the simulated block`);
    }
  }

  private validateInputs(inputs: StepInputs): Map<Input, bigint> {
    const values = new Map<Input, bigint>();
    for (const [key, value] of entriesOf(inputs)) {
      const wire = typeof key === 'string' ? this.block.getWireVectorByName(key) : key;
      if (!(wire instanceof Input) || !this.inputWires.has(wire)) {
        const name = typeof key === 'string' ? key : key.name;
        throw new SimulationError(`"${name}" is not an input of the simulated block`);
      }
      values.set(wire, toUnsigned(value, wire.width, `input "${wire.name}"`));
    }
    const missing = [...this.inputWires].filter((i) => !values.has(i)).map((i) => i.name);
    if (missing.length > 0) {
      throw new SimulationError(`no value given for input(s) ${missing.join(', ')}`);
    }
    return values;
  }

  private checkAssertions(): void {
    for (const [wire, message] of this.block.assertions) {
      if (this.pendingValue(wire) === 0n) {
        throw new SimulationError(`assertion "${wire.name}" failed in cycle ${this.cycleCount}: ${message}`);
      }
    }
  }

  private resolveRegisters(source: SimulationOptions['registerValueMap']): Map<Register, bigint> {
    const result = new Map<Register, bigint>();
    if (!source) return result;
    for (const [key, value] of entriesOf(source)) {
      const reg = typeof key === 'string' ? this.block.getWireVectorByName(key) : key;
      if (!(reg instanceof Register) || reg.block !== this.block) {
        const name = typeof key === 'string' ? key : key.name;
        throw new SimulationError(`"${name}" is not a register of the simulated block`);
      }
      result.set(reg, toUnsigned(value, reg.width, `initial value of register "${reg.name}"`));
    }
    return result;
  }

  private resolveMemories(
    source: SimulationOptions['memoryValueMap']
  ): Map<MemBlockBase, Map<bigint, bigint>> {
    const result = new Map<MemBlockBase, Map<bigint, bigint>>();
    if (!source) return result;
    for (const [mem, init] of source) {
      this.checkMemory(mem);
      if (mem.readOnly) {
        throw new SimulationError(`ROM "${mem.name}" cannot be given initial contents`);
      }
      const words = new Map<bigint, bigint>();
      for (const [key, value] of entriesOf(init)) {
        const address = toUnsigned(typeof key === 'string' ? Number(key) : key, mem.addrwidth, `address in "${mem.name}"`);
        words.set(address, toUnsigned(value, mem.bitwidth, `initial word ${address} of "${mem.name}"`));
      }
      result.set(mem, words);
    }
    return result;
  }
}

function sequenceValue(name: string, seq: Sequence, index: number): Value {
  if (typeof seq !== 'string') {
    return seq[index];
  }
  const ch = seq[index];
  if (!/^[0-9]$/.test(ch)) {
    throw new SimulationError(`sequence for "${name}" has "${ch}" at position ${index}; only digits are allowed`);
  }
  return Number(ch);
}

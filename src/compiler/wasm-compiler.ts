// WASM Code Generator using Binaryen
// Generates block-specific WASM for simulation speed
//
// Every wire owns one i32 word of linear memory. Each combinational net
// becomes one load/compute/store statement with its slot offsets and masks
// baked in as constants; registers and memory writes get a separate commit
// function so the caller can check assertions in between.

import binaryen from 'binaryen';
import type { Block } from '../core/block.js';
import type { WireVector } from '../core/wirevector.js';
import type { MemBlockBase } from '../core/memory.js';
import { SimulationError, RtlInternalError } from '../core/errors.js';
import type { LogicNet } from '../types/netlist.js';
import type { LevelizedBlock } from '../circuit/levelizer.js';

// Limits of the i32 encoding
export const WASM_MAX_BITWIDTH = 32;
export const WASM_MAX_ADDRWIDTH = 16;

const PAGE_BYTES = 65536;

/**
 * Word indices into linear memory:
 * [ wire slots | register staging | memory 0 | memory 1 | ... ]
 */
export interface WasmLayout {
  slots: ReadonlyMap<WireVector, number>;
  // Keyed by register
  staging: ReadonlyMap<WireVector, number>;
  memories: ReadonlyMap<MemBlockBase, number>;
  wireWords: number;
  totalWords: number;
}

export interface CompiledWasmBlock {
  wasmModule: WebAssembly.Module;
  wasmInstance: WebAssembly.Instance;
  memory: WebAssembly.Memory;
  layout: WasmLayout;
  // Evaluate combinational logic only
  evaluate: () => void;
  // Sample register next values and enabled writes, then apply them
  commit: () => void;
}

/**
 * Why a block cannot be compiled to WASM, or undefined when it can.
 */
export function unsupportedReason(block: Block): string | undefined {
  for (const wire of block.wirevectors) {
    if ((wire.bitwidth ?? 0) > WASM_MAX_BITWIDTH) {
      return `wire "${wire.name}" is ${wire.bitwidth} bits wide; WASM simulation supports at most ${WASM_MAX_BITWIDTH}`;
    }
  }
  for (const mem of block.memories) {
    if (mem.addrwidth > WASM_MAX_ADDRWIDTH) {
      return `memory "${mem.name}" has a ${mem.addrwidth}-bit address; WASM simulation supports at most ${WASM_MAX_ADDRWIDTH}`;
    }
  }
  return undefined;
}

function computeLayout(levelized: LevelizedBlock): WasmLayout {
  const { block } = levelized;
  const slots = new Map<WireVector, number>();
  block.wirevectors.forEach((w, i) => slots.set(w, i));

  let next = slots.size;
  const staging = new Map<WireVector, number>();
  for (const reg of block.registers) {
    staging.set(reg, next++);
  }
  const memories = new Map<MemBlockBase, number>();
  for (const mem of block.memories) {
    memories.set(mem, next);
    next += mem.size;
  }
  return { slots, staging, memories, wireWords: slots.size, totalWords: next };
}

/**
 * Compile a levelized block to WASM
 *
 * The generated WASM exports:
 * - evaluate(): every combinational net in levelized order
 * - commit(): the clock edge (registers and memory writes)
 */
export function compileToWasm(levelized: LevelizedBlock): CompiledWasmBlock {
  const reason = unsupportedReason(levelized.block);
  if (reason !== undefined) {
    throw new SimulationError(`Block cannot be compiled to WASM: ${reason}`);
  }

  const layout = computeLayout(levelized);
  const mod = new binaryen.Module();

  // Import memory (shared with JS)
  // Note: Do NOT call setMemory after addMemoryImport - it overwrites the import!
  mod.addMemoryImport('0', 'env', 'memory');

  const gen = new ExpressionBuilder(mod, layout);
  generateEvaluateFunction(mod, gen, levelized);
  generateCommitFunction(mod, gen, levelized);

  // Level 2 keeps clear of the LocalCSE bug in higher levels
  binaryen.setOptimizeLevel(2);
  binaryen.setShrinkLevel(0);
  mod.optimize();

  if (!mod.validate()) {
    mod.dispose();
    throw new RtlInternalError('Generated WASM module is invalid');
  }

  const binary = mod.emitBinary();
  mod.dispose();

  const memoryPages = Math.max(1, Math.ceil((layout.totalWords * 4) / PAGE_BYTES));
  const memory = new WebAssembly.Memory({
    initial: memoryPages,
    maximum: memoryPages,
    shared: false,
  });

  const wasmModule = new WebAssembly.Module(binary);
  const wasmInstance = new WebAssembly.Instance(wasmModule, {
    env: { memory },
  });

  const exports = wasmInstance.exports as {
    evaluate: () => void;
    commit: () => void;
  };

  return {
    wasmModule,
    wasmInstance,
    memory,
    layout,
    evaluate: exports.evaluate,
    commit: exports.commit,
  };
}

// Builds i32 expressions over the slots of one layout
class ExpressionBuilder {
  constructor(
    private readonly mod: binaryen.Module,
    private readonly layout: WasmLayout
  ) {}

  slot(wire: WireVector): number {
    const slot = this.layout.slots.get(wire);
    if (slot === undefined) {
      throw new RtlInternalError(`wire "${wire.name}" has no WASM slot`);
    }
    return slot;
  }

  load(wire: WireVector): binaryen.ExpressionRef {
    return this.mod.i32.load(0, 4, this.mod.i32.const(this.slot(wire) * 4));
  }

  store(wire: WireVector, value: binaryen.ExpressionRef): binaryen.ExpressionRef {
    return this.mod.i32.store(0, 4, this.mod.i32.const(this.slot(wire) * 4), value);
  }

  stagingWord(reg: WireVector): number {
    const word = this.layout.staging.get(reg);
    if (word === undefined) {
      throw new RtlInternalError(`register net drives "${reg.name}", which is not a Register`);
    }
    return word;
  }

  // Byte address of mem[addr]
  memAddress(mem: MemBlockBase, addr: WireVector): binaryen.ExpressionRef {
    const base = this.layout.memories.get(mem);
    if (base === undefined) {
      throw new RtlInternalError(`memory "${mem.name}" has no WASM region`);
    }
    return this.mod.i32.add(
      this.mod.i32.const(base * 4),
      this.mod.i32.shl(this.load(addr), this.mod.i32.const(2))
    );
  }

  mask(expr: binaryen.ExpressionRef, width: number): binaryen.ExpressionRef {
    if (width >= 32) {
      return expr;
    }
    return this.mod.i32.and(expr, this.mod.i32.const((2 ** width - 1) | 0));
  }

  /**
   * Value of a combinational net's destination, masked to its bitwidth
   */
  net(net: LogicNet): binaryen.ExpressionRef {
    if (net.op === 'register' || net.op === 'memwrite') {
      throw new RtlInternalError(`"${net.op}" net is not combinational`);
    }
    const { mod } = this;
    const width = net.dests[0].width;
    const a = (i: number): binaryen.ExpressionRef => this.load(net.args[i]);

    switch (net.op) {
      case 'wire':
        return this.mask(a(0), width);
      case 'not':
        return this.mask(mod.i32.xor(a(0), mod.i32.const(-1)), width);
      case 'and':
        return this.mask(mod.i32.and(a(0), a(1)), width);
      case 'or':
        return this.mask(mod.i32.or(a(0), a(1)), width);
      case 'xor':
        return this.mask(mod.i32.xor(a(0), a(1)), width);
      case 'nand':
        return this.mask(mod.i32.xor(mod.i32.and(a(0), a(1)), mod.i32.const(-1)), width);
      case 'add':
        return this.mask(mod.i32.add(a(0), a(1)), width);
      case 'sub':
        return this.mask(mod.i32.sub(a(0), a(1)), width);
      case 'mul':
        return this.mask(mod.i32.mul(a(0), a(1)), width);
      case 'lt':
        return mod.i32.lt_u(a(0), a(1));
      case 'gt':
        return mod.i32.gt_u(a(0), a(1));
      case 'eq':
        return mod.i32.eq(a(0), a(1));
      case 'select':
        // args: (sel, falseCase, trueCase)
        return this.mask(mod.select(a(0), a(2), a(1)), width);
      case 'concat': {
        let expr = a(0);
        for (let i = 1; i < net.args.length; i++) {
          expr = mod.i32.or(mod.i32.shl(expr, mod.i32.const(net.args[i].width)), a(i));
        }
        return this.mask(expr, width);
      }
      case 'bitselect': {
        const bits = net.param;
        if (bits.every((b, k) => b === bits[0] + k)) {
          return this.mask(mod.i32.shr_u(a(0), mod.i32.const(bits[0])), width);
        }
        let expr = mod.i32.const(0);
        bits.forEach((b, k) => {
          const bit = mod.i32.and(mod.i32.shr_u(a(0), mod.i32.const(b)), mod.i32.const(1));
          expr = mod.i32.or(expr, mod.i32.shl(bit, mod.i32.const(k)));
        });
        return expr;
      }
      case 'memread':
        return this.mask(mod.i32.load(0, 4, this.memAddress(net.param.mem, net.args[0])), width);
    }
  }
}

function generateEvaluateFunction(
  mod: binaryen.Module,
  gen: ExpressionBuilder,
  levelized: LevelizedBlock
): void {
  const statements: binaryen.ExpressionRef[] = [];
  for (const level of levelized.levels) {
    for (const net of level) {
      statements.push(gen.store(net.dests[0], gen.net(net)));
    }
  }

  mod.addFunction('evaluate', binaryen.none, binaryen.none, [], mod.block(null, statements));
  mod.addFunctionExport('evaluate', 'evaluate');
}

function generateCommitFunction(
  mod: binaryen.Module,
  gen: ExpressionBuilder,
  levelized: LevelizedBlock
): void {
  const statements: binaryen.ExpressionRef[] = [];
  const latched: [number, WireVector][] = [];

  // Step 1: Sample every register's next value into its staging word
  // Step 2: Apply enabled memory writes in declaration order
  for (const net of levelized.sequential) {
    if (net.op === 'register') {
      const reg = net.dests[0];
      const stagingWord = gen.stagingWord(reg);
      latched.push([stagingWord, reg]);
      statements.push(
        mod.i32.store(0, 4, mod.i32.const(stagingWord * 4), gen.mask(gen.load(net.args[0]), reg.width))
      );
    } else if (net.op === 'memwrite') {
      const [addr, data, enable] = net.args;
      statements.push(
        mod.if(gen.load(enable), mod.i32.store(0, 4, gen.memAddress(net.param.mem, addr), gen.load(data)))
      );
    }
  }

  // Step 3: Update all registers (clock edge)
  for (const [stagingWord, reg] of latched) {
    statements.push(gen.store(reg, mod.i32.load(0, 4, mod.i32.const(stagingWord * 4))));
  }

  mod.addFunction('commit', binaryen.none, binaryen.none, [], mod.block(null, statements));
  mod.addFunctionExport('commit', 'commit');
}

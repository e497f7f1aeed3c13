// WASM Simulation: runs the block as generated WebAssembly
//
// Wires up to 32 bits wide and memories with up to 16 address bits. ROM
// contents are copied into linear memory once, at construction.

import type { Block } from '../core/block.js';
import type { Input, WireVector } from '../core/wirevector.js';
import { RomBlock } from '../core/memory.js';
import type { MemBlockBase } from '../core/memory.js';
import { compileToWasm, unsupportedReason } from '../compiler/wasm-compiler.js';
import type { CompiledWasmBlock } from '../compiler/wasm-compiler.js';
import { SimulationBase } from './simulation-base.js';
import type { SimulationOptions } from './simulation-base.js';
import { SlotStore } from './slot-store.js';

export class WasmSimulation extends SimulationBase {
  private readonly compiled: CompiledWasmBlock;
  private readonly store: SlotStore;
  // Wire slots before the current evaluation
  private saved: Uint32Array | undefined;

  /**
   * Whether the block fits the i32 encoding.
   */
  static supports(block: Block): boolean {
    return unsupportedReason(block) === undefined;
  }

  constructor(block: Block, options: SimulationOptions = {}) {
    super(block, options);
    this.compiled = compileToWasm(this.levelized);
    this.store = new SlotStore(this.compiled.memory, this.compiled.layout);

    for (const c of this.constWires) {
      this.store.write(c, c.value);
    }
    for (const reg of block.registers) {
      this.store.write(reg, this.initialValue(reg));
    }
    for (const mem of block.memories) {
      if (mem instanceof RomBlock) {
        for (let addr = 0; addr < mem.size; addr++) {
          this.store.writeWord(mem, addr, mem.readData(addr));
        }
        continue;
      }
      const fallback = this.defaultWord(mem);
      if (fallback !== 0n) {
        for (let addr = 0; addr < mem.size; addr++) {
          this.store.writeWord(mem, addr, fallback);
        }
      }
      for (const [addr, value] of this.initialMemories.get(mem) ?? []) {
        this.store.writeWord(mem, Number(addr), value);
      }
    }
  }

  protected evaluate(inputs: ReadonlyMap<Input, bigint>): void {
    this.saved = this.store.snapshot();
    for (const [input, value] of inputs) {
      this.store.write(input, value);
    }
    this.compiled.evaluate();
  }

  protected pendingValue(wire: WireVector): bigint {
    return this.store.read(wire);
  }

  protected commit(): void {
    this.compiled.commit();
    this.saved = undefined;
  }

  protected discard(): void {
    if (this.saved !== undefined) {
      this.store.restore(this.saved);
      this.saved = undefined;
    }
  }

  protected currentValue(wire: WireVector): bigint {
    return this.store.read(wire);
  }

  protected *memoryWords(mem: MemBlockBase): Iterable<[bigint, bigint]> {
    for (let addr = 0; addr < mem.size; addr++) {
      yield [BigInt(addr), this.store.readWord(mem, addr)];
    }
  }
}

// Fast Simulation: runs the block as one compiled JavaScript function per cycle
//
// Same contract as the interpreting Simulation; the block is compiled once at
// construction and every step is a single call over an array of bigint slots.

import type { Block } from '../core/block.js';
import type { Input, WireVector } from '../core/wirevector.js';
import { RomBlock } from '../core/memory.js';
import type { MemBlockBase } from '../core/memory.js';
import { RtlInternalError } from '../core/errors.js';
import { mask } from '../core/values.js';
import { compileToJs } from '../compiler/js-compiler.js';
import type { CompiledBlock } from '../compiler/js-compiler.js';
import { SimulationBase } from './simulation-base.js';
import type { SimulationOptions } from './simulation-base.js';

export class FastSimulation extends SimulationBase {
  private readonly compiled: CompiledBlock;
  private current: bigint[];
  private pending: bigint[] | undefined;

  private readonly mems: Map<bigint, bigint>[];
  private readonly roms: (RomBlock | undefined)[];
  private readonly dflt: bigint[];

  constructor(block: Block, options: SimulationOptions = {}) {
    super(block, options);
    this.compiled = compileToJs(this.levelized);

    this.current = new Array<bigint>(this.compiled.slots.size).fill(0n);
    for (const c of this.constWires) {
      this.current[this.slotOf(c)] = c.value;
    }
    for (const reg of block.registers) {
      this.current[this.slotOf(reg)] = this.initialValue(reg);
    }

    this.mems = block.memories.map((m) => new Map(this.initialMemories.get(m)));
    this.roms = block.memories.map((m) => (m instanceof RomBlock ? m : undefined));
    this.dflt = block.memories.map((m) => this.defaultWord(m));
  }

  // Generated source of the per-cycle function
  get source(): string {
    return this.compiled.source;
  }

  protected evaluate(inputs: ReadonlyMap<Input, bigint>): void {
    const scratch = this.current.slice();
    for (const [input, value] of inputs) {
      scratch[this.slotOf(input)] = value;
    }
    this.compiled.evaluate(scratch, this.mems, this.roms, this.dflt);
    this.pending = scratch;
  }

  protected pendingValue(wire: WireVector): bigint {
    if (this.pending === undefined) {
      throw new RtlInternalError(`no pending value for "${wire.name}"`);
    }
    return this.pending[this.slotOf(wire)];
  }

  /**
   * Sample every register next value and enabled write port, then apply them
   */
  protected commit(): void {
    const v = this.pending;
    if (v === undefined) {
      throw new RtlInternalError('commit without an evaluated step');
    }

    const nextRegs: [number, bigint][] = [];
    const writes: [Map<bigint, bigint> | undefined, bigint, bigint][] = [];
    for (const net of this.levelized.sequential) {
      if (net.op === 'register') {
        const reg = net.dests[0];
        nextRegs.push([this.slotOf(reg), v[this.slotOf(net.args[0])] & mask(reg.width)]);
      } else if (net.op === 'memwrite') {
        const [addr, data, enable] = net.args.map((w) => v[this.slotOf(w)]);
        if (enable !== 0n) {
          writes.push([this.mems[this.memIndexOf(net.param.mem)], addr, data]);
        }
      }
    }

    for (const [contents, address, value] of writes) {
      contents?.set(address, value);
    }
    for (const [slot, value] of nextRegs) {
      v[slot] = value;
    }
    this.current = v;
    this.pending = undefined;
  }

  protected discard(): void {
    this.pending = undefined;
  }

  protected currentValue(wire: WireVector): bigint {
    return this.current[this.slotOf(wire)];
  }

  protected memoryWords(mem: MemBlockBase): Iterable<[bigint, bigint]> {
    return this.mems[this.memIndexOf(mem)];
  }

  private slotOf(wire: WireVector): number {
    const slot = this.compiled.slots.get(wire);
    if (slot === undefined) {
      throw new RtlInternalError(`wire "${wire.name}" has no slot`);
    }
    return slot;
  }

  private memIndexOf(mem: MemBlockBase): number {
    const index = this.compiled.memIndex.get(mem);
    if (index === undefined) {
      throw new RtlInternalError(`memory "${mem.name}" has no index`);
    }
    return index;
  }
}

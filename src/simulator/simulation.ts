// Simulation: interprets the levelized block net by net each cycle

import type { Block } from '../core/block.js';
import { Register, Const } from '../core/wirevector.js';
import type { Input, WireVector } from '../core/wirevector.js';
import type { MemBlockBase } from '../core/memory.js';
import { RtlInternalError } from '../core/errors.js';
import { mask } from '../core/values.js';
import { SimulationBase } from './simulation-base.js';
import type { SimulationOptions } from './simulation-base.js';
import { evaluateNet } from './js-kernel.js';

interface PendingWrite {
  mem: MemBlockBase;
  address: bigint;
  value: bigint;
}

export class Simulation extends SimulationBase {
  // Values of the last committed step; registers hold their post-commit value
  private values = new Map<WireVector, bigint>();
  private readonly registerState = new Map<Register, bigint>();
  private readonly memState = new Map<MemBlockBase, Map<bigint, bigint>>();

  private pending: Map<WireVector, bigint> | undefined;

  constructor(block: Block, options: SimulationOptions = {}) {
    super(block, options);

    for (const reg of block.registers) {
      const value = this.initialValue(reg);
      this.registerState.set(reg, value);
      this.values.set(reg, value);
    }
    for (const c of this.constWires) {
      this.values.set(c, c.value);
    }
    for (const mem of block.memories) {
      if (!mem.readOnly) {
        this.memState.set(mem, new Map(this.initialMemories.get(mem)));
      }
    }
  }

  /**
   * Evaluate all combinational logic in level order into a fresh value map
   */
  protected evaluate(inputs: ReadonlyMap<Input, bigint>): void {
    const values = new Map<WireVector, bigint>();
    for (const c of this.constWires) {
      values.set(c, c.value);
    }
    for (const [reg, value] of this.registerState) {
      values.set(reg, value);
    }
    for (const [input, value] of inputs) {
      values.set(input, value);
    }

    const state = {
      read: (wire: WireVector): bigint => {
        const value = values.get(wire);
        if (value === undefined) {
          throw new RtlInternalError(`"${wire.name}" read before it was evaluated`);
        }
        return value;
      },
      readMemory: (mem: MemBlockBase, address: bigint): bigint =>
        this.memState.get(mem)?.get(address) ?? this.defaultWord(mem),
    };

    for (const net of this.levelized.order) {
      values.set(net.dests[0], evaluateNet(net, state));
    }
    this.pending = values;
  }

  protected pendingValue(wire: WireVector): bigint {
    const value = this.pending?.get(wire);
    if (value === undefined) {
      throw new RtlInternalError(`no pending value for "${wire.name}"`);
    }
    return value;
  }

  /**
   * Update registers and memories (clock edge)
   * Samples every next value and write port before any state changes
   */
  protected commit(): void {
    const values = this.pending;
    if (values === undefined) {
      throw new RtlInternalError('commit without an evaluated step');
    }
    const read = (wire: WireVector): bigint => values.get(wire) ?? 0n;

    const nextRegs: [Register, bigint][] = [];
    const writes: PendingWrite[] = [];
    for (const net of this.levelized.sequential) {
      if (net.op === 'register') {
        const reg = net.dests[0];
        if (reg instanceof Register) {
          nextRegs.push([reg, read(net.args[0]) & mask(reg.width)]);
        }
      } else if (net.op === 'memwrite') {
        const [addr, data, enable] = net.args;
        if (read(enable) !== 0n) {
          writes.push({ mem: net.param.mem, address: read(addr), value: read(data) });
        }
      }
    }

    // Declaration order: with two writes to one address the later port wins
    for (const { mem, address, value } of writes) {
      this.memState.get(mem)?.set(address, value);
    }
    for (const [reg, value] of nextRegs) {
      this.registerState.set(reg, value);
      values.set(reg, value);
    }
    this.values = values;
    this.pending = undefined;
  }

  protected discard(): void {
    this.pending = undefined;
  }

  protected currentValue(wire: WireVector): bigint {
    if (wire instanceof Const) {
      return wire.value;
    }
    const value = this.values.get(wire);
    if (value === undefined) {
      throw new RtlInternalError(`no value recorded for "${wire.name}"`);
    }
    return value;
  }

  protected memoryWords(mem: MemBlockBase): Iterable<[bigint, bigint]> {
    return this.memState.get(mem) ?? [];
  }
}

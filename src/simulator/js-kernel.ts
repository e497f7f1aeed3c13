// JavaScript evaluation kernel: computes one net at a time
// Used by the interpreting Simulation; the compiled engines bake the same
// semantics into generated code.

import type { LogicNet } from '../types/netlist.js';
import type { WireVector } from '../core/wirevector.js';
import { RomBlock } from '../core/memory.js';
import type { MemBlockBase } from '../core/memory.js';
import { mask } from '../core/values.js';
import { RtlInternalError } from '../core/errors.js';

export interface KernelState {
  read(wire: WireVector): bigint;
  readMemory(mem: MemBlockBase, address: bigint): bigint;
}

/**
 * Evaluate a single combinational net and return its destination value,
 * masked to the destination's bitwidth.
 */
export function evaluateNet(net: LogicNet, state: KernelState): bigint {
  if (net.op === 'register' || net.op === 'memwrite') {
    throw new RtlInternalError(`"${net.op}" net is not combinational`);
  }
  const m = mask(net.dests[0].width);
  const arg = (i: number): bigint => state.read(net.args[i]);

  switch (net.op) {
    case 'wire':
      return arg(0) & m;
    case 'not':
      return ~arg(0) & m;
    case 'and':
      return arg(0) & arg(1) & m;
    case 'or':
      return (arg(0) | arg(1)) & m;
    case 'xor':
      return (arg(0) ^ arg(1)) & m;
    case 'nand':
      return ~(arg(0) & arg(1)) & m;
    case 'add':
      return (arg(0) + arg(1)) & m;
    case 'sub':
      // Negative differences wrap to two's complement under the mask
      return (arg(0) - arg(1)) & m;
    case 'mul':
      return (arg(0) * arg(1)) & m;
    case 'lt':
      return arg(0) < arg(1) ? 1n : 0n;
    case 'gt':
      return arg(0) > arg(1) ? 1n : 0n;
    case 'eq':
      return arg(0) === arg(1) ? 1n : 0n;
    case 'select':
      // args: (sel, falseCase, trueCase)
      return (arg(0) ? arg(2) : arg(1)) & m;
    case 'concat': {
      let value = 0n;
      for (const w of net.args) {
        value = (value << BigInt(w.width)) | state.read(w);
      }
      return value & m;
    }
    case 'bitselect': {
      const source = arg(0);
      let value = 0n;
      net.param.forEach((bit, k) => {
        value |= ((source >> BigInt(bit)) & 1n) << BigInt(k);
      });
      return value & m;
    }
    case 'memread': {
      const mem = net.param.mem;
      const address = arg(0);
      return (mem instanceof RomBlock ? mem.readData(address) : state.readMemory(mem, address)) & m;
    }
  }
}

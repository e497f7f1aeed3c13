// JS Compiler: turns a levelized block into one native JavaScript function
// that evaluates every combinational net of a cycle
//
// Each wire gets a slot in a bigint array and every net becomes one
// statement with its masks and indices baked in as constants.
//
// Example transformation:
//   tmp3/4W <-- add -- a/3I, b/3I
//   ->
//   v[3] = (v[0] + v[1]) & 0xfn;

import type { WireVector } from '../core/wirevector.js';
import { RomBlock } from '../core/memory.js';
import type { MemBlockBase } from '../core/memory.js';
import { mask } from '../core/values.js';
import type { LogicNet } from '../types/netlist.js';
import type { LevelizedBlock } from '../circuit/levelizer.js';

// Compiled per-cycle function signature
//   v     - one slot per wire, inputs and registers filled in by the caller
//   mems  - contents of each writable memory, by memory index
//   roms  - each RomBlock, by memory index
//   dflt  - word read from unwritten addresses, by memory index
export type CompiledEvaluate = (
  v: bigint[],
  mems: readonly Map<bigint, bigint>[],
  roms: readonly (RomBlock | undefined)[],
  dflt: readonly bigint[]
) => void;

export interface CompiledBlock {
  evaluate: CompiledEvaluate;
  slots: ReadonlyMap<WireVector, number>;
  memIndex: ReadonlyMap<MemBlockBase, number>;
  // Generated source, kept for debugging
  source: string;
}

const literal = (value: bigint): string => `0x${value.toString(16)}n`;

/**
 * Compile a levelized block to a JavaScript function over bigint slots.
 */
export function compileToJs(levelized: LevelizedBlock): CompiledBlock {
  const { block } = levelized;

  const slots = new Map<WireVector, number>();
  block.wirevectors.forEach((w, i) => slots.set(w, i));
  const memIndex = new Map<MemBlockBase, number>();
  block.memories.forEach((m, i) => memIndex.set(m, i));

  const slot = (w: WireVector): string => `v[${slots.get(w)}]`;
  const lines = levelized.order.map((net) => generateNet(net, slot, memIndex));

  const funcCode = `
    return function evaluate_block(v, mems, roms, dflt) {
      ${lines.join('\n      ')}
    };
  `;

  try {
    // Use Function constructor to create the function dynamically
    const factory = new Function(funcCode);
    return {
      evaluate: factory() as CompiledEvaluate,
      slots,
      memIndex,
      source: funcCode,
    };
  } catch (e) {
    console.error('Failed to compile block:', e);
    console.error('Generated code:', funcCode);
    throw e;
  }
}

// One statement per net
function generateNet(
  net: LogicNet,
  slot: (w: WireVector) => string,
  memIndex: ReadonlyMap<MemBlockBase, number>
): string {
  if (net.op === 'register' || net.op === 'memwrite') {
    return `/* ${net.op} is applied on the clock edge */`;
  }
  const dest = slot(net.dests[0]);
  const m = literal(mask(net.dests[0].width));
  const a = net.args.map(slot);

  switch (net.op) {
    case 'wire':
      return `${dest} = ${a[0]} & ${m};`;
    case 'not':
      return `${dest} = ~${a[0]} & ${m};`;
    case 'and':
      return `${dest} = ${a[0]} & ${a[1]} & ${m};`;
    case 'or':
      return `${dest} = (${a[0]} | ${a[1]}) & ${m};`;
    case 'xor':
      return `${dest} = (${a[0]} ^ ${a[1]}) & ${m};`;
    case 'nand':
      return `${dest} = ~(${a[0]} & ${a[1]}) & ${m};`;
    case 'add':
      return `${dest} = (${a[0]} + ${a[1]}) & ${m};`;
    case 'sub':
      return `${dest} = (${a[0]} - ${a[1]}) & ${m};`;
    case 'mul':
      return `${dest} = (${a[0]} * ${a[1]}) & ${m};`;
    case 'lt':
      return `${dest} = ${a[0]} < ${a[1]} ? 1n : 0n;`;
    case 'gt':
      return `${dest} = ${a[0]} > ${a[1]} ? 1n : 0n;`;
    case 'eq':
      return `${dest} = ${a[0]} === ${a[1]} ? 1n : 0n;`;
    case 'select':
      return `${dest} = (${a[0]} ? ${a[2]} : ${a[1]}) & ${m};`;
    case 'concat': {
      let expr = a[0];
      for (let i = 1; i < net.args.length; i++) {
        expr = `((${expr} << ${net.args[i].width}n) | ${a[i]})`;
      }
      return `${dest} = ${expr} & ${m};`;
    }
    case 'bitselect': {
      const bits = net.param;
      const contiguous = bits.every((b, k) => b === bits[0] + k);
      if (contiguous) {
        return `${dest} = (${a[0]} >> ${bits[0]}n) & ${m};`;
      }
      const terms = bits.map((b, k) => `(((${a[0]} >> ${b}n) & 1n) << ${k}n)`);
      return `${dest} = (${terms.join(' | ')}) & ${m};`;
    }
    case 'memread': {
      const k = memIndex.get(net.param.mem);
      if (net.param.mem instanceof RomBlock) {
        return `${dest} = roms[${k}].readData(${a[0]}) & ${m};`;
      }
      return `${dest} = (mems[${k}].get(${a[0]}) ?? dflt[${k}]) & ${m};`;
    }
  }
}

// Netlist types for the block graph
// Every builder operator lowers to one of these primitive ops

import type { WireVector } from '../core/wirevector.js';
import type { MemBlockBase } from '../core/memory.js';

export type NetOp =
  | 'wire'      // directional connection, no logic function
  | 'not'
  | 'and'
  | 'or'
  | 'xor'
  | 'nand'
  | 'add'       // result has one extra carry bit
  | 'sub'
  | 'mul'       // result is as wide as both operands together
  | 'lt'        // unsigned comparisons produce a single bit
  | 'gt'
  | 'eq'
  | 'select'    // args: (sel, falseCase, trueCase)
  | 'concat'    // first arg ends up in the most significant bits
  | 'bitselect' // param lists the source bit for each result bit, LSB first
  | 'register'  // latches its arg on the clock edge
  | 'memread'   // async read: args (addr), dests (data)
  | 'memwrite'; // sync write: args (addr, data, enable), no dests

export const NET_OPS: readonly NetOp[] = [
  'wire', 'not', 'and', 'or', 'xor', 'nand', 'add', 'sub', 'mul',
  'lt', 'gt', 'eq', 'select', 'concat', 'bitselect', 'register',
  'memread', 'memwrite',
];

export type BinaryOp = 'and' | 'or' | 'xor' | 'nand' | 'add' | 'sub' | 'mul' | 'lt' | 'gt' | 'eq';

export const BINARY_OPS: ReadonlySet<NetOp> = new Set<NetOp>([
  'and', 'or', 'xor', 'nand', 'add', 'sub', 'mul', 'lt', 'gt', 'eq',
]);

export const COMPARISON_OPS: ReadonlySet<NetOp> = new Set<NetOp>(['lt', 'gt', 'eq']);

// Memory ports carry a reference back to the memory they access
export interface MemoryRef {
  memId: number;
  mem: MemBlockBase;
}

interface NetBase {
  readonly args: readonly WireVector[];
  readonly dests: readonly WireVector[];
}

export type PlainOp = Exclude<NetOp, 'bitselect' | 'memread' | 'memwrite'>;

export interface PlainNet extends NetBase {
  readonly op: PlainOp;
  readonly param: null;
}

export interface BitSelectNet extends NetBase {
  readonly op: 'bitselect';
  readonly param: readonly number[];
}

export interface MemoryNet extends NetBase {
  readonly op: 'memread' | 'memwrite';
  readonly param: MemoryRef;
}

// A LogicNet is immutable once created; transformations add nets, never edit them
export type LogicNet = PlainNet | BitSelectNet | MemoryNet;

export function plainNet(
  op: PlainOp,
  args: readonly WireVector[],
  dests: readonly WireVector[]
): PlainNet {
  return Object.freeze({ op, param: null, args: Object.freeze([...args]), dests: Object.freeze([...dests]) });
}

export function bitSelectNet(indices: readonly number[], arg: WireVector, dest: WireVector): BitSelectNet {
  return Object.freeze({
    op: 'bitselect' as const,
    param: Object.freeze([...indices]),
    args: Object.freeze([arg]),
    dests: Object.freeze([dest]),
  });
}

export function memoryNet(
  op: 'memread' | 'memwrite',
  mem: MemBlockBase,
  args: readonly WireVector[],
  dests: readonly WireVector[]
): MemoryNet {
  return Object.freeze({
    op,
    param: Object.freeze({ memId: mem.id, mem }),
    args: Object.freeze([...args]),
    dests: Object.freeze([...dests]),
  });
}

/**
 * Registers and memory write ports act on the clock edge; everything else is
 * combinational and gets evaluated once per cycle.
 */
export function isCombinational(net: LogicNet): boolean {
  return net.op !== 'register' && net.op !== 'memwrite';
}

// One line per net, e.g. "tmp3/4W <-- add -- a/3I, b/3I"
export function formatNet(net: LogicNet): string {
  const lhs = net.dests.map((w) => w.toString()).join(', ');
  const rhs = net.args.map((w) => w.toString()).join(', ');
  let param = '';
  if (net.op === 'bitselect') {
    param = ` (${net.param.join(', ')})`;
  } else if (net.op === 'memread' || net.op === 'memwrite') {
    param = ` (${net.param.memId}:${net.param.mem.name})`;
  }
  return `${lhs} <-- ${net.op} -- ${rhs}${param}`;
}

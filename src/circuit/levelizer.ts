// Levelizer: topological sort and level assignment for levelized simulation

import type { Block } from '../core/block.js';
import { Input, Const, Register } from '../core/wirevector.js';
import type { WireVector } from '../core/wirevector.js';
import { CombinationalLoopError, SimulationError } from '../core/errors.js';
import { isCombinational, formatNet } from '../types/netlist.js';
import type { LogicNet } from '../types/netlist.js';

export interface LevelizedBlock {
  block: Block;
  // Combinational nets grouped by level; level k only reads levels below k
  levels: LogicNet[][];
  // The same nets flattened into one evaluation order
  order: LogicNet[];
  maxLevel: number;
  // Register and memwrite nets in declaration order, applied on the clock edge
  sequential: LogicNet[];
}

/**
 * Levelize a block for simulation.
 *
 * The algorithm:
 * 1. Level 0 wires: Inputs, Consts and Registers
 * 2. Build the consumer graph (wire -> combinational nets that read it)
 * 3. Release each net once all of its arguments have a level;
 *    its destinations get max(argument levels) + 1
 * 4. Group nets by level, keeping declaration order inside a level
 *
 * Nets that never become ready sit on a combinational loop (or read a wire
 * nothing drives) and are reported as an error.
 */
export function levelize(block: Block): LevelizedBlock {
  const signalLevel = new Map<WireVector, number>();
  for (const wire of block.wirevectors) {
    if (wire instanceof Input || wire instanceof Const || wire instanceof Register) {
      signalLevel.set(wire, 0);
    }
  }

  const combinational: LogicNet[] = [];
  const sequential: LogicNet[] = [];
  const position = new Map<LogicNet, number>();
  for (const net of block.logic) {
    position.set(net, position.size);
    (isCombinational(net) ? combinational : sequential).push(net);
  }

  const consumers = new Map<WireVector, LogicNet[]>();
  const pending = new Map<LogicNet, number>();
  const ready: LogicNet[] = [];
  for (const net of combinational) {
    let waiting = 0;
    for (const arg of net.args) {
      if (signalLevel.has(arg)) continue;
      waiting++;
      const list = consumers.get(arg);
      if (list) {
        list.push(net);
      } else {
        consumers.set(arg, [net]);
      }
    }
    pending.set(net, waiting);
    if (waiting === 0) {
      ready.push(net);
    }
  }

  const netLevel = new Map<LogicNet, number>();
  let maxLevel = 0;
  while (ready.length > 0) {
    const net = ready.pop();
    if (net === undefined) break;

    let level = 0;
    for (const arg of net.args) {
      level = Math.max(level, signalLevel.get(arg) ?? 0);
    }
    level += 1;
    netLevel.set(net, level);
    maxLevel = Math.max(maxLevel, level);

    for (const dest of net.dests) {
      signalLevel.set(dest, level);
      for (const consumer of consumers.get(dest) ?? []) {
        const left = (pending.get(consumer) ?? 0) - 1;
        pending.set(consumer, left);
        if (left === 0) {
          ready.push(consumer);
        }
      }
    }
  }

  if (netLevel.size < combinational.length) {
    const loops = detectLoops(block);
    if (loops.length > 0) {
      throw new CombinationalLoopError(loops);
    }
    const stuck = combinational.filter((net) => !netLevel.has(net));
    throw new SimulationError(
      `Levelization failed: nets read wires that are never driven:\n  ${stuck.map(formatNet).join('\n  ')}`
    );
  }

  const levels: LogicNet[][] = [];
  for (let i = 0; i < maxLevel; i++) {
    levels.push([]);
  }
  for (const net of combinational) {
    levels[(netLevel.get(net) ?? 1) - 1].push(net);
  }
  for (const group of levels) {
    group.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
  }

  return {
    block,
    levels,
    order: levels.flat(),
    maxLevel,
    sequential,
  };
}

/**
 * Detect combinational loops in the block.
 * Returns the nets of each loop, in declaration order.
 */
export function detectLoops(block: Block): LogicNet[][] {
  const combinational = block.logic.filter(isCombinational);

  // Adjacency: net -> combinational nets reading one of its destinations
  const readers = new Map<WireVector, LogicNet[]>();
  for (const net of combinational) {
    for (const arg of net.args) {
      const list = readers.get(arg);
      if (list) {
        list.push(net);
      } else {
        readers.set(arg, [net]);
      }
    }
  }
  const successors = (net: LogicNet): LogicNet[] => net.dests.flatMap((d) => readers.get(d) ?? []);

  // Tarjan's SCC algorithm
  const sccs: LogicNet[][] = [];
  const index = new Map<LogicNet, number>();
  const onStack = new Set<LogicNet>();
  const stack: LogicNet[] = [];
  let currentIndex = 0;

  function strongConnect(v: LogicNet): number {
    const vIndex = currentIndex++;
    let vLow = vIndex;
    index.set(v, vIndex);
    stack.push(v);
    onStack.add(v);

    for (const w of successors(v)) {
      const wIndex = index.get(w);
      if (wIndex === undefined) {
        vLow = Math.min(vLow, strongConnect(w));
      } else if (onStack.has(w)) {
        vLow = Math.min(vLow, wIndex);
      }
    }

    if (vLow === vIndex) {
      const scc: LogicNet[] = [];
      let w: LogicNet | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        scc.push(w);
      } while (w !== v);

      // A single net is only a loop when it reads its own output
      if (scc.length > 1 || successors(v).includes(v)) {
        sccs.push(scc);
      }
    }
    return vLow;
  }

  // Run Tarjan's for all unvisited nets
  for (const net of combinational) {
    if (!index.has(net)) {
      strongConnect(net);
    }
  }

  const order = new Map(block.logic.map((net, i): [LogicNet, number] => [net, i]));
  return sccs.map((scc) => scc.sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0)));
}

/**
 * Get evaluation statistics for the levelized block.
 */
export function getStats(levelized: LevelizedBlock): {
  totalNets: number;
  totalRegisters: number;
  totalMemories: number;
  maxLevel: number;
  netsPerLevel: number[];
  avgFanout: number;
} {
  // Calculate average fanout
  const fanoutCount = new Map<WireVector, number>();
  for (const net of levelized.block.logic) {
    for (const arg of net.args) {
      fanoutCount.set(arg, (fanoutCount.get(arg) || 0) + 1);
    }
  }

  let totalFanout = 0;
  for (const count of fanoutCount.values()) {
    totalFanout += count;
  }
  const avgFanout = fanoutCount.size > 0 ? totalFanout / fanoutCount.size : 0;

  return {
    totalNets: levelized.block.logic.length,
    totalRegisters: levelized.block.registers.length,
    totalMemories: levelized.block.memories.length,
    maxLevel: levelized.maxLevel,
    netsPerLevel: levelized.levels.map((l) => l.length),
    avgFanout,
  };
}

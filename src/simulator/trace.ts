// Simulation trace: per-cycle values of selected wires

import type { Block } from '../core/block.js';
import { Const } from '../core/wirevector.js';
import type { WireVector } from '../core/wirevector.js';
import { SimulationError } from '../core/errors.js';
import type { SimulationBase } from './simulation-base.js';

// Names the library generates for temporaries and constants
const INTERNAL_NAME = /^(tmp|const)\d/;

export function isInternalName(name: string): boolean {
  return INTERNAL_NAME.test(name);
}

export class SimulationTrace {
  readonly block: Block;
  readonly wires: readonly WireVector[];
  private readonly samples = new Map<string, bigint[]>();
  private cycles = 0;

  /**
   * Trace `wires`, or by default every wire whose name is not internal.
   */
  constructor(block: Block, wires?: readonly (WireVector | string)[]) {
    this.block = block;
    if (wires === undefined) {
      this.wires = block.wirevectors.filter((w) => !(w instanceof Const) && !isInternalName(w.name));
    } else {
      this.wires = wires.map((w) => {
        const wire = typeof w === 'string' ? block.getWireVectorByName(w) : w;
        if (wire === undefined || wire.block !== block) {
          throw new SimulationError(`cannot trace "${typeof w === 'string' ? w : w.name}": not a wire of this block`);
        }
        return wire;
      });
    }
    for (const wire of this.wires) {
      this.samples.set(wire.name, []);
    }
  }

  /** @internal Called by the simulation after each committed step. */
  record(sim: SimulationBase): void {
    for (const wire of this.wires) {
      this.samples.get(wire.name)?.push(sim.inspect(wire));
    }
    this.cycles++;
  }

  // Number of recorded cycles
  get length(): number {
    return this.cycles;
  }

  get(name: string): readonly bigint[] {
    const values = this.samples.get(name);
    if (values === undefined) {
      throw new SimulationError(`"${name}" is not traced`);
    }
    return values;
  }

  at(name: string, cycle: number): bigint {
    const values = this.get(name);
    if (!Number.isInteger(cycle) || cycle < 0 || cycle >= values.length) {
      throw new SimulationError(`cycle ${cycle} is out of range for the trace of "${name}" (${values.length} cycles)`);
    }
    return values[cycle];
  }

  // One "name: v0 v1 v2 ..." line per traced wire
  toString(): string {
    return this.wires.map((w) => `${w.name}: ${this.get(w.name).join(' ')}`).join('\n');
  }
}

// Error taxonomy for graph construction, structural checks, conditional
// lowering and simulation

import type { LogicNet } from '../types/netlist.js';
import { formatNet } from '../types/netlist.js';

export class RtlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RtlError';
  }
}

// Raised at the offending call while the graph is being built
export class ConstructionError extends RtlError {
  constructor(message: string) {
    super(message);
    this.name = 'ConstructionError';
  }
}

// Raised by Block.sanityCheck with every violation it found
export class StructuralError extends RtlError {
  constructor(public problems: string[]) {
    super(`Block failed sanity check:\n  ${problems.join('\n  ')}`);
    this.name = 'StructuralError';
  }
}

export class ConditionalError extends RtlError {
  constructor(message: string) {
    super(message);
    this.name = 'ConditionalError';
  }
}

export class SimulationError extends RtlError {
  constructor(message: string) {
    super(message);
    this.name = 'SimulationError';
  }
}

export class CombinationalLoopError extends SimulationError {
  constructor(public loops: LogicNet[][]) {
    super(
      `Combinational loop detected:\n` +
        loops.map((loop, i) => `  loop ${i}:\n    ${loop.map(formatNet).join('\n    ')}`).join('\n')
    );
    this.name = 'CombinationalLoopError';
  }
}

export interface OutputMismatch {
  cycle: number;
  wire: string;
  expected: bigint;
  actual: bigint;
}

export class OutputMismatchError extends SimulationError {
  constructor(public mismatches: OutputMismatch[]) {
    super(
      `Simulation output mismatch:\n  ` +
        mismatches
          .map((m) => `cycle ${m.cycle}: ${m.wire} expected ${m.expected}, got ${m.actual}`)
          .join('\n  ')
    );
    this.name = 'OutputMismatchError';
  }
}

// Something inside this library broke one of its own invariants
export class RtlInternalError extends RtlError {
  constructor(message: string) {
    super(message);
    this.name = 'RtlInternalError';
  }
}

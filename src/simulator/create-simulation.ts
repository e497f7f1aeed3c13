// Engine selection

import type { Block } from '../core/block.js';
import { unsupportedReason } from '../compiler/wasm-compiler.js';
import type { SimulationBase, SimulationOptions } from './simulation-base.js';
import { Simulation } from './simulation.js';
import { FastSimulation } from './fast-simulation.js';
import { WasmSimulation } from './wasm-simulation.js';

export type SimulationMode = 'interpret' | 'fast' | 'wasm' | 'auto';

export interface CreateSimulationOptions extends SimulationOptions {
  mode?: SimulationMode;
}

/**
 * Create a simulation of `block` on the requested engine.
 * 'auto' uses WebAssembly when the block fits in 32-bit words.
 */
export function createSimulation(block: Block, options: CreateSimulationOptions = {}): SimulationBase {
  const { mode = 'auto', ...simOptions } = options;

  switch (mode) {
    case 'interpret':
      return new Simulation(block, simOptions);
    case 'fast':
      return new FastSimulation(block, simOptions);
    case 'wasm':
      return new WasmSimulation(block, simOptions);
    case 'auto': {
      const reason = unsupportedReason(block);
      if (reason === undefined) {
        return new WasmSimulation(block, simOptions);
      }
      console.warn(`Warning: ${reason}; falling back to the JavaScript compiler`);
      return new FastSimulation(block, simOptions);
    }
  }
}

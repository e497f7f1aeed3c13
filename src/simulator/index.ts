export {
  SimulationBase,
  type Value,
  type MemoryInit,
  type SimulationOptions,
  type StepInputs,
  type Sequence,
  type StepMultipleOptions,
} from './simulation-base.js';
export { Simulation } from './simulation.js';
export { FastSimulation } from './fast-simulation.js';
export { WasmSimulation } from './wasm-simulation.js';
export { SlotStore } from './slot-store.js';
export { evaluateNet, type KernelState } from './js-kernel.js';
export { SimulationTrace } from './trace.js';
export { createSimulation, type SimulationMode, type CreateSimulationOptions } from './create-simulation.js';

// rtlgraph - register-transfer-level netlists in TypeScript
// Build a hardware block, then simulate it cycle by cycle

// Netlist IR
export {
  NET_OPS,
  BINARY_OPS,
  COMPARISON_OPS,
  plainNet,
  bitSelectNet,
  memoryNet,
  isCombinational,
  formatNet,
  type NetOp,
  type BinaryOp,
  type PlainOp,
  type MemoryRef,
  type PlainNet,
  type BitSelectNet,
  type MemoryNet,
  type LogicNet,
} from './types/netlist.js';

// Wires and blocks
export {
  WireVector,
  Input,
  Output,
  Const,
  Register,
  RegisterNext,
  parseConst,
  checkBitwidth,
  asWires,
  blockOf,
  concatWires,
  type WireKind,
  type ConstValue,
  type WireLike,
} from './core/wirevector.js';
export { Block, type BlockOptions } from './core/block.js';
export {
  MemBlockBase,
  MemBlock,
  RomBlock,
  EnabledWrite,
  enabledWrite,
  MAX_ADDRWIDTH,
  type RomData,
} from './core/memory.js';

// Operators
export {
  concat,
  concatList,
  matchBitwidth,
  select,
  mux,
  andAllBits,
  orAllBits,
  xorAllBits,
  parity,
  rtlAny,
  rtlAll,
  signedAdd,
  signedMult,
  signedLt,
  signedLe,
  signedGt,
  signedGe,
  probe,
  rtlAssert,
} from './core/ops.js';

// Conditional assignment
export { conditionalAssignment, ConditionalScope, type ConditionalOptions } from './core/conditional.js';

// Values
export { mask, toUnsigned, valueToSigned, signedToValue } from './core/values.js';

// Errors
export {
  RtlError,
  ConstructionError,
  StructuralError,
  ConditionalError,
  SimulationError,
  CombinationalLoopError,
  OutputMismatchError,
  RtlInternalError,
  type OutputMismatch,
} from './core/errors.js';

// Analysis
export { levelize, detectLoops, getStats, type LevelizedBlock } from './circuit/levelizer.js';

// Compilers
export { compileToJs, type CompiledBlock, type CompiledEvaluate } from './compiler/js-compiler.js';
export {
  compileToWasm,
  unsupportedReason,
  WASM_MAX_BITWIDTH,
  WASM_MAX_ADDRWIDTH,
  type WasmLayout,
  type CompiledWasmBlock,
} from './compiler/wasm-compiler.js';

// Simulation
export * from './simulator/index.js';
export { isInternalName } from './simulator/trace.js';

// Slot store: wire values kept in WebAssembly linear memory
// One uint32 word per wire, memories laid out after the wire slots

import type { WasmLayout } from '../compiler/wasm-compiler.js';
import type { WireVector } from '../core/wirevector.js';
import type { MemBlockBase } from '../core/memory.js';
import { RtlInternalError } from '../core/errors.js';

export class SlotStore {
  private readonly view: Uint32Array;

  constructor(
    memory: WebAssembly.Memory,
    private readonly layout: WasmLayout
  ) {
    // Memory has a fixed maximum, so the buffer never detaches
    this.view = new Uint32Array(memory.buffer);
  }

  /**
   * Read a wire's value
   */
  read(wire: WireVector): bigint {
    return BigInt(this.view[this.slotOf(wire)]);
  }

  /**
   * Write a wire's value; it must already fit its bitwidth
   */
  write(wire: WireVector, value: bigint): void {
    this.view[this.slotOf(wire)] = Number(value);
  }

  readWord(mem: MemBlockBase, address: number): bigint {
    return BigInt(this.view[this.baseOf(mem) + address]);
  }

  writeWord(mem: MemBlockBase, address: number, value: bigint): void {
    this.view[this.baseOf(mem) + address] = Number(value);
  }

  /**
   * Copy of every wire slot, for rolling back a failed step
   */
  snapshot(): Uint32Array {
    return this.view.slice(0, this.layout.wireWords);
  }

  restore(snapshot: Uint32Array): void {
    this.view.set(snapshot, 0);
  }

  private slotOf(wire: WireVector): number {
    const slot = this.layout.slots.get(wire);
    if (slot === undefined) {
      throw new RtlInternalError(`wire "${wire.name}" has no slot`);
    }
    return slot;
  }

  private baseOf(mem: MemBlockBase): number {
    const base = this.layout.memories.get(mem);
    if (base === undefined) {
      throw new RtlInternalError(`memory "${mem.name}" has no region`);
    }
    return base;
  }
}

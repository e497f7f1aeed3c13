// MemBlock and RomBlock
//
// Reads are asynchronous: a memread net is combinational on its address.
// Writes are synchronous and become visible on the following cycle.

import type { Block } from './block.js';
import { WireVector, asWires, checkBitwidth } from './wirevector.js';
import type { WireLike } from './wirevector.js';
import { ConstructionError, SimulationError } from './errors.js';
import { memoryNet } from '../types/netlist.js';
import type { MemoryNet } from '../types/netlist.js';

// Largest address space a memory may declare
export const MAX_ADDRWIDTH = 32;

// Write data together with its enable bit; a plain value writes every cycle
export class EnabledWrite {
  constructor(
    readonly data: WireLike,
    readonly enable: WireLike
  ) {}
}

export function enabledWrite(data: WireLike, enable: WireLike): EnabledWrite {
  return new EnabledWrite(data, enable);
}

export abstract class MemBlockBase {
  readonly id: number;
  readonly name: string;

  constructor(
    readonly block: Block,
    readonly bitwidth: number,
    readonly addrwidth: number,
    name?: string
  ) {
    checkBitwidth(bitwidth, `memory "${name ?? '<unnamed>'}"`);
    checkBitwidth(addrwidth, `address of memory "${name ?? '<unnamed>'}"`);
    if (addrwidth > MAX_ADDRWIDTH) {
      throw new ConstructionError(`memory address width ${addrwidth} exceeds ${MAX_ADDRWIDTH}`);
    }
    this.id = block.nextMemId();
    this.name = name ?? `mem${this.id}`;
    block.addMemory(this);
  }

  abstract get readOnly(): boolean;

  // Number of addressable words
  get size(): number {
    return 2 ** this.addrwidth;
  }

  get readPorts(): MemoryNet[] {
    return this.block.logic.filter(
      (net): net is MemoryNet => net.op === 'memread' && net.param.mem === this
    );
  }

  get writePorts(): MemoryNet[] {
    return this.block.logic.filter(
      (net): net is MemoryNet => net.op === 'memwrite' && net.param.mem === this
    );
  }

  /**
   * Add a read port and return its data wire.
   */
  read(addr: WireLike): WireVector {
    const address = this.addressWire(addr);
    const data = new WireVector(this.block, this.bitwidth);
    this.block.addNet(memoryNet('memread', this, [address], [data]));
    return data;
  }

  // Narrower addresses are zero-extended; wider ones are an error
  protected addressWire(addr: WireLike): WireVector {
    return asWires(this.block, addr, this.addrwidth, false);
  }

  toString(): string {
    return `${this.name}[${this.size}x${this.bitwidth}]`;
  }
}

export class MemBlock extends MemBlockBase {
  get readOnly(): boolean {
    return false;
  }

  /**
   * Add a write port. Data wider than the memory is truncated.
   *
   *   mem.write(addr, enabledWrite(data, we))
   */
  write(addr: WireLike, value: WireLike | EnabledWrite): void {
    const { data, enable } = value instanceof EnabledWrite ? value : { data: value, enable: true };
    this.buildWritePort(
      this.addressWire(addr),
      asWires(this.block, data, this.bitwidth),
      asWires(this.block, enable, 1, false)
    );
  }

  // Conditional write under the open conditionalAssignment
  assign(addr: WireLike, value: WireLike | EnabledWrite): void {
    const scope = this.block.requireConditional(this.name);
    const { data, enable } = value instanceof EnabledWrite ? value : { data: value, enable: true };
    scope.recordMemWrite(
      this,
      this.addressWire(addr),
      asWires(this.block, data, this.bitwidth),
      asWires(this.block, enable, 1, false)
    );
  }

  /** @internal */
  buildWritePort(addr: WireVector, data: WireVector, enable: WireVector): void {
    this.block.addNet(memoryNet('memwrite', this, [addr, data, enable], []));
  }
}

// Either a table indexed by address or a pure function of the address
export type RomData = readonly (number | bigint)[] | ((address: number) => number | bigint);

export class RomBlock extends MemBlockBase {
  private readonly romData: RomData;

  constructor(block: Block, bitwidth: number, addrwidth: number, romData: RomData, name?: string) {
    super(block, bitwidth, addrwidth, name);
    if (typeof romData !== 'function') {
      if (romData.length > this.size) {
        throw new ConstructionError(
          `ROM "${this.name}" has ${romData.length} entries but only ${this.size} addresses`
        );
      }
      romData.forEach((v, i) => {
        if (!this.fits(v)) {
          throw new ConstructionError(`ROM "${this.name}" entry ${i} (${v}) does not fit in ${bitwidth} bits`);
        }
      });
    }
    this.romData = romData;
  }

  get readOnly(): boolean {
    return true;
  }

  /**
   * Contents at `address`; table entries past the end of the array read as 0.
   */
  readData(address: number | bigint): bigint {
    const addr = BigInt(address);
    if (addr < 0n || addr >= BigInt(this.size)) {
      throw new SimulationError(`address ${addr} is out of range for ROM "${this.name}"`);
    }
    const index = Number(addr);
    if (typeof this.romData !== 'function') {
      return index < this.romData.length ? BigInt(this.romData[index]) : 0n;
    }
    const value = this.romData(index);
    if (!this.fits(value)) {
      throw new SimulationError(
        `ROM "${this.name}" produced ${value} at address ${index}, which does not fit in ${this.bitwidth} bits`
      );
    }
    return BigInt(value);
  }

  private fits(value: number | bigint): boolean {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      return false;
    }
    const n = BigInt(value);
    return n >= 0n && n >> BigInt(this.bitwidth) === 0n;
  }
}

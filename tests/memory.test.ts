// Tests for MemBlock and RomBlock

import { describe, it, expect } from 'vitest';
import {
  Block,
  MemBlock,
  enabledWrite,
  memoryNet,
  conditionalAssignment,
  createSimulation,
  Simulation,
  ConstructionError,
  SimulationError,
  type SimulationMode,
} from '../src/index.js';

const ENGINES: SimulationMode[] = ['interpret', 'fast', 'wasm'];

// Memory with one enabled write port and one read port, all driven by inputs
function memoryBlock(bitwidth: number = 32, addrwidth: number = 3): { block: Block; mem: MemBlock } {
  const block = new Block();
  const mem = block.memBlock(bitwidth, addrwidth, 'mem');
  const waddr = block.input(addrwidth, 'waddr');
  const wdata = block.input(bitwidth, 'wdata');
  const we = block.input(1, 'we');
  const raddr = block.input(addrwidth, 'raddr');
  mem.write(waddr, enabledWrite(wdata, we));
  block.output(bitwidth, 'rdata').connect(mem.read(raddr));
  return { block, mem };
}

describe('MemBlock', () => {
  it('should describe its geometry', () => {
    const { mem } = memoryBlock();
    expect(mem.size).toBe(8);
    expect(mem.readOnly).toBe(false);
    expect(mem.toString()).toBe('mem[8x32]');
    expect(mem.readPorts).toHaveLength(1);
    expect(mem.writePorts).toHaveLength(1);
  });

  it('should name unnamed memories by id', () => {
    const block = new Block();
    expect(block.memBlock(8, 2).name).toBe('mem0');
    expect(block.memBlock(8, 2).name).toBe('mem1');
  });

  it('should reject addresses wider than the memory', () => {
    const block = new Block();
    const mem = block.memBlock(8, 3);
    const addr = block.input(4, 'addr');
    expect(() => mem.read(addr)).toThrow(/wider than 3 bits/);
  });

  it('should zero-extend narrower addresses', () => {
    const block = new Block();
    const mem = block.memBlock(8, 3);
    const addr = block.input(2, 'addr');
    const data = mem.read(addr);
    expect(block.driverOf(data)?.args[0].bitwidth).toBe(3);
  });

  it('should reject bad geometry', () => {
    const block = new Block();
    expect(() => block.memBlock(0, 3)).toThrow(ConstructionError);
    expect(() => block.memBlock(8, 33)).toThrow(/exceeds 32/);
  });
});

describe('RomBlock', () => {
  it('should read table entries and zero past the table', () => {
    const block = new Block();
    const rom = block.romBlock(8, 2, [10, 20, 30]);
    expect(rom.readOnly).toBe(true);
    expect([0, 1, 2, 3].map((a) => rom.readData(a))).toEqual([10n, 20n, 30n, 0n]);
    expect(() => rom.readData(4)).toThrow(/out of range/);
  });

  it('should validate its table at construction', () => {
    const block = new Block();
    expect(() => block.romBlock(8, 2, [300])).toThrow(ConstructionError);
    expect(() => block.romBlock(8, 2, [1, 2, 3, 4, 5])).toThrow(/only 4 addresses/);
  });

  it('should validate function results when read', () => {
    const block = new Block();
    const rom = block.romBlock(4, 3, (a) => a * 3);
    expect(rom.readData(5)).toBe(15n);
    expect(() => rom.readData(6)).toThrow(SimulationError);
  });

  it('should not accept write ports', () => {
    const block = new Block();
    const rom = block.romBlock(8, 2, [1]);
    const addr = block.input(2, 'addr');
    const data = block.input(8, 'data');
    const en = block.input(1, 'en');
    expect(() => block.addNet(memoryNet('memwrite', rom, [addr, data, en], []))).toThrow(/read-only/);
  });

  it('should report bad function results during simulation', () => {
    const block = new Block();
    const rom = block.romBlock(4, 3, (a) => a * 3);
    const addr = block.input(3, 'addr');
    block.output(4, 'out').connect(rom.read(addr));
    const sim = new Simulation(block);
    sim.step({ addr: 5 });
    expect(sim.inspect('out')).toBe(15n);
    expect(() => sim.step({ addr: 7 })).toThrow(/does not fit in 4 bits/);
    expect(sim.cycle).toBe(1);
  });
});

describe.each(ENGINES)('memory simulation (%s)', (mode) => {
  it('should read back a word written on the previous step', () => {
    const { block, mem } = memoryBlock();
    const sim = createSimulation(block, { mode });

    sim.step({ waddr: 5, wdata: 42, we: 1, raddr: 5 });
    expect(sim.inspect('rdata')).toBe(0n);

    sim.step({ waddr: 0, wdata: 0, we: 0, raddr: 5 });
    expect(sim.inspect('rdata')).toBe(42n);
    expect(sim.inspectMem(mem)).toEqual(new Map([[5n, 42n]]));
  });

  it('should hold full 32-bit words', () => {
    const { block } = memoryBlock();
    const sim = createSimulation(block, { mode });
    sim.step({ waddr: 1, wdata: 0xffffffff, we: 1, raddr: 0 });
    sim.step({ waddr: 0, wdata: 0, we: 0, raddr: 1 });
    expect(sim.inspect('rdata')).toBe(0xffffffffn);
  });

  it('should let the last-declared write port win', () => {
    const block = new Block();
    const mem = block.memBlock(8, 2, 'mem');
    const addr = block.input(2, 'addr');
    const we = block.input(1, 'we');
    mem.write(addr, enabledWrite(block.input(8, 'd1'), we));
    mem.write(addr, enabledWrite(block.input(8, 'd2'), we));

    const sim = createSimulation(block, { mode });
    sim.step({ addr: 2, we: 1, d1: 7, d2: 9 });
    expect(sim.inspectMem(mem)).toEqual(new Map([[2n, 9n]]));
  });

  it('should start from memoryValueMap and defaultValue', () => {
    const { block, mem } = memoryBlock(8, 2);
    const sim = createSimulation(block, {
      mode,
      memoryValueMap: new Map([[mem, { 3: 99 }]]),
      defaultValue: 1,
    });

    sim.step({ waddr: 0, wdata: 0, we: 0, raddr: 3 });
    expect(sim.inspect('rdata')).toBe(99n);
    sim.step({ waddr: 0, wdata: 0, we: 0, raddr: 2 });
    expect(sim.inspect('rdata')).toBe(1n);
    expect(sim.inspectMem(mem)).toEqual(new Map([[3n, 99n]]));
  });

  it('should reject bad memory initialization', () => {
    const { block, mem } = memoryBlock(8, 2);
    expect(() => createSimulation(block, { mode, memoryValueMap: new Map([[mem, { 4: 1 }]]) })).toThrow(
      SimulationError
    );
    expect(() => createSimulation(block, { mode, memoryValueMap: new Map([[mem, { 0: 256 }]]) })).toThrow(
      /does not fit in 8 bits/
    );

    const rom = block.romBlock(8, 2, [1, 2], 'rom');
    block.output(8, 'romdata').connect(rom.read(0));
    expect(() => createSimulation(block, { mode, memoryValueMap: new Map([[rom, { 0: 1 }]]) })).toThrow(
      /cannot be given initial contents/
    );
  });

  it('should read ROM contents', () => {
    const block = new Block();
    const rom = block.romBlock(8, 2, [10, 20, 30], 'rom');
    const addr = block.input(2, 'addr');
    block.output(8, 'out').connect(rom.read(addr));

    const sim = createSimulation(block, { mode });
    const seen: bigint[] = [];
    for (const a of [0, 1, 2, 3]) {
      sim.step({ addr: a });
      seen.push(sim.inspect('out'));
    }
    expect(seen).toEqual([10n, 20n, 30n, 0n]);
    expect(() => sim.inspectMem(rom)).toThrow(/is a ROM/);
  });

  it('should write under a conditional', () => {
    const block = new Block();
    const mem = block.memBlock(8, 2, 'mem');
    const addr = block.input(2, 'addr');
    const data = block.input(8, 'data');
    const go = block.input(1, 'go');
    conditionalAssignment(block, (c) => {
      c.when(go, () => {
        mem.assign(addr, data);
      });
    });

    const sim = createSimulation(block, { mode });
    sim.step({ addr: 1, data: 5, go: 0 });
    expect(sim.inspectMem(mem)).toEqual(new Map());
    sim.step({ addr: 1, data: 5, go: 1 });
    expect(sim.inspectMem(mem)).toEqual(new Map([[1n, 5n]]));
  });
});

// Tests that the interpreter, the JS compiler and the WASM compiler agree

import { describe, it, expect, vi } from 'vitest';
import {
  Block,
  MemBlock,
  Simulation,
  FastSimulation,
  WasmSimulation,
  createSimulation,
  conditionalAssignment,
  concat,
  enabledWrite,
  mux,
  probe,
  SimulationError,
  type SimulationBase,
  type SimulationMode,
} from '../src/index.js';

// Park-Miller generator, for repeatable stimulus
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state >> 7;
  };
}

// A small datapath: accumulator, scratch memory, lookup ROM and a state machine
function datapath(): { block: Block; mem: MemBlock } {
  const block = new Block();
  const x = block.input(8, 'x');
  const op = block.input(2, 'op');
  const addr = block.input(3, 'addr');
  const we = block.input(1, 'we');

  const acc = block.register(12, 'acc');
  const mode = block.register(2, 'mode');
  const mem = block.memBlock(12, 3, 'scratch');
  const rom = block.romBlock(8, 3, (a) => (a * 37) % 256, 'table');

  const stored = mem.read(addr);
  const looked = rom.read(addr);
  const result = mux(op, [acc.add(x), acc.sub(looked), acc.xor(stored), concat(x.slice(0, 4), looked)]);
  acc.next.connect(result);
  mem.write(addr, enabledWrite(acc, we));

  conditionalAssignment(block, (c) => {
    c.when(x.eq(0), () => {
      mode.next.assign(0);
    });
    c.when(acc.bit(0), () => {
      c.when(mode.lt(3), () => {
        mode.next.assign(mode.add(1));
      });
    });
    c.otherwise(() => {
      mode.next.assign(mode.sub(1));
    });
  });

  block.output(undefined, 'product').connect(x.mul(looked));
  block.output(undefined, 'stored').connect(stored);
  block.output(undefined, 'high').connect(acc.gt(2000));
  probe(mode, 'mode_out');
  return { block, mem };
}

describe('engine equivalence', () => {
  it('should produce identical values for random stimulus', () => {
    const modes: SimulationMode[] = ['interpret', 'fast', 'wasm'];
    const runs = modes.map((mode) => {
      const { block, mem } = datapath();
      return { sim: createSimulation(block, { mode }), mem };
    });
    const watched = ['acc', 'mode', 'product', 'stored', 'high', 'mode_out'];

    const next = lcg(7);
    for (let cycle = 0; cycle < 200; cycle++) {
      const inputs = { x: next() % 256, op: next() % 4, addr: next() % 8, we: next() % 2 };
      const seen = runs.map(({ sim }) => {
        sim.step(inputs);
        return watched.map((name) => sim.inspect(name));
      });
      expect(seen[1]).toEqual(seen[0]);
      expect(seen[2]).toEqual(seen[0]);
    }

    const contents = runs.map(({ sim, mem }) => sim.inspectMem(mem));
    expect(contents[1]).toEqual(contents[0]);
    expect(contents[2]).toEqual(contents[0]);
  });

  it('should agree on values wider than 64 bits', () => {
    const build = (): Block => {
      const block = new Block();
      const a = block.input(64, 'a');
      const b = block.input(64, 'b');
      block.output(undefined, 'prod').connect(a.mul(b));
      block.output(undefined, 'diff').connect(a.sub(b));
      return block;
    };
    const a = 2n ** 63n + 5n;
    const b = 3n;

    for (const sim of [new Simulation(build()), new FastSimulation(build())]) {
      sim.step({ a, b });
      expect(sim.inspect('prod')).toBe(a * b);
      expect(sim.inspect('diff')).toBe(a - b);
    }
  });
});

describe('engine selection', () => {
  function wide(): Block {
    const block = new Block();
    const a = block.input(40, 'wide');
    block.output(40, 'out').connect(a);
    return block;
  }

  it('should report whether WASM supports a block', () => {
    expect(WasmSimulation.supports(datapath().block)).toBe(true);
    expect(WasmSimulation.supports(wide())).toBe(false);

    const deep = new Block();
    const mem = deep.memBlock(8, 17, 'deep');
    deep.output(8, 'o').connect(mem.read(deep.input(17, 'addr')));
    expect(WasmSimulation.supports(deep)).toBe(false);
  });

  it('should refuse unsupported blocks on the WASM engine', () => {
    expect(() => new WasmSimulation(wide())).toThrow(SimulationError);
    expect(() => createSimulation(wide(), { mode: 'wasm' })).toThrow(/cannot be compiled to WASM/);
  });

  it('should fall back to the JS compiler in auto mode', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      const sim: SimulationBase = createSimulation(wide());
      expect(sim).toBeInstanceOf(FastSimulation);
      expect(warn).toHaveBeenCalledWith(
        'Warning: wire "wide" is 40 bits wide; WASM simulation supports at most 32; falling back to the JavaScript compiler'
      );

      sim.step({ wide: 2n ** 39n });
      expect(sim.inspect('out')).toBe(2n ** 39n);
    } finally {
      warn.mockRestore();
    }
  });

  it('should pick WASM in auto mode when it can', () => {
    expect(createSimulation(datapath().block)).toBeInstanceOf(WasmSimulation);
    expect(createSimulation(datapath().block, { mode: 'interpret' })).toBeInstanceOf(Simulation);
  });

  it('should expose the generated JavaScript', () => {
    const block = new Block();
    const a = block.input(3, 'a');
    const b = block.input(3, 'b');
    block.output(4, 'sum').connect(a.add(b));
    const sim = new FastSimulation(block);
    expect(sim.source).toContain('function evaluate_block(v, mems, roms, dflt)');
    expect(sim.source).toContain('v[3] = (v[0] + v[1]) & 0xfn;');
  });
});

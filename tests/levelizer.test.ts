import { describe, it, expect } from 'vitest';
import {
  Block,
  levelize,
  detectLoops,
  getStats,
  createSimulation,
  CombinationalLoopError,
  SimulationError,
  StructuralError,
  type SimulationMode,
} from '../src/index.js';

// w = ~(w & a): a three-net loop through w
function loopBlock(): Block {
  const block = new Block();
  const a = block.input(1, 'a');
  const w = block.wireVector(1, 'w');
  const x = w.and(a);
  w.connect(x.not());
  block.output(1, 'o').connect(w);
  return block;
}

describe('levelize', () => {
  it('should assign levels from inputs, constants and registers', () => {
    const block = new Block();
    const a = block.input(1, 'a');
    const b = block.input(1, 'b');
    const r = block.register(1, 'r');
    r.next.connect(a);
    block.output(1, 'o').connect(a.and(b).not());

    const levelized = levelize(block);
    expect(levelized.maxLevel).toBe(3);
    expect(levelized.levels.map((level) => level.map((net) => net.op))).toEqual([['and'], ['not'], ['wire']]);
    expect(levelized.order.map((net) => net.op)).toEqual(['and', 'not', 'wire']);
    expect(levelized.sequential.map((net) => net.op)).toEqual(['register']);
  });

  it('should keep declaration order within a level', () => {
    const block = new Block();
    const a = block.input(1, 'a');
    const b = block.input(1, 'b');
    const x = block.output(1, 'x');
    const y = block.output(1, 'y');
    y.connect(b);
    x.connect(a);

    const levelized = levelize(block);
    expect(levelized.levels[0].map((net) => net.dests[0].name)).toEqual(['y', 'x']);
  });

  it('should report reads of wires nothing drives', () => {
    const block = new Block();
    const w = block.wireVector(1, 'w');
    block.output(1, 'o').connect(w);
    expect(() => levelize(block)).toThrow(/never driven/);
    expect(detectLoops(block)).toEqual([]);
  });

  it('should summarize the levelized block', () => {
    const block = new Block();
    const a = block.input(1, 'a');
    const b = block.input(1, 'b');
    block.output(1, 'o').connect(a.and(b).not());

    expect(getStats(levelize(block))).toEqual({
      totalNets: 3,
      totalRegisters: 0,
      totalMemories: 0,
      maxLevel: 3,
      netsPerLevel: [1, 1, 1],
      avgFanout: 1,
    });
  });
});

describe('detectLoops', () => {
  it('should list the nets of a loop in declaration order', () => {
    const loops = detectLoops(loopBlock());
    expect(loops).toHaveLength(1);
    expect(loops[0].map((net) => net.op)).toEqual(['and', 'not', 'wire']);
  });

  it('should find a wire driving itself', () => {
    const block = new Block();
    const w = block.wireVector(1, 'w');
    w.connect(w);
    const loops = detectLoops(block);
    expect(loops).toHaveLength(1);
    expect(loops[0]).toEqual([block.driverOf(w)]);
  });

  it('should not treat registers as loops', () => {
    const block = new Block();
    const r = block.register(4, 'r');
    r.next.connect(r.add(1));
    expect(detectLoops(block)).toEqual([]);
  });

  it('should raise a loop error from levelize', () => {
    let caught: unknown;
    try {
      levelize(loopBlock());
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(CombinationalLoopError);
    expect(caught).toBeInstanceOf(SimulationError);
    if (caught instanceof CombinationalLoopError) {
      expect(caught.loops).toHaveLength(1);
      expect(caught.message).toContain('w/1W <-- wire -- tmp1/1W');
    }
  });
});

describe.each<SimulationMode>(['interpret', 'fast', 'wasm'])('simulation construction (%s)', (mode) => {
  it('should refuse a block with a combinational loop', () => {
    expect(() => createSimulation(loopBlock(), { mode })).toThrow(CombinationalLoopError);
  });

  it('should run sanityCheck first', () => {
    const block = new Block();
    block.wireVector(1, 'w');
    expect(() => createSimulation(block, { mode })).toThrow(StructuralError);
  });
});

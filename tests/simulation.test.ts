// Tests for cycle-accurate simulation on every engine

import { describe, it, expect } from 'vitest';
import {
  Block,
  Register,
  conditionalAssignment,
  select,
  rtlAssert,
  createSimulation,
  SimulationTrace,
  SimulationError,
  OutputMismatchError,
  type SimulationMode,
  type SimulationOptions,
  type SimulationBase,
} from '../src/index.js';

const ENGINES: SimulationMode[] = ['interpret', 'fast', 'wasm'];

function fullAdder(): Block {
  const block = new Block();
  const a = block.input(1, 'a');
  const b = block.input(1, 'b');
  const c = block.input(1, 'c');
  block.output(1, 'sum').connect(a.xor(b).xor(c));
  block.output(1, 'cout').connect(a.and(b).or(a.and(c)).or(b.and(c)));
  return block;
}

function counter(): { block: Block; count: Register } {
  const block = new Block();
  const count = block.register(3, 'counter');
  count.next.connect(count.add(1));
  return { block, count };
}

// Counter that only advances while `en` is 1
function enabledCounter(): { block: Block; count: Register } {
  const block = new Block();
  const count = block.register(3, 'counter');
  const en = block.input(1, 'en');
  count.next.connect(select(en, count.add(1), count));
  return { block, count };
}

function vendingMachine(): Block {
  const block = new Block();
  const tokenIn = block.input(1, 'token_in');
  const reqRefund = block.input(1, 'req_refund');
  const dispense = block.output(1, 'dispense');
  const refund = block.output(1, 'refund');
  const state = block.register(3, 'state');

  const [WAIT, TOK1, TOK2, TOK3, DISPENSE, REFUND] = [0, 1, 2, 3, 4, 5].map((x) => block.const(x, 3));

  conditionalAssignment(block, (c) => {
    c.when(reqRefund, () => {
      state.next.assign(REFUND);
    });
    c.when(tokenIn, () => {
      c.when(state.eq(WAIT), () => {
        state.next.assign(TOK1);
      });
      c.when(state.eq(TOK1), () => {
        state.next.assign(TOK2);
      });
      c.when(state.eq(TOK2), () => {
        state.next.assign(TOK3);
      });
      c.when(state.eq(TOK3), () => {
        state.next.assign(DISPENSE);
      });
      c.otherwise(() => {
        state.next.assign(REFUND);
      });
    });
    c.when(state.eq(DISPENSE).or(state.eq(REFUND)), () => {
      state.next.assign(WAIT);
    });
  });

  dispense.connect(state.eq(DISPENSE));
  refund.connect(state.eq(REFUND));
  return block;
}

describe.each(ENGINES)('Simulation (%s)', (mode) => {
  const simulate = (block: Block, options: SimulationOptions = {}): SimulationBase =>
    createSimulation(block, { ...options, mode });

  describe('scenarios', () => {
    it('should add three bits', () => {
      const sim = simulate(fullAdder());
      sim.step({ a: 1, b: 0, c: 1 });
      expect(sim.inspect('sum')).toBe(0n);
      expect(sim.inspect('cout')).toBe(1n);

      sim.step({ a: 1, b: 1, c: 1 });
      expect(sim.inspect('sum')).toBe(1n);
      expect(sim.inspect('cout')).toBe(1n);
    });

    it('should count and wrap a 3-bit register', () => {
      const { block } = counter();
      const sim = simulate(block);
      const values: bigint[] = [];
      for (let i = 0; i < 10; i++) {
        sim.step();
        values.push(sim.inspect('counter'));
      }
      expect(values).toEqual([1n, 2n, 3n, 4n, 5n, 6n, 7n, 0n, 1n, 2n]);
      expect(sim.cycle).toBe(10);
    });

    it('should run the vending machine', () => {
      const sim = simulate(vendingMachine());
      sim.stepMultiple(
        { token_in: '0010100111010000', req_refund: '1100010000000000' },
        { dispense: '0000000000001000', refund: '0111001000000000' }
      );
      expect(sim.cycle).toBe(16);
    });
  });

  describe('inspect', () => {
    it('should show registers and constants before the first step', () => {
      const { block } = counter();
      const sim = simulate(block);
      expect(sim.cycle).toBe(0);
      expect(sim.inspect('counter')).toBe(0n);
      expect(sim.inspect('const0_1')).toBe(1n);
    });

    it('should refuse other wires before the first step', () => {
      const sim = simulate(fullAdder());
      expect(() => sim.inspect('sum')).toThrow(/has not been computed yet/);
    });

    it('should refuse unknown wires', () => {
      const sim = simulate(fullAdder());
      expect(() => sim.inspect('nope')).toThrow(SimulationError);
    });
  });

  describe('initial state', () => {
    it('should start registers from registerValueMap', () => {
      const { block, count } = counter();
      const byName = simulate(block, { registerValueMap: { counter: 5 } });
      byName.step();
      expect(byName.inspect(count)).toBe(6n);

      const byWire = simulate(block, { registerValueMap: new Map([[count, 7n]]) });
      byWire.step();
      expect(byWire.inspect(count)).toBe(0n);
    });

    it('should truncate defaultValue to each register', () => {
      const { block } = counter();
      const sim = simulate(block, { defaultValue: 13 });
      expect(sim.inspect('counter')).toBe(5n);
      sim.step();
      expect(sim.inspect('counter')).toBe(6n);
    });

    it('should reject bad initial values', () => {
      const { block } = counter();
      expect(() => simulate(block, { registerValueMap: { counter: 8 } })).toThrow(/does not fit in 3 bits/);
      expect(() => simulate(block, { registerValueMap: { const0_1: 1 } })).toThrow(/not a register/);
      expect(() => simulate(block, { defaultValue: -1 })).toThrow(SimulationError);
    });
  });

  describe('input validation', () => {
    it('should require every input', () => {
      const sim = simulate(fullAdder());
      expect(() => sim.step({ a: 1, b: 0 })).toThrow('no value given for input(s) c');
    });

    it('should reject unknown inputs', () => {
      const sim = simulate(fullAdder());
      expect(() => sim.step({ a: 1, b: 0, c: 1, d: 1 })).toThrow('"d" is not an input of the simulated block');
      expect(() => sim.step({ a: 1, b: 0, c: 1, sum: 1 })).toThrow(SimulationError);
    });

    it('should reject values outside the input width', () => {
      const sim = simulate(fullAdder());
      expect(() => sim.step({ a: 2, b: 0, c: 0 })).toThrow('input "a": 2 does not fit in 1 bits');
      expect(() => sim.step({ a: -1, b: 0, c: 0 })).toThrow(/negative/);
      expect(() => sim.step({ a: 0.5, b: 0, c: 0 })).toThrow(/not an integer/);
    });

    it('should not advance on a rejected step', () => {
      const { block } = enabledCounter();
      const sim = simulate(block);
      sim.step({ en: 1 });
      expect(() => sim.step({ en: 2 })).toThrow(SimulationError);
      expect(sim.cycle).toBe(1);
      expect(sim.inspect('counter')).toBe(1n);
      sim.step({ en: 1 });
      expect(sim.inspect('counter')).toBe(2n);
    });

    it('should keep the inputs it was built with', () => {
      const block = fullAdder();
      const sim = simulate(block);
      block.input(1, 'late');

      sim.step({ a: 1, b: 1, c: 0 });
      expect([sim.inspect('sum'), sim.inspect('cout')]).toEqual([0n, 1n]);
      expect(() => sim.step({ a: 0, b: 0, c: 0, late: 1 })).toThrow('"late" is not an input of the simulated block');
    });
  });

  describe('assertions', () => {
    it('should fail the step without committing it', () => {
      const { block } = enabledCounter();
      const a = block.input(4, 'a');
      rtlAssert(a.lt(10), 'a must stay below 10');
      const sim = simulate(block);

      sim.step({ en: 1, a: 3 });
      expect(() => sim.step({ en: 1, a: 12 })).toThrow('assertion "assert0" failed in cycle 1: a must stay below 10');
      expect(sim.cycle).toBe(1);
      expect(sim.inspect('counter')).toBe(1n);

      sim.step({ en: 1, a: 9 });
      expect(sim.inspect('counter')).toBe(2n);
    });
  });

  describe('stepMultiple', () => {
    it('should pass when outputs match', () => {
      const { block } = enabledCounter();
      const sim = simulate(block);
      sim.stepMultiple({ en: '1101' }, { counter: '1223' });
      expect(sim.cycle).toBe(4);
    });

    it('should accept value arrays', () => {
      const { block } = enabledCounter();
      const sim = simulate(block);
      sim.stepMultiple({ en: [1, 1n] }, { counter: [1, 2n] });
      expect(sim.inspect('counter')).toBe(2n);
    });

    it('should report every mismatch', () => {
      const { block } = enabledCounter();
      const sim = simulate(block);
      let caught: unknown;
      try {
        sim.stepMultiple({ en: '1101' }, { counter: '1233' });
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(OutputMismatchError);
      if (caught instanceof OutputMismatchError) {
        expect(caught.mismatches).toEqual([{ cycle: 2, wire: 'counter', expected: 3n, actual: 2n }]);
      }
      expect(sim.cycle).toBe(4);
    });

    it('should stop after the first mismatch when asked', () => {
      const { block } = enabledCounter();
      const sim = simulate(block);
      expect(() =>
        sim.stepMultiple({ en: '1101' }, { counter: '1033' }, { stopAfterFirstError: true })
      ).toThrow(OutputMismatchError);
      expect(sim.cycle).toBe(2);
    });

    it('should run only nsteps cycles', () => {
      const { block } = enabledCounter();
      const sim = simulate(block);
      sim.stepMultiple({ en: '1111' }, {}, { nsteps: 2 });
      expect(sim.cycle).toBe(2);
      expect(sim.inspect('counter')).toBe(2n);
    });

    it('should reject sequences of different lengths', () => {
      const { block } = enabledCounter();
      const sim = simulate(block);
      expect(() => sim.stepMultiple({ en: '11' }, { counter: '123' })).toThrow(
        /sequence for "counter" has 3 entries, expected 2/
      );
      expect(() => sim.stepMultiple({ en: '1x' })).toThrow(/only digits are allowed/);
      expect(sim.cycle).toBe(1);
    });
  });

  describe('tracing', () => {
    it('should record named wires after each step', () => {
      const { block } = enabledCounter();
      const tracer = new SimulationTrace(block);
      const sim = simulate(block, { tracer });
      for (const en of [1, 0, 1]) {
        sim.step({ en });
      }

      expect(tracer.wires.map((w) => w.name)).toEqual(['counter', 'en']);
      expect(tracer.length).toBe(3);
      expect(tracer.get('counter')).toEqual([1n, 1n, 2n]);
      expect(tracer.at('en', 1)).toBe(0n);
      expect(tracer.toString()).toBe('counter: 1 1 2\nen: 1 0 1');
      expect(() => tracer.at('en', 3)).toThrow(SimulationError);
    });

    it('should trace only the wires it was given', () => {
      const { block } = enabledCounter();
      const tracer = new SimulationTrace(block, ['counter']);
      const sim = simulate(block, { tracer });
      sim.step({ en: 1 });
      expect(tracer.get('counter')).toEqual([1n]);
      expect(() => tracer.get('en')).toThrow(/not traced/);
    });

    it('should refuse a tracer from another block', () => {
      const { block } = enabledCounter();
      const tracer = new SimulationTrace(fullAdder());
      expect(() => simulate(block, { tracer })).toThrow(/different block/);
    });
  });
});

// Conditional-assignment compiler
//
// Lowers prioritized, nested "when predicate, assign value" scopes to select
// chains. Every assignment is recorded with its full predicate: the AND of the
// enclosing conditions, each guarded by "no earlier sibling matched". When the
// outermost scope closes, one chain per destination is built with the
// first-declared assignment at the highest priority.

import type { Block } from './block.js';
import { WireVector, Register, Input, Const, asWires } from './wirevector.js';
import type { WireLike } from './wirevector.js';
import type { MemBlock } from './memory.js';
import { select } from './ops.js';
import { ConditionalError } from './errors.js';

export interface ConditionalOptions {
  // Value a destination takes when none of its predicates hold
  defaults?: ReadonlyMap<WireVector, WireLike>;
}

interface Assignment {
  predicate: WireVector;
  value: WireVector;
}

interface MemAssignment {
  predicate: WireVector;
  addr: WireVector;
  data: WireVector;
  enable: WireVector;
}

// The when/otherwise siblings directly under one frame (or the scope root)
class Level {
  readonly predicates: WireVector[] = [];
  hasOtherwise = false;
  private readonly anyUpTo: WireVector[] = [];
  private readonly noneBeforeCache = new Map<number, WireVector>();

  /**
   * 1 when none of the first `count` sibling predicates holds; built on demand
   * so levels without an otherwise or later assignments add no logic.
   */
  noneBefore(count: number): WireVector {
    const cached = this.noneBeforeCache.get(count);
    if (cached) return cached;
    for (let i = this.anyUpTo.length; i < count; i++) {
      this.anyUpTo.push(i === 0 ? this.predicates[0] : this.anyUpTo[i - 1].or(this.predicates[i]));
    }
    const none = this.anyUpTo[count - 1].not();
    this.noneBeforeCache.set(count, none);
    return none;
  }
}

// One when or otherwise body
class Frame {
  readonly children = new Level();
  private full: WireVector | undefined;

  constructor(
    readonly parent: Frame | undefined,
    readonly level: Level,
    readonly index: number,
    readonly condition: WireVector | undefined
  ) {}

  get predicate(): WireVector {
    if (this.full === undefined) {
      let local: WireVector;
      if (this.condition === undefined) {
        local = this.level.noneBefore(this.index);
      } else if (this.index === 0) {
        local = this.condition;
      } else {
        local = this.condition.and(this.level.noneBefore(this.index));
      }
      this.full = this.parent ? this.parent.predicate.and(local) : local;
    }
    return this.full;
  }
}

/**
 * Handle passed to the body of conditionalAssignment.
 */
export class ConditionalScope {
  private readonly root = new Level();
  private current: Frame | undefined;
  private closed = false;
  private readonly wires = new Map<WireVector, Assignment[]>();
  private readonly registers = new Map<Register, Assignment[]>();
  private readonly memWrites = new Map<MemBlock, MemAssignment[]>();

  constructor(readonly block: Block) {}

  /**
   * Open a scope whose assignments apply when `predicate` is 1 and no earlier
   * sibling's predicate was.
   */
  when(predicate: WireLike, body: () => void): void {
    this.checkOpen('when');
    const level = this.currentLevel();
    if (level.hasOtherwise) {
      throw new ConditionalError('when cannot follow otherwise at the same level');
    }
    const pred = asWires(this.block, predicate);
    if (pred.width !== 1) {
      throw new ConditionalError(`predicate "${pred.name}" must be 1 bit wide, got ${pred.width}`);
    }
    level.predicates.push(pred);
    this.enter(new Frame(this.current, level, level.predicates.length - 1, pred), body);
  }

  // Applies when no earlier sibling at this level matched
  otherwise(body: () => void): void {
    this.checkOpen('otherwise');
    const level = this.currentLevel();
    if (level.hasOtherwise) {
      throw new ConditionalError('only one otherwise is allowed at each level');
    }
    if (level.predicates.length === 0) {
      throw new ConditionalError('otherwise needs a preceding when at the same level');
    }
    level.hasOtherwise = true;
    this.enter(new Frame(this.current, level, level.predicates.length, undefined), body);
  }

  isPending(wire: WireVector): boolean {
    return this.wires.has(wire) || (wire instanceof Register && this.registers.has(wire));
  }

  /** @internal */
  recordWire(wire: WireVector, value: WireLike): void {
    const frame = this.requireFrame(wire.name);
    if (wire instanceof Input || wire instanceof Const || wire instanceof Register) {
      throw new ConditionalError(`"${wire.name}" cannot be the target of a conditional assignment`);
    }
    this.checkTarget(wire);
    const rhs = asWires(this.block, value, wire.width);
    push(this.wires, wire, { predicate: frame.predicate, value: rhs });
  }

  /** @internal */
  recordRegister(reg: Register, value: WireLike): void {
    const frame = this.requireFrame(reg.name);
    if (reg.nextWire !== undefined) {
      throw new ConditionalError(`next value of register "${reg.name}" already has an unconditional driver`);
    }
    const rhs = asWires(this.block, value, reg.width);
    push(this.registers, reg, { predicate: frame.predicate, value: rhs });
  }

  /** @internal */
  recordMemWrite(mem: MemBlock, addr: WireVector, data: WireVector, enable: WireVector): void {
    const frame = this.requireFrame(mem.name);
    push(this.memWrites, mem, { predicate: frame.predicate, addr, data, enable });
  }

  /** @internal Build the select chains once the outermost body has returned. */
  finalize(defaults: ReadonlyMap<WireVector, WireLike>): void {
    for (const [wire, pairs] of this.wires) {
      const fallback = defaults.get(wire) ?? 0;
      wire.connect(chain(pairs, asWires(this.block, fallback, wire.width)));
    }
    for (const [reg, pairs] of this.registers) {
      const fallback = defaults.get(reg) ?? reg;
      reg.next.connect(chain(pairs, asWires(this.block, fallback, reg.width)));
    }
    for (const [mem, writes] of this.memWrites) {
      const zero = (bitwidth: number): WireVector => asWires(this.block, 0, bitwidth);
      mem.buildWritePort(
        chain(writes.map((w) => ({ predicate: w.predicate, value: w.addr })), zero(mem.addrwidth)),
        chain(writes.map((w) => ({ predicate: w.predicate, value: w.data })), zero(mem.bitwidth)),
        chain(writes.map((w) => ({ predicate: w.predicate, value: w.enable })), zero(1))
      );
    }
  }

  /** @internal */
  close(): void {
    this.closed = true;
  }

  private checkTarget(wire: WireVector): void {
    if (wire.bitwidth === undefined) {
      throw new ConditionalError(`cannot assign "${wire.name}" conditionally: its bitwidth is undefined`);
    }
    if (this.block.isDriven(wire)) {
      throw new ConditionalError(`"${wire.name}" already has an unconditional driver`);
    }
  }

  private checkOpen(what: string): void {
    if (this.closed) {
      throw new ConditionalError(`${what} used after its conditionalAssignment closed`);
    }
  }

  private currentLevel(): Level {
    return this.current ? this.current.children : this.root;
  }

  private requireFrame(target: string): Frame {
    if (this.current === undefined) {
      throw new ConditionalError(`assignment to "${target}" must be inside a when or otherwise`);
    }
    return this.current;
  }

  private enter(frame: Frame, body: () => void): void {
    const saved = this.current;
    this.current = frame;
    try {
      body();
    } finally {
      this.current = saved;
    }
  }
}

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

// Last-declared first, so the first-declared assignment wins
function chain(pairs: readonly Assignment[], fallback: WireVector): WireVector {
  let acc = fallback;
  for (let i = pairs.length - 1; i >= 0; i--) {
    acc = select(pairs[i].predicate, pairs[i].value, acc);
  }
  return acc;
}

/**
 * Run `body` with a conditional scope open on `block`:
 *
 *   conditionalAssignment(block, (c) => {
 *     c.when(a.eq(0), () => { r.next.assign(1); });
 *     c.otherwise(() => { r.next.assign(r.add(1)); });
 *   });
 *
 * If `body` throws, the scope is released and no destination is driven.
 * Predicate logic built before the throw stays in the block.
 */
export function conditionalAssignment(
  block: Block,
  body: (c: ConditionalScope) => void,
  options: ConditionalOptions = {}
): void {
  const scope = new ConditionalScope(block);
  block.openConditional(scope);
  try {
    body(scope);
  } finally {
    scope.close();
    block.closeConditional(scope);
  }
  scope.finalize(options.defaults ?? new Map());
}

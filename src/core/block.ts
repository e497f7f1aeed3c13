// Block: owns the wires, nets, memories and assertions of one circuit
//
// Nets are checked as they are added; sanityCheck() re-runs every check over
// the whole graph and adds the ones that only make sense once it is complete.

import { WireVector, Input, Output, Const, Register } from './wirevector.js';
import type { WireKind, ConstValue } from './wirevector.js';
import { MemBlock, RomBlock } from './memory.js';
import type { MemBlockBase, RomData } from './memory.js';
import type { ConditionalScope } from './conditional.js';
import { ConstructionError, ConditionalError, StructuralError } from './errors.js';
import { NET_OPS, BINARY_OPS, COMPARISON_OPS, formatNet } from '../types/netlist.js';
import type { LogicNet, NetOp } from '../types/netlist.js';

export interface BlockOptions {
  // Warn about driven wires that nothing reads when sanityCheck() runs
  debug?: boolean;
  // Restrict the ops nets may use; defaults to every op
  legalOps?: Iterable<NetOp>;
}

const RESERVED_NAMES = new Set(['clk', 'clock']);

export class Block {
  readonly debug: boolean;
  readonly legalOps: ReadonlySet<NetOp>;

  private readonly wires = new Set<WireVector>();
  private readonly nets: LogicNet[] = [];
  private readonly byName = new Map<string, WireVector>();
  private readonly drivers = new Map<WireVector, LogicNet>();
  private readonly mems: MemBlockBase[] = [];
  private readonly asserts = new Map<Output, string>();
  private readonly nameCounters = new Map<string, number>();
  private constCounter = 0;
  private memCounter = 0;

  /** @internal The conditionalAssignment currently open on this block. */
  activeConditional: ConditionalScope | undefined;

  constructor(options: BlockOptions = {}) {
    this.debug = options.debug ?? false;
    this.legalOps = new Set(options.legalOps ?? NET_OPS);
  }

  // Factories

  wireVector(bitwidth?: number, name?: string): WireVector {
    return new WireVector(this, bitwidth, name);
  }

  input(bitwidth: number, name?: string): Input {
    return new Input(this, bitwidth, name);
  }

  output(bitwidth?: number, name?: string): Output {
    return new Output(this, bitwidth, name);
  }

  const(value: ConstValue, bitwidth?: number): Const {
    return new Const(this, value, bitwidth);
  }

  register(bitwidth: number, name?: string): Register {
    return new Register(this, bitwidth, name);
  }

  memBlock(bitwidth: number, addrwidth: number, name?: string): MemBlock {
    return new MemBlock(this, bitwidth, addrwidth, name);
  }

  romBlock(bitwidth: number, addrwidth: number, romData: RomData, name?: string): RomBlock {
    return new RomBlock(this, bitwidth, addrwidth, romData, name);
  }

  // Naming

  /**
   * Validate a caller-chosen name, or make up a fresh `tmpN` one.
   */
  nextTempName(name?: string): string {
    if (name === undefined) {
      return this.uniqueName('tmp');
    }
    if (name.length === 0) {
      throw new ConstructionError('wire names must be non-empty');
    }
    if (RESERVED_NAMES.has(name)) {
      throw new ConstructionError(`"${name}" is reserved for the implicit clock`);
    }
    if (this.byName.has(name)) {
      throw new ConstructionError(`a wire named "${name}" already exists in this block`);
    }
    return name;
  }

  nextConstName(value: bigint): string {
    let name: string;
    do {
      name = `const${this.constCounter++}_${value}`;
    } while (this.byName.has(name));
    return name;
  }

  // Next free `${prefix}N`, skipping names already taken
  uniqueName(prefix: string): string {
    let n = this.nameCounters.get(prefix) ?? 0;
    let name = `${prefix}${n}`;
    while (this.byName.has(name)) {
      n++;
      name = `${prefix}${n}`;
    }
    this.nameCounters.set(prefix, n + 1);
    return name;
  }

  nextMemId(): number {
    return this.memCounter++;
  }

  // Growth

  addWireVector(wire: WireVector): void {
    if (wire.block !== this) {
      throw new ConstructionError(`wire "${wire.name}" was created for a different block`);
    }
    if (this.byName.has(wire.name)) {
      throw new ConstructionError(`a wire named "${wire.name}" already exists in this block`);
    }
    this.wires.add(wire);
    this.byName.set(wire.name, wire);
  }

  /**
   * Add a net after running the per-net checks on it.
   */
  addNet(net: LogicNet): void {
    const problems = this.netProblems(net);
    for (const dest of net.dests) {
      if (this.drivers.has(dest)) {
        problems.push(`wire "${dest.name}" is already driven and cannot be driven again`);
      }
    }
    if (problems.length > 0) {
      throw new ConstructionError(`${problems.join('; ')}: ${formatNet(net)}`);
    }
    this.nets.push(net);
    for (const dest of net.dests) {
      this.drivers.set(dest, net);
    }
  }

  addMemory(mem: MemBlockBase): void {
    if (mem.block !== this) {
      throw new ConstructionError(`memory "${mem.name}" was created for a different block`);
    }
    this.mems.push(mem);
  }

  addAssertion(wire: Output, message: string): void {
    this.asserts.set(wire, message);
  }

  // Conditional-assignment slot

  /** @internal */
  openConditional(scope: ConditionalScope): void {
    if (this.activeConditional !== undefined) {
      throw new ConditionalError('conditionalAssignment cannot be nested inside another');
    }
    this.activeConditional = scope;
  }

  /** @internal */
  closeConditional(scope: ConditionalScope): void {
    if (this.activeConditional === scope) {
      this.activeConditional = undefined;
    }
  }

  /** @internal */
  requireConditional(target: string): ConditionalScope {
    if (this.activeConditional === undefined) {
      throw new ConditionalError(
        `conditional assignment to "${target}" outside conditionalAssignment; use connect() instead`
      );
    }
    return this.activeConditional;
  }

  // Introspection

  get wirevectors(): readonly WireVector[] {
    return [...this.wires];
  }

  get logic(): readonly LogicNet[] {
    return this.nets;
  }

  get memories(): readonly MemBlockBase[] {
    return this.mems;
  }

  get assertions(): ReadonlyMap<Output, string> {
    return this.asserts;
  }

  get inputs(): Input[] {
    return [...this.wires].filter((w): w is Input => w instanceof Input);
  }

  get outputs(): Output[] {
    return [...this.wires].filter((w): w is Output => w instanceof Output);
  }

  get registers(): Register[] {
    return [...this.wires].filter((w): w is Register => w instanceof Register);
  }

  get consts(): Const[] {
    return [...this.wires].filter((w): w is Const => w instanceof Const);
  }

  wirevectorSubset(kinds: WireKind | readonly WireKind[]): WireVector[] {
    const wanted = new Set<WireKind>(typeof kinds === 'string' ? [kinds] : kinds);
    return [...this.wires].filter((w) => wanted.has(w.kind));
  }

  logicSubset(ops: NetOp | readonly NetOp[]): LogicNet[] {
    const wanted = new Set<NetOp>(typeof ops === 'string' ? [ops] : ops);
    return this.nets.filter((net) => wanted.has(net.op));
  }

  getWireVectorByName(name: string, strict: true): WireVector;
  getWireVectorByName(name: string, strict?: boolean): WireVector | undefined;
  getWireVectorByName(name: string, strict: boolean = false): WireVector | undefined {
    const wire = this.byName.get(name);
    if (wire === undefined && strict) {
      throw new ConstructionError(`no wire named "${name}" in this block`);
    }
    return wire;
  }

  isDriven(wire: WireVector): boolean {
    return this.drivers.has(wire);
  }

  driverOf(wire: WireVector): LogicNet | undefined {
    return this.drivers.get(wire);
  }

  toString(): string {
    return this.nets.map(formatNet).join('\n');
  }

  // Checks

  /**
   * Run every structural check and throw one StructuralError listing all the
   * problems found. Never modifies the block.
   */
  sanityCheck(): void {
    const problems: string[] = [];

    for (const net of this.nets) {
      problems.push(...this.netProblems(net));
    }

    const seen = new Set<string>();
    for (const wire of this.wires) {
      if (seen.has(wire.name)) {
        problems.push(`duplicate wire name "${wire.name}"`);
      }
      seen.add(wire.name);
      if (wire.bitwidth === undefined) {
        problems.push(`wire "${wire.name}" has no defined bitwidth`);
      }
    }

    const driveCount = new Map<WireVector, number>();
    const used = new Set<WireVector>();
    for (const net of this.nets) {
      for (const dest of net.dests) {
        driveCount.set(dest, (driveCount.get(dest) ?? 0) + 1);
      }
      for (const arg of net.args) {
        used.add(arg);
      }
    }

    for (const wire of this.wires) {
      const count = driveCount.get(wire) ?? 0;
      if (count > 1) {
        problems.push(`wire "${wire.name}" is driven ${count} times`);
      }
      if (count > 0 || wire instanceof Input || wire instanceof Const || wire instanceof Register) {
        continue;
      }
      if (used.has(wire)) {
        problems.push(`wire "${wire.name}" is used but never driven`);
      } else {
        problems.push(`wire "${wire.name}" is declared but never connected`);
      }
    }

    if (this.activeConditional !== undefined) {
      problems.push('a conditionalAssignment is still open');
    }

    if (problems.length > 0) {
      throw new StructuralError(problems);
    }

    if (this.debug) {
      for (const wire of this.wires) {
        if (!used.has(wire) && driveCount.has(wire) && !(wire instanceof Output)) {
          console.warn(`Warning: wire "${wire.name}" is driven but never used`);
        }
      }
    }
  }

  // Checks that concern one net on its own
  private netProblems(net: LogicNet): string[] {
    const problems: string[] = [];

    if (!this.legalOps.has(net.op)) {
      problems.push(`op "${net.op}" is not legal in this block`);
    }
    for (const wire of [...net.args, ...net.dests]) {
      if (wire.block !== this || !this.wires.has(wire)) {
        problems.push(`wire "${wire.name}" does not belong to this block`);
      }
      if (wire.bitwidth === undefined) {
        problems.push(`wire "${wire.name}" has no defined bitwidth`);
      }
    }
    for (const dest of net.dests) {
      if (dest instanceof Input) {
        problems.push(`input "${dest.name}" cannot be driven by a net`);
      }
      if (dest instanceof Const) {
        problems.push(`constant "${dest.name}" cannot be driven by a net`);
      }
      if (dest instanceof Register && net.op !== 'register') {
        problems.push(`register "${dest.name}" can only be driven by a register net`);
      }
      if (net.op === 'register' && !(dest instanceof Register)) {
        problems.push(`register net must drive a Register, not "${dest.name}"`);
      }
    }
    for (const arg of net.args) {
      if (arg instanceof Output) {
        problems.push(`output "${arg.name}" cannot be read inside the block`);
      }
    }
    if (problems.length > 0) {
      return problems;
    }

    const arity = expectedArity(net.op);
    if (arity.args !== undefined ? net.args.length !== arity.args : net.args.length === 0) {
      problems.push(`op "${net.op}" takes ${arity.args ?? 'one or more'} arguments, got ${net.args.length}`);
    }
    if (net.dests.length !== arity.dests) {
      problems.push(`op "${net.op}" drives ${arity.dests} wires, got ${net.dests.length}`);
    }
    if (problems.length > 0) {
      return problems;
    }

    const widths = net.args.map((w) => w.bitwidth ?? 0);
    let produced = 0;

    switch (net.op) {
      case 'wire':
      case 'not':
      case 'register':
        produced = widths[0];
        break;
      case 'select':
        if (widths[0] !== 1) {
          problems.push(`select needs a 1-bit selector, got ${widths[0]} bits`);
        }
        if (widths[1] !== widths[2]) {
          problems.push(`select cases differ in bitwidth (${widths[1]} and ${widths[2]})`);
        }
        produced = widths[1];
        break;
      case 'concat':
        produced = widths.reduce((a, b) => a + b, 0);
        break;
      case 'bitselect':
        for (const i of net.param) {
          if (!Number.isInteger(i) || i < 0 || i >= widths[0]) {
            problems.push(`bit index ${i} is out of range for "${net.args[0].name}"`);
          }
        }
        produced = net.param.length;
        break;
      case 'memread':
      case 'memwrite': {
        const mem = net.param.mem;
        if (mem.block !== this) {
          problems.push(`memory "${mem.name}" does not belong to this block`);
        }
        if (widths[0] !== mem.addrwidth) {
          problems.push(`address of "${mem.name}" must be ${mem.addrwidth} bits, got ${widths[0]}`);
        }
        if (net.op === 'memread') {
          produced = mem.bitwidth;
          if (net.dests[0].bitwidth !== mem.bitwidth) {
            problems.push(`read data of "${mem.name}" must be ${mem.bitwidth} bits`);
          }
        } else {
          if (mem.readOnly) {
            problems.push(`"${mem.name}" is read-only and cannot have a write port`);
          }
          if (widths[1] !== mem.bitwidth) {
            problems.push(`write data of "${mem.name}" must be ${mem.bitwidth} bits, got ${widths[1]}`);
          }
          if (widths[2] !== 1) {
            problems.push(`write enable of "${mem.name}" must be 1 bit, got ${widths[2]}`);
          }
        }
        break;
      }
      default:
        if (BINARY_OPS.has(net.op)) {
          if (widths[0] !== widths[1]) {
            problems.push(`operands of "${net.op}" differ in bitwidth (${widths[0]} and ${widths[1]})`);
          }
          if (COMPARISON_OPS.has(net.op)) {
            produced = 1;
          } else if (net.op === 'add' || net.op === 'sub') {
            produced = widths[0] + 1;
          } else if (net.op === 'mul') {
            produced = widths[0] + widths[1];
          } else {
            produced = widths[0];
          }
        }
    }

    for (const dest of net.dests) {
      const width = dest.bitwidth ?? 0;
      if (width > produced) {
        problems.push(`"${dest.name}" is ${width} bits but "${net.op}" produces only ${produced}`);
      }
    }
    return problems;
  }
}

// undefined args means "at least one"
function expectedArity(op: NetOp): { args: number | undefined; dests: number } {
  switch (op) {
    case 'concat':
      return { args: undefined, dests: 1 };
    case 'select':
      return { args: 3, dests: 1 };
    case 'memwrite':
      return { args: 3, dests: 0 };
    case 'wire':
    case 'not':
    case 'bitselect':
    case 'register':
    case 'memread':
      return { args: 1, dests: 1 };
    default:
      return { args: 2, dests: 1 };
  }
}

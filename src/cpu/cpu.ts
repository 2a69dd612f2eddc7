import { CallStack } from './callStack';
import { RuntimeFault, type RuntimeFaultCode } from './errors';
import { DEFAULT_BITS, DEFAULT_RAM_SIZE, DEFAULT_REGISTER_COUNT, DEFAULT_STACK_SIZE, MAX_BITS } from '../isa/limits';
import type { Instruction, Opcode, Operand, Program, Word } from '../isa/types';
import {
  andWord,
  divTrunc,
  modTrunc,
  mulWrap,
  notWord,
  orWord,
  shlWrap,
  shrWrap,
  toSigned,
  wrap,
  xorWord,
} from '../isa/word';

export type RunState = 'running' | 'halted' | 'faulted';

export interface CPUOptions {
  registerCount?: number;
  ramSize?: number;
  stackSize?: number;
  bits?: number;
  printing?: boolean; // PRT is a no-op unless set
}

// Side channels. Called synchronously, in instruction order; handlers must not touch CPU state.
export interface CPUHooks {
  onPixel?: (x: Word, y: Word, color: number) => void;
  onClear?: () => void;
  onPrint?: (value: number) => void;
}

export interface StepResult {
  state: RunState;
  pc: number; // index of the instruction attempted, or the current PC when nothing ran
  opcode: Opcode | null;
  fault?: RuntimeFault;
}

export const COLOR_MASK = 0xffffff;

function positiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) throw new Error(`${name} must be a positive integer, got ${v}`);
  return v;
}

export class CPU {
  readonly registerCount: number;
  readonly ramSize: number;
  readonly bits: number;
  readonly printing: boolean;

  readonly registers: Uint32Array;
  readonly ram: Uint32Array;
  readonly stack: CallStack;

  pc = 0;
  flag = false; // set by CMP: operands equal
  color = 0;

  private runState: RunState = 'running';
  private lastFault: RuntimeFault | undefined;
  private current: Instruction | undefined;

  constructor(
    readonly program: Program,
    opts: CPUOptions = {},
    private readonly hooks: CPUHooks = {},
  ) {
    this.registerCount = positiveInt('registerCount', opts.registerCount ?? DEFAULT_REGISTER_COUNT);
    this.ramSize = positiveInt('ramSize', opts.ramSize ?? DEFAULT_RAM_SIZE);
    this.bits = positiveInt('bits', opts.bits ?? DEFAULT_BITS);
    if (this.bits > MAX_BITS) throw new Error(`bits must be at most ${MAX_BITS}, got ${this.bits}`);
    this.printing = opts.printing ?? false;

    for (const instr of program.instructions) {
      for (const op of instr.operands) {
        if ((op.kind === 'register' || op.kind === 'indirect') && op.register >= this.registerCount) {
          throw new Error(`line ${instr.line}: r${op.register} is outside the ${this.registerCount}-register file`);
        }
      }
    }

    this.registers = new Uint32Array(this.registerCount);
    this.ram = new Uint32Array(this.ramSize);
    this.stack = new CallStack(positiveInt('stackSize', opts.stackSize ?? DEFAULT_STACK_SIZE));
  }

  get state(): RunState {
    return this.runState;
  }

  get fault(): RuntimeFault | undefined {
    return this.lastFault;
  }

  reset(): void {
    this.registers.fill(0);
    this.ram.fill(0);
    this.stack.clear();
    this.pc = 0;
    this.flag = false;
    this.color = 0;
    this.runState = 'running';
    this.lastFault = undefined;
    this.current = undefined;
  }

  step(): StepResult {
    if (this.runState !== 'running') {
      return { state: this.runState, pc: this.pc, opcode: null, fault: this.lastFault };
    }

    const pc = this.pc;
    const instr = this.program.instructions[pc];
    if (instr === undefined) {
      // PC ran past the last instruction.
      this.runState = 'halted';
      return { state: 'halted', pc, opcode: null };
    }

    this.current = instr;
    try {
      this.execute(instr);
    } catch (e) {
      if (!(e instanceof RuntimeFault)) throw e;
      this.runState = 'faulted';
      this.lastFault = e;
      return { state: 'faulted', pc, opcode: instr.opcode, fault: e };
    }
    return { state: this.runState, pc, opcode: instr.opcode };
  }

  private execute(instr: Instruction): void {
    const [a, b] = instr.operands;
    let next = this.pc + 1;

    switch (instr.opcode) {
      case 'NOP':
        break;
      case 'MOV':
        this.write(a, this.read(b));
        break;
      case 'ADD':
        this.write(a, wrap(this.read(a) + this.read(b), this.bits));
        break;
      case 'SUB':
        this.write(a, wrap(this.read(a) - this.read(b), this.bits));
        break;
      case 'MUL':
        this.write(a, mulWrap(this.read(a), this.read(b), this.bits));
        break;
      case 'DIV': {
        const divisor = this.read(b);
        if (divisor === 0) this.raise('DivisionByZero', 'divisor is zero');
        this.write(a, divTrunc(this.read(a), divisor, this.bits));
        break;
      }
      case 'MOD': {
        const divisor = this.read(b);
        if (divisor === 0) this.raise('DivisionByZero', 'divisor is zero');
        this.write(a, modTrunc(this.read(a), divisor, this.bits));
        break;
      }
      case 'SHL':
        this.write(a, shlWrap(this.read(a), this.read(b), this.bits));
        break;
      case 'SHR':
        this.write(a, shrWrap(this.read(a), this.read(b), this.bits));
        break;
      case 'AND':
        this.write(a, andWord(this.read(a), this.read(b)));
        break;
      case 'OR':
        this.write(a, orWord(this.read(a), this.read(b)));
        break;
      case 'XOR':
        this.write(a, xorWord(this.read(a), this.read(b)));
        break;
      case 'NOT':
        this.write(a, notWord(this.read(a), this.bits));
        break;
      case 'CMP':
        this.flag = this.read(a) === this.read(b);
        break;
      case 'JN':
        if (!this.flag) next = this.jumpTarget(a);
        break;
      case 'JMP':
        next = this.jumpTarget(a);
        break;
      case 'INC':
        this.write(a, wrap(this.read(a) + 1, this.bits));
        break;
      case 'DEC':
        this.write(a, wrap(this.read(a) - 1, this.bits));
        break;
      case 'CALL': {
        const target = this.jumpTarget(a);
        if (this.stack.full) this.raise('StackOverflow', `call depth exceeds ${this.stack.capacity}`);
        this.stack.push(this.pc + 1);
        next = target;
        break;
      }
      case 'RET':
        if (this.stack.empty) this.raise('StackUnderflow', 'RET with an empty call stack');
        next = this.stack.pop();
        break;
      case 'COL':
        this.color = this.read(a) & COLOR_MASK;
        break;
      case 'DSP':
        this.hooks.onPixel?.(this.read(a), this.read(b), this.color);
        break;
      case 'CLS':
        this.hooks.onClear?.();
        break;
      case 'PRT':
        if (this.printing) this.hooks.onPrint?.(toSigned(this.read(a), this.bits));
        break;
      case 'HLT':
        this.runState = 'halted';
        return;
    }
    this.pc = next;
  }

  private raise(code: RuntimeFaultCode, detail: string): never {
    const instr = this.current;
    if (!instr) throw new Error(`fault ${code} raised outside of step()`);
    throw new RuntimeFault(code, this.pc, instr.opcode, instr.line, detail);
  }

  private address(addr: number): number {
    if (addr >= this.ramSize) this.raise('MemoryOutOfRange', `address ${addr} outside 0..${this.ramSize - 1}`);
    return addr;
  }

  private read(op: Operand): Word {
    switch (op.kind) {
      case 'register':
        return this.registers[op.register];
      case 'indirect':
        return this.ram[this.address(this.registers[op.register])];
      case 'direct':
        return this.ram[this.address(op.address)];
      case 'immediate':
        return wrap(op.value, this.bits);
      case 'label':
        return op.target;
    }
  }

  private write(op: Operand, value: Word): void {
    switch (op.kind) {
      case 'register':
        this.registers[op.register] = value;
        return;
      case 'indirect':
        this.ram[this.address(this.registers[op.register])] = value;
        return;
      case 'direct':
        this.ram[this.address(op.address)] = value;
        return;
      case 'immediate':
      case 'label':
        throw new Error(`line ${this.current?.line ?? '?'}: ${op.kind} operand is not writable`);
    }
  }

  // Targets are absolute instruction indices and are never reduced to the word width.
  private jumpTarget(op: Operand): number {
    const len = this.program.instructions.length;
    const target = op.kind === 'label' ? op.target : op.kind === 'immediate' ? op.value : this.read(op);
    if (target < 0 || target > len) {
      this.raise('InvalidJumpTarget', `target ${target} outside 0..${len}`);
    }
    return target;
  }
}

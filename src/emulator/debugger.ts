import type { CPU, RunState, StepResult } from '../cpu/cpu';
import type { RuntimeFault } from '../cpu/errors';
import { formatInstruction } from '../isa/disassemble';
import { toSigned } from '../isa/word';
import type { EmulatorConfig } from './config';
import { TimingHistory, type TimingSample } from './timingHistory';

export type StopReason = 'limit' | 'breakpoint' | 'halted' | 'faulted';

export interface BatchResult {
  state: RunState;
  steps: number;
  reason: StopReason;
  pc: number;
  fault?: RuntimeFault;
}

export interface CPUSnapshot {
  state: RunState;
  pc: number;
  flag: boolean;
  color: number;
  registers: number[];
  signed: number[];
  stackDepth: number;
  stack?: number[]; // omitted in simple mode
  ram?: number[]; // omitted in simple mode
  instruction: string | null; // disassembly at pc
  line: number | null;
  labelsAt: string[];
  stepsExecuted: number;
  fault?: RuntimeFault;
}

export interface DebuggerSinks {
  onTimingSample?: (sample: TimingSample) => void;
  log?: (line: string) => void;
  now?: () => number; // ms clock, defaults to performance.now
}

function traceFromEnv(): boolean {
  const v = process.env.PIXEL_ISA_TRACE;
  return v === '1' || v === 'true';
}

export class Debugger {
  readonly timings: TimingHistory | undefined;
  private readonly bps = new Set<number>();
  private readonly log: (line: string) => void;
  private readonly now: () => number;
  private readonly trace: boolean;
  private stepsExecuted = 0;
  // PC of the breakpoint the previous batch stopped on; the next batch steps over it once.
  private resumeFrom: number | undefined;

  constructor(
    readonly cpu: CPU,
    readonly config: EmulatorConfig,
    private readonly sinks: DebuggerSinks = {},
  ) {
    this.timings = config.recordTimings && config.debug ? new TimingHistory(config.maxGraphPoints) : undefined;
    this.log = sinks.log ?? ((line) => console.log(line));
    this.now = sinks.now ?? (() => performance.now());
    this.trace = config.textDebug || traceFromEnv();
  }

  get steps(): number {
    return this.stepsExecuted;
  }

  runBatch(n: number): BatchResult {
    if (!Number.isInteger(n) || n < 0) throw new RangeError(`batch size must be a non-negative integer, got ${n}`);
    const skip = this.resumeFrom;
    this.resumeFrom = undefined;
    const honourBreakpoints = this.config.debug;

    let steps = 0;
    while (steps < n && this.cpu.state === 'running') {
      const pc = this.cpu.pc;
      if (honourBreakpoints && this.bps.has(pc) && !(steps === 0 && skip === pc)) {
        this.resumeFrom = pc;
        return this.result(steps, 'breakpoint');
      }
      this.stepOnce();
      steps++;
    }
    return this.result(steps, this.cpu.state === 'running' ? 'limit' : this.cpu.state);
  }

  // Single step; breakpoints do not apply.
  step(): BatchResult {
    this.resumeFrom = undefined;
    if (this.cpu.state !== 'running') return this.result(0, this.cpu.state);
    this.stepOnce();
    return this.result(1, this.cpu.state === 'running' ? 'limit' : this.cpu.state);
  }

  reset(): void {
    this.cpu.reset();
    this.timings?.clear();
    this.stepsExecuted = 0;
    this.resumeFrom = undefined;
  }

  addBreakpoint(index: number): void {
    const len = this.cpu.program.instructions.length;
    if (!Number.isInteger(index) || index < 0 || index > len) {
      throw new RangeError(`breakpoint ${index} outside 0..${len}`);
    }
    this.bps.add(index);
  }

  addBreakpointAtLabel(name: string): number {
    const index = this.cpu.program.labels.get(name);
    if (index === undefined) throw new Error(`unknown label '${name}'`);
    this.addBreakpoint(index);
    return index;
  }

  removeBreakpoint(index: number): boolean {
    return this.bps.delete(index);
  }

  toggleBreakpoint(index: number): boolean {
    if (this.bps.has(index)) {
      this.bps.delete(index);
      return false;
    }
    this.addBreakpoint(index);
    return true;
  }

  clearBreakpoints(): void {
    this.bps.clear();
  }

  breakpoints(): number[] {
    return [...this.bps].sort((a, b) => a - b);
  }

  snapshot(): CPUSnapshot {
    const { cpu } = this;
    const instr = cpu.program.instructions[cpu.pc];
    const labelsAt: string[] = [];
    for (const [name, index] of cpu.program.labels) if (index === cpu.pc) labelsAt.push(name);

    const snap: CPUSnapshot = {
      state: cpu.state,
      pc: cpu.pc,
      flag: cpu.flag,
      color: cpu.color,
      registers: Array.from(cpu.registers),
      signed: Array.from(cpu.registers, (v) => toSigned(v, cpu.bits)),
      stackDepth: cpu.stack.depth,
      instruction: instr ? formatInstruction(instr) : null,
      line: instr ? instr.line : null,
      labelsAt,
      stepsExecuted: this.stepsExecuted,
      fault: cpu.fault,
    };
    if (!this.config.simpleDebug) {
      snap.stack = cpu.stack.values();
      snap.ram = Array.from(cpu.ram);
    }
    return snap;
  }

  private result(steps: number, reason: StopReason): BatchResult {
    return { state: this.cpu.state, steps, reason, pc: this.cpu.pc, fault: this.cpu.fault };
  }

  private stepOnce(): StepResult {
    const timings = this.timings;
    const t0 = timings ? this.now() : 0;
    const r = this.cpu.step();
    if (timings) {
      const sample: TimingSample = { seq: this.stepsExecuted, pc: r.pc, opcode: r.opcode, micros: (this.now() - t0) * 1000 };
      timings.push(sample);
      this.sinks.onTimingSample?.(sample);
    }
    if (this.trace) this.log(this.traceLine(r));
    this.stepsExecuted++;
    return r;
  }

  private traceLine(r: StepResult): string {
    const { cpu } = this;
    const head = `[trace] #${this.stepsExecuted} ${String(r.pc).padStart(4, '0')}`;
    const instr = cpu.program.instructions[r.pc];
    if (!instr || r.opcode === null) return `${head} <end of program> ${r.state}`;
    if (r.fault) return `${head} ${formatInstruction(instr)} !! ${r.fault.code}`;

    let dest = '';
    const target = instr.operands[0];
    if (target && target.kind === 'register') dest = ` r${target.register}=${cpu.registers[target.register]}`;
    return `${head} ${formatInstruction(instr)} -> pc=${cpu.pc} flag=${cpu.flag ? 1 : 0}${dest}`;
  }
}

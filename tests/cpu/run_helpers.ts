import { assemble } from '../../src/assembler/assembler';
import { CPU, type CPUHooks, type CPUOptions } from '../../src/cpu/cpu';

export function makeCPU(src: string, opts: CPUOptions = {}, hooks: CPUHooks = {}): CPU {
  return new CPU(assemble(src, opts.registerCount), opts, hooks);
}

// Step until the CPU stops running or maxSteps is reached; returns the step count.
export function runToEnd(cpu: CPU, maxSteps = 100_000): number {
  let steps = 0;
  while (cpu.state === 'running' && steps < maxSteps) {
    cpu.step();
    steps++;
  }
  return steps;
}

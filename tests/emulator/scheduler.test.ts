import fs from 'fs';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { resolveConfig, type RawConfig } from '../../src/emulator/config';
import { Emulator } from '../../src/emulator/core';
import { Scheduler, type SchedulerHooks } from '../../src/emulator/scheduler';
import type { CPUSnapshot } from '../../src/emulator/debugger';

const COUNTDOWN = fs.readFileSync(path.join(process.cwd(), 'programs', 'countdown.asm'), 'utf8');
const SPIN = 'L: JMP L';

const immediate = async (): Promise<void> => {};

function setup(src: string, overrides: RawConfig, hooks: SchedulerHooks = {}) {
  const prints: number[] = [];
  const emu = Emulator.fromSource(src, resolveConfig(overrides), { print: (v) => prints.push(v) });
  const sched = new Scheduler(emu.dbg, { now: () => 0, yieldFn: immediate, ...hooks });
  return { emu, sched, prints };
}

describe('Scheduler', () => {
  it('runs a program to completion in batches', async () => {
    const refreshes: CPUSnapshot[] = [];
    const { sched, prints } = setup(COUNTDOWN, { printing: true, batch_size: 10 }, { onRefresh: (s) => refreshes.push(s) });
    const result = await sched.run();
    expect(result).toEqual({ reason: 'halted', state: 'halted', steps: 32, batches: 4, fault: undefined });
    expect(prints).toEqual([5, 4, 3, 2, 1]);
    // clock never advances past the 200ms interval, so only the final refresh fires
    expect(refreshes).toHaveLength(1);
    expect(refreshes[0].state).toBe('halted');
  });

  it('refreshes after every batch with a zero interval', async () => {
    let refreshes = 0;
    const { sched } = setup(COUNTDOWN, { batch_size: 10, window_update_interval: 0 }, { onRefresh: () => refreshes++ });
    await sched.run();
    expect(refreshes).toBe(4);
  });

  it('stops between batches when cancelled', async () => {
    const ctrl = new AbortController();
    let yields = 0;
    const { sched } = setup(SPIN, { batch_size: 50 }, {
      yieldFn: async () => {
        if (++yields === 3) ctrl.abort();
      },
    });
    const result = await sched.run({ signal: ctrl.signal });
    expect(result).toEqual({ reason: 'cancelled', state: 'running', steps: 150, batches: 3, fault: undefined });
  });

  it('stops after maxBatches', async () => {
    const { sched } = setup(SPIN, { batch_size: 50 });
    const result = await sched.run({ maxBatches: 2 });
    expect(result.reason).toBe('limit');
    expect(result.steps).toBe(100);
  });

  it('pushes timing samples every graphUpdateFrequency batches', async () => {
    const updates: number[] = [];
    const { sched } = setup(
      SPIN,
      { timing_graph: true, graph_update_frequency: 2, batch_size: 5, max_graph_points: 4 },
      { onGraphUpdate: (samples) => updates.push(samples.length) },
    );
    await sched.run({ maxBatches: 6 });
    expect(updates).toEqual([4, 4, 4]);
  });

  it('sends no graph updates without timingGraph', async () => {
    let updates = 0;
    const { sched } = setup(SPIN, { batch_size: 5 }, { onGraphUpdate: () => updates++ });
    await sched.run({ maxBatches: 6 });
    expect(updates).toBe(0);
  });

  it('returns at a breakpoint and continues past it on the next run', async () => {
    const { emu, sched, prints } = setup(COUNTDOWN, { printing: true, batch_size: 10 });
    emu.dbg.addBreakpointAtLabel('SHOW');

    const first = await sched.run();
    expect(first.reason).toBe('breakpoint');
    expect(first.steps).toBe(2);
    expect(emu.cpu.pc).toBe(6);
    expect(prints).toEqual([]);

    const second = await sched.run();
    expect(second.reason).toBe('breakpoint');
    expect(second.steps).toBe(6);
    expect(prints).toEqual([5]);
  });

  it('reports the fault of a faulted run', async () => {
    const { sched } = setup('MOV r0 1\nDIV r0 0', {});
    const result = await sched.run();
    expect(result.reason).toBe('faulted');
    expect(result.fault?.code).toBe('DivisionByZero');
  });
});

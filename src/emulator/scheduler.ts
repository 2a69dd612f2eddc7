import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { RunState } from '../cpu/cpu';
import type { RuntimeFault } from '../cpu/errors';
import type { CPUSnapshot, Debugger, StopReason } from './debugger';
import type { TimingSample } from './timingHistory';

export interface SchedulerHooks {
  onRefresh?: (snapshot: CPUSnapshot) => void;
  onGraphUpdate?: (samples: TimingSample[]) => void;
  now?: () => number; // ms clock for the refresh cadence
  yieldFn?: () => Promise<void>;
}

export interface RunOptions {
  signal?: AbortSignal;
  maxBatches?: number;
}

export interface RunResult {
  reason: StopReason | 'cancelled';
  state: RunState;
  steps: number;
  batches: number;
  fault?: RuntimeFault;
}

// Cooperative driver: one batch at a time, yielding to the event loop in between.
// - refreshes presentation every windowUpdateInterval ms (and once when the run stops)
// - pushes timing samples to the graph every graphUpdateFrequency batches when timingGraph is on
// - cancellation is checked between batches only; a running batch always completes
export class Scheduler {
  private readonly now: () => number;
  private readonly yieldFn: () => Promise<void>;

  constructor(private readonly dbg: Debugger, private readonly hooks: SchedulerHooks = {}) {
    this.now = hooks.now ?? (() => performance.now());
    this.yieldFn = hooks.yieldFn ?? (() => yieldToEventLoop());
  }

  async run(opts: RunOptions = {}): Promise<RunResult> {
    const { batchSize, windowUpdateInterval, timingGraph, graphUpdateFrequency } = this.dbg.config;
    const maxBatches = opts.maxBatches ?? Infinity;
    let steps = 0;
    let batches = 0;
    let lastRefresh = this.now();

    for (;;) {
      if (opts.signal?.aborted) return this.finish('cancelled', steps, batches);
      if (batches >= maxBatches) return this.finish('limit', steps, batches);

      const r = this.dbg.runBatch(batchSize);
      batches++;
      steps += r.steps;

      if (timingGraph && this.dbg.timings && batches % graphUpdateFrequency === 0) {
        this.hooks.onGraphUpdate?.(this.dbg.timings.samples());
      }
      if (r.reason !== 'limit') return this.finish(r.reason, steps, batches);

      const t = this.now();
      if (t - lastRefresh >= windowUpdateInterval) {
        lastRefresh = t;
        this.hooks.onRefresh?.(this.dbg.snapshot());
      }
      await this.yieldFn();
    }
  }

  private finish(reason: RunResult['reason'], steps: number, batches: number): RunResult {
    this.hooks.onRefresh?.(this.dbg.snapshot());
    return { reason, state: this.dbg.cpu.state, steps, batches, fault: this.dbg.cpu.fault };
  }
}

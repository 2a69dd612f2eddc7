import type { Opcode } from '../isa/types';

export interface TimingSample {
  seq: number; // monotonically increasing step number
  pc: number;
  opcode: Opcode | null;
  micros: number;
}

// Fixed-capacity ring buffer; pushing into a full buffer evicts the oldest sample.
export class TimingHistory {
  private readonly buf: (TimingSample | undefined)[];
  private head = 0; // index of the oldest sample
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`timing history capacity must be a positive integer, got ${capacity}`);
    }
    this.buf = new Array<TimingSample | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.count;
  }

  push(sample: TimingSample): void {
    if (this.count < this.capacity) {
      this.buf[(this.head + this.count) % this.capacity] = sample;
      this.count++;
      return;
    }
    this.buf[this.head] = sample;
    this.head = (this.head + 1) % this.capacity;
  }

  // Oldest first.
  samples(): TimingSample[] {
    const out: TimingSample[] = [];
    for (let i = 0; i < this.count; i++) {
      const s = this.buf[(this.head + i) % this.capacity];
      if (s) out.push(s);
    }
    return out;
  }

  clear(): void {
    this.buf.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  mean(): number {
    if (this.count === 0) return 0;
    let sum = 0;
    for (const s of this.samples()) sum += s.micros;
    return sum / this.count;
  }

  // Median over the most recent `window` samples.
  median(window: number = this.capacity): number {
    const recent = this.samples().slice(-Math.max(1, window)).map((s) => s.micros);
    if (recent.length === 0) return 0;
    recent.sort((a, b) => a - b);
    const mid = recent.length >> 1;
    return recent.length % 2 === 1 ? recent[mid] : (recent[mid - 1] + recent[mid]) / 2;
  }
}

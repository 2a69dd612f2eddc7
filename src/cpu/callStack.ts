// Fixed-capacity return-address stack used only by CALL/RET.
export class CallStack {
  private readonly slots: Uint32Array;
  private top = 0;

  constructor(public readonly capacity: number) {
    this.slots = new Uint32Array(capacity);
  }

  get depth(): number {
    return this.top;
  }

  get full(): boolean {
    return this.top >= this.capacity;
  }

  get empty(): boolean {
    return this.top === 0;
  }

  push(returnAddress: number): void {
    if (this.full) throw new RangeError('call stack is full');
    this.slots[this.top++] = returnAddress;
  }

  pop(): number {
    if (this.empty) throw new RangeError('call stack is empty');
    return this.slots[--this.top];
  }

  // Bottom first.
  values(): number[] {
    return Array.from(this.slots.subarray(0, this.top));
  }

  clear(): void {
    this.top = 0;
    this.slots.fill(0);
  }
}

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { makeCPU } from './run_helpers';

// Reference results computed with BigInt, independent of the CPU's number paths.
function ref(bits: number, v: bigint): number {
  return Number(BigInt.asUintN(bits, v));
}

const word32 = fc.integer({ min: 0, max: 0xffffffff });

describe('CPU arithmetic wraps modulo 2^bits', () => {
  it('ADD/SUB/MUL register-register at 32 bits', () => {
    fc.assert(
      fc.property(word32, word32, (a, b) => {
        for (const op of ['ADD', 'SUB', 'MUL'] as const) {
          const cpu = makeCPU(`${op} r0 r1`);
          cpu.registers[0] = a;
          cpu.registers[1] = b;
          cpu.step();
          const expected =
            op === 'ADD' ? ref(32, BigInt(a) + BigInt(b)) : op === 'SUB' ? ref(32, BigInt(a) - BigInt(b)) : ref(32, BigInt(a) * BigInt(b));
          expect(cpu.registers[0]).toBe(expected);
          expect(cpu.registers[1]).toBe(b);
        }
      }),
      { numRuns: 300 },
    );
  });

  it('ADD/SUB/MUL with narrow word widths and signed immediates', () => {
    const arb = fc
      .integer({ min: 1, max: 32 })
      .chain((bits) =>
        fc.tuple(fc.constant(bits), fc.integer({ min: 0, max: 2 ** bits - 1 }), fc.integer({ min: -(2 ** 31), max: 2 ** 31 })),
      );
    fc.assert(
      fc.property(arb, ([bits, a, imm]) => {
        const add = makeCPU(`ADD r0 ${imm}`, { bits });
        add.registers[0] = a;
        add.step();
        expect(add.registers[0]).toBe(ref(bits, BigInt(a) + BigInt(imm)));

        const sub = makeCPU(`SUB r0 ${imm}`, { bits });
        sub.registers[0] = a;
        sub.step();
        expect(sub.registers[0]).toBe(ref(bits, BigInt(a) - BigInt(imm)));

        const mul = makeCPU(`MUL r0 ${imm}`, { bits });
        mul.registers[0] = a;
        mul.step();
        expect(mul.registers[0]).toBe(ref(bits, BigInt(a) * BigInt(imm)));
      }),
      { numRuns: 300 },
    );
  });

  it('SHL matches a BigInt shift truncated to the word', () => {
    fc.assert(
      fc.property(word32, fc.integer({ min: 0, max: 40 }), (a, n) => {
        const cpu = makeCPU(`SHL r0 ${n}`);
        cpu.registers[0] = a;
        cpu.step();
        expect(cpu.registers[0]).toBe(n >= 32 ? 0 : ref(32, BigInt(a) << BigInt(n)));
      }),
    );
  });

  it('DIV by a zero register always faults and leaves the destination alone', () => {
    fc.assert(
      fc.property(fc.integer({ min: -(2 ** 31), max: 2 ** 32 - 1 }), (a) => {
        const cpu = makeCPU(`MOV r0 ${a}\nMOV r1 0\nDIV r0 r1`);
        cpu.step();
        cpu.step();
        const r = cpu.step();
        expect(r.state).toBe('faulted');
        expect(r.fault?.code).toBe('DivisionByZero');
        expect(r.fault?.pc).toBe(2);
        expect(cpu.registers[0]).toBe(ref(32, BigInt(a)));
      }),
      { numRuns: 100 },
    );
  });
});

describe('CPU arithmetic examples', () => {
  function single(src: string, bits?: number): number {
    const cpu = makeCPU(src, { bits });
    while (cpu.state === 'running') cpu.step();
    expect(cpu.state).toBe('halted');
    return cpu.registers[0];
  }

  it('DIV truncates toward zero on signed operands', () => {
    expect(single('MOV r0 -7\nDIV r0 2')).toBe(2 ** 32 - 3);
    expect(single('MOV r0 7\nDIV r0 -2')).toBe(2 ** 32 - 3);
    expect(single('MOV r0 -7\nDIV r0 -2')).toBe(3);
    expect(single('MOV r0 100\nDIV r0 7')).toBe(14);
  });

  it('MOD takes the sign of the dividend', () => {
    expect(single('MOV r0 -7\nMOD r0 2')).toBe(2 ** 32 - 1);
    expect(single('MOV r0 17\nMOD r0 5')).toBe(2);
  });

  it('INC and DEC wrap at the word boundary', () => {
    expect(single('MOV r0 0x7FFFFFFF\nINC r0')).toBe(0x80000000);
    expect(single('MOV r0 0xFFFFFFFF\nINC r0')).toBe(0);
    expect(single('DEC r0')).toBe(0xffffffff);
    expect(single('MOV r0 250\nADD r0 10', 8)).toBe(4);
  });

  it('SHL past the top bit leaves zero', () => {
    expect(single('MOV r0 1\nSHL r0 31')).toBe(0x80000000);
    expect(single('MOV r0 1\nSHL r0 31\nSHL r0 1')).toBe(0);
    expect(single('MOV r0 3\nSHL r0 40')).toBe(0);
  });

  it('MOD by zero faults like DIV', () => {
    const cpu = makeCPU('MOD r0 0');
    const r = cpu.step();
    expect(r.fault?.code).toBe('DivisionByZero');
    expect(r.fault?.opcode).toBe('MOD');
    expect(r.fault?.line).toBe(1);
  });
});

export type Word = number; // 0..2^bits-1

export type Opcode =
  | 'NOP'
  | 'MOV'
  | 'ADD'
  | 'SUB'
  | 'MUL'
  | 'DIV'
  | 'MOD'
  | 'SHL'
  | 'SHR'
  | 'AND'
  | 'OR'
  | 'XOR'
  | 'NOT'
  | 'CMP'
  | 'JN'
  | 'JMP'
  | 'INC'
  | 'DEC'
  | 'CALL'
  | 'RET'
  | 'COL'
  | 'DSP'
  | 'CLS'
  | 'PRT'
  | 'HLT';

// Operand kinds are decided once by the assembler; the CPU only switches on `kind`.
export type Operand =
  | { kind: 'register'; register: number }
  | { kind: 'indirect'; register: number } // [rN]: RAM at the register's current value
  | { kind: 'direct'; address: number } // [N]
  | { kind: 'immediate'; value: number }
  | { kind: 'label'; name: string; target: number };

export type OperandKind = Operand['kind'];

export interface Instruction {
  readonly opcode: Opcode;
  readonly operands: readonly Operand[];
  readonly line: number; // 1-based source line
  readonly source: string;
}

export interface Program {
  readonly labels: ReadonlyMap<string, number>;
  readonly instructions: readonly Instruction[];
}

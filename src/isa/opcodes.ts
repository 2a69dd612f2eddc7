import type { Opcode, OperandKind } from './types';

// Operand slot classes used by the signature table.
export type OperandSlot = 'dest' | 'value' | 'target';

export const SLOT_KINDS: Record<OperandSlot, readonly OperandKind[]> = {
  dest: ['register', 'indirect', 'direct'],
  value: ['register', 'indirect', 'direct', 'immediate'],
  target: ['label', 'immediate'],
};

export const OPCODE_SIGNATURES: Record<Opcode, readonly OperandSlot[]> = {
  NOP: [],
  MOV: ['dest', 'value'],
  ADD: ['dest', 'value'],
  SUB: ['dest', 'value'],
  MUL: ['dest', 'value'],
  DIV: ['dest', 'value'],
  MOD: ['dest', 'value'],
  SHL: ['dest', 'value'],
  SHR: ['dest', 'value'],
  AND: ['dest', 'value'],
  OR: ['dest', 'value'],
  XOR: ['dest', 'value'],
  NOT: ['dest'],
  CMP: ['value', 'value'],
  JN: ['target'],
  JMP: ['target'],
  INC: ['dest'],
  DEC: ['dest'],
  CALL: ['target'],
  RET: [],
  COL: ['value'],
  DSP: ['value', 'value'],
  CLS: [],
  PRT: ['value'],
  HLT: [],
};

export function isOpcode(mnemonic: string): mnemonic is Opcode {
  return Object.prototype.hasOwnProperty.call(OPCODE_SIGNATURES, mnemonic);
}

export function slotAccepts(slot: OperandSlot, kind: OperandKind): boolean {
  return SLOT_KINDS[slot].includes(kind);
}

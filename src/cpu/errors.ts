import type { Opcode } from '../isa/types';

export type RuntimeFaultCode =
  | 'DivisionByZero'
  | 'MemoryOutOfRange'
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'InvalidJumpTarget';

export class RuntimeFault extends Error {
  constructor(
    public readonly code: RuntimeFaultCode,
    public readonly pc: number,
    public readonly opcode: Opcode,
    public readonly line: number,
    detail: string,
  ) {
    super(`${code} at instruction ${pc} (${opcode}, line ${line}): ${detail}`);
    this.name = 'RuntimeFault';
  }
}

export type AssemblyErrorCode =
  | 'UnknownMnemonic'
  | 'ArityMismatch'
  | 'OperandKindMismatch'
  | 'UndefinedLabel'
  | 'DuplicateLabel'
  | 'RegisterOutOfRange'
  | 'InvalidSyntax';

export class AssemblyError extends Error {
  constructor(
    public readonly code: AssemblyErrorCode,
    public readonly line: number,
    detail: string,
    public readonly label?: string,
  ) {
    super(`Line ${line}: ${code}: ${detail}`);
    this.name = 'AssemblyError';
  }
}

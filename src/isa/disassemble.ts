import type { Instruction, Operand } from './types';

export function formatOperand(op: Operand): string {
  switch (op.kind) {
    case 'register':
      return `r${op.register}`;
    case 'indirect':
      return `[r${op.register}]`;
    case 'direct':
      return `[${op.address}]`;
    case 'immediate':
      return String(op.value);
    case 'label':
      return op.name;
  }
}

export function formatInstruction(instr: Instruction): string {
  if (instr.operands.length === 0) return instr.opcode;
  return `${instr.opcode} ${instr.operands.map(formatOperand).join(' ')}`;
}

// Listing with label headers, used by the assemble script and the debugger view.
export function formatListing(labels: ReadonlyMap<string, number>, instructions: readonly Instruction[]): string[] {
  const byIndex = new Map<number, string[]>();
  for (const [name, index] of labels) {
    const names = byIndex.get(index) ?? [];
    names.push(name);
    byIndex.set(index, names);
  }
  const out: string[] = [];
  for (let i = 0; i <= instructions.length; i++) {
    for (const name of byIndex.get(i) ?? []) out.push(`${name}:`);
    const instr = instructions[i];
    if (!instr) break;
    out.push(`  ${String(i).padStart(4, '0')}  ${formatInstruction(instr).padEnd(20)} ; line ${instr.line}`);
  }
  return out;
}

import { AssemblyError } from './errors';
import { OPCODE_SIGNATURES, isOpcode, slotAccepts } from '../isa/opcodes';
import { DEFAULT_REGISTER_COUNT } from '../isa/limits';
import type { Instruction, Operand, Program } from '../isa/types';

// Two-pass assembler.
// Pass 1 strips comments, binds labels to instruction indices and collects instruction lines.
// Pass 2 encodes each instruction line into a resolved Instruction.
//
// Grammar (one statement per line, ';' starts a comment):
//   LABEL:                 label bound to the next instruction
//   LABEL: MNEMONIC ...    label and instruction on one line
//   MNEMONIC op op         operands separated by whitespace and/or commas
// Operands: rN, [rN], [N], decimal or 0x-hex literal, label name.

interface SourceStatement {
  line: number;
  text: string;
}

const LABEL_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const REGISTER = /^[rR](\d+)$/;
const INDIRECT = /^\[[rR](\d+)\]$/;
const DIRECT = /^\[([^\]]+)\]$/;
const DECIMAL = /^[+-]?\d+$/;
const HEX = /^[+-]?0[xX][0-9a-fA-F]+$/;

function stripComment(raw: string): string {
  const i = raw.indexOf(';');
  return (i === -1 ? raw : raw.slice(0, i)).trim();
}

export function parseInteger(token: string): number | null {
  let v: number;
  if (DECIMAL.test(token)) {
    v = Number(token);
  } else if (HEX.test(token)) {
    const negative = token.startsWith('-');
    v = parseInt(token.replace(/^[+-]/, ''), 16) * (negative ? -1 : 1);
  } else {
    return null;
  }
  return Number.isSafeInteger(v) ? v : null;
}

function scan(source: string): { statements: SourceStatement[]; labels: Map<string, number> } {
  const labels = new Map<string, number>();
  const statements: SourceStatement[] = [];
  const lines = source.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = i + 1;
    let text = stripComment(lines[i]);
    if (!text) continue;

    const colon = text.indexOf(':');
    if (colon !== -1) {
      const name = text.slice(0, colon).trim();
      if (!LABEL_NAME.test(name)) {
        throw new AssemblyError('InvalidSyntax', line, `invalid label name '${name}'`);
      }
      if (REGISTER.test(name)) {
        throw new AssemblyError('InvalidSyntax', line, `label '${name}' collides with a register name`);
      }
      if (labels.has(name)) {
        throw new AssemblyError('DuplicateLabel', line, `label '${name}' is already defined`, name);
      }
      labels.set(name, statements.length);
      text = text.slice(colon + 1).trim();
      if (!text) continue;
    }
    statements.push({ line, text });
  }
  return { statements, labels };
}

function checkRegister(id: number, registerCount: number, line: number, token: string): number {
  if (id >= registerCount) {
    throw new AssemblyError('RegisterOutOfRange', line, `${token}: only r0-r${registerCount - 1} exist`);
  }
  return id;
}

function classify(token: string, labels: ReadonlyMap<string, number>, registerCount: number, line: number): Operand {
  let m = REGISTER.exec(token);
  if (m) return { kind: 'register', register: checkRegister(Number(m[1]), registerCount, line, token) };

  m = INDIRECT.exec(token);
  if (m) return { kind: 'indirect', register: checkRegister(Number(m[1]), registerCount, line, token) };

  m = DIRECT.exec(token);
  if (m) {
    const address = parseInteger(m[1]);
    if (address === null || address < 0) {
      throw new AssemblyError('InvalidSyntax', line, `invalid memory reference '${token}'`);
    }
    return { kind: 'direct', address };
  }

  const value = parseInteger(token);
  if (value !== null) return { kind: 'immediate', value };

  if (LABEL_NAME.test(token)) {
    const target = labels.get(token);
    if (target === undefined) {
      throw new AssemblyError('UndefinedLabel', line, `undefined label '${token}'`, token);
    }
    return { kind: 'label', name: token, target };
  }

  throw new AssemblyError('InvalidSyntax', line, `unrecognised operand '${token}'`);
}

function encode(stmt: SourceStatement, labels: ReadonlyMap<string, number>, registerCount: number): Instruction {
  const [head, ...tokens] = stmt.text.split(/[\s,]+/).filter((t) => t.length > 0);
  if (head === undefined) {
    throw new AssemblyError('InvalidSyntax', stmt.line, `cannot parse '${stmt.text}'`);
  }
  const mnemonic = head.toUpperCase();
  if (!isOpcode(mnemonic)) {
    throw new AssemblyError('UnknownMnemonic', stmt.line, `unknown mnemonic '${head}'`);
  }

  const signature = OPCODE_SIGNATURES[mnemonic];
  if (tokens.length !== signature.length) {
    throw new AssemblyError(
      'ArityMismatch',
      stmt.line,
      `${mnemonic} expects ${signature.length} operand(s), got ${tokens.length}`,
    );
  }

  const operands = tokens.map((token, i) => {
    const operand = classify(token, labels, registerCount, stmt.line);
    if (!slotAccepts(signature[i], operand.kind)) {
      throw new AssemblyError(
        'OperandKindMismatch',
        stmt.line,
        `${mnemonic} operand ${i + 1} ('${token}') cannot be ${operand.kind}`,
      );
    }
    return operand;
  });

  return { opcode: mnemonic, operands, line: stmt.line, source: stmt.text };
}

export function assemble(source: string, registerCount: number = DEFAULT_REGISTER_COUNT): Program {
  const { statements, labels } = scan(source);
  const instructions = statements.map((stmt) => encode(stmt, labels, registerCount));
  return { labels, instructions };
}

import type { Word } from './types';

export function wordModulus(bits: number): number {
  return 2 ** bits;
}

// Reduce any safe integer into [0, 2^bits).
export function wrap(value: number, bits: number): Word {
  const m = wordModulus(bits);
  const r = value % m;
  return r < 0 ? r + m : r + 0; // + 0 folds -0
}

export function toSigned(word: Word, bits: number): number {
  return word >= 2 ** (bits - 1) ? word - wordModulus(bits) : word;
}

export function mulWrap(a: Word, b: Word, bits: number): Word {
  const p = a * b;
  if (Number.isSafeInteger(p)) return wrap(p, bits);
  return Number(BigInt.asUintN(bits, BigInt(a) * BigInt(b)));
}

// Logical shift; anything shifted past the word width is gone.
export function shlWrap(a: Word, n: Word, bits: number): Word {
  if (n >= bits) return 0;
  const p = a * 2 ** n;
  if (Number.isSafeInteger(p)) return wrap(p, bits);
  return Number(BigInt.asUintN(bits, BigInt(a) << BigInt(n)));
}

// Logical shift right; zeros come in from the top.
export function shrWrap(a: Word, n: Word, bits: number): Word {
  return n >= bits ? 0 : a >>> n;
}

// Bitwise ops work on the unsigned 32-bit view; inputs are already < 2^bits.
export function andWord(a: Word, b: Word): Word {
  return (a & b) >>> 0;
}

export function orWord(a: Word, b: Word): Word {
  return (a | b) >>> 0;
}

export function xorWord(a: Word, b: Word): Word {
  return (a ^ b) >>> 0;
}

export function notWord(a: Word, bits: number): Word {
  return wrap(~a >>> 0, bits);
}

// Signed division truncated toward zero. Caller rejects b === 0.
export function divTrunc(a: Word, b: Word, bits: number): Word {
  const q = BigInt(toSigned(a, bits)) / BigInt(toSigned(b, bits));
  return Number(BigInt.asUintN(bits, q));
}

// Signed remainder, sign follows the dividend. Caller rejects b === 0.
export function modTrunc(a: Word, b: Word, bits: number): Word {
  return wrap(toSigned(a, bits) % toSigned(b, bits), bits);
}

import type { Hash } from '../types/primitives';

const RegExpHex = /^0x[0-9a-fA-F]*$/;

export const isHash = (x: unknown, length?: number): boolean => {
  if (!x || typeof x !== 'string') return false;
  return (length === undefined || x.length === length) && RegExpHex.test(x);
};

// 0x-prefixed hex of length 66 (32 bytes + '0x'): transaction and block hashes
export const isHash66 = (x: unknown): x is Hash => isHash(x, 66);

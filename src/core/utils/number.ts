import type { Hex } from '../types/primitives';

export const isNumber = (x: unknown): x is number => typeof x === 'number' && Number.isFinite(x);

export const isBigint = (x: unknown): x is bigint => typeof x === 'bigint';

const RegExpQuantity = /^0x[0-9a-fA-F]+$/;

// JSON-RPC quantities are 0x-prefixed hex without leading zeroes ("0x0" for zero).
export const isQuantity = (x: unknown): x is Hex => typeof x === 'string' && RegExpQuantity.test(x);

export function toQuantity(value: bigint | number): Hex {
  const big = typeof value === 'bigint' ? value : BigInt(value);
  if (big < 0n) throw new RangeError(`Quantity must be non-negative, got ${big.toString()}`);
  return `0x${big.toString(16)}`;
}

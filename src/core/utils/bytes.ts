import type { Hex } from '../types/primitives';

const RegExpEvenHex = /^0x(?:[0-9a-fA-F]{2})*$/;

export const isBytesHex = (x: unknown): x is Hex => typeof x === 'string' && RegExpEvenHex.test(x);

// '0x' decodes to an empty array; callers check the shape with isBytesHex first.
export function hexToBytes(hex: Hex): Uint8Array {
  const body = hex.slice(2);
  const out = new Uint8Array(body.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(body.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/* ------------------------------------------------------------------
   Shared fixtures: a bare byte-array carrier of any length
   ------------------------------------------------------------------ */
import type { Carrier, ColorBytes, Dimensions } from '../../src/carrier/Carrier.js';

export class ArrayCarrier implements Carrier<ArrayCarrier> {
  constructor(readonly bytes: Uint8Array) {}

  static of(length: number, fill = 0): ArrayCarrier {
    return new ArrayCarrier(new Uint8Array(length).fill(fill));
  }

  colorBytes(): ColorBytes {
    const bytes = this.bytes;
    return {
      length: bytes.length,
      get: i => bytes[i],
      set: (i, v) => { bytes[i] = v; },
    };
  }

  dimensions(): Dimensions {
    return { width: this.bytes.length, height: 1 };
  }

  clone(): ArrayCarrier {
    return new ArrayCarrier(this.bytes.slice());
  }
}

/** Bit 0 of every byte, in order. */
export const lsbs = (u8: Uint8Array): number[] => Array.from(u8, b => b & 1);

/** `bits` zeroes with `ones` set at the listed positions. */
export function bitVector(bits: number, ones: number[]): number[] {
  const out = new Array<number>(bits).fill(0);
  for (const i of ones) out[i] = 1;
  return out;
}

export const toHex = (u8: Uint8Array): string =>
  Array.from(u8, b => b.toString(16).padStart(2, '0')).join('');

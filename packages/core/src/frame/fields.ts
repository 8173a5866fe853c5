// packages/core/src/frame/fields.ts
import type { BitChannel } from '../channel/BitChannel.js';
import { BITS_PER_BYTE } from '../config/defaults.js';

/* ------------------------------------------------------------------
   Field-level bit I/O. Length fields go out bit 0 first; byte strings
   go out byte by byte, most significant bit first.
   ------------------------------------------------------------------ */

export function writeUintLE(ch: BitChannel, value: bigint, bits: number): void {
  if (value < 0n || value >> BigInt(bits) !== 0n) {
    throw new RangeError(`${value} does not fit in ${bits} bits`);
  }
  for (let i = 0; i < bits; i++) {
    ch.writeBit(((value >> BigInt(i)) & 1n) === 1n ? 1 : 0);
  }
}

export function readUintLE(ch: BitChannel, bits: number): bigint {
  let value = 0n;
  for (let i = 0; i < bits; i++) {
    if (ch.readBit() === 1) value |= 1n << BigInt(i);
  }
  return value;
}

export function writeBytesMSB(ch: BitChannel, bytes: Uint8Array): void {
  for (const byte of bytes) {
    for (let bit = BITS_PER_BYTE - 1; bit >= 0; bit--) {
      ch.writeBit(((byte >> bit) & 1) === 1 ? 1 : 0);
    }
  }
}

export function readBytesMSB(ch: BitChannel, count: number): Uint8Array {
  const out = new Uint8Array(count);
  for (let i = 0; i < count; i++) {
    let byte = 0;
    for (let bit = 0; bit < BITS_PER_BYTE; bit++) {
      byte = (byte << 1) | ch.readBit();
    }
    out[i] = byte;
  }
  return out;
}

// packages/core/src/frame/layout.ts
import {
  BITS_PER_BYTE,
  COLOR_CHANNELS,
  FRAME_FIXED_BITS,
} from '../config/defaults.js';
import type { Dimensions } from '../carrier/Carrier.js';

/** Color bytes (= bits) a frame occupies. */
export function frameBits(filenameLength: number, payloadLength: number): number {
  return FRAME_FIXED_BITS + (filenameLength + payloadLength) * BITS_PER_BYTE;
}

export function capacityBits({ width, height }: Dimensions): number {
  return width * height * COLOR_CHANNELS;
}

/** Largest payload that fits beside a filename of the given byte length (0 if none). */
export function maxPayloadBytes(totalBits: number, filenameLength: number): number {
  const free = totalBits - frameBits(filenameLength, 0);
  return free > 0 ? Math.floor(free / BITS_PER_BYTE) : 0;
}

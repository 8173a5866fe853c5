// packages/core/src/channel/BitChannel.ts
import type { ColorBytes } from '../carrier/Carrier.js';
import { CapacityExceededError } from '../errors/index.js';

export type Bit = 0 | 1;

/**
 * Sequential one-bit-per-byte access to a carrier's color bytes.
 * Only bit 0 of a byte is ever read or written.
 */
export class BitChannel {
  #cursor = 0;

  constructor(private readonly bytes: ColorBytes) {}

  /** Color bytes not yet consumed. */
  remainingBits(): number {
    return this.bytes.length - this.#cursor;
  }

  /** Number of bits consumed so far. */
  get position(): number {
    return this.#cursor;
  }

  writeBit(bit: Bit): void {
    const i = this.take();
    this.bytes.set(i, (this.bytes.get(i) & 0xFE) | bit);
  }

  readBit(): Bit {
    return (this.bytes.get(this.take()) & 1) === 1 ? 1 : 0;
  }

  private take(): number {
    if (this.#cursor >= this.bytes.length) {
      throw new CapacityExceededError(this.#cursor + 1, this.bytes.length, 'Bit channel exhausted');
    }
    return this.#cursor++;
  }
}

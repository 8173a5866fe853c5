// packages/core/src/frame/decoder.ts
import type { CarrierView } from '../carrier/Carrier.js';
import { BitChannel } from '../channel/BitChannel.js';
import { TruncatedCarrierError } from '../errors/index.js';
import { utf8DecodeLossy } from '../util/bytes.js';
import {
  BITS_PER_BYTE,
  FILENAME_LENGTH_BITS,
  PAYLOAD_LENGTH_BITS,
} from '../config/defaults.js';
import { readBytesMSB, readUintLE } from './fields.js';

export interface DecodedFrame {
  filename : string;
  payload  : Uint8Array;
}

export interface FrameHeader {
  filename      : string;
  payloadLength : number;
  /** Bits consumed by the header fields (everything before the payload). */
  headerBits    : number;
}

/** Fail unless `bits` more bits can be read. */
function ensure(ch: BitChannel, bits: bigint, field: string): void {
  const left = ch.remainingBits();
  if (bits > BigInt(left)) throw new TruncatedCarrierError(field, bits, left);
}

function readHeader(ch: BitChannel): FrameHeader {
  ensure(ch, BigInt(FILENAME_LENGTH_BITS), 'filename length');
  const nameLen = Number(readUintLE(ch, FILENAME_LENGTH_BITS));

  ensure(ch, BigInt(nameLen * BITS_PER_BYTE), 'filename');
  const filename = utf8DecodeLossy(readBytesMSB(ch, nameLen));

  ensure(ch, BigInt(PAYLOAD_LENGTH_BITS), 'payload length');
  const payloadLen = readUintLE(ch, PAYLOAD_LENGTH_BITS);

  // checked before allocating: a random image declares absurd lengths
  ensure(ch, payloadLen * BigInt(BITS_PER_BYTE), 'payload');

  return { filename, payloadLength: Number(payloadLen), headerBits: ch.position };
}

/**
 * Read only the header fields and validate that the declared payload fits.
 * @throws TruncatedCarrierError
 */
export function peekFrameHeader(carrier: CarrierView): FrameHeader {
  return readHeader(new BitChannel(carrier.colorBytes()));
}

/**
 * Recover `{ filename, payload }` from an encoded carrier.
 * @throws TruncatedCarrierError when a field runs past the last color byte
 */
export function decodeFrame(carrier: CarrierView): DecodedFrame {
  const ch     = new BitChannel(carrier.colorBytes());
  const header = readHeader(ch);
  return {
    filename : header.filename,
    payload  : readBytesMSB(ch, header.payloadLength),
  };
}

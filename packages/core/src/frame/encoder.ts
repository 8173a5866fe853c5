// packages/core/src/frame/encoder.ts
import type { Carrier } from '../carrier/Carrier.js';
import { BitChannel } from '../channel/BitChannel.js';
import { CapacityExceededError } from '../errors/index.js';
import { filenameBytes } from '../util/bytes.js';
import { FILENAME_LENGTH_BITS, PAYLOAD_LENGTH_BITS } from '../config/defaults.js';
import { frameBits } from './layout.js';
import { writeBytesMSB, writeUintLE } from './fields.js';

/**
 * Hide `payload` (and the name it goes by) in the color LSBs of a copy of
 * `carrier`. The input is never modified; on any error nothing has been
 * written anywhere.
 *
 * @throws FilenameTooLongError  filename exceeds 65535 UTF-8 bytes
 * @throws CapacityExceededError frame does not fit in the carrier
 */
export function encodeFrame<C extends Carrier<C>>(
  carrier  : C,
  filename : string | Uint8Array,
  payload  : Uint8Array,
): C {
  const name     = filenameBytes(filename);
  const required = frameBits(name.byteLength, payload.byteLength);
  const capacity = carrier.colorBytes().length;

  if (required > capacity) {
    throw new CapacityExceededError(required, capacity);
  }

  const out = carrier.clone();
  const ch  = new BitChannel(out.colorBytes());

  writeUintLE(ch, BigInt(name.byteLength), FILENAME_LENGTH_BITS);
  writeBytesMSB(ch, name);
  writeUintLE(ch, BigInt(payload.byteLength), PAYLOAD_LENGTH_BITS);
  writeBytesMSB(ch, payload);

  return out;
}

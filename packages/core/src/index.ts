// packages/core/src/index.ts

import type { Carrier, CarrierView, Dimensions } from './carrier/Carrier.js';
import { encodeFrame }                        from './frame/encoder.js';
import { decodeFrame, peekFrameHeader, type DecodedFrame } from './frame/decoder.js';
import { capacityBits, frameBits, maxPayloadBytes } from './frame/layout.js';
import { filenameBytes, toPayloadBytes }      from './util/bytes.js';
import { BITS_PER_BYTE }                    from './config/defaults.js';
import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring Pixstash instance behavior.
 */
export interface PixstashOptions {
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose? : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?  : (msg: string) => void;
}

export interface InspectResult {
  filename      : string;
  payloadLength : number;
  /** Color bytes the whole frame occupies */
  frameBits     : number;
  /** Color bytes the carrier offers */
  capacityBits  : number;
}

export interface CapacityResult {
  totalBits       : number;
  /** Header cost for the given filename */
  overheadBits    : number;
  maxPayloadBytes : number;
}

/**
 * Pixstash hides a named payload in the least-significant bits of an
 * image's color channels and recovers it again.
 */
export class Pixstash {
  private readonly log : Logger;

  constructor(opt: PixstashOptions = {}) {
    this.log = createLogger(opt.verbose ?? 0, opt.logger);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Theoretical payload capacity of an image of the given size.
   * @param filenameLength - UTF-8 byte length of the name stored with it
   */
  static maxPayloadBytes(dim: Dimensions, filenameLength = 0): number {
    return maxPayloadBytes(capacityBits(dim), filenameLength);
  }

  /** How much `carrier` can hold next to `filename`. */
  capacity(carrier: CarrierView, filename: string | Uint8Array = ''): CapacityResult {
    const total    = carrier.colorBytes().length;
    const nameLen  = filenameBytes(filename).byteLength;
    return {
      totalBits       : total,
      overheadBits    : frameBits(nameLen, 0),
      maxPayloadBytes : maxPayloadBytes(total, nameLen),
    };
  }

  /**
   * Read the header of an encoded carrier without extracting the payload.
   * @throws TruncatedCarrierError if the declared frame exceeds the carrier
   */
  inspect(carrier: CarrierView): InspectResult {
    const h = peekFrameHeader(carrier);
    this.log.log(3, `Header: ${h.headerBits} bits, payload ${h.payloadLength} bytes`);
    return {
      filename      : h.filename,
      payloadLength : h.payloadLength,
      frameBits     : h.headerBits + h.payloadLength * BITS_PER_BYTE,
      capacityBits  : carrier.colorBytes().length,
    };
  }

  /** Adjust verbosity level of internal logger at runtime. */
  setVerbose(level: Verbosity): void         { this.log.level = level; }
  /** Get the current logger verbosity setting. */
  getVerbose(): Verbosity                    { return this.log.level; }

  // ════════════════════════════════════════════════════════════════════════
  //  Encode / decode
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Embed `payload` under `filename` and return the encoded copy.
   * @param payload - raw bytes, or a string (stored as UTF-8)
   * @throws FilenameTooLongError | CapacityExceededError
   */
  encode<C extends Carrier<C>>(
    carrier  : C,
    filename : string | Uint8Array,
    payload  : string | Uint8Array,
  ): C {
    const bytes = toPayloadBytes(payload);
    const { width, height } = carrier.dimensions();
    this.log.log(1, `Start encoding into ${width}x${height} carrier`);
    this.log.log(2, `Payload ${bytes.byteLength} bytes, capacity ${carrier.colorBytes().length} bits`);

    const out = encodeFrame(carrier, filename, bytes);

    this.log.log(1, 'Encoding finished');
    return out;
  }

  /**
   * Extract the filename and payload from an encoded carrier.
   * @throws TruncatedCarrierError
   */
  decode(carrier: CarrierView): DecodedFrame {
    this.log.log(1, 'Start decoding');
    const frame = decodeFrame(carrier);
    this.log.log(2, `Recovered '${frame.filename}' (${frame.payload.byteLength} bytes)`);
    this.log.log(1, 'Decoding finished');
    return frame;
  }
}

export type { Carrier, CarrierView, ColorBytes, Dimensions } from './carrier/Carrier.js';
export { PixelBuffer, type ChannelCount } from './carrier/PixelBuffer.js';
export { BitChannel, type Bit }           from './channel/BitChannel.js';
export { encodeFrame }                    from './frame/encoder.js';
export { decodeFrame, peekFrameHeader, type DecodedFrame, type FrameHeader } from './frame/decoder.js';
export { frameBits, capacityBits }        from './frame/layout.js';
export { createLogger, toVerbosity, type Verbosity, type Logger } from './util/logger.js';
export * from './errors/index.js';
export * from './config/defaults.js';

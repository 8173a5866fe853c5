// packages/core/src/carrier/PixelBuffer.ts
import type { Carrier, ColorBytes, Dimensions } from './Carrier.js';
import { COLOR_CHANNELS } from '../config/defaults.js';

export type ChannelCount = 3 | 4;

/**
 * In-memory 8-bit image, interleaved RGB or RGBA. The color-byte view
 * skips the alpha byte of every pixel, so index `i` maps to
 * pixel `⌊i / 3⌋`, channel `i % 3`.
 */
export class PixelBuffer implements Carrier<PixelBuffer> {
  constructor(
    readonly width    : number,
    readonly height   : number,
    readonly data     : Uint8Array,
    readonly channels : ChannelCount = 4,
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Invalid image dimensions: ${width}x${height}`);
    }
    const expected = width * height * channels;
    if (data.byteLength !== expected) {
      throw new RangeError(
        `Pixel data is ${data.byteLength} bytes; ${width}x${height}x${channels} needs ${expected}`,
      );
    }
  }

  /** Blank (all-zero) image of the given size. */
  static alloc(width: number, height: number, channels: ChannelCount = 4): PixelBuffer {
    return new PixelBuffer(width, height, new Uint8Array(width * height * channels), channels);
  }

  dimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  colorBytes(): ColorBytes {
    const { data, channels } = this;
    const length = this.width * this.height * COLOR_CHANNELS;

    // RGB data is already the color sequence
    if (channels === COLOR_CHANNELS) {
      return {
        length,
        get: i => data[i],
        set: (i, v) => { data[i] = v; },
      };
    }

    const offset = (i: number) => Math.floor(i / COLOR_CHANNELS) * channels + (i % COLOR_CHANNELS);
    return {
      length,
      get: i => data[offset(i)],
      set: (i, v) => { data[offset(i)] = v; },
    };
  }

  clone(): PixelBuffer {
    return new PixelBuffer(this.width, this.height, this.data.slice(), this.channels);
  }
}
